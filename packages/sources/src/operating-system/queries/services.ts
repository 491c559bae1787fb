import { z } from 'zod';
import type { CategoryHandler } from '../../types.js';

const SystemctlUnit = z.object({
  unit: z.string(),
  load: z.string().default(''),
  active: z.string().default(''),
  sub: z.string().default(''),
  description: z.string().default(''),
});

export type ServiceRecord = z.infer<typeof SystemctlUnit>;

/**
 * Runs `systemctl list-units --type=service --all --no-pager --output=json`
 * and validates the JSON rows.
 */
export const services: CategoryHandler<ServiceRecord> = {
  command: 'systemctl',
  args: ['list-units', '--type=service', '--all', '--no-pager', '--output=json'],
  parse: parseServices,
};

export function parseServices(stdout: string): ServiceRecord[] {
  return z.array(SystemctlUnit).parse(JSON.parse(stdout));
}
