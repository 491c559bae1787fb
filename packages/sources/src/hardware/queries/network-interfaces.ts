import { z } from 'zod';
import type { CategoryHandler } from '../../types.js';

const IpLink = z.object({
  ifname: z.string(),
  mtu: z.number(),
  operstate: z.string().default('UNKNOWN'),
  address: z.string().optional(),
});

export interface NetworkInterfaceRecord {
  name: string;
  /** Link-layer address, null for interfaces without one */
  mac: string | null;
  mtu: number;
  /** Operational state as reported by the kernel, e.g. "UP" */
  state: string;
}

/** Runs `ip -j link show` (iproute2 JSON output). */
export const networkInterfaces: CategoryHandler<NetworkInterfaceRecord> = {
  command: 'ip',
  args: ['-j', 'link', 'show'],
  parse: parseIpLink,
};

export function parseIpLink(stdout: string): NetworkInterfaceRecord[] {
  const links = z.array(IpLink).parse(JSON.parse(stdout));
  return links.map((link) => ({
    name: link.ifname,
    mac: link.address ?? null,
    mtu: link.mtu,
    state: link.operstate,
  }));
}
