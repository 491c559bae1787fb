import { z } from 'zod';
import type { CategoryHandler } from '../../types.js';

export interface BlockDeviceRecord {
  name: string;
  /** "disk", "part", "lvm", "rom", ... */
  type: string;
  sizeBytes: number;
  model: string | null;
  mountpoint: string | null;
  /** Name of the enclosing device, null for top-level disks */
  parent: string | null;
}

interface LsblkDevice {
  name: string;
  type: string;
  size: number | string | null;
  model?: string | null;
  mountpoint?: string | null;
  children?: LsblkDevice[];
}

// Older lsblk releases print sizes as strings even with -b
const LsblkDevice: z.ZodType<LsblkDevice> = z.lazy(() =>
  z.object({
    name: z.string(),
    type: z.string(),
    size: z.union([z.number(), z.string(), z.null()]),
    model: z.string().nullable().optional(),
    mountpoint: z.string().nullable().optional(),
    children: z.array(LsblkDevice).optional(),
  }),
);

const LsblkOutput = z.object({
  blockdevices: z.array(LsblkDevice),
});

/**
 * Runs `lsblk -J -b -o NAME,TYPE,SIZE,MODEL,MOUNTPOINT` and flattens the
 * device tree into one record per device, parents first.
 */
export const blockDevices: CategoryHandler<BlockDeviceRecord> = {
  command: 'lsblk',
  args: ['-J', '-b', '-o', 'NAME,TYPE,SIZE,MODEL,MOUNTPOINT'],
  parse: parseLsblk,
};

export function parseLsblk(stdout: string): BlockDeviceRecord[] {
  const { blockdevices } = LsblkOutput.parse(JSON.parse(stdout));
  const records: BlockDeviceRecord[] = [];

  const visit = (device: LsblkDevice, parent: string | null): void => {
    const sizeBytes = Number(device.size ?? 0);
    records.push({
      name: device.name,
      type: device.type,
      sizeBytes: Number.isNaN(sizeBytes) ? 0 : sizeBytes,
      model: device.model?.trim() || null,
      mountpoint: device.mountpoint ?? null,
      parent,
    });
    for (const child of device.children ?? []) {
      visit(child, device.name);
    }
  };

  for (const device of blockdevices) {
    visit(device, null);
  }

  return records;
}
