import type { CategoryHandler } from '../../types.js';

export interface FilesystemRecord {
  filesystem: string;
  sizeKb: number;
  usedKb: number;
  availableKb: number;
  usePct: number;
  mountedOn: string;
}

/** Pseudo-filesystems left out of the inventory */
const PSEUDO_FILESYSTEMS = new Set(['tmpfs', 'devtmpfs', 'none', 'overlay']);

/**
 * Runs `df -kP`.
 * `-k` = 1K blocks, `-P` = POSIX portable output format (one line per fs).
 */
export const filesystems: CategoryHandler<FilesystemRecord> = {
  command: 'df',
  args: ['-kP'],
  parse: parseDfOutput,
};

export function parseDfOutput(stdout: string): FilesystemRecord[] {
  const lines = stdout.trim().split('\n');
  // Skip header line
  const dataLines = lines.slice(1);

  const records: FilesystemRecord[] = [];

  for (const line of dataLines) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 6) continue;

    const [filesystem, sizeStr, usedStr, availStr, pctStr, ...mountParts] = parts;
    if (!filesystem || !sizeStr || !usedStr || !availStr || !pctStr) continue;

    if (PSEUDO_FILESYSTEMS.has(filesystem)) continue;

    const sizeKb = Number(sizeStr);
    const usedKb = Number(usedStr);
    const availableKb = Number(availStr);
    const usePct = Number.parseInt(pctStr.replace('%', ''), 10);

    if (Number.isNaN(sizeKb) || Number.isNaN(usedKb)) continue;

    records.push({
      filesystem,
      sizeKb,
      usedKb,
      availableKb,
      usePct: Number.isNaN(usePct) ? 0 : usePct,
      mountedOn: mountParts.join(' '),
    });
  }

  return records;
}
