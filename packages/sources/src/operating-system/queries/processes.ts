import type { CategoryHandler } from '../../types.js';

export interface ProcessRecord {
  pid: number;
  ppid: number;
  user: string;
  /** `ps` state code, e.g. "Ss" or "R+" */
  state: string;
  /** Full command line; kernel threads show as "[name]" */
  command: string;
}

const PS_LINE_RE = /^\s*(\d+)\s+(\d+)\s+(\S+)\s+(\S+)(?:\s+(.*))?$/;

/**
 * Runs `ps -eo pid=,ppid=,user=,stat=,args=`.
 * The trailing `=` on each column suppresses the header line.
 */
export const processes: CategoryHandler<ProcessRecord> = {
  command: 'ps',
  args: ['-eo', 'pid=,ppid=,user=,stat=,args='],
  scrub: true,
  parse: parsePsProcesses,
};

export function parsePsProcesses(stdout: string): ProcessRecord[] {
  const records: ProcessRecord[] = [];

  for (const line of stdout.split('\n')) {
    const match = PS_LINE_RE.exec(line);
    if (!match) continue;

    const [, pidStr, ppidStr, user, state, command] = match;
    if (!pidStr || !ppidStr || !user || !state) continue;

    records.push({
      pid: Number(pidStr),
      ppid: Number(ppidStr),
      user,
      state,
      command: (command ?? '').trim(),
    });
  }

  return records;
}
