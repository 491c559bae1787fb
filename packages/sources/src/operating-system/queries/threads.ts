import type { CategoryHandler } from '../../types.js';

export interface ThreadRecord {
  /** Owning process */
  pid: number;
  /** Thread id (LWP) */
  tid: number;
  state: string;
  name: string;
}

const PS_THREAD_RE = /^\s*(\d+)\s+(\d+)\s+(\S+)\s+(.*)$/;

/**
 * Runs `ps -eLo pid=,lwp=,stat=,comm=`: one line per thread.
 */
export const threads: CategoryHandler<ThreadRecord> = {
  command: 'ps',
  args: ['-eLo', 'pid=,lwp=,stat=,comm='],
  scrub: true,
  parse: parsePsThreads,
};

export function parsePsThreads(stdout: string): ThreadRecord[] {
  const records: ThreadRecord[] = [];

  for (const line of stdout.split('\n')) {
    const match = PS_THREAD_RE.exec(line);
    if (!match) continue;

    const [, pidStr, tidStr, state, name] = match;
    if (!pidStr || !tidStr || !state || name === undefined) continue;

    records.push({ pid: Number(pidStr), tid: Number(tidStr), state, name: name.trim() });
  }

  return records;
}
