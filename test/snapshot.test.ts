import {
  ExecDataSource,
  QueryTimeoutError,
  assertRefreshed,
  createHostDataSource,
  createHostSnapshot,
  createProcessTableSnapshot,
  diffSnapshots,
} from '@hostsnap/agent';
import { SnapshotDocument } from '@hostsnap/shared';
import { describe, expect, it } from 'vitest';

/** Simulated host whose process table can be edited between refreshes */
function simulatedHost() {
  const host = {
    pids: [10, 20, 30],
    threads: 5,
    hangThreads: false,
  };

  const psProcesses = (): string =>
    host.pids.map((pid) => `${String(pid).padStart(5)}     1 root     S    worker-${pid}`).join('\n');
  const psThreads = (): string =>
    Array.from({ length: host.threads }, (_, i) => `   10 ${100 + i} S    worker`).join('\n');

  const answer = (command: string, args: string[]): string => {
    if (command === 'ps' && args[0] === '-eo') return psProcesses();
    if (command === 'ps' && args[0] === '-eLo') return psThreads();
    throw new Error(`${command}: not installed`);
  };

  const dataSource = createHostDataSource({
    checker: { commandExists: (cmd) => cmd === 'ps' },
    exec: (command, args, options) => {
      if (host.hangThreads && args[0] === '-eLo') {
        return new Promise<string>((_, reject) => {
          options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      }
      return Promise.resolve(answer(command, args));
    },
    execSync: (command, args) => answer(command, args),
  });

  return { host, dataSource };
}

describe('process table snapshot', () => {
  it('detects the changed category across two refreshes', async () => {
    const { host, dataSource } = simulatedHost();
    await dataSource.open();
    const root = createProcessTableSnapshot(dataSource, { hostname: 'test-host' });

    assertRefreshed(root.refresh());
    expect(root.category('processes').records.map((p) => p.pid)).toEqual([10, 20, 30]);
    expect(root.category('threads').records).toHaveLength(5);
    expect(root.category('processes').changed).toBe(false);
    expect(root.category('threads').changed).toBe(false);
    const before = root.toJSON();

    host.pids = [10, 20, 40];
    assertRefreshed(await root.refreshAsync());

    expect(root.category('processes').changed).toBe(true);
    expect(root.category('threads').changed).toBe(false);
    expect(root.changedCategories()).toEqual(['processes']);

    const after = root.toJSON();
    expect(SnapshotDocument.safeParse(after).success).toBe(true);

    const diff = diffSnapshots(before, after);
    expect(diff.changed).toEqual(['processes']);
    expect(diff.categories.processes?.added).toEqual([
      { pid: 40, ppid: 1, user: 'root', state: 'S', command: 'worker-40' },
    ]);
    expect(diff.categories.processes?.removed).toEqual([
      { pid: 30, ppid: 1, user: 'root', state: 'S', command: 'worker-30' },
    ]);

    await dataSource.close();
  });

  it('keeps the last good threads table when a refresh times out', async () => {
    const { host, dataSource } = simulatedHost();
    await dataSource.open();
    const root = createProcessTableSnapshot(dataSource, { timeoutMs: 30 });
    await root.refreshAsync();
    const threadsBefore = root.category('threads').current();

    host.hangThreads = true;
    host.pids = [10];
    const report = await root.refreshAsync();

    expect(report.succeeded).toEqual(['processes']);
    expect(report.failed[0]?.error).toBeInstanceOf(QueryTimeoutError);
    expect(root.category('threads').current()).toBe(threadsBefore);
    expect(root.category('processes').records).toHaveLength(1);

    await dataSource.close();
  });
});

describe('host snapshot over unavailable categories', () => {
  it('refreshes what the host supports and reports the rest', async () => {
    const { dataSource } = simulatedHost();
    expect(dataSource).toBeInstanceOf(ExecDataSource);
    await dataSource.open();

    const root = createHostSnapshot(dataSource, ['processes', 'users', 'block-devices']);
    const report = await root.refreshAsync();

    expect(report.succeeded).toEqual(['processes']);
    expect(report.failed.map((f) => f.error.message)).toEqual([
      'Category "users" is unavailable: missing command(s) getent',
      'Category "block-devices" is unavailable: missing command(s) lsblk',
    ]);
    expect(root.lastUpdated).toBeNull();

    await dataSource.close();
  });

  it('fails every query once the data source is closed', async () => {
    const { dataSource } = simulatedHost();
    await dataSource.open();
    await dataSource.close();

    const report = createHostSnapshot(dataSource, ['processes']).refresh();

    expect(report.failed[0]?.error.name).toBe('DataSourceClosedError');
  });
});
