import type { DataSource } from '@hostsnap/shared';
import type { CategoryRecords } from '@hostsnap/sources';
import { describe, expect, it, vi } from 'vitest';
import type { SystemChecker } from '../system/scanner.js';
import {
  createHostDataSource,
  createHostSnapshot,
  createProcessTableSnapshot,
} from './host-snapshot.js';

const fixtures: { [K in keyof CategoryRecords]: CategoryRecords[K][] } = {
  processes: [{ pid: 1, ppid: 0, user: 'root', state: 'Ss', command: '/sbin/init' }],
  threads: [{ pid: 1, tid: 1, state: 'Ss', name: 'systemd' }],
  services: [],
  filesystems: [],
  users: [{ name: 'root', uid: 0, gid: 0, gecos: 'root', home: '/root', shell: '/bin/bash' }],
  'block-devices': [],
  'network-interfaces': [],
};

function fixtureSource() {
  const timeouts: Record<string, number> = {};
  const dataSource: DataSource<CategoryRecords> = {
    open: async () => {},
    close: async () => {},
    query: async <K extends keyof CategoryRecords>(
      category: K,
      options: { timeoutMs: number },
    ): Promise<CategoryRecords[K][]> => {
      timeouts[category] = options.timeoutMs;
      return fixtures[category];
    },
    querySync: <K extends keyof CategoryRecords>(category: K): CategoryRecords[K][] =>
      fixtures[category],
  };
  return { dataSource, timeouts };
}

describe('createHostSnapshot', () => {
  it('creates one child per category, dropping duplicates', () => {
    const { dataSource } = fixtureSource();

    const root = createHostSnapshot(dataSource, ['users', 'processes', 'users']);

    expect(root.categories()).toEqual(['users', 'processes']);
  });

  it('uses each category definition timeout unless overridden', async () => {
    const { dataSource, timeouts } = fixtureSource();

    await createHostSnapshot(dataSource, ['processes', 'threads']).refreshAsync();
    expect(timeouts).toEqual({ processes: 10_000, threads: 15_000 });

    await createHostSnapshot(dataSource, ['processes'], { timeoutMs: 500 }).refreshAsync();
    expect(timeouts.processes).toBe(500);
  });

  it('applies the first-refresh policy to every child', () => {
    const { dataSource } = fixtureSource();
    const root = createHostSnapshot(dataSource, ['processes', 'users'], { firstRefresh: 'changed' });

    expect(root.refresh().changed).toEqual(['processes', 'users']);
  });
});

describe('createProcessTableSnapshot', () => {
  it('exposes typed process and thread children', () => {
    const { dataSource } = fixtureSource();
    const root = createProcessTableSnapshot(dataSource);

    root.refresh();

    expect(root.category('processes').records[0]?.command).toBe('/sbin/init');
    expect(root.category('threads').records[0]?.name).toBe('systemd');
  });
});

describe('createHostDataSource', () => {
  it('marks categories unavailable when their commands are missing', async () => {
    const checker: SystemChecker = { commandExists: (cmd) => cmd !== 'lsblk' };
    const exec = vi.fn(async () => '');
    const source = createHostDataSource({ checker, exec });

    await source.open();

    expect([...source.unavailableCategories().keys()]).toEqual(['block-devices']);
    await source.close();
  });
});
