import type { CategorySource, SnapshotDocument } from '@hostsnap/shared';
import { SnapshotDocument as SnapshotDocumentSchema } from '@hostsnap/shared';
import { describe, expect, it } from 'vitest';
import { CategorySnapshot } from './category-snapshot.js';
import { AggregateRefreshError, QueryFailure, SnapshotError } from './errors.js';
import { RootSnapshot, assertRefreshed } from './root-snapshot.js';

interface Proc {
  pid: number;
}

interface Thread {
  pid: number;
  tid: number;
}

/** Source whose answer can be swapped between refreshes */
class MutableSource<R> implements CategorySource<R> {
  rows: R[] = [];
  error: Error | null = null;
  delayMs = 0;
  calls = 0;

  async query(): Promise<R[]> {
    this.calls++;
    if (this.delayMs > 0) await new Promise((r) => setTimeout(r, this.delayMs));
    return this.querySync();
  }

  querySync(): R[] {
    if (this.error) throw this.error;
    return [...this.rows];
  }
}

const threadRows: Thread[] = [
  { pid: 10, tid: 10 },
  { pid: 10, tid: 11 },
  { pid: 20, tid: 20 },
  { pid: 30, tid: 30 },
  { pid: 30, tid: 31 },
];

function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}

/** One second later on every call, starting at 10:00:00 */
function tickingClock(): () => Date {
  let seconds = 0;
  return () => new Date(Date.UTC(2024, 2, 1, 10, 0, seconds++));
}

function setup(options: { firstRefresh?: 'unchanged' | 'changed' } = {}) {
  const processes = new MutableSource<Proc>();
  const threads = new MutableSource<Thread>();
  processes.rows = [{ pid: 10 }, { pid: 20 }, { pid: 30 }];
  threads.rows = threadRows;

  const root = new RootSnapshot(
    {
      processes: new CategorySnapshot('processes', processes, {
        ...options,
        now: fixedClock('2024-03-01T10:00:00.000Z'),
      }),
      threads: new CategorySnapshot('threads', threads, {
        ...options,
        now: fixedClock('2024-03-01T10:00:05.000Z'),
      }),
    },
    { hostname: 'test-host', now: fixedClock('2024-03-01T10:01:00.000Z') },
  );
  return { root, processes, threads };
}

describe('RootSnapshot', () => {
  it('lists categories in registration order and returns typed children', () => {
    const { root } = setup();

    expect(root.categories()).toEqual(['processes', 'threads']);
    expect(root.category('threads').category).toBe('threads');
  });

  it('detects which category changed between two refreshes', () => {
    const { root, processes } = setup();

    const first = root.refresh();
    expect(first.failed).toEqual([]);
    expect(first.changed).toEqual([]);
    expect(root.category('processes').records).toHaveLength(3);
    expect(root.category('threads').records).toHaveLength(5);

    processes.rows = [{ pid: 10 }, { pid: 20 }, { pid: 40 }];
    const second = root.refresh();

    expect(root.category('processes').changed).toBe(true);
    expect(root.category('threads').changed).toBe(false);
    expect(second.changed).toEqual(['processes']);
    expect(root.changedCategories()).toEqual(['processes']);
  });

  it('reports every category as changed on first refresh under the changed policy', async () => {
    const { root } = setup({ firstRefresh: 'changed' });

    const report = await root.refreshAsync();

    expect(report.changed).toEqual(['processes', 'threads']);
  });

  it('isolates a failing category from the others', () => {
    const { root, processes, threads } = setup();
    root.refresh();

    processes.rows = [{ pid: 99 }];
    threads.error = new Error('ps: permission denied');
    const report = root.refresh();

    expect(report.succeeded).toEqual(['processes']);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0]?.category).toBe('threads');
    expect(report.failed[0]?.error).toBeInstanceOf(QueryFailure);
    expect(root.category('processes').records).toEqual([{ pid: 99 }]);
    expect(root.category('threads').records).toEqual(threadRows);
  });

  it('refreshes children concurrently and waits for the slowest', async () => {
    const { root, processes, threads } = setup();
    processes.delayMs = 40;
    threads.delayMs = 5;

    const report = await root.refreshAsync();

    expect(report.mode).toBe('async');
    expect(report.succeeded).toEqual(['processes', 'threads']);
    expect(root.category('processes').lastUpdated).not.toBeNull();
    expect(root.category('threads').lastUpdated).not.toBeNull();
  });

  it('starts every child before any finishes', async () => {
    const { root, processes, threads } = setup();
    processes.delayMs = 20;
    threads.delayMs = 20;

    const pending = root.refreshAsync();
    await new Promise((r) => setTimeout(r, 5));

    expect(processes.calls).toBe(1);
    expect(threads.calls).toBe(1);
    await pending;
  });

  it('honours a concurrency limit of one', async () => {
    const { root, processes, threads } = setup();
    processes.delayMs = 20;
    threads.delayMs = 20;

    const pending = root.refreshAsync({ concurrency: 1 });
    await new Promise((r) => setTimeout(r, 5));

    expect(processes.calls).toBe(1);
    expect(threads.calls).toBe(0);
    await pending;
    expect(threads.calls).toBe(1);
  });

  it('collects async failures without rejecting', async () => {
    const { root, threads } = setup();
    threads.error = new Error('boom');

    const report = await root.refreshAsync();

    expect(report.succeeded).toEqual(['processes']);
    expect(report.failed.map((f) => f.category)).toEqual(['threads']);
  });

  it('leaves a failed category exactly as it was while the others move on', async () => {
    const processes = new MutableSource<Proc>();
    const threads = new MutableSource<Thread>();
    processes.rows = [{ pid: 10 }];
    threads.rows = threadRows;
    const root = new RootSnapshot(
      {
        processes: new CategorySnapshot('processes', processes, { now: tickingClock() }),
        threads: new CategorySnapshot('threads', threads, { now: tickingClock() }),
      },
      { hostname: 'test-host' },
    );

    await root.refreshAsync();
    const before = root.category('threads').current();
    expect(root.category('processes').lastUpdated).toEqual(new Date('2024-03-01T10:00:00.000Z'));

    threads.error = new Error('boom');
    const report = await root.refreshAsync();

    expect(report.failed.map((f) => f.category)).toEqual(['threads']);
    expect(root.category('threads').current()).toBe(before);
    expect(before.records).toEqual(threadRows);
    expect(before.lastUpdated).toEqual(new Date('2024-03-01T10:00:00.000Z'));
    expect(root.category('processes').lastUpdated).toEqual(new Date('2024-03-01T10:00:01.000Z'));
  });

  describe('lastUpdated', () => {
    it('is null before any refresh', () => {
      expect(setup().root.lastUpdated).toBeNull();
    });

    it('is null while any child has never refreshed', () => {
      const { root, threads } = setup();
      threads.error = new Error('boom');
      root.refresh();

      expect(root.lastUpdated).toBeNull();
    });

    it('is the oldest child timestamp', () => {
      const { root } = setup();
      root.refresh();

      expect(root.lastUpdated).toEqual(new Date('2024-03-01T10:00:00.000Z'));
    });

    it('is null for an empty root', () => {
      expect(new RootSnapshot({}).lastUpdated).toBeNull();
    });
  });

  it('rejects one snapshot registered under two names', () => {
    const shared = new CategorySnapshot('processes', new MutableSource<Proc>());

    expect(() => new RootSnapshot({ a: shared, b: shared })).toThrow(SnapshotError);
    expect(() => new RootSnapshot({ a: shared, b: shared })).toThrow(
      'Categories "a" and "b" share one snapshot instance',
    );
  });

  it('serializes to a valid snapshot document', () => {
    const { root } = setup();
    root.refresh();

    const doc: SnapshotDocument = root.toJSON();

    expect(SnapshotDocumentSchema.safeParse(doc).success).toBe(true);
    expect(doc.hostname).toBe('test-host');
    expect(doc.takenAt).toBe('2024-03-01T10:01:00.000Z');
    expect(doc.lastUpdated).toBe('2024-03-01T10:00:00.000Z');
    expect(doc.categories.processes).toMatchObject({
      records: [{ pid: 10 }, { pid: 20 }, { pid: 30 }],
      lastUpdated: '2024-03-01T10:00:00.000Z',
      changed: false,
    });
    expect(doc.categories.threads?.records).toHaveLength(5);
  });

  it('serializes never-refreshed categories with null timestamps', () => {
    const doc = setup().root.toJSON();

    expect(doc.lastUpdated).toBeNull();
    expect(doc.categories.processes?.lastUpdated).toBeNull();
    expect(doc.categories.processes?.records).toEqual([]);
  });
});

describe('assertRefreshed', () => {
  it('passes when nothing failed', () => {
    const { root } = setup();
    expect(() => assertRefreshed(root.refresh())).not.toThrow();
  });

  it('throws AggregateRefreshError listing failed categories', () => {
    const { root, processes, threads } = setup();
    processes.error = new Error('a');
    threads.error = new Error('b');
    const report = root.refresh();

    expect(() => assertRefreshed(report)).toThrow(AggregateRefreshError);
    expect(() => assertRefreshed(report)).toThrow(
      'Refresh failed for 2 categories: processes, threads',
    );
  });
});
