import os from 'node:os';
import {
  DEFAULT_REFRESH_CONCURRENCY,
  type RefreshMode,
  type SerializedCategorySnapshot,
  type SnapshotDocument,
} from '@hostsnap/shared';
import { type Logger, logger as rootLogger } from '../logger.js';
import type { CategorySnapshot } from './category-snapshot.js';
import {
  AggregateRefreshError,
  type CategoryFailure,
  SnapshotError,
  toSnapshotError,
} from './errors.js';
import { settleAll } from './pool.js';

export type CategorySnapshots = Record<string, CategorySnapshot<unknown>>;

export interface RefreshReport {
  mode: RefreshMode;
  startedAt: Date;
  durationMs: number;
  /** Categories whose refresh committed */
  succeeded: string[];
  /** Categories that kept their previous state, with the reason */
  failed: CategoryFailure[];
  /** Committed categories whose records changed */
  changed: string[];
}

export interface RefreshAsyncOptions {
  /** Max child refreshes in flight; defaults to the snapshot's setting */
  concurrency?: number;
}

export interface RootSnapshotOptions {
  concurrency?: number;
  hostname?: string;
  /** Clock used for `takenAt` in serialized documents */
  now?: () => Date;
  logger?: Logger;
}

/** Anything that can be refreshed as a whole and report on it */
export interface Refreshable {
  refresh(): RefreshReport;
  refreshAsync(options?: RefreshAsyncOptions): Promise<RefreshReport>;
}

/**
 * Aggregate over a fixed set of category snapshots. Refreshing the root
 * refreshes every child; one child failing never blocks the others.
 */
export class RootSnapshot<C extends CategorySnapshots> implements Refreshable {
  private readonly children: Readonly<C>;
  private readonly entries: [string, CategorySnapshot<unknown>][];
  private readonly concurrency: number;
  private readonly hostname: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(children: C, options: RootSnapshotOptions = {}) {
    this.children = Object.freeze({ ...children });
    this.entries = Object.entries(this.children);

    const seen = new Map<CategorySnapshot<unknown>, string>();
    for (const [name, snapshot] of this.entries) {
      const other = seen.get(snapshot);
      if (other !== undefined) {
        throw new SnapshotError(`Categories "${other}" and "${name}" share one snapshot instance`);
      }
      seen.set(snapshot, name);
    }

    this.concurrency = options.concurrency ?? DEFAULT_REFRESH_CONCURRENCY;
    this.hostname = options.hostname ?? os.hostname();
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? rootLogger;
  }

  category<K extends keyof C>(name: K): C[K] {
    return this.children[name];
  }

  /** Category names in registration order */
  categories(): string[] {
    return this.entries.map(([name]) => name);
  }

  /**
   * Oldest `lastUpdated` across children, so the root never claims to be
   * fresher than its stalest part. Null while any child has never refreshed.
   */
  get lastUpdated(): Date | null {
    if (this.entries.length === 0) return null;

    let oldest: Date | null = null;
    for (const [, snapshot] of this.entries) {
      const updated = snapshot.lastUpdated;
      if (updated === null) return null;
      if (oldest === null || updated < oldest) oldest = updated;
    }
    return oldest;
  }

  /** Children whose last successful refresh changed their records */
  changedCategories(): string[] {
    return this.entries.filter(([, snapshot]) => snapshot.changed).map(([name]) => name);
  }

  /** Refreshes every child one after another on the calling thread */
  refresh(): RefreshReport {
    const startedAt = new Date();
    const start = Date.now();
    const succeeded: string[] = [];
    const failed: CategoryFailure[] = [];

    for (const [name, snapshot] of this.entries) {
      try {
        snapshot.refresh();
        succeeded.push(name);
      } catch (err: unknown) {
        failed.push({ category: name, error: toSnapshotError(name, err) });
      }
    }

    return this.report('sync', startedAt, start, succeeded, failed);
  }

  /**
   * Starts child refreshes concurrently, at most `concurrency` at a time,
   * and resolves once all have settled.
   */
  async refreshAsync(options: RefreshAsyncOptions = {}): Promise<RefreshReport> {
    const startedAt = new Date();
    const start = Date.now();
    const limit = options.concurrency ?? this.concurrency;

    const outcomes = await settleAll(this.entries, limit, ([, snapshot]) =>
      snapshot.refreshAsync(),
    );

    const succeeded: string[] = [];
    const failed: CategoryFailure[] = [];
    for (const outcome of outcomes) {
      const [name] = outcome.item;
      if (outcome.status === 'fulfilled') {
        succeeded.push(name);
      } else {
        failed.push({ category: name, error: toSnapshotError(name, outcome.reason) });
      }
    }

    return this.report('async', startedAt, start, succeeded, failed);
  }

  toJSON(): SnapshotDocument {
    const categories: Record<string, SerializedCategorySnapshot> = {};
    for (const [name, snapshot] of this.entries) {
      const state = snapshot.current();
      categories[name] = {
        records: [...state.records],
        lastUpdated: state.lastUpdated?.toISOString() ?? null,
        changed: state.changed,
        fingerprint: state.fingerprint,
      };
    }

    return {
      hostname: this.hostname,
      takenAt: this.now().toISOString(),
      lastUpdated: this.lastUpdated?.toISOString() ?? null,
      categories,
    };
  }

  private report(
    mode: RefreshMode,
    startedAt: Date,
    start: number,
    succeeded: string[],
    failed: CategoryFailure[],
  ): RefreshReport {
    const committed = new Set(succeeded);
    const changed = this.entries
      .filter(([name, snapshot]) => committed.has(name) && snapshot.changed)
      .map(([name]) => name);
    const durationMs = Date.now() - start;

    if (failed.length > 0) {
      this.log.warn(
        { mode, failed: failed.map((f) => ({ category: f.category, err: f.error.message })) },
        'Snapshot refresh finished with failures',
      );
    } else {
      this.log.info({ mode, categories: succeeded.length, changed, durationMs }, 'Snapshot refreshed');
    }

    return { mode, startedAt, durationMs, succeeded, failed, changed };
  }
}

/** Throws AggregateRefreshError when any category in the report failed */
export function assertRefreshed(report: RefreshReport): void {
  if (report.failed.length > 0) {
    throw new AggregateRefreshError(report.failed);
  }
}
