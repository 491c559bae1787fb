import {
  type CategoryName,
  type CategorySource,
  DEFAULT_QUERY_TIMEOUT_MS,
  type DataSource,
  type FirstRefreshPolicy,
  MAX_TIMER_MS,
  type RecordMap,
  bindCategory,
} from '@hostsnap/shared';
import { type Logger, logger as rootLogger } from '../logger.js';
import {
  type QueryFailure,
  QueryTimeoutError,
  RefreshInProgressError,
  toQueryFailure,
} from './errors.js';
import { EMPTY_FINGERPRINT, fingerprintRecords } from './fingerprint.js';

/** Immutable view of one category at a point in time */
export interface CategoryState<R> {
  readonly records: readonly R[];
  /** When the last successful refresh committed; null until then */
  readonly lastUpdated: Date | null;
  /** Whether the last successful refresh altered the record collection */
  readonly changed: boolean;
  readonly fingerprint: string;
}

export interface CategorySnapshotOptions {
  /** Per-query deadline in ms */
  timeoutMs?: number;
  /** How the very first successful refresh reports `changed` */
  firstRefresh?: FirstRefreshPolicy;
  /** Clock used to stamp `lastUpdated` */
  now?: () => Date;
  logger?: Logger;
}

function freezeState<R>(state: CategoryState<R>): CategoryState<R> {
  return Object.freeze(state);
}

/**
 * Cached record collection for a single category.
 *
 * A refresh queries the source, compares the result against the committed
 * records and swaps in a new state in one step. A failed refresh leaves the
 * previous state untouched. Async refreshes on the same instance run one at
 * a time in call order.
 */
export class CategorySnapshot<R> {
  readonly category: string;
  private readonly source: CategorySource<R>;
  private readonly timeoutMs: number;
  private readonly firstRefresh: FirstRefreshPolicy;
  private readonly now: () => Date;
  private readonly log: Logger;
  private state: CategoryState<R>;
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(category: string, source: CategorySource<R>, options: CategorySnapshotOptions = {}) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMER_MS) {
      throw new RangeError(
        `Query timeout for "${category}" must be an integer between 1 and ${MAX_TIMER_MS}ms, got ${timeoutMs}`,
      );
    }
    this.category = category;
    this.source = source;
    this.timeoutMs = timeoutMs;
    this.firstRefresh = options.firstRefresh ?? 'unchanged';
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ category });
    this.state = freezeState({
      records: Object.freeze([]),
      lastUpdated: null,
      changed: false,
      fingerprint: EMPTY_FINGERPRINT,
    });
  }

  get records(): readonly R[] {
    return this.state.records;
  }

  get lastUpdated(): Date | null {
    return this.state.lastUpdated;
  }

  get changed(): boolean {
    return this.state.changed;
  }

  get fingerprint(): string {
    return this.state.fingerprint;
  }

  /** True while an async refresh is queued or running */
  get refreshing(): boolean {
    return this.pending > 0;
  }

  current(): CategoryState<R> {
    return this.state;
  }

  /**
   * Blocking refresh. Throws RefreshInProgressError if an async refresh on
   * this instance has not settled yet.
   */
  refresh(): CategoryState<R> {
    if (this.pending > 0) throw new RefreshInProgressError(this.category);

    const start = Date.now();
    let records: R[];
    try {
      records = this.source.querySync({ timeoutMs: this.timeoutMs });
    } catch (err: unknown) {
      throw this.fail(toQueryFailure(this.category, err), start);
    }
    return this.commit(records, start);
  }

  refreshAsync(): Promise<CategoryState<R>> {
    this.pending++;
    const run = this.queue.then(() => this.runQuery());
    // The queue only orders refreshes; callers observe the outcome through `run`
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run.finally(() => {
      this.pending--;
    });
  }

  private async runQuery(): Promise<CategoryState<R>> {
    const start = Date.now();
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new QueryTimeoutError(this.category, this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      const records = await Promise.race([
        this.source.query({ timeoutMs: this.timeoutMs, signal: controller.signal }),
        deadline,
      ]);
      return this.commit(records, start);
    } catch (err: unknown) {
      throw this.fail(toQueryFailure(this.category, err), start);
    } finally {
      clearTimeout(timer);
    }
  }

  private commit(records: R[], start: number): CategoryState<R> {
    const previous = this.state;
    const fingerprint = fingerprintRecords(records);
    const changed =
      previous.lastUpdated === null
        ? this.firstRefresh === 'changed'
        : previous.fingerprint !== fingerprint;

    this.state = freezeState({
      records: Object.freeze([...records]),
      lastUpdated: this.now(),
      changed,
      fingerprint,
    });

    this.log.debug(
      { records: records.length, changed, durationMs: Date.now() - start },
      'Category refreshed',
    );
    return this.state;
  }

  private fail(error: QueryFailure, start: number): QueryFailure {
    this.log.warn(
      { err: error.message, durationMs: Date.now() - start },
      'Category refresh failed; keeping previous records',
    );
    return error;
  }
}

/** Builds a snapshot for one category of a data source, typed by its record shape */
export function categorySnapshot<M extends RecordMap, K extends CategoryName<M>>(
  dataSource: DataSource<M>,
  category: K,
  options?: CategorySnapshotOptions,
): CategorySnapshot<M[K]> {
  return new CategorySnapshot(category, bindCategory(dataSource, category), options);
}
