import { MAX_TIMER_MS, MIN_WATCH_INTERVAL_MS, type RefreshMode } from '@hostsnap/shared';
import { type Logger, logger as rootLogger } from '../logger.js';
import { errorMessage } from './errors.js';
import type { Refreshable, RefreshReport } from './root-snapshot.js';

export interface SnapshotWatcherOptions {
  intervalMs: number;
  mode?: RefreshMode;
  /** Called after every completed cycle, including ones with failed categories */
  onRefresh?: (report: RefreshReport, cycle: number) => void;
  /** Called when a cycle throws outright */
  onError?: (error: unknown) => void;
  logger?: Logger;
}

/**
 * Refreshes a snapshot on a fixed interval. The next cycle is scheduled only
 * after the previous one settles, so cycles never overlap.
 */
export class SnapshotWatcher {
  private readonly target: Refreshable;
  private readonly intervalMs: number;
  private readonly mode: RefreshMode;
  private readonly onRefresh?: (report: RefreshReport, cycle: number) => void;
  private readonly onError?: (error: unknown) => void;
  private readonly log: Logger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inflight: Promise<void> | null = null;
  private running = false;
  /** Bumped by start() and stop(); a timer chain from an older run stops rescheduling */
  private generation = 0;
  private cycles = 0;

  constructor(target: Refreshable, options: SnapshotWatcherOptions) {
    const { intervalMs } = options;
    if (!Number.isInteger(intervalMs) || intervalMs < MIN_WATCH_INTERVAL_MS || intervalMs > MAX_TIMER_MS) {
      throw new RangeError(
        `Watch interval must be an integer between ${MIN_WATCH_INTERVAL_MS} and ${MAX_TIMER_MS}ms, got ${intervalMs}`,
      );
    }
    this.target = target;
    this.intervalMs = options.intervalMs;
    this.mode = options.mode ?? 'async';
    this.onRefresh = options.onRefresh;
    this.onError = options.onError;
    this.log = options.logger ?? rootLogger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Completed cycles since construction */
  get cycleCount(): number {
    return this.cycles;
  }

  /**
   * Runs the first cycle immediately, then one every `intervalMs`. A cycle
   * still settling from before the last stop() finishes first.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    const generation = ++this.generation;

    const prior = this.inflight;
    if (prior === null) {
      this.schedule(0, generation);
      return;
    }
    // `prior` never rejects: cycle errors are caught before it settles
    void prior.then(() => {
      if (this.generation === generation) this.schedule(0, generation);
    });
  }

  /** Cancels the next cycle and resolves once any running cycle has settled */
  async stop(): Promise<void> {
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inflight;
  }

  private schedule(delayMs: number, generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inflight = this.cycle()
        .catch((err: unknown) => {
          this.log.error({ err: errorMessage(err) }, 'Watcher callback failed');
        })
        .finally(() => {
          this.inflight = null;
          if (this.running && this.generation === generation) {
            this.schedule(this.intervalMs, generation);
          }
        });
    }, delayMs);
  }

  private async cycle(): Promise<void> {
    let report: RefreshReport;
    try {
      report = this.mode === 'sync' ? this.target.refresh() : await this.target.refreshAsync();
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err) }, 'Snapshot refresh cycle failed');
      this.onError?.(err);
      return;
    }

    this.cycles++;
    this.log.debug(
      { cycle: this.cycles, changed: report.changed, failed: report.failed.length },
      'Watch cycle complete',
    );
    this.onRefresh?.(report, this.cycles);
  }
}
