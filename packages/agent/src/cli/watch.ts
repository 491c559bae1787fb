import type { DataSource } from '@hostsnap/shared';
import type { BuiltinCategory, CategoryRecords } from '@hostsnap/sources';
import { type AgentConfig, loadConfig } from '../config.js';
import { logger } from '../logger.js';
import { errorMessage } from '../runtime/errors.js';
import { type HostSnapshotOptions, createHostSnapshot } from '../runtime/host-snapshot.js';
import type { RefreshReport } from '../runtime/root-snapshot.js';
import { SnapshotWatcher } from '../runtime/watcher.js';
import { createDefaultDataSource, resolveCategories, snapshotOptionsFrom } from './common.js';

export interface WatchCommandOptions {
  /** Overrides the configured interval */
  intervalMs?: number;
  sync?: boolean;
  categories?: readonly BuiltinCategory[];
}

export interface WatchCommandDeps {
  config: AgentConfig;
  dataSource: DataSource<CategoryRecords>;
  log: (msg: string) => void;
  warn: (msg: string) => void;
  snapshotOptions?: HostSnapshotOptions;
}

function createDefaultDeps(): WatchCommandDeps {
  const config = loadConfig();
  return {
    config,
    dataSource: createDefaultDataSource(config),
    log: console.log,
    warn: console.error,
  };
}

/** One line per cycle; the first cycle only establishes the baseline */
export function formatCycle(report: RefreshReport, cycle: number): string {
  const at = report.startedAt.toISOString();
  if (report.changed.length > 0) return `[${at}] changed: ${report.changed.join(', ')}`;
  if (cycle === 1) return `[${at}] baseline: ${report.succeeded.length} categories`;
  return `[${at}] no changes`;
}

export interface WatchHandle {
  watcher: SnapshotWatcher;
  /** Stops the watcher and closes the data source */
  stop: () => Promise<void>;
}

/** Starts refreshing on an interval, printing the changed categories each cycle */
export async function cmdWatch(
  options: WatchCommandOptions = {},
  deps?: WatchCommandDeps,
): Promise<WatchHandle> {
  const { config, dataSource, log, warn, snapshotOptions } = deps ?? createDefaultDeps();
  const intervalMs = options.intervalMs ?? config.intervalMs;

  await dataSource.open();
  const root = createHostSnapshot(dataSource, resolveCategories(options.categories, config), {
    ...snapshotOptionsFrom(config),
    ...snapshotOptions,
  });

  const watcher = new SnapshotWatcher(root, {
    intervalMs,
    mode: options.sync ? 'sync' : 'async',
    logger,
    onRefresh: (report, cycle) => {
      log(formatCycle(report, cycle));
      for (const failure of report.failed) {
        warn(`  ${failure.category} not refreshed: ${errorMessage(failure.error)}`);
      }
    },
    onError: (err) => warn(`Refresh cycle failed: ${errorMessage(err)}`),
  });

  log(`Watching ${root.categories().length} categories every ${intervalMs}ms (Ctrl-C to stop)`);
  watcher.start();

  return {
    watcher,
    stop: async () => {
      await watcher.stop();
      await dataSource.close();
    },
  };
}
