export {
  CategorySnapshot,
  categorySnapshot,
  type CategorySnapshotOptions,
  type CategoryState,
} from './category-snapshot.js';
export {
  RootSnapshot,
  assertRefreshed,
  type CategorySnapshots,
  type Refreshable,
  type RefreshAsyncOptions,
  type RefreshReport,
  type RootSnapshotOptions,
} from './root-snapshot.js';
export {
  ExecDataSource,
  MAX_OUTPUT_BYTES,
  type ExecDataSourceOptions,
  type ExecFn,
  type ExecOptions,
  type ExecSyncFn,
} from './data-source.js';
export {
  createHostDataSource,
  createHostSnapshot,
  createProcessTableSnapshot,
  type HostSnapshot,
  type HostSnapshotOptions,
} from './host-snapshot.js';
export { diffRecords, diffSnapshots, type CategoryDiff, type SnapshotDiff } from './diff.js';
export { SnapshotWatcher, type SnapshotWatcherOptions } from './watcher.js';
export { fingerprintRecords, recordHash, sameRecords, stableStringify } from './fingerprint.js';
export { settleAll, type Settled } from './pool.js';
export {
  DEFAULT_SCRUB_PATTERNS,
  buildPatterns,
  scrubString,
  type ScrubPattern,
} from './scrubber.js';
export {
  AggregateRefreshError,
  ConfigError,
  DataSourceClosedError,
  QueryFailure,
  QueryTimeoutError,
  RefreshInProgressError,
  SnapshotDocumentError,
  SnapshotError,
  type CategoryFailure,
} from './errors.js';
