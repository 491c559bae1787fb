// Types
export {
  FirstRefreshPolicy,
  RefreshMode,
  Platform,
  DEFAULT_QUERY_TIMEOUT_MS,
  DEFAULT_REFRESH_CONCURRENCY,
  DEFAULT_WATCH_INTERVAL_MS,
  MIN_WATCH_INTERVAL_MS,
  MAX_TIMER_MS,
} from './types/common.js';
export type {
  RecordMap,
  CategoryName,
  QueryOptions,
  DataSource,
  CategorySource,
} from './types/data-source.js';
export { bindCategory } from './types/data-source.js';

// Schemas: Categories
export { CategoryRequirements, CategoryDefinition, SourceManifest } from './schemas/categories.js';

// Schemas: Snapshot documents
export { SerializedCategorySnapshot, SnapshotDocument } from './schemas/snapshot.js';
