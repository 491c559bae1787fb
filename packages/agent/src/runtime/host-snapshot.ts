import type { DataSource } from '@hostsnap/shared';
import {
  type BuiltinCategory,
  type CategoryRecords,
  type HostRecord,
  categoryDefinitions,
  categoryHandlers,
} from '@hostsnap/sources';
import {
  type CategorySnapshot,
  type CategorySnapshotOptions,
  categorySnapshot,
} from './category-snapshot.js';
import { ExecDataSource, type ExecDataSourceOptions } from './data-source.js';
import { RootSnapshot, type RootSnapshotOptions } from './root-snapshot.js';

export type HostSnapshotOptions = CategorySnapshotOptions & RootSnapshotOptions;

export type HostSnapshot = RootSnapshot<Record<string, CategorySnapshot<HostRecord>>>;

function childOptions(
  category: BuiltinCategory,
  options: HostSnapshotOptions,
): CategorySnapshotOptions {
  return {
    timeoutMs: options.timeoutMs ?? categoryDefinitions.get(category)?.timeout,
    firstRefresh: options.firstRefresh,
    now: options.now,
    logger: options.logger,
  };
}

/**
 * Builds a root snapshot over the given built-in categories. Without an
 * explicit timeout each category uses the timeout from its definition.
 */
export function createHostSnapshot(
  dataSource: DataSource<CategoryRecords>,
  categories: readonly BuiltinCategory[],
  options: HostSnapshotOptions = {},
): HostSnapshot {
  const children: Record<string, CategorySnapshot<HostRecord>> = {};
  for (const category of new Set(categories)) {
    children[category] = categorySnapshot(dataSource, category, childOptions(category, options));
  }
  return new RootSnapshot(children, options);
}

/** Typed root over the process and thread tables */
export function createProcessTableSnapshot(
  dataSource: DataSource<CategoryRecords>,
  options: HostSnapshotOptions = {},
) {
  return new RootSnapshot(
    {
      processes: categorySnapshot(dataSource, 'processes', childOptions('processes', options)),
      threads: categorySnapshot(dataSource, 'threads', childOptions('threads', options)),
    },
    options,
  );
}

/** Exec-backed data source over every built-in category */
export function createHostDataSource(
  options: Omit<ExecDataSourceOptions<CategoryRecords>, 'handlers' | 'definitions'> = {},
): ExecDataSource<CategoryRecords> {
  return new ExecDataSource({
    ...options,
    handlers: categoryHandlers,
    definitions: categoryDefinitions,
  });
}
