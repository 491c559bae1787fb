import type { DataSource } from '@hostsnap/shared';
import {
  BUILTIN_CATEGORIES,
  type BuiltinCategory,
  type CategoryRecords,
  isBuiltinCategory,
} from '@hostsnap/sources';
import type { AgentConfig } from '../config.js';
import { logger } from '../logger.js';
import { ConfigError } from '../runtime/errors.js';
import { createHostDataSource, type HostSnapshotOptions } from '../runtime/host-snapshot.js';
import { buildPatterns } from '../runtime/scrubber.js';

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/** Parses a comma-separated category list, rejecting unknown names */
export function parseCategoryList(raw: string): BuiltinCategory[] {
  const names = raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  const unknown = names.filter((name) => !isBuiltinCategory(name));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown categor${unknown.length === 1 ? 'y' : 'ies'}: ${unknown.join(', ')}. Available: ${BUILTIN_CATEGORIES.join(', ')}`,
    );
  }
  return names.filter(isBuiltinCategory);
}

/** Category selection: explicit list, then config, then everything built in */
export function resolveCategories(
  explicit: readonly BuiltinCategory[] | undefined,
  config: AgentConfig,
): readonly BuiltinCategory[] {
  return explicit ?? config.categories ?? BUILTIN_CATEGORIES;
}

export function createDefaultDataSource(config: AgentConfig): DataSource<CategoryRecords> {
  return createHostDataSource({ scrubPatterns: buildPatterns(config.scrubPatterns), logger });
}

export function snapshotOptionsFrom(config: AgentConfig): HostSnapshotOptions {
  return {
    timeoutMs: config.queryTimeoutMs,
    firstRefresh: config.firstRefresh,
    concurrency: config.concurrency,
    logger,
  };
}
