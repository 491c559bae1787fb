import type { DataSource } from '@hostsnap/shared';
import {
  BUILTIN_CATEGORIES,
  type CategoryRecords,
  categoryDefinitions,
  isBuiltinCategory,
} from '@hostsnap/sources';
import { type AgentConfig, loadConfig } from '../config.js';
import { logger } from '../logger.js';
import { categorySnapshot } from '../runtime/category-snapshot.js';
import { stableStringify } from '../runtime/fingerprint.js';
import { createDefaultDataSource } from './common.js';

export interface FieldsCommandDeps {
  config: AgentConfig;
  dataSource: DataSource<CategoryRecords>;
  log: (msg: string) => void;
}

function createDefaultDeps(): FieldsCommandDeps {
  const config = loadConfig();
  return { config, dataSource: createDefaultDataSource(config), log: console.log };
}

/** Union of record keys in first-seen order */
export function collectFields(records: readonly unknown[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    if (typeof record !== 'object' || record === null) continue;
    for (const key of Object.keys(record)) fields.add(key);
  }
  return [...fields];
}

export interface FieldsResult {
  fields: string[];
  records: readonly unknown[];
}

/**
 * Queries a single category and prints its field names followed by each
 * raw row. Returns null for an unknown category.
 */
export async function cmdFields(
  category: string,
  deps?: FieldsCommandDeps,
): Promise<FieldsResult | null> {
  const { config, dataSource, log } = deps ?? createDefaultDeps();

  if (!isBuiltinCategory(category)) {
    log(`Error: Category "${category}" not found.`);
    log(`Available categories: ${BUILTIN_CATEGORIES.join(', ')}`);
    return null;
  }

  await dataSource.open();
  try {
    const snapshot = categorySnapshot(dataSource, category, {
      timeoutMs: config.queryTimeoutMs ?? categoryDefinitions.get(category)?.timeout,
      logger,
    });
    const { records } = await snapshot.refreshAsync();
    const fields = collectFields(records);

    log(`${category}: ${records.length} records`);
    log(`Fields: ${fields.join(', ')}`);
    log('');
    for (const record of records) {
      log(stableStringify(record));
    }
    return { fields, records };
  } finally {
    await dataSource.close();
  }
}
