import fs from 'node:fs';
import type { DataSource, SnapshotDocument } from '@hostsnap/shared';
import type { BuiltinCategory, CategoryRecords } from '@hostsnap/sources';
import { type AgentConfig, loadConfig } from '../config.js';
import { errorMessage } from '../runtime/errors.js';
import { type HostSnapshotOptions, createHostSnapshot } from '../runtime/host-snapshot.js';
import { type RefreshReport, assertRefreshed } from '../runtime/root-snapshot.js';
import { createDefaultDataSource, resolveCategories, snapshotOptionsFrom } from './common.js';

export interface SnapshotCommandOptions {
  /** Refresh categories one after another instead of concurrently */
  sync?: boolean;
  /** Fail when any category could not be refreshed */
  strict?: boolean;
  categories?: readonly BuiltinCategory[];
  /** Write the document here instead of stdout */
  out?: string;
}

export interface SnapshotCommandDeps {
  config: AgentConfig;
  dataSource: DataSource<CategoryRecords>;
  log: (msg: string) => void;
  warn: (msg: string) => void;
  writeFile: (file: string, contents: string) => void;
  snapshotOptions?: HostSnapshotOptions;
}

function createDefaultDeps(): SnapshotCommandDeps {
  const config = loadConfig();
  return {
    config,
    dataSource: createDefaultDataSource(config),
    log: console.log,
    warn: console.error,
    writeFile: (file, contents) => fs.writeFileSync(file, contents, 'utf-8'),
  };
}

export interface SnapshotCommandResult {
  document: SnapshotDocument;
  report: RefreshReport;
}

/** Takes one snapshot of the selected categories and emits it as JSON */
export async function cmdSnapshot(
  options: SnapshotCommandOptions = {},
  deps?: SnapshotCommandDeps,
): Promise<SnapshotCommandResult> {
  const { config, dataSource, log, warn, writeFile, snapshotOptions } =
    deps ?? createDefaultDeps();

  await dataSource.open();
  try {
    const root = createHostSnapshot(dataSource, resolveCategories(options.categories, config), {
      ...snapshotOptionsFrom(config),
      ...snapshotOptions,
    });

    const report = options.sync ? root.refresh() : await root.refreshAsync();
    const document = root.toJSON();
    const json = JSON.stringify(document, null, 2);

    if (options.out) {
      writeFile(options.out, `${json}\n`);
      log(`Snapshot written to ${options.out} (${report.succeeded.length} categories)`);
    } else {
      log(json);
    }

    for (const failure of report.failed) {
      warn(`Category "${failure.category}" not refreshed: ${errorMessage(failure.error)}`);
    }

    if (options.strict) assertRefreshed(report);
    return { document, report };
  } finally {
    await dataSource.close();
  }
}
