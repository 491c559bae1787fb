import fs from 'node:fs';
import { SnapshotDocument } from '@hostsnap/shared';
import { SnapshotDocumentError, errorMessage } from '../runtime/errors.js';
import { type SnapshotDiff, diffSnapshots } from '../runtime/diff.js';
import { stableStringify } from '../runtime/fingerprint.js';

export interface DiffCommandDeps {
  readFile: (file: string) => string;
  log: (msg: string) => void;
}

function createDefaultDeps(): DiffCommandDeps {
  return {
    readFile: (file) => fs.readFileSync(file, 'utf-8'),
    log: console.log,
  };
}

export function loadSnapshotDocument(file: string, readFile: (file: string) => string): SnapshotDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(readFile(file));
  } catch (err: unknown) {
    throw new SnapshotDocumentError(`Cannot read snapshot ${file}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = SnapshotDocument.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SnapshotDocumentError(`Invalid snapshot document ${file} (${issues})`);
  }
  return parsed.data;
}

/** Compares two saved snapshot documents and prints added and removed records */
export function cmdDiff(beforeFile: string, afterFile: string, deps?: DiffCommandDeps): SnapshotDiff {
  const { readFile, log } = deps ?? createDefaultDeps();
  const before = loadSnapshotDocument(beforeFile, readFile);
  const after = loadSnapshotDocument(afterFile, readFile);
  const diff = diffSnapshots(before, after);

  for (const [name, category] of Object.entries(diff.categories)) {
    if (category.added.length === 0 && category.removed.length === 0) {
      log(`${name}: unchanged (${category.unchanged})`);
      continue;
    }
    log(`${name}: +${category.added.length} -${category.removed.length} =${category.unchanged}`);
    for (const record of category.added) log(`  + ${stableStringify(record)}`);
    for (const record of category.removed) log(`  - ${stableStringify(record)}`);
  }

  if (diff.addedCategories.length > 0) {
    log(`Only in ${afterFile}: ${diff.addedCategories.join(', ')}`);
  }
  if (diff.removedCategories.length > 0) {
    log(`Only in ${beforeFile}: ${diff.removedCategories.join(', ')}`);
  }

  return diff;
}
