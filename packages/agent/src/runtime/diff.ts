import type { SnapshotDocument } from '@hostsnap/shared';
import { recordHash } from './fingerprint.js';

export interface CategoryDiff {
  added: unknown[];
  removed: unknown[];
  unchanged: number;
}

export interface SnapshotDiff {
  /** Categories present in both documents */
  categories: Record<string, CategoryDiff>;
  /** Categories with at least one added or removed record */
  changed: string[];
  /** Present only in the newer document */
  addedCategories: string[];
  /** Present only in the older document */
  removedCategories: string[];
}

/**
 * Multiset difference of two record collections. A record present twice
 * before and once after counts as one removal.
 */
export function diffRecords(before: readonly unknown[], after: readonly unknown[]): CategoryDiff {
  const unmatched = new Map<string, number>();
  const beforeHashes = before.map(recordHash);
  for (const hash of beforeHashes) {
    unmatched.set(hash, (unmatched.get(hash) ?? 0) + 1);
  }

  const added: unknown[] = [];
  let unchanged = 0;
  for (const record of after) {
    const hash = recordHash(record);
    const count = unmatched.get(hash) ?? 0;
    if (count > 0) {
      unmatched.set(hash, count - 1);
      unchanged++;
    } else {
      added.push(record);
    }
  }

  const removed: unknown[] = [];
  before.forEach((record, i) => {
    const hash = beforeHashes[i] ?? recordHash(record);
    const count = unmatched.get(hash) ?? 0;
    if (count > 0) {
      unmatched.set(hash, count - 1);
      removed.push(record);
    }
  });

  return { added, removed, unchanged };
}

export function diffSnapshots(previous: SnapshotDocument, next: SnapshotDocument): SnapshotDiff {
  const categories: Record<string, CategoryDiff> = {};
  const changed: string[] = [];
  const addedCategories: string[] = [];

  for (const [name, after] of Object.entries(next.categories)) {
    const before = previous.categories[name];
    if (before === undefined) {
      addedCategories.push(name);
      continue;
    }
    const diff = diffRecords(before.records, after.records);
    categories[name] = diff;
    if (diff.added.length > 0 || diff.removed.length > 0) changed.push(name);
  }

  const removedCategories = Object.keys(previous.categories).filter(
    (name) => !Object.hasOwn(next.categories, name),
  );

  return { categories, changed, addedCategories, removedCategories };
}
