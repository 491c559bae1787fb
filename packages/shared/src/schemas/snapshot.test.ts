import { describe, expect, it } from 'vitest';
import { CategoryDefinition, SourceManifest } from './categories.js';
import { SnapshotDocument } from './snapshot.js';

describe('SnapshotDocument', () => {
  const valid = {
    hostname: 'test-host',
    takenAt: '2024-06-01T00:00:01.000Z',
    lastUpdated: null,
    categories: {
      processes: { records: [{ pid: 1 }], lastUpdated: null, changed: false, fingerprint: 'abc' },
    },
  };

  it('accepts a document with never-refreshed categories', () => {
    expect(SnapshotDocument.safeParse(valid).success).toBe(true);
  });

  it('rejects timestamps that are not ISO 8601', () => {
    expect(SnapshotDocument.safeParse({ ...valid, takenAt: 'yesterday' }).success).toBe(false);
  });

  it('rejects a category without a fingerprint', () => {
    const result = SnapshotDocument.safeParse({
      ...valid,
      categories: { processes: { records: [], lastUpdated: null, changed: false } },
    });
    expect(result.success).toBe(false);
  });
});

describe('CategoryDefinition', () => {
  it('fills in the default timeout and requirements', () => {
    expect(
      CategoryDefinition.parse({ name: 'users', description: 'Users', requires: {} }),
    ).toEqual({ name: 'users', description: 'Users', timeout: 30_000, requires: { commands: [] } });
  });

  it('rejects a timeout longer than a timer can wait', () => {
    const base = { name: 'users', description: 'Users', requires: {} };
    expect(CategoryDefinition.safeParse({ ...base, timeout: 2_147_483_648 }).success).toBe(false);
    expect(CategoryDefinition.safeParse({ ...base, timeout: 2_147_483_647 }).success).toBe(true);
  });

  it('rejects names that are not lowercase kebab-case', () => {
    expect(
      CategoryDefinition.safeParse({ name: 'Users', description: 'Users', requires: {} }).success,
    ).toBe(false);
  });
});

describe('SourceManifest', () => {
  it('requires at least one platform', () => {
    const result = SourceManifest.safeParse({
      name: 'hardware',
      version: '1.0.0',
      description: 'Hardware',
      platforms: [],
      categories: [],
    });
    expect(result.success).toBe(false);
  });
});
