import crypto from 'node:crypto';

/**
 * JSON with object keys sorted and `undefined` members dropped, so that two
 * structurally equal records always serialize to the same string.
 * Dates become ISO strings, bigints decimal strings.
 */
export function stableStringify(value: unknown): string {
  const stack = new WeakSet<object>();

  const normalize = (v: unknown): unknown => {
    if (typeof v === 'bigint') return v.toString();
    if (v === null || typeof v !== 'object') return v;
    if (v instanceof Date) return v.toISOString();

    if (stack.has(v)) return '[Circular]';
    stack.add(v);

    let out: unknown;
    if (Array.isArray(v)) {
      out = v.map(normalize);
    } else {
      const entries: [string, unknown][] = Object.entries(v);
      entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      const obj: Record<string, unknown> = {};
      for (const [key, item] of entries) {
        if (item === undefined) continue;
        obj[key] = normalize(item);
      }
      out = obj;
    }

    stack.delete(v);
    return out;
  };

  return JSON.stringify(normalize(value));
}

function sha256Hex(s: string): string {
  return crypto.createHash('sha256').update(s, 'utf8').digest('hex');
}

export function recordHash(record: unknown): string {
  return sha256Hex(stableStringify(record));
}

/**
 * Content fingerprint of a record collection as an unordered multiset:
 * reordering records keeps the fingerprint, duplicating one changes it.
 */
export function fingerprintRecords(records: readonly unknown[]): string {
  const hashes = records.map(recordHash).sort();
  return sha256Hex(hashes.join('\n'));
}

export const EMPTY_FINGERPRINT = fingerprintRecords([]);

export function sameRecords(a: readonly unknown[], b: readonly unknown[]): boolean {
  return a.length === b.length && fingerprintRecords(a) === fingerprintRecords(b);
}
