import { z } from 'zod';

/** One category as written to a snapshot document */
export const SerializedCategorySnapshot = z.object({
  records: z.array(z.unknown()),
  /** ISO 8601, null if the category was never refreshed */
  lastUpdated: z.string().datetime().nullable(),
  changed: z.boolean(),
  fingerprint: z.string(),
});
export type SerializedCategorySnapshot = z.infer<typeof SerializedCategorySnapshot>;

/**
 * JSON form of a root snapshot. This is what `hostsnap snapshot` prints
 * and what `hostsnap diff` reads back.
 */
export const SnapshotDocument = z.object({
  hostname: z.string(),
  /** When the document was produced (ISO 8601) */
  takenAt: z.string().datetime(),
  /** Oldest category timestamp, null if any category was never refreshed */
  lastUpdated: z.string().datetime().nullable(),
  categories: z.record(SerializedCategorySnapshot),
});
export type SnapshotDocument = z.infer<typeof SnapshotDocument>;
