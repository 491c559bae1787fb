import { z } from 'zod';
import { DEFAULT_QUERY_TIMEOUT_MS, MAX_TIMER_MS, Platform } from '../types/common.js';

/** Host requirements for a category's query */
export const CategoryRequirements = z.object({
  /** Binaries that must exist in PATH */
  commands: z.array(z.string()).default([]),
});
export type CategoryRequirements = z.infer<typeof CategoryRequirements>;

/** One inventory category within a source group */
export const CategoryDefinition = z.object({
  /** Category name, e.g. "processes". Unique across all groups */
  name: z.string().regex(/^[a-z][a-z0-9-]*$/),
  /** Human-readable description */
  description: z.string(),
  /** Query deadline in ms */
  timeout: z.number().int().positive().max(MAX_TIMER_MS).default(DEFAULT_QUERY_TIMEOUT_MS),
  requires: CategoryRequirements,
});
export type CategoryDefinition = z.infer<typeof CategoryDefinition>;

/**
 * Manifest for a group of related categories, e.g. "operating-system".
 */
export const SourceManifest = z.object({
  /** Group name */
  name: z.string(),
  /** Semver version */
  version: z.string().regex(/^\d+\.\d+\.\d+$/),
  /** Human-readable description */
  description: z.string(),
  /** Platforms the queries run on */
  platforms: z.array(Platform).min(1),
  /** Categories this group provides */
  categories: z.array(CategoryDefinition),
});
export type SourceManifest = z.infer<typeof SourceManifest>;
