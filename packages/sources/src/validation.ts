import { type CategoryDefinition, SourceManifest } from '@hostsnap/shared';
import type { SourceGroup } from './types.js';

export class SourceValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SourceValidationError';
  }
}

/**
 * Validates a source group's manifest and checks that its handlers match
 * the manifest's categories exactly.
 * - Every category in the manifest must have a handler keyed by its name
 * - No extra handlers may exist beyond what the manifest declares
 */
export function validateSourceGroup(group: SourceGroup): void {
  const parsed = SourceManifest.safeParse(group.manifest);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SourceValidationError(`Source "${group.manifest.name}": invalid manifest (${issues})`);
  }

  const groupName = group.manifest.name;
  const expected = new Set(group.manifest.categories.map((c) => c.name));
  const actual = new Set(Object.keys(group.handlers));

  if (expected.size !== group.manifest.categories.length) {
    throw new SourceValidationError(`Source "${groupName}": duplicate category in manifest`);
  }

  // Check for missing handlers
  for (const name of expected) {
    if (!actual.has(name)) {
      throw new SourceValidationError(`Source "${groupName}": missing handler for category "${name}"`);
    }
  }

  // Check for extra handlers
  for (const name of actual) {
    if (!expected.has(name)) {
      throw new SourceValidationError(`Source "${groupName}": extra handler "${name}" not in manifest`);
    }
  }
}

/**
 * Validates all source groups and builds a registry map keyed by group name.
 * Throws on duplicate group names or on a category claimed by two groups.
 */
export function createSourceRegistry(groups: SourceGroup[]): ReadonlyMap<string, SourceGroup> {
  const registry = new Map<string, SourceGroup>();
  const owners = new Map<string, string>();

  for (const group of groups) {
    validateSourceGroup(group);

    if (registry.has(group.manifest.name)) {
      throw new SourceValidationError(`Duplicate source name: "${group.manifest.name}"`);
    }

    for (const category of group.manifest.categories) {
      const owner = owners.get(category.name);
      if (owner) {
        throw new SourceValidationError(
          `Category "${category.name}" declared by both "${owner}" and "${group.manifest.name}"`,
        );
      }
      owners.set(category.name, group.manifest.name);
    }

    registry.set(group.manifest.name, group);
  }

  return registry;
}

/** Flattens a registry into category definitions keyed by category name */
export function listCategoryDefinitions(
  registry: ReadonlyMap<string, SourceGroup>,
): ReadonlyMap<string, CategoryDefinition> {
  const definitions = new Map<string, CategoryDefinition>();
  for (const group of registry.values()) {
    for (const category of group.manifest.categories) {
      definitions.set(category.name, category);
    }
  }
  return definitions;
}
