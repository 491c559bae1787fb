import type { SourceGroup } from '@hostsnap/sources';
import { sourceRegistry } from '@hostsnap/sources';
import { type AgentConfig, loadConfig } from '../config.js';
import {
  type CategoryAvailability,
  type SystemChecker,
  checkCategoryRequirements,
  createSystemChecker,
} from '../system/scanner.js';
import { bold, resolveCategories } from './common.js';

export interface CategoriesCommandDeps {
  registry: ReadonlyMap<string, SourceGroup>;
  checker: SystemChecker;
  config: AgentConfig;
  log: (msg: string) => void;
}

function createDefaultDeps(): CategoriesCommandDeps {
  return {
    registry: sourceRegistry,
    checker: createSystemChecker(),
    config: loadConfig(),
    log: console.log,
  };
}

/** Lists every source group and its categories with availability on this host */
export function cmdCategoriesList(deps?: CategoriesCommandDeps): CategoryAvailability[] {
  const { registry, checker, config, log } = deps ?? createDefaultDeps();
  const enabled = new Set<string>(resolveCategories(undefined, config));
  const results: CategoryAvailability[] = [];

  log('Categories:');
  log('');
  for (const [name, group] of registry) {
    const { manifest } = group;
    log(`  ${bold(name)} v${manifest.version} (${manifest.platforms.join(', ')})`);
    log(`    ${manifest.description}`);

    const availability = checkCategoryRequirements(manifest.categories, checker);
    for (const [i, category] of manifest.categories.entries()) {
      const status = availability[i];
      if (!status) continue;
      results.push(status);

      const tags: string[] = [];
      tags.push(
        status.available ? 'available' : `missing: ${status.missingCommands.join(', ')}`,
      );
      if (!enabled.has(category.name)) tags.push('disabled');
      log(`    - ${category.name}: ${category.description} [${tags.join('; ')}]`);
    }
    log('');
  }

  const unavailable = results.filter((r) => !r.available).length;
  log(`  ${results.length} categories, ${unavailable} unavailable on this host`);
  return results;
}
