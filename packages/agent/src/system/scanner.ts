import { execFileSync } from 'node:child_process';
import type { CategoryDefinition } from '@hostsnap/shared';

/** Abstraction for testability */
export interface SystemChecker {
  commandExists(cmd: string): boolean;
}

/** Real system checker using PATH lookup */
export function createSystemChecker(): SystemChecker {
  return {
    commandExists(cmd: string): boolean {
      try {
        execFileSync('which', [cmd], { stdio: 'ignore' });
        return true;
      } catch {
        return false;
      }
    },
  };
}

export interface CategoryAvailability {
  category: string;
  available: boolean;
  missingCommands: string[];
}

/**
 * Checks each category's required commands against the host.
 * Each command is looked up once even when several categories need it.
 */
export function checkCategoryRequirements(
  definitions: Iterable<CategoryDefinition>,
  checker: SystemChecker,
): CategoryAvailability[] {
  const known = new Map<string, boolean>();
  const exists = (cmd: string): boolean => {
    let found = known.get(cmd);
    if (found === undefined) {
      found = checker.commandExists(cmd);
      known.set(cmd, found);
    }
    return found;
  };

  const results: CategoryAvailability[] = [];
  for (const definition of definitions) {
    const missingCommands = definition.requires.commands.filter((c) => !exists(c));
    results.push({
      category: definition.name,
      available: missingCommands.length === 0,
      missingCommands,
    });
  }
  return results;
}
