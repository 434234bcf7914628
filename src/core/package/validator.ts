/**
 * Structural lint over a package recipe. Never throws; findings are logged
 * as warnings and returned for callers that want to inspect them.
 */

import type { PackageRecipe } from '../../types/index.js';
import { logger } from '../../utils/logger.js';

export interface LintTarget {
  /** Qualified name */
  readonly name: string;
  readonly path: string;
  readonly recipe: PackageRecipe;
  readonly parentPackage: LintTarget | null;
}

export function lintPackage(pkg: LintTarget): string[] {
  const warnings: string[] = [];
  const warn = (message: string): void => {
    warnings.push(message);
    logger.warn(message);
  };

  const parent = pkg.parentPackage;
  if (parent && parent.path !== pkg.path) {
    if (pkg.recipe.license && pkg.recipe.license !== parent.recipe.license) {
      warn(`License in sub package ${pkg.name} is different than its parent package, this is discouraged.`);
    }
  }

  if (!pkg.name) {
    warn(`The package in ${pkg.path} has no name.`);
  }

  const seen = new Set<string>();
  for (const configuration of pkg.recipe.configurations) {
    if (seen.has(configuration.name)) {
      warn(
        `Multiple configurations with the name "${configuration.name}" are defined in package "${pkg.name}". ` +
        'This will most likely cause configuration resolution issues.'
      );
    }
    seen.add(configuration.name);
  }

  return warnings;
}
