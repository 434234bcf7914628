/**
 * Default source paths and configurations for recipes that declare none.
 *
 * Synthesis is a pure transformation: the input recipe is never modified,
 * a new effective recipe is returned.
 */

import { join } from 'path';

import type { PackageRecipe } from '../../types/index.js';
import {
  CONFIGURATION_NAMES,
  DEFAULT_DIRS,
  MAIN_FILE_CANDIDATES
} from '../../constants/index.js';
import {
  appendPlatformValues,
  cloneRecipe,
  createBuildSettingsTemplate,
  createConfiguration,
  hasPlatformKey
} from '../recipe.js';
import type { FileSystemPort } from '../ports/filesystem.js';
import { logger } from '../../utils/logger.js';

/**
 * Find the conventional entry point in the declared source paths.
 * The first candidate found wins.
 */
export async function detectMainSourceFile(
  sourcePaths: readonly string[],
  packageName: string,
  root: string,
  fileSystem: FileSystemPort
): Promise<string> {
  const name = packageName.length > 0 ? packageName : 'unknown';
  for (const sourcePath of sourcePaths) {
    const dir = join(root, sourcePath);
    if (!(await fileSystem.exists(dir))) continue;

    for (const candidate of MAIN_FILE_CANDIDATES) {
      const file = candidate.replace('{name}', name);
      if (await fileSystem.exists(join(dir, file))) {
        return join(sourcePath, file);
      }
    }
  }
  return '';
}

/**
 * Effective recipe for `raw` located at `root`: conventional directories
 * added where nothing is declared for all platforms, and default
 * `application` / `library` configurations when none are declared.
 */
export async function synthesizeDefaults(
  raw: PackageRecipe,
  root: string,
  fileSystem: FileSystemPort
): Promise<PackageRecipe> {
  const recipe = cloneRecipe(raw);
  const settings = recipe.buildSettings;

  // packages without a location have no directories to inspect
  if (root.length > 0) {
    if (!hasPlatformKey(settings.stringImportPaths, '')) {
      for (const dir of DEFAULT_DIRS.STRING_IMPORT) {
        if (await fileSystem.exists(join(root, dir))) {
          appendPlatformValues(settings.stringImportPaths, '', dir);
        }
      }
    }

    const hasSourcePaths = hasPlatformKey(settings.sourcePaths, '');
    const hasImportPaths = hasPlatformKey(settings.importPaths, '');
    if (!hasSourcePaths || !hasImportPaths) {
      for (const dir of DEFAULT_DIRS.SOURCE) {
        if (await fileSystem.exists(join(root, dir))) {
          if (!hasSourcePaths) appendPlatformValues(settings.sourcePaths, '', dir);
          if (!hasImportPaths) appendPlatformValues(settings.importPaths, '', dir);
          break;
        }
      }
    }
  }

  const mainSourceFile = root.length > 0
    ? await detectMainSourceFile(settings.sourcePaths[''] ?? [], recipe.name, root, fileSystem)
    : '';

  if (recipe.configurations.length > 0) return recipe;

  if (settings.targetType === 'executable') {
    const application = createBuildSettingsTemplate({ targetType: 'executable' });
    if (!settings.mainSourceFile) application.mainSourceFile = mainSourceFile;
    recipe.configurations.push(createConfiguration({
      name: CONFIGURATION_NAMES.APPLICATION,
      buildSettings: application
    }));
  } else if (settings.targetType !== 'none') {
    const autodetect = settings.targetType === 'autodetect';
    const library = createBuildSettingsTemplate({
      targetType: autodetect ? 'library' : settings.targetType
    });

    if (autodetect && mainSourceFile) {
      appendPlatformValues(library.excludedSourceFiles, '', mainSourceFile);
      recipe.configurations.push(createConfiguration({
        name: CONFIGURATION_NAMES.APPLICATION,
        buildSettings: createBuildSettingsTemplate({ targetType: 'executable', mainSourceFile })
      }));
    }

    recipe.configurations.push(createConfiguration({
      name: CONFIGURATION_NAMES.LIBRARY,
      buildSettings: library
    }));
  }

  logger.debug(`Generated default configurations for ${recipe.name || root}: ${recipe.configurations.map(c => c.name).join(', ')}`);
  return recipe;
}
