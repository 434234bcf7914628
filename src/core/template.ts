/**
 * Application of a build settings template onto effective build settings.
 *
 * Only entries whose platform suffix matches the target platform are applied.
 * Source, import and string-import paths are expanded into file lists by
 * scanning the file system below the package directory.
 */

import { isAbsolute, join, relative, extname } from 'path';

import type { BuildSettingsTemplate, PlatformKeyed } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import type { BuildSettings } from './build-settings.js';
import { matchesSpecification, type BuildPlatform } from './platform.js';
import type { FileSystemPort } from './ports/filesystem.js';
import { InvalidRecipeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Values of every entry of `map` whose suffix matches `platform`, in
 * declaration order
 */
export function matchingValues<T>(map: PlatformKeyed<T>, platform: BuildPlatform): T[] {
  const values: T[] = [];
  for (const [suffix, entries] of Object.entries(map)) {
    if (matchesSpecification(platform, suffix)) {
      values.push(...entries);
    }
  }
  return values;
}

async function collectFiles(
  paths: PlatformKeyed<string>,
  extensions: readonly string[] | null,
  platform: BuildPlatform,
  basePath: string,
  fileSystem: FileSystemPort,
  add: (file: string) => void
): Promise<void> {
  for (const declared of matchingValues(paths, platform)) {
    if (declared.length === 0) {
      throw new InvalidRecipeError('Paths must not be empty strings.', { basePath });
    }

    const dir = isAbsolute(declared) ? declared : join(basePath, declared);
    if (!(await fileSystem.isDirectory(dir))) {
      logger.warn(`Invalid source/import path: ${dir}`);
      continue;
    }

    for (const file of await fileSystem.listFilesRecursive(dir)) {
      if (extensions && !extensions.includes(extname(file))) continue;
      add(relative(basePath, file));
    }
  }
}

/**
 * Apply the entries of `template` that match `platform` onto `dst`.
 *
 * Scalars override when the template sets them; lists extend.
 */
export async function applyTemplate(
  template: BuildSettingsTemplate,
  dst: BuildSettings,
  platform: BuildPlatform,
  basePath: string,
  fileSystem: FileSystemPort
): Promise<void> {
  if (template.targetType !== 'autodetect') dst.targetType = template.targetType;
  if (template.targetPath) dst.targetPath = template.targetPath;
  if (template.targetName) dst.targetName = template.targetName;
  if (template.workingDirectory) dst.workingDirectory = template.workingDirectory;
  if (template.mainSourceFile) {
    dst.mainSourceFile = template.mainSourceFile;
    dst.addSourceFiles(template.mainSourceFile);
  }

  await collectFiles(template.sourcePaths, FILE_PATTERNS.SOURCE_EXTENSIONS, platform, basePath, fileSystem,
    file => dst.addSourceFiles(file));
  await collectFiles(template.importPaths, FILE_PATTERNS.IMPORT_EXTENSIONS, platform, basePath, fileSystem,
    file => dst.addImportFiles(file));
  dst.removeImportFiles(...dst.sourceFiles);
  await collectFiles(template.stringImportPaths, null, platform, basePath, fileSystem,
    file => dst.addStringImportFiles(file));

  // deterministic order of files as passed to the compiler
  dst.sourceFiles.sort();

  dst.addDFlags(...matchingValues(template.dflags, platform));
  dst.addLFlags(...matchingValues(template.lflags, platform));
  dst.addLibs(...matchingValues(template.libs, platform));
  dst.addSourceFiles(...matchingValues(template.sourceFiles, platform));
  dst.removeSourceFiles(...matchingValues(template.excludedSourceFiles, platform));
  dst.addCopyFiles(...matchingValues(template.copyFiles, platform));
  dst.addVersions(...matchingValues(template.versions, platform));
  dst.addDebugVersions(...matchingValues(template.debugVersions, platform));
  dst.addImportPaths(...matchingValues(template.importPaths, platform));
  dst.addStringImportPaths(...matchingValues(template.stringImportPaths, platform));
  dst.addPreGenerateCommands(...matchingValues(template.preGenerateCommands, platform));
  dst.addPostGenerateCommands(...matchingValues(template.postGenerateCommands, platform));
  dst.addPreBuildCommands(...matchingValues(template.preBuildCommands, platform));
  dst.addPostBuildCommands(...matchingValues(template.postBuildCommands, platform));
  dst.addRequirements(...matchingValues(template.buildRequirements, platform));
  dst.addOptions(...matchingValues(template.buildOptions, platform));
}

/**
 * Whether a configuration restricted to `platforms` applies to `platform`
 */
export function matchesPlatformList(platforms: readonly string[], platform: BuildPlatform): boolean {
  if (platforms.length === 0) return true;
  return platforms.some(spec => matchesSpecification(platform, `-${spec}`));
}
