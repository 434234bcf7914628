/**
 * Package description export
 */

import type { PackageDescription, SourceFileDescription, SourceFileRole } from '../../types/index.js';
import type { BuildSettings } from '../build-settings.js';
import type { BuildPlatform } from '../platform.js';
import type { CompilerCapability } from '../ports/compiler.js';
import type { PackageEntity } from './package.js';

/**
 * Role of every file known to `all`, refined by the files actually used in
 * `used`. A used role always replaces an unused one. Sorted by path.
 */
export function classifyFiles(used: BuildSettings, all: BuildSettings): SourceFileDescription[] {
  const roles = new Map<string, SourceFileRole>();
  const assign = (files: readonly string[], role: SourceFileRole): void => {
    for (const file of files) roles.set(file, role);
  };

  assign(all.stringImportFiles, 'unusedStringImport');
  assign(all.importFiles, 'unusedImport');
  assign(all.sourceFiles, 'unusedSource');
  assign(used.stringImportFiles, 'stringImport');
  assign(used.importFiles, 'import');
  assign(used.sourceFiles, 'source');

  return [...roles.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([path, role]) => ({ path, role }));
}

/**
 * Flat description of `pkg` built for `platform` and `configuration`,
 * optionally with a build type applied on top.
 */
export async function describePackage(
  pkg: PackageEntity,
  platform: BuildPlatform,
  compiler: CompilerCapability | undefined,
  configuration: string,
  buildType = ''
): Promise<PackageDescription> {
  const settings = await pkg.getBuildSettings(platform, configuration);
  if (buildType) {
    await pkg.addBuildTypeSettings(settings, platform, buildType);
    pkg.context.compiler.extractBuildOptions(settings);
  }
  const combined = await pkg.getCombinedBuildSettings();

  const targetFileName = settings.targetType !== 'none' && compiler
    ? compiler.getTargetFileName(settings, platform)
    : '';

  return {
    path: pkg.path,
    name: pkg.name,
    version: pkg.version.toString(),
    description: pkg.recipe.description,
    homepage: pkg.recipe.homepage,
    authors: [...pkg.recipe.authors],
    copyright: pkg.recipe.copyright,
    license: pkg.recipe.license,
    dependencies: Object.keys(pkg.getDependencies(configuration)),
    configuration,

    targetType: settings.targetType,
    targetPath: settings.targetPath,
    targetName: settings.targetName,
    targetFileName,
    workingDirectory: settings.workingDirectory,
    mainSourceFile: settings.mainSourceFile,

    dflags: settings.dflags,
    lflags: settings.lflags,
    libs: settings.libs,
    copyFiles: settings.copyFiles,
    versions: settings.versions,
    debugVersions: settings.debugVersions,
    importPaths: settings.importPaths,
    stringImportPaths: settings.stringImportPaths,
    preGenerateCommands: settings.preGenerateCommands,
    postGenerateCommands: settings.postGenerateCommands,
    preBuildCommands: settings.preBuildCommands,
    postBuildCommands: settings.postBuildCommands,

    buildRequirements: settings.requirements.values(),
    options: settings.options.values(),

    files: classifyFiles(settings, combined)
  };
}
