/**
 * Build settings resolution: root + configuration + platform merge,
 * build-type overlays and sub-configuration lookup.
 *
 * Nothing is cached; every call recomputes from the current recipe.
 */

import type { ConfigurationInfo, PackageRecipe } from '../../types/index.js';
import { DFLAGS_BUILD_TYPE } from '../../constants/index.js';
import { BuildSettings } from '../build-settings.js';
import type { BuildOption } from '../flags.js';
import { ANY_PLATFORM, type BuildPlatform } from '../platform.js';
import { applyTemplate } from '../template.js';
import type { PackageContext } from './context.js';
import { UnknownBuildTypeError, UnknownConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * What the resolver needs to know about a package
 */
export interface ResolvablePackage {
  /** Qualified name, `parent:child` for sub-packages */
  readonly name: string;
  readonly path: string;
  readonly recipe: PackageRecipe;
  readonly context: PackageContext;
}

export const BUILTIN_BUILD_TYPES: ReadonlyMap<string, readonly BuildOption[]> = new Map<string, readonly BuildOption[]>([
  ['plain', []],
  ['debug', ['debugMode', 'debugInfo']],
  ['release', ['releaseMode', 'optimize', 'inline']],
  ['release-debug', ['releaseMode', 'optimize', 'inline', 'debugInfo']],
  ['release-nobounds', ['releaseMode', 'optimize', 'inline', 'noBoundsCheck']],
  ['unittest', ['unittests', 'debugMode', 'debugInfo']],
  ['docs', ['syntaxOnly', '_docs']],
  ['ddox', ['syntaxOnly', '_ddox']],
  ['profile', ['profile', 'optimize', 'inline', 'debugInfo']],
  ['profile-gc', ['profileGC', 'debugInfo']],
  ['cov', ['coverage', 'debugInfo']],
  ['unittest-cov', ['unittests', 'coverage', 'debugMode', 'debugInfo']]
]);

/**
 * First configuration declared under `name`; later duplicates are unreachable
 */
export function findConfiguration(recipe: PackageRecipe, name: string): ConfigurationInfo | undefined {
  return recipe.configurations.find(configuration => configuration.name === name);
}

function requireConfiguration(pkg: ResolvablePackage, name: string): ConfigurationInfo {
  const configuration = findConfiguration(pkg.recipe, name);
  if (!configuration) {
    throw new UnknownConfigurationError(pkg.name, name);
  }
  return configuration;
}

function finalize(pkg: ResolvablePackage, settings: BuildSettings): BuildSettings {
  if (!settings.targetName) {
    settings.targetName = pkg.name.replace(/:/g, '_');
  }
  pkg.context.compiler.extractBuildOptions(settings);
  return settings;
}

/**
 * Effective settings of `pkg` for `platform` and `configuration`.
 *
 * An empty configuration name yields the root settings only; a non-empty
 * name that matches no configuration is an error.
 */
export async function resolveBuildSettings(
  pkg: ResolvablePackage,
  platform: BuildPlatform,
  configuration: string
): Promise<BuildSettings> {
  const { fileSystem } = pkg.context;
  const configurationInfo = configuration ? requireConfiguration(pkg, configuration) : undefined;

  const settings = new BuildSettings();
  await applyTemplate(pkg.recipe.buildSettings, settings, platform, pkg.path, fileSystem);
  if (configurationInfo) {
    await applyTemplate(configurationInfo.buildSettings, settings, platform, pkg.path, fileSystem);
  }

  return finalize(pkg, settings);
}

/**
 * Union of the settings of every configuration on every platform.
 *
 * Each configuration is resolved against the root on its own and the
 * results are unioned, so one configuration's exclusions never hide files
 * another configuration uses. Meant for file listings, not for builds.
 */
export async function resolveCombinedBuildSettings(pkg: ResolvablePackage): Promise<BuildSettings> {
  const { fileSystem } = pkg.context;

  const combined = new BuildSettings();
  await applyTemplate(pkg.recipe.buildSettings, combined, ANY_PLATFORM, pkg.path, fileSystem);

  for (const configuration of pkg.recipe.configurations) {
    const settings = new BuildSettings();
    await applyTemplate(pkg.recipe.buildSettings, settings, ANY_PLATFORM, pkg.path, fileSystem);
    await applyTemplate(configuration.buildSettings, settings, ANY_PLATFORM, pkg.path, fileSystem);
    combined.add(settings);
  }
  combined.sourceFiles.sort();

  return finalize(pkg, combined);
}

/**
 * Apply a build type on top of already resolved settings.
 *
 * Custom build types declared by the recipe take precedence over the
 * built-in ones. `$DFLAGS` appends the configured raw compiler flags.
 */
export async function addBuildTypeSettings(
  pkg: ResolvablePackage,
  settings: BuildSettings,
  platform: BuildPlatform,
  buildType: string
): Promise<void> {
  if (buildType === DFLAGS_BUILD_TYPE) {
    settings.addDFlags(...pkg.context.config.dflags.split(/\s+/).filter(flag => flag.length > 0));
    return;
  }

  if (Object.prototype.hasOwnProperty.call(pkg.recipe.buildTypes, buildType)) {
    logger.info(`Using custom build type '${buildType}'.`);
    await applyTemplate(pkg.recipe.buildTypes[buildType], settings, platform, pkg.path, pkg.context.fileSystem);
    return;
  }

  const options = BUILTIN_BUILD_TYPES.get(buildType);
  if (!options) {
    throw new UnknownBuildTypeError(pkg.name, buildType);
  }
  settings.addOptions(...options);
}

/**
 * Configuration of `dependencyName` selected by `configuration` of `pkg`,
 * falling back to the root-level selection.
 *
 * The platform is accepted for future use; sub-configuration selections
 * carry no platform suffixes, so it does not influence the result.
 */
export function getSubConfiguration(
  pkg: ResolvablePackage,
  configuration: string,
  dependencyName: string,
  _platform: BuildPlatform
): string | undefined {
  if (configuration) {
    const selections = requireConfiguration(pkg, configuration).buildSettings.subConfigurations;
    if (Object.prototype.hasOwnProperty.call(selections, dependencyName)) {
      return selections[dependencyName];
    }
  }

  const rootSelections = pkg.recipe.buildSettings.subConfigurations;
  if (Object.prototype.hasOwnProperty.call(rootSelections, dependencyName)) {
    return rootSelections[dependencyName];
  }
  return undefined;
}
