/**
 * Package entity: a recipe together with its location, its effective
 * (synthesized) form and its place in a sub-package hierarchy.
 */

import { basename, extname, join, normalize, sep } from 'path';

import type {
  BuildSettingsTemplate,
  Dependency,
  PackageDependency,
  PackageDescription,
  PackageRecipe
} from '../../types/index.js';
import { DEFAULT_RECIPE_FILENAME, RECIPE_FILES, type RecipeFormat } from '../../constants/index.js';
import type { BuildSettings } from '../build-settings.js';
import type { BuildPlatform } from '../platform.js';
import type { CompilerCapability } from '../ports/compiler.js';
import type { FileSystemPort } from '../ports/filesystem.js';
import { cloneRecipe } from '../recipe.js';
import { matchesPlatformList } from '../template.js';
import { Version } from '../version.js';
import { VersionResolver } from '../scm/version-resolver.js';
import { warnOnSpecialCompilerFlags } from '../compilers/special-flags.js';
import { createPackageContext, type PackageContext, type PackageContextOptions } from './context.js';
import { synthesizeDefaults } from './configuration-synthesizer.js';
import { lintPackage } from './validator.js';
import { describePackage } from './describer.js';
import {
  addBuildTypeSettings,
  findConfiguration,
  getSubConfiguration,
  resolveBuildSettings,
  resolveCombinedBuildSettings
} from './build-settings-resolver.js';
import { RecipeNotFoundError, UnknownConfigurationError, UnknownVersionError, UsageError } from '../../utils/errors.js';
import { parseRecipeText, serializeRecipe } from '../../utils/recipe-file.js';
import { logger } from '../../utils/logger.js';

export interface PackageCreateOptions {
  /** Directory of the package; empty for packages without a local copy */
  root?: string;
  parent?: PackageEntity | null;
  /** Wins over both the recipe version and source control when non-empty */
  versionOverride?: string;
  /** Recipe file the recipe was read from */
  recipePath?: string;
  context?: PackageContext | PackageContextOptions;
}

export interface PackageLoadOptions {
  /** Explicit recipe file; searched for in `root` when omitted */
  recipeFile?: string;
  parent?: PackageEntity | null;
  versionOverride?: string;
  context?: PackageContext | PackageContextOptions;
}

function isPackageContext(value: PackageContext | PackageContextOptions): value is PackageContext {
  return value.fileSystem !== undefined && value.sourceControl !== undefined &&
    value.compiler !== undefined && value.config !== undefined;
}

function toContext(value: PackageContext | PackageContextOptions | undefined): PackageContext {
  if (value && isPackageContext(value)) return value;
  return createPackageContext(value);
}

function toDirectoryPath(path: string): string {
  if (path.length === 0) return '';
  const normalized = normalize(path);
  return normalized.endsWith(sep) ? normalized : `${normalized}${sep}`;
}

function recipeFormatOf(file: string): RecipeFormat {
  const byName = RECIPE_FILES.find(entry => entry.filename === basename(file));
  if (byName) return byName.format;
  return extname(file).toLowerCase() === '.json' ? 'json' : 'yaml';
}

function sameDependency(a: PackageDependency, b: PackageDependency): boolean {
  return a.name === b.name &&
    a.spec.version === b.spec.version &&
    a.spec.path === b.spec.path &&
    (a.spec.optional ?? false) === (b.spec.optional ?? false) &&
    (a.spec.default ?? false) === (b.spec.default ?? false);
}

export class PackageEntity {
  private constructor(
    private readonly rawInfo: PackageRecipe,
    private readonly info: PackageRecipe,
    private readonly root: string,
    private readonly recipeFile: string,
    private readonly parent: PackageEntity | null,
    readonly context: PackageContext
  ) {}

  /**
   * Build a package from an in-memory recipe.
   *
   * The version is taken from `versionOverride`, then from the recipe and
   * finally, for root packages, from source control. Default paths and
   * configurations are synthesized and the result is linted.
   */
  static async create(recipe: PackageRecipe, options: PackageCreateOptions = {}): Promise<PackageEntity> {
    const context = toContext(options.context);
    const parent = options.parent ?? null;
    const root = options.root ?? '';
    const raw = cloneRecipe(recipe);
    const effective = cloneRecipe(recipe);

    if (options.versionOverride) {
      effective.version = options.versionOverride;
    } else if (!effective.version && !parent) {
      effective.version = await PackageEntity.determineVersion(effective.name, root, context);
    }

    const path = toDirectoryPath(root);
    const synthesized = await synthesizeDefaults(effective, path, context.fileSystem);
    const pkg = new PackageEntity(raw, synthesized, path, options.recipePath ?? '', parent, context);
    lintPackage(pkg);
    return pkg;
  }

  /**
   * Load the package stored in `root`, reading its recipe file.
   */
  static async load(root: string, options: PackageLoadOptions = {}): Promise<PackageEntity> {
    const context = toContext(options.context);
    const recipeFile = options.recipeFile ?? await PackageEntity.findPackageFile(root, context.fileSystem);
    if (!recipeFile) {
      throw new RecipeNotFoundError(root, RECIPE_FILES.map(entry => entry.filename));
    }

    logger.debug(`Loading package recipe ${recipeFile}`);
    const content = await context.fileSystem.readText(recipeFile);
    const parentName = options.parent ? options.parent.name : '';
    const recipe = parseRecipeText(content, recipeFormatOf(recipeFile), parentName, recipeFile);

    return PackageEntity.create(recipe, {
      root,
      parent: options.parent,
      versionOverride: options.versionOverride,
      recipePath: recipeFile,
      context
    });
  }

  /**
   * Path of the preferred recipe file in `dir`, or an empty string
   */
  static async findPackageFile(dir: string, fileSystem: FileSystemPort): Promise<string> {
    for (const { filename } of RECIPE_FILES) {
      const candidate = join(dir, filename);
      if (await fileSystem.exists(candidate)) return candidate;
    }
    return '';
  }

  private static async determineVersion(name: string, root: string, context: PackageContext): Promise<string> {
    let version = '';
    try {
      const resolver = new VersionResolver(context.sourceControl, context.fileSystem, {
        cache: context.config.versionCache
      });
      version = await resolver.resolve(root);
    } catch (error) {
      logger.debug(`Failed to determine the version of ${name} from source control`, error);
    }

    if (version) {
      logger.info(`Determined package version using source control: ${name} ${version}`);
      return version;
    }
    logger.info(`Failed to determine version of package ${name} at ${root || '<no path>'}. Assuming ${Version.masterBranch}.`);
    return Version.masterBranch.toString();
  }

  /** Qualified name, `parent:child` for sub-packages */
  get name(): string {
    const names: string[] = [];
    for (let pkg: PackageEntity | null = this; pkg; pkg = pkg.parent) {
      names.unshift(pkg.info.name);
    }
    return names.join(':');
  }

  /** Directory of the package, ending in a separator, or empty */
  get path(): string {
    return this.root;
  }

  get recipePath(): string {
    return this.recipeFile;
  }

  /** Effective recipe, after synthesis of defaults */
  get recipe(): PackageRecipe {
    return this.info;
  }

  /** Recipe as it was given */
  get rawRecipe(): PackageRecipe {
    return this.rawInfo;
  }

  get parentPackage(): PackageEntity | null {
    return this.parent;
  }

  get basePackage(): PackageEntity {
    let pkg: PackageEntity = this;
    while (pkg.parent) pkg = pkg.parent;
    return pkg;
  }

  get subPackages(): PackageRecipe['subPackages'] {
    return this.info.subPackages;
  }

  /** Configuration names, in declaration order */
  get configurations(): string[] {
    return this.info.configurations.map(configuration => configuration.name);
  }

  /** Sub-packages share the version of their base package */
  get version(): Version {
    return new Version(this.basePackage.info.version);
  }

  setVersion(version: Version | string): void {
    if (this.parent) {
      throw new UsageError(`Cannot set the version of sub package ${this.name}, it shares the version of ${this.basePackage.name}`);
    }
    this.info.version = version.toString();
  }

  /**
   * Inline recipe of the sub-package called `name`.
   * Path-based sub-packages are left to the caller to load.
   */
  getInternalSubPackage(name: string): PackageRecipe | undefined {
    for (const sub of this.info.subPackages) {
      if (sub.kind === 'inline' && sub.recipe.name === name) return sub.recipe;
    }
    return undefined;
  }

  /**
   * Root template, or the template of `configuration`
   */
  getBuildSettingsTemplate(configuration = ''): BuildSettingsTemplate {
    if (!configuration) return this.info.buildSettings;
    const info = findConfiguration(this.info, configuration);
    if (!info) throw new UnknownConfigurationError(this.name, configuration);
    return info.buildSettings;
  }

  /**
   * Whether `name` is declared at the root or in `configuration`. Without a
   * configuration every configuration is searched; an unknown configuration
   * contributes nothing.
   */
  hasDependency(name: string, configuration = ''): boolean {
    const declares = (template: BuildSettingsTemplate): boolean =>
      Object.prototype.hasOwnProperty.call(template.dependencies, name);
    if (declares(this.info.buildSettings)) return true;
    return this.info.configurations.some(info =>
      (!configuration || info.name === configuration) && declares(info.buildSettings)
    );
  }

  /**
   * Dependencies of `configuration`; its entries win over root entries of
   * the same name. An unknown configuration yields the root entries only.
   */
  getDependencies(configuration = ''): Record<string, Dependency> {
    const dependencies: Record<string, Dependency> = { ...this.info.buildSettings.dependencies };
    const info = configuration ? findConfiguration(this.info, configuration) : undefined;
    if (info) Object.assign(dependencies, info.buildSettings.dependencies);
    return dependencies;
  }

  /**
   * Every dependency declared anywhere in the recipe; identical
   * declarations are listed once.
   */
  getAllDependencies(): PackageDependency[] {
    const all: PackageDependency[] = [];
    const collect = (template: BuildSettingsTemplate): void => {
      for (const [name, spec] of Object.entries(template.dependencies)) {
        const dependency = { name, spec };
        if (!all.some(existing => sameDependency(existing, dependency))) all.push(dependency);
      }
    };

    collect(this.info.buildSettings);
    for (const configuration of this.info.configurations) collect(configuration.buildSettings);
    return all;
  }

  /**
   * First configuration applicable to `platform`. Executables are skipped
   * unless `allowNonLibrary` is set.
   */
  getDefaultConfiguration(platform: BuildPlatform, allowNonLibrary = false): string | undefined {
    return this.getPlatformConfigurations(platform, allowNonLibrary)[0];
  }

  getPlatformConfigurations(platform: BuildPlatform, allowNonLibrary = false): string[] {
    return this.info.configurations
      .filter(configuration => matchesPlatformList(configuration.platforms, platform))
      .filter(configuration => allowNonLibrary || configuration.buildSettings.targetType !== 'executable')
      .map(configuration => configuration.name);
  }

  getBuildSettings(platform: BuildPlatform, configuration: string): Promise<BuildSettings> {
    return resolveBuildSettings(this, platform, configuration);
  }

  getCombinedBuildSettings(): Promise<BuildSettings> {
    return resolveCombinedBuildSettings(this);
  }

  addBuildTypeSettings(settings: BuildSettings, platform: BuildPlatform, buildType: string): Promise<void> {
    return addBuildTypeSettings(this, settings, platform, buildType);
  }

  getSubConfiguration(
    configuration: string,
    dependency: string | { readonly name: string },
    platform: BuildPlatform
  ): string | undefined {
    const dependencyName = typeof dependency === 'string' ? dependency : dependency.name;
    return getSubConfiguration(this, configuration, dependencyName, platform);
  }

  describe(
    platform: BuildPlatform,
    compiler: CompilerCapability | undefined,
    configuration: string,
    buildType = ''
  ): Promise<PackageDescription> {
    return describePackage(this, platform, compiler, configuration, buildType);
  }

  /**
   * Warn about raw compiler flags with a portable alternative, in the root
   * settings and in every configuration. Returns the number of warnings.
   */
  warnOnSpecialCompilerFlags(): number {
    const flagsOf = (template: BuildSettingsTemplate): string[] => Object.values(template.dflags).flat();

    let count = warnOnSpecialCompilerFlags(flagsOf(this.info.buildSettings), this.name);
    for (const configuration of this.info.configurations) {
      count += warnOnSpecialCompilerFlags(flagsOf(configuration.buildSettings), this.name, configuration.name);
    }
    return count;
  }

  /**
   * Write the effective recipe as JSON to `dir` (the package directory by
   * default). In-memory state is left untouched.
   */
  async storeInfo(dir: string = this.root): Promise<string> {
    if (this.version.isUnknown) {
      throw new UnknownVersionError(this.name);
    }
    if (!dir) {
      throw new UsageError(`Package ${this.name || '(unnamed)'} has no location, pass a directory to store its recipe in`);
    }

    const file = join(dir, DEFAULT_RECIPE_FILENAME);
    await this.context.fileSystem.writeText(file, serializeRecipe(this.info));
    logger.debug(`Stored package recipe of ${this.name} in ${file}`);
    return file;
  }
}
