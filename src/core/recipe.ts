/**
 * Constructors and helpers for recipe values
 */

import type {
  BuildSettingsTemplate,
  ConfigurationInfo,
  PackageRecipe,
  PlatformKeyed,
  SubPackage
} from '../types/index.js';

export type TemplateInit = Partial<BuildSettingsTemplate>;

export interface ConfigurationInit {
  name: string;
  platforms?: string[];
  buildSettings?: TemplateInit;
}

export type SubPackageInit =
  | { kind: 'inline'; recipe: RecipeInit }
  | { kind: 'path'; path: string };

export interface RecipeInit {
  name?: string;
  version?: string;
  description?: string;
  homepage?: string;
  authors?: string[];
  copyright?: string;
  license?: string;
  buildSettings?: TemplateInit;
  configurations?: ConfigurationInit[];
  buildTypes?: Record<string, TemplateInit>;
  subPackages?: SubPackageInit[];
}

export function createBuildSettingsTemplate(init: TemplateInit = {}): BuildSettingsTemplate {
  return {
    dependencies: {},
    targetType: 'autodetect',
    targetPath: '',
    targetName: '',
    workingDirectory: '',
    mainSourceFile: '',
    subConfigurations: {},
    dflags: {},
    lflags: {},
    libs: {},
    sourceFiles: {},
    sourcePaths: {},
    excludedSourceFiles: {},
    copyFiles: {},
    versions: {},
    debugVersions: {},
    importPaths: {},
    stringImportPaths: {},
    preGenerateCommands: {},
    postGenerateCommands: {},
    preBuildCommands: {},
    postBuildCommands: {},
    buildRequirements: {},
    buildOptions: {},
    ...init
  };
}

export function createConfiguration(init: ConfigurationInit): ConfigurationInfo {
  return {
    name: init.name,
    platforms: init.platforms ?? [],
    buildSettings: createBuildSettingsTemplate(init.buildSettings)
  };
}

/**
 * Build a complete recipe from a partial description
 */
export function createRecipe(init: RecipeInit = {}): PackageRecipe {
  const buildTypes: Record<string, BuildSettingsTemplate> = {};
  for (const [name, template] of Object.entries(init.buildTypes ?? {})) {
    buildTypes[name] = createBuildSettingsTemplate(template);
  }

  const subPackages = (init.subPackages ?? []).map((sub): SubPackage =>
    sub.kind === 'inline'
      ? { kind: 'inline', recipe: createRecipe(sub.recipe) }
      : { kind: 'path', path: sub.path }
  );

  return {
    name: init.name ?? '',
    version: init.version ?? '',
    description: init.description ?? '',
    homepage: init.homepage ?? '',
    authors: init.authors ?? [],
    copyright: init.copyright ?? '',
    license: init.license ?? '',
    buildSettings: createBuildSettingsTemplate(init.buildSettings),
    configurations: (init.configurations ?? []).map(createConfiguration),
    buildTypes,
    subPackages
  };
}

/**
 * Deep copy of a recipe; the copy shares no mutable state with the input.
 */
export function cloneRecipe(recipe: PackageRecipe): PackageRecipe {
  return structuredClone(recipe);
}

/**
 * Append values under a platform key, creating the entry if needed
 */
export function appendPlatformValues<T>(map: PlatformKeyed<T>, suffix: string, ...values: T[]): void {
  const existing = map[suffix];
  if (existing) {
    existing.push(...values);
  } else {
    map[suffix] = [...values];
  }
}

export function hasPlatformKey<T>(map: PlatformKeyed<T>, suffix: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, suffix);
}
