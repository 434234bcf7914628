/**
 * Recipe model: the syntax-independent form of a package recipe.
 */

import type { BuildOption, BuildRequirement } from '../core/flags.js';

export const TARGET_TYPES = [
  'autodetect',
  'none',
  'executable',
  'library',
  'sourceLibrary',
  'dynamicLibrary',
  'staticLibrary',
  'object'
] as const;

export type TargetType = typeof TARGET_TYPES[number];

export function isTargetType(value: string): value is TargetType {
  return (TARGET_TYPES as readonly string[]).includes(value);
}

/**
 * Values keyed by platform suffix.
 *
 * The empty key applies to every platform; other keys look like
 * `-linux`, `-x86_64` or `-windows-x86-dmd`.
 */
export type PlatformKeyed<T> = Record<string, T[]>;

/**
 * Dependency constraint as written in a recipe
 */
export interface Dependency {
  /** Version specification, e.g. `~>1.2.0`, `>=2.0.0`, `~master` */
  version?: string;
  /** Local path of the dependency, relative to the declaring package */
  path?: string;
  optional?: boolean;
  default?: boolean;
}

export interface PackageDependency {
  name: string;
  spec: Dependency;
}

export interface BuildSettingsTemplate {
  dependencies: Record<string, Dependency>;
  targetType: TargetType;
  targetPath: string;
  targetName: string;
  workingDirectory: string;
  mainSourceFile: string;
  /** Dependency name -> configuration of that dependency to build */
  subConfigurations: Record<string, string>;

  dflags: PlatformKeyed<string>;
  lflags: PlatformKeyed<string>;
  libs: PlatformKeyed<string>;
  sourceFiles: PlatformKeyed<string>;
  sourcePaths: PlatformKeyed<string>;
  excludedSourceFiles: PlatformKeyed<string>;
  copyFiles: PlatformKeyed<string>;
  versions: PlatformKeyed<string>;
  debugVersions: PlatformKeyed<string>;
  importPaths: PlatformKeyed<string>;
  stringImportPaths: PlatformKeyed<string>;
  preGenerateCommands: PlatformKeyed<string>;
  postGenerateCommands: PlatformKeyed<string>;
  preBuildCommands: PlatformKeyed<string>;
  postBuildCommands: PlatformKeyed<string>;

  buildRequirements: PlatformKeyed<BuildRequirement>;
  buildOptions: PlatformKeyed<BuildOption>;
}

/**
 * Names of the platform-keyed string list fields of a template
 */
export const TEMPLATE_LIST_FIELDS = [
  'dflags',
  'lflags',
  'libs',
  'sourceFiles',
  'sourcePaths',
  'excludedSourceFiles',
  'copyFiles',
  'versions',
  'debugVersions',
  'importPaths',
  'stringImportPaths',
  'preGenerateCommands',
  'postGenerateCommands',
  'preBuildCommands',
  'postBuildCommands'
] as const;

export type TemplateListField = typeof TEMPLATE_LIST_FIELDS[number];

export const TEMPLATE_SCALAR_FIELDS = [
  'targetPath',
  'targetName',
  'workingDirectory',
  'mainSourceFile'
] as const;

export type TemplateScalarField = typeof TEMPLATE_SCALAR_FIELDS[number];

export interface ConfigurationInfo {
  name: string;
  /** Platform specifications without the leading dash; empty matches all */
  platforms: string[];
  buildSettings: BuildSettingsTemplate;
}

export type SubPackage =
  | { kind: 'inline'; recipe: PackageRecipe }
  | { kind: 'path'; path: string };

export interface PackageRecipe {
  name: string;
  version: string;
  description: string;
  homepage: string;
  authors: string[];
  copyright: string;
  license: string;
  buildSettings: BuildSettingsTemplate;
  configurations: ConfigurationInfo[];
  buildTypes: Record<string, BuildSettingsTemplate>;
  subPackages: SubPackage[];
}
