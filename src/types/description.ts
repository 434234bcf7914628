/**
 * Flat, serializable package description for IDEs and build tools
 */

import type { BuildOption, BuildRequirement } from '../core/flags.js';
import type { TargetType } from './recipe.js';

export type SourceFileRole =
  | 'unusedStringImport'
  | 'unusedImport'
  | 'unusedSource'
  | 'stringImport'
  | 'import'
  | 'source';

export interface SourceFileDescription {
  path: string;
  role: SourceFileRole;
}

export interface PackageDescription {
  path: string;
  name: string;
  version: string;
  description: string;
  homepage: string;
  authors: string[];
  copyright: string;
  license: string;
  /** Names of the dependencies of the described configuration */
  dependencies: string[];
  configuration: string;

  targetType: TargetType;
  targetPath: string;
  targetName: string;
  targetFileName: string;
  workingDirectory: string;
  mainSourceFile: string;

  dflags: string[];
  lflags: string[];
  libs: string[];
  copyFiles: string[];
  versions: string[];
  debugVersions: string[];
  importPaths: string[];
  stringImportPaths: string[];
  preGenerateCommands: string[];
  postGenerateCommands: string[];
  preBuildCommands: string[];
  postBuildCommands: string[];

  /** Set build requirements, in increasing bit order */
  buildRequirements: BuildRequirement[];
  /** Set build options, in increasing bit order */
  options: BuildOption[];

  /** Every known file of the package, sorted by path */
  files: SourceFileDescription[];
}
