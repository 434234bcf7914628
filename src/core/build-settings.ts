/**
 * Effective (flattened, platform-resolved) build settings
 */

import { minimatch } from 'minimatch';
import { normalize } from 'path';

import type { TargetType } from '../types/index.js';
import {
  createBuildOptions,
  createBuildRequirements,
  type BuildOption,
  type BuildOptions,
  type BuildRequirement,
  type BuildRequirements
} from './flags.js';

/**
 * Append values that are not already present
 */
function addUnique(target: string[], values: readonly string[]): void {
  for (const value of values) {
    if (!target.includes(value)) {
      target.push(value);
    }
  }
}

function samePath(a: string, b: string): boolean {
  return normalize(a) === normalize(b);
}

/**
 * Remove entries equal to, or glob-matched by, any of the given patterns
 */
function removePaths(target: string[], patterns: readonly string[]): string[] {
  return target.filter(entry =>
    !patterns.some(pattern => samePath(entry, pattern) || minimatch(entry, pattern, { dot: true }))
  );
}

export class BuildSettings {
  targetType: TargetType = 'autodetect';
  targetPath = '';
  targetName = '';
  workingDirectory = '';
  mainSourceFile = '';

  dflags: string[] = [];
  lflags: string[] = [];
  libs: string[] = [];
  sourceFiles: string[] = [];
  copyFiles: string[] = [];
  versions: string[] = [];
  debugVersions: string[] = [];
  importPaths: string[] = [];
  stringImportPaths: string[] = [];
  importFiles: string[] = [];
  stringImportFiles: string[] = [];
  preGenerateCommands: string[] = [];
  postGenerateCommands: string[] = [];
  preBuildCommands: string[] = [];
  postBuildCommands: string[] = [];

  requirements: BuildRequirements = createBuildRequirements();
  options: BuildOptions = createBuildOptions();

  // compiler flags and command lists keep duplicates, order matters
  addDFlags(...values: string[]): void { this.dflags.push(...values); }
  addLFlags(...values: string[]): void { this.lflags.push(...values); }
  addPreGenerateCommands(...values: string[]): void { this.preGenerateCommands.push(...values); }
  addPostGenerateCommands(...values: string[]): void { this.postGenerateCommands.push(...values); }
  addPreBuildCommands(...values: string[]): void { this.preBuildCommands.push(...values); }
  addPostBuildCommands(...values: string[]): void { this.postBuildCommands.push(...values); }

  addLibs(...values: string[]): void { addUnique(this.libs, values); }
  addSourceFiles(...values: string[]): void { addUnique(this.sourceFiles, values); }
  removeSourceFiles(...values: string[]): void { this.sourceFiles = removePaths(this.sourceFiles, values); }
  addImportFiles(...values: string[]): void { addUnique(this.importFiles, values); }
  removeImportFiles(...values: string[]): void { this.importFiles = removePaths(this.importFiles, values); }
  addStringImportFiles(...values: string[]): void { addUnique(this.stringImportFiles, values); }
  addCopyFiles(...values: string[]): void { addUnique(this.copyFiles, values); }
  addVersions(...values: string[]): void { addUnique(this.versions, values); }
  addDebugVersions(...values: string[]): void { addUnique(this.debugVersions, values); }
  addImportPaths(...values: string[]): void { addUnique(this.importPaths, values); }
  addStringImportPaths(...values: string[]): void { addUnique(this.stringImportPaths, values); }

  addRequirements(...values: BuildRequirement[]): void { this.requirements.add(...values); }
  addOptions(...values: BuildOption[]): void { this.options.add(...values); }

  /**
   * Merge another settings value into this one: lists extend, scalars
   * override when set.
   */
  add(other: BuildSettings): void {
    if (other.targetType !== 'autodetect') this.targetType = other.targetType;
    if (other.targetPath) this.targetPath = other.targetPath;
    if (other.targetName) this.targetName = other.targetName;
    if (other.workingDirectory) this.workingDirectory = other.workingDirectory;
    if (other.mainSourceFile) this.mainSourceFile = other.mainSourceFile;

    addUnique(this.dflags, other.dflags);
    addUnique(this.lflags, other.lflags);
    this.addLibs(...other.libs);
    this.addSourceFiles(...other.sourceFiles);
    this.addCopyFiles(...other.copyFiles);
    this.addVersions(...other.versions);
    this.addDebugVersions(...other.debugVersions);
    this.addImportPaths(...other.importPaths);
    this.addStringImportPaths(...other.stringImportPaths);
    this.addImportFiles(...other.importFiles);
    this.addStringImportFiles(...other.stringImportFiles);
    addUnique(this.preGenerateCommands, other.preGenerateCommands);
    addUnique(this.postGenerateCommands, other.postGenerateCommands);
    addUnique(this.preBuildCommands, other.preBuildCommands);
    addUnique(this.postBuildCommands, other.postBuildCommands);
    this.addRequirements(...other.requirements);
    this.addOptions(...other.options);
  }

  clone(): BuildSettings {
    const copy = new BuildSettings();
    copy.targetType = this.targetType;
    copy.targetPath = this.targetPath;
    copy.targetName = this.targetName;
    copy.workingDirectory = this.workingDirectory;
    copy.mainSourceFile = this.mainSourceFile;
    copy.dflags = [...this.dflags];
    copy.lflags = [...this.lflags];
    copy.libs = [...this.libs];
    copy.sourceFiles = [...this.sourceFiles];
    copy.copyFiles = [...this.copyFiles];
    copy.versions = [...this.versions];
    copy.debugVersions = [...this.debugVersions];
    copy.importPaths = [...this.importPaths];
    copy.stringImportPaths = [...this.stringImportPaths];
    copy.importFiles = [...this.importFiles];
    copy.stringImportFiles = [...this.stringImportFiles];
    copy.preGenerateCommands = [...this.preGenerateCommands];
    copy.postGenerateCommands = [...this.postGenerateCommands];
    copy.preBuildCommands = [...this.preBuildCommands];
    copy.postBuildCommands = [...this.postBuildCommands];
    copy.requirements = this.requirements.clone();
    copy.options = this.options.clone();
    return copy;
  }
}
