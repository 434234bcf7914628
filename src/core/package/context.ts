/**
 * Package context: the collaborators a package needs to resolve itself.
 *
 * Every capability the package model depends on is injected here so that
 * tests and embedders can replace the file system, the source-control tool
 * or the compiler conventions.
 */

import type { FileSystemPort } from '../ports/filesystem.js';
import type { SourceControl } from '../ports/source-control.js';
import type { CompilerCapability } from '../ports/compiler.js';
import type { ProcessRunner } from '../ports/process.js';
import { nodeFileSystem } from '../ports/node-filesystem.js';
import { execProcessRunner } from '../ports/exec-process.js';
import { GitSourceControl } from '../scm/git-source-control.js';
import { getCompiler } from '../compilers/index.js';
import { loadConfig, type PackageModelConfig } from '../config.js';

export interface PackageContext {
  fileSystem: FileSystemPort;
  sourceControl: SourceControl;
  /** Compiler whose flag conventions are applied to resolved settings */
  compiler: CompilerCapability;
  config: PackageModelConfig;
}

export interface PackageContextOptions extends Partial<PackageContext> {
  processRunner?: ProcessRunner;
}

/**
 * Fill in defaults for every collaborator not supplied
 */
export function createPackageContext(options: PackageContextOptions = {}): PackageContext {
  const config = options.config ?? loadConfig();
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  return {
    fileSystem,
    sourceControl: options.sourceControl
      ?? new GitSourceControl(options.processRunner ?? execProcessRunner, fileSystem),
    compiler: options.compiler ?? getCompiler(config.defaultCompiler),
    config
  };
}
