/**
 * Compiler Capability Port Interface
 *
 * The package model does not drive compilers; it only asks one to
 * normalize compiler-specific flags and to name the produced target file.
 */

import type { BuildSettings } from '../build-settings.js';
import type { BuildPlatform } from '../platform.js';

export interface CompilerCapability {
  readonly name: string;

  /**
   * Promote recognized raw compiler flags into structured options,
   * versions and debug versions, removing them from `settings.dflags`.
   * Must be idempotent.
   */
  extractBuildOptions(settings: BuildSettings): void;

  /**
   * File name of the build target, or an empty string for target types
   * that produce no file.
   */
  getTargetFileName(settings: BuildSettings, platform: BuildPlatform): string;
}
