/**
 * Runtime configuration.
 *
 * Environment values are read once, at the edge, and passed into the package
 * context; nothing below this module consults `process.env` directly.
 */

import { LogLevel } from '../types/index.js';
import { logLevelFromEnv } from '../utils/logger.js';

export interface PackageModelConfig {
  logLevel: LogLevel;
  /** Raw compiler flags appended by the `$DFLAGS` build type */
  dflags: string;
  /** Persist the source-control version per HEAD commit */
  versionCache: boolean;
  /** Compiler whose flag conventions are used when resolving build settings */
  defaultCompiler: string;
}

export const DEFAULT_CONFIG: Readonly<PackageModelConfig> = Object.freeze({
  logLevel: LogLevel.WARN,
  dflags: '',
  versionCache: false,
  defaultCompiler: 'dmd'
});

function parseBooleanFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Build the configuration from an environment record.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  hostPlatform: NodeJS.Platform = process.platform
): PackageModelConfig {
  return {
    logLevel: logLevelFromEnv(env),
    dflags: env.DFLAGS ?? '',
    versionCache: parseBooleanFlag(env.DRECIPE_VERSION_CACHE) ?? hostPlatform === 'win32',
    defaultCompiler: env.DRECIPE_COMPILER?.trim() || DEFAULT_CONFIG.defaultCompiler
  };
}
