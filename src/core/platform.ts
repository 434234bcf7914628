/**
 * Build platform description and platform-suffix matching
 */

import { UsageError } from '../utils/errors.js';

export interface BuildPlatform {
  /** Operating system identifiers, e.g. `['posix', 'linux']` */
  platform: string[];
  /** Architecture identifiers, e.g. `['x86_64']` */
  architecture: string[];
  /** Compiler identity, e.g. `dmd` */
  compiler: string;
  compilerBinary: string;
  frontendVersion: number;
}

/**
 * Platform value that matches every platform specification.
 * Used for combined (IDE-style) views, never for actual builds.
 */
export const ANY_PLATFORM: Readonly<BuildPlatform> = Object.freeze({
  platform: [],
  architecture: [],
  compiler: '',
  compilerBinary: '',
  frontendVersion: -1
});

export function isAnyPlatform(platform: BuildPlatform): boolean {
  return platform === ANY_PLATFORM || (
    platform.platform.length === 0 &&
    platform.architecture.length === 0 &&
    platform.compiler === '' &&
    platform.compilerBinary === '' &&
    platform.frontendVersion === -1
  );
}

export function createBuildPlatform(init: Partial<BuildPlatform> = {}): BuildPlatform {
  return {
    platform: init.platform ?? [],
    architecture: init.architecture ?? [],
    compiler: init.compiler ?? '',
    compilerBinary: init.compilerBinary ?? init.compiler ?? '',
    frontendVersion: init.frontendVersion ?? 0
  };
}

/**
 * Describe the platform this process runs on, in recipe vocabulary.
 */
export function detectHostPlatform(compiler: string): BuildPlatform {
  const platform: string[] = [];
  switch (process.platform) {
    case 'win32':
      platform.push('windows');
      break;
    case 'darwin':
      platform.push('posix', 'osx');
      break;
    case 'linux':
      platform.push('posix', 'linux');
      break;
    case 'freebsd':
      platform.push('posix', 'freebsd');
      break;
    default:
      platform.push('posix', process.platform);
  }

  const archNames: Record<string, string[]> = {
    x64: ['x86_64'],
    ia32: ['x86'],
    arm64: ['aarch64'],
    arm: ['arm']
  };

  return createBuildPlatform({
    platform,
    architecture: archNames[process.arch] ?? [process.arch],
    compiler
  });
}

/**
 * Match a platform suffix such as `-linux`, `-x86_64-dmd` or
 * `-windows-x86-ldc` against a platform.
 *
 * The optional parts are consumed in the order platform, architecture,
 * compiler; the compiler, if present, must be the last part.
 */
export function matchesSpecification(platform: BuildPlatform, specification: string): boolean {
  if (specification.length === 0) return true;
  if (isAnyPlatform(platform)) return true;

  if (!specification.startsWith('-')) {
    throw new UsageError(`Platform specification must start with a dash: "${specification}"`);
  }

  const parts = specification.slice(1).split('-');
  if (parts.length === 1 && parts[0] === '') {
    throw new UsageError(`Platform specification, if present, must not be empty: "${specification}"`);
  }

  let index = 0;
  if (platform.platform.includes(parts[index])) {
    index++;
    if (index === parts.length) return true;
  }
  if (platform.architecture.includes(parts[index])) {
    index++;
    if (index === parts.length) return true;
  }
  if (platform.compiler === parts[index]) {
    index++;
    if (index !== parts.length) {
      throw new UsageError(`Invalid platform specification "${specification}": the compiler has to be the last element`);
    }
    return true;
  }
  return false;
}
