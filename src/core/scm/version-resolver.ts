/**
 * Version determination from source-control state.
 *
 * Produces a version string or an empty string; never throws for a missing
 * or failing source-control tool.
 */

import { join } from 'path';

import { DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';
import type { FileSystemPort } from '../ports/filesystem.js';
import type { SourceControl, TagDescription } from '../ports/source-control.js';
import { Version } from '../version.js';
import { logger } from '../../utils/logger.js';

export interface VersionCacheRecord {
  commit: string;
  version: string;
}

export interface VersionResolverOptions {
  /** Keep a per-HEAD-commit record so the tool is not spawned on every run */
  cache?: boolean;
}

function isVersionCacheRecord(value: unknown): value is VersionCacheRecord {
  return typeof value === 'object' && value !== null &&
    'commit' in value && typeof value.commit === 'string' &&
    'version' in value && typeof value.version === 'string';
}

/**
 * Version for a tag description, or null when the tag is not `v<semver>`.
 *
 * - distance 0: the tag's version verbatim
 * - tag with build metadata: `<version>.commit.<distance>.<hash>`
 * - otherwise: `<version>+commit.<distance>.<hash>`
 */
export function versionFromTag(description: TagDescription): string | null {
  const { tag, distance, hash } = description;
  if (!tag.startsWith('v')) return null;
  const version = tag.slice(1);
  if (!Version.isValid(version)) return null;

  if (distance === 0) return version;
  if (version.includes('+')) return `${version}.commit.${distance}.${hash}`;
  return `${version}+commit.${distance}.${hash}`;
}

export function getVersionCachePath(root: string): string {
  return join(root, DIR_PATTERNS.METADATA, FILE_PATTERNS.VERSION_CACHE);
}

export class VersionResolver {
  private readonly useCache: boolean;

  constructor(
    private readonly sourceControl: SourceControl,
    private readonly fileSystem: FileSystemPort,
    options: VersionResolverOptions = {}
  ) {
    this.useCache = options.cache ?? false;
  }

  /**
   * Determine the version of the package stored at `root`.
   * Returns an empty string when source control offers nothing usable.
   */
  async resolve(root: string): Promise<string> {
    if (root.length === 0) return '';

    const headCommit = this.useCache ? await this.readHeadCommit(root) : null;
    if (headCommit) {
      const cached = await this.readCache(root);
      if (cached && cached.commit === headCommit) {
        logger.debug(`Using cached version ${cached.version} for commit ${headCommit}`);
        return cached.version;
      }
    }

    const version = await this.determine(root);

    if (headCommit) {
      await this.writeCache(root, { commit: headCommit, version });
    }

    return version;
  }

  private async determine(root: string): Promise<string> {
    if (!(await this.sourceControl.isWorkingCopy(root))) return '';

    const description = await this.sourceControl.describe(root);
    if (description) {
      const version = versionFromTag(description);
      if (version !== null) return version;
      logger.debug(`Ignoring tag '${description.tag}', not of the form v<semver>`);
    }

    const branch = await this.sourceControl.currentBranch(root);
    if (branch && branch !== 'HEAD') return `~${branch}`;

    return '';
  }

  private async readHeadCommit(root: string): Promise<string | null> {
    try {
      return await this.sourceControl.headCommit(root);
    } catch (error) {
      logger.debug(`Failed to determine HEAD commit in ${root}`, error);
      return null;
    }
  }

  private async readCache(root: string): Promise<VersionCacheRecord | null> {
    const cachePath = getVersionCachePath(root);
    try {
      if (!(await this.fileSystem.exists(cachePath))) return null;
      const parsed: unknown = JSON.parse(await this.fileSystem.readText(cachePath));
      if (isVersionCacheRecord(parsed)) return parsed;
      logger.debug(`Ignoring malformed version cache ${cachePath}`);
    } catch (error) {
      logger.debug(`Ignoring unreadable version cache ${cachePath}`, error);
    }
    return null;
  }

  private async writeCache(root: string, record: VersionCacheRecord): Promise<void> {
    const cachePath = getVersionCachePath(root);
    try {
      await this.fileSystem.writeTextAtomic(cachePath, JSON.stringify(record, null, 2));
    } catch (error) {
      logger.debug(`Failed to update version cache ${cachePath}`, error);
    }
  }
}
