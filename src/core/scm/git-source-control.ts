/**
 * Git implementation of the SourceControl port
 */

import { join } from 'path';

import { DIR_PATTERNS } from '../../constants/index.js';
import type { FileSystemPort } from '../ports/filesystem.js';
import type { ProcessRunner } from '../ports/process.js';
import type { SourceControl, TagDescription } from '../ports/source-control.js';
import { logger } from '../../utils/logger.js';

/**
 * Parse the output of `git describe --long --tags`:
 * `<tag>-<distance>-g<hash>`, where the tag itself may contain dashes.
 */
export function parseDescribeOutput(output: string): TagDescription | null {
  const parts = output.trim().split('-');
  if (parts.length < 3) return null;

  const hash = parts[parts.length - 1];
  const distance = Number(parts[parts.length - 2]);
  if (!Number.isInteger(distance) || distance < 0) return null;

  return {
    tag: parts.slice(0, -2).join('-'),
    distance,
    hash
  };
}

export class GitSourceControl implements SourceControl {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly fileSystem: FileSystemPort
  ) {}

  private gitDir(root: string): string {
    return join(root, DIR_PATTERNS.GIT);
  }

  /**
   * Run git against the repository at `root`; stripped stdout, or null on failure
   */
  private async exec(root: string, args: string[]): Promise<string | null> {
    const fullArgs = [`--git-dir=${this.gitDir(root)}`, ...args];
    const result = await this.runner.run('git', fullArgs);
    if (result.exitCode === 0) return result.stdout.trim();
    logger.debug(`'git ${fullArgs.join(' ')}' failed with exit code ${result.exitCode}: ${result.stderr.trim()}`);
    return null;
  }

  async isWorkingCopy(root: string): Promise<boolean> {
    return this.fileSystem.isDirectory(this.gitDir(root));
  }

  async describe(root: string): Promise<TagDescription | null> {
    const output = await this.exec(root, ['describe', '--long', '--tags']);
    if (output === null) return null;
    const parsed = parseDescribeOutput(output);
    if (!parsed) logger.debug(`Unrecognized git describe output: ${output}`);
    return parsed;
  }

  async currentBranch(root: string): Promise<string | null> {
    return this.exec(root, ['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  /**
   * Read the HEAD commit straight from the repository metadata, without
   * spawning git. A detached HEAD holds the commit itself; symbolic refs
   * are only understood when stored as loose files.
   */
  async headCommit(root: string): Promise<string | null> {
    const headPath = join(this.gitDir(root), 'HEAD');
    if (!(await this.fileSystem.exists(headPath))) return null;

    const headRef = (await this.fileSystem.readText(headPath)).trim();
    if (!headRef.startsWith('ref: ')) return /^[0-9a-f]{40,64}$/.test(headRef) ? headRef : null;

    const refPath = join(this.gitDir(root), headRef.slice('ref: '.length));
    if (!(await this.fileSystem.exists(refPath))) return null;
    const commit = (await this.fileSystem.readText(refPath)).trim();
    return commit.length > 0 ? commit : null;
  }
}
