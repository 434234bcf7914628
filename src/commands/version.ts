/**
 * @fileoverview Version command implementation
 */

import { Command } from 'commander';
import { resolve } from 'path';

import { PackageEntity } from '../core/package/package.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

async function versionCommand(dir: string): Promise<void> {
  const root = resolve(process.cwd(), dir);
  logger.debug('Version command invoked', { root });

  const pkg = await PackageEntity.load(root);
  console.log(pkg.version.toString());
}

/**
 * Setup the version command
 */
export function setupVersionCommand(program: Command): void {
  program
    .command('version')
    .description('Print the effective version of a package')
    .argument('[dir]', 'package directory', '.')
    .action(withErrorHandling(async (dir: string) => {
      await versionCommand(dir);
    }));
}
