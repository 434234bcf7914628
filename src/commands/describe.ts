/**
 * @fileoverview Describe command implementation
 *
 * Prints the description of a package for one platform, configuration
 * and build type as JSON.
 */

import { Command } from 'commander';
import { resolve } from 'path';

import { PackageEntity } from '../core/package/package.js';
import { createPackageContext } from '../core/package/context.js';
import { getCompiler } from '../core/compilers/index.js';
import { createBuildPlatform, detectHostPlatform } from '../core/platform.js';
import { loadConfig } from '../core/config.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

interface DescribeOptions {
  config?: string;
  build?: string;
  platform?: string;
  arch?: string;
  compiler?: string;
}

function splitList(value: string): string[] {
  return value.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);
}

async function describeCommand(dir: string, options: DescribeOptions): Promise<void> {
  const root = resolve(process.cwd(), dir);
  logger.debug('Describe command invoked', { root, options });

  const config = loadConfig();
  const compiler = getCompiler(options.compiler ?? config.defaultCompiler);
  const context = createPackageContext({ config, compiler });

  const host = detectHostPlatform(compiler.name);
  const platform = createBuildPlatform({
    platform: options.platform ? splitList(options.platform) : host.platform,
    architecture: options.arch ? splitList(options.arch) : host.architecture,
    compiler: compiler.name
  });

  const pkg = await PackageEntity.load(root, { context });
  const configuration = options.config ?? pkg.getDefaultConfiguration(platform, true) ?? '';
  const description = await pkg.describe(platform, compiler, configuration, options.build ?? '');

  console.log(JSON.stringify(description, null, 2));
}

/**
 * Setup the describe command
 */
export function setupDescribeCommand(program: Command): void {
  program
    .command('describe')
    .description('Print the resolved description of a package as JSON')
    .argument('[dir]', 'package directory', '.')
    .option('-c, --config <name>', 'configuration to describe')
    .option('-b, --build <type>', 'build type to apply, e.g. debug or release')
    .option('--platform <list>', 'comma-separated platform identifiers, e.g. posix,linux')
    .option('--arch <list>', 'comma-separated architecture identifiers, e.g. x86_64')
    .option('--compiler <id>', 'compiler whose conventions are applied')
    .action(withErrorHandling(async (dir: string, options: DescribeOptions) => {
      await describeCommand(dir, options);
    }));
}
