#!/usr/bin/env node

import { Command } from 'commander';

import { LogLevel } from './types/index.js';
import { loadConfig } from './core/config.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package-version.js';

// Import command setup functions
import { setupDescribeCommand } from './commands/describe.js';
import { setupVersionCommand } from './commands/version.js';

/**
 * drecipe CLI - Main entry point
 *
 * Inspects D package recipes: effective versions, configurations and
 * resolved build settings.
 */

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('drecipe')
  .description('drecipe - inspect D package recipes')
  .version(getVersion())
  .option('--verbose', 'print debug diagnostics')
  .configureHelp({ sortSubcommands: true });

setupDescribeCommand(program);
setupVersionCommand(program);

program.hook('preAction', () => {
  const opts = program.opts<{ verbose?: boolean }>();
  logger.setLevel(opts.verbose ? LogLevel.DEBUG : loadConfig().logLevel);
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // If no arguments provided, show help and exit successfully
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
