#!/usr/bin/env node

import { Command } from 'commander';
import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupPlanCommand } from './commands/plan.js';
import { setupInspectCommand } from './commands/inspect.js';

/**
 * cratebuild CLI - Main entry point
 *
 * Turns RO-Crate metadata into reproducible container build plans.
 */

const program = new Command();

program
  .name('cratebuild')
  .description('Generate container build plans from RO-Crate metadata')
  .version(getVersion())
  .option('--verbose', 'print debug logs to stderr')
  .configureHelp({
    sortSubcommands: true
  });

setupPlanCommand(program);
setupInspectCommand(program);

program.hook('preAction', () => {
  if (program.opts().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  // No arguments: show help and exit successfully
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('cratebuild')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
