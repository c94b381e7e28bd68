#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

import { setupResolveCommand } from './commands/resolve.js';
import { setupTreeCommand } from './commands/tree.js';

/**
 * dbdeps CLI - Main entry point
 *
 * Lists the objects that depend on (or are depended on by) database objects,
 * ordered so they can be dropped and recreated safely.
 */

const program = new Command();

program
  .name('dbdeps')
  .description('Resolve database object dependencies in a valid creation order')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--config <file>', 'configuration file (default: dbdeps.config.jsonc)')
  .option('--verbose', 'log debug output')
  .configureHelp({ sortSubcommands: true });

setupResolveCommand(program);
setupTreeCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts();

  if (opts.verbose === true) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (typeof opts.cwd === 'string') {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      logger.debug(`Working directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }

  try {
    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('dbdeps')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
