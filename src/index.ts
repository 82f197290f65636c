#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

import { setupResolveCommand } from './commands/resolve.js';
import { setupGraphCommand } from './commands/graph.js';

/**
 * graphpin CLI - Main entry point
 */

const program = new Command();

program
  .name('graphpin')
  .description('Resolve package dependencies into a pinned, validated build graph')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--registry <dir>', 'registry directory to read packages from')
  .option('--platform <name>', 'build platform for conditional target dependencies')
  .option('--verbose', 'print debug logging')
  .configureHelp({ sortSubcommands: true });

setupResolveCommand(program);
setupGraphCommand(program);

// =============================================================================
// HOOKS
// =============================================================================

program.hook('preAction', async () => {
  const opts: { cwd?: string; verbose?: boolean } = program.opts();

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      logger.info(`Working directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`Invalid --cwd '${opts.cwd}': Directory must exist. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    if (process.argv.length <= 2) {
      program.outputHelp();
      return;
    }
    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exitCode = 1;
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('graphpin')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
