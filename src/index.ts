#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { LogLevel } from './types/index.js';
import { logger } from './utils/logger.js';

// Import command setup functions
import { setupBuildCommand } from './commands/build.js';
import { setupReleaseCommand } from './commands/release.js';
import { setupRenderCommand } from './commands/render.js';

/**
 * podreadme CLI - Main entry point
 *
 * Builds a distribution and keeps its README in step with the POD of its main module.
 */

function getVersion(): string {
  // src/index.ts and dist/src/index.js sit at different depths below package.json
  for (const candidate of ['../package.json', '../../package.json']) {
    try {
      const manifest: unknown = JSON.parse(readFileSync(new URL(candidate, import.meta.url), 'utf8'));
      if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
        return manifest.version;
      }
    } catch {
      logger.debug(`No package manifest at ${candidate}`);
    }
  }
  return '0.0.0';
}

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('podreadme')
  .description('Generate README files from POD while building a distribution')
  .version(getVersion())
  .option('--working-dir <path>', 'Specify working directory (default: current directory)')
  .option('--verbose', 'Show debug output')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
  })
  .configureHelp({
    sortSubcommands: true,
  });

// === BUILD COMMANDS ===
setupBuildCommand(program);
setupReleaseCommand(program);
setupRenderCommand(program);

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Please check the logs for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason: String(reason) });
  console.error('❌ An unexpected error occurred. Please check the logs for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error: String(error) });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('podreadme')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error: String(error) });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
