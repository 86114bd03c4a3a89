#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { installInterruptHandlers } from './utils/interrupt.js';
import { EXIT_CODES } from './constants/index.js';

import { setupCheckCommand } from './commands/check.js';
import { setupCacheCommand } from './commands/cache.js';

/**
 * distro-deps CLI - Main entry point
 *
 * Audits whether a Rust project's crate dependencies are packaged in the
 * distribution repositories, and keeps an RPM spec file's BuildRequires and
 * bundled Provides in sync with the result.
 */

const program = new Command();

program
  .name('distro-deps')
  .description('Check Cargo dependencies against distribution packages and update RPM spec files')
  .version(getVersion())
  .showHelpAfterError()
  .addHelpText('after', `
Examples:
  $ distro-deps check project-1.2.3.tar.zstd
  $ distro-deps check --all-crates --source-dir ./project-1.2.3
  $ distro-deps check --all-crates --update-spec packaging/project.spec --draft project.tar.zstd
  $ distro-deps check --all-crates --format json --source-dir ./project-1.2.3
  $ distro-deps cache clear`);

setupCheckCommand(program);
setupCacheCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with DISTRO_DEPS_VERBOSE=1 for details.');
  process.exit(EXIT_CODES.FAILURE);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with DISTRO_DEPS_VERBOSE=1 for details.');
  process.exit(EXIT_CODES.FAILURE);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  installInterruptHandlers();

  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

// Only run main if this file is executed directly.
// The bin wrapper calls run() explicitly.
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(EXIT_CODES.FAILURE);
  });
}

export { program };
