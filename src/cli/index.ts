#!/usr/bin/env node
/**
 * Mirth Connect REST client CLI
 *
 * Usage: mirth-client [options] <command> [subcommand] [arguments]
 *
 * Connection settings come from the global options or the MIRTH_URL,
 * MIRTH_USERNAME, MIRTH_PASSWORD, MIRTH_VERIFY_SSL and MIRTH_TIMEOUT
 * environment variables (a .env file in the working directory is loaded).
 */

import 'dotenv/config';
import chalk from 'chalk';
import { LogLevel, setGlobalLevel, shutdownLogging } from '../logging/index.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  // Keep info-level session logs out of command output unless asked for
  if (!process.env['LOG_LEVEL']) {
    setGlobalLevel(LogLevel.WARN);
  }
  try {
    await createProgram().parseAsync(process.argv);
  } finally {
    await shutdownLogging();
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
