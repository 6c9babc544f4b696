/**
 * Session helpers shared by all commands
 *
 * Each command opens a session from the global options (falling back to
 * MIRTH_* environment variables), runs, and logs out again.
 */

import type { Command } from 'commander';
import ora from 'ora';
import { MirthApi } from '../../client/MirthApi.js';
import { MirthError, MirthValidationError } from '../../client/errors.js';
import { loadClientConfig } from '../../config/ClientConfig.js';
import { LogLevel, getLogger, setGlobalLevel } from '../../logging/index.js';
import type { GlobalOptions } from '../types/index.js';
import { OutputFormatter } from './OutputFormatter.js';

const logger = getLogger('cli');

export async function withSession<T>(
  globalOpts: GlobalOptions,
  fn: (mirth: MirthApi) => Promise<T>
): Promise<T> {
  const config = loadClientConfig(process.env, {
    url: globalOpts.url,
    username: globalOpts.user,
    password: globalOpts.password,
    verifySsl: globalOpts.insecure ? false : undefined,
  });

  if (!config.username) {
    throw new MirthValidationError('A username is required (--user or MIRTH_USERNAME)');
  }

  const mirth = MirthApi.fromConfig(config);
  await mirth.login(config.username, config.password ?? '');
  try {
    return await fn(mirth);
  } finally {
    await closeQuietly(mirth);
  }
}

/**
 * Log out without letting a logout failure replace the command's outcome
 */
async function closeQuietly(mirth: MirthApi): Promise<void> {
  try {
    await mirth.close();
  } catch (error) {
    logger.warn('Logout failed', error instanceof Error ? error : undefined);
  }
}

/**
 * Parse a non-negative integer option
 */
export function parseCount(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new MirthValidationError(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return n;
}

/**
 * Run a command: open a session, fetch with a spinner, then render as text
 * or JSON. Failures are printed and set a non-zero exit code.
 */
export async function runCommand<T>(
  cmd: Command,
  spinnerText: string,
  fetch: (mirth: MirthApi) => Promise<T>,
  render: (data: T, formatter: OutputFormatter) => void
): Promise<void> {
  const globalOpts = cmd.optsWithGlobals<GlobalOptions>();
  const formatter = new OutputFormatter(globalOpts.json ?? false);
  if (globalOpts.verbose) {
    setGlobalLevel(LogLevel.DEBUG);
  }

  const spinner = formatter.isJson ? null : ora(spinnerText).start();
  try {
    const data = await withSession(globalOpts, fetch);
    spinner?.stop();
    render(data, formatter);
  } catch (error) {
    spinner?.stop();
    const message = error instanceof Error ? error.message : String(error);
    if (!(error instanceof MirthError) && error instanceof Error) {
      logger.error('Unexpected failure', error);
    }
    formatter.error(`${spinnerText.replace(/\.+$/, '')} failed`, message);
    process.exitCode = 1;
  }
}
