/**
 * Server Commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { runCommand } from '../lib/session.js';

export function registerServerCommands(program: Command): void {
  program
    .command('version')
    .description('Show the Mirth Connect server version')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching server version...',
        async (mirth) => ({ url: mirth.base, version: mirth.version ?? (await mirth.getServerVersion()) }),
        (data, formatter) => {
          formatter.output(`${chalk.gray('Server:')}  ${data.url}\n${chalk.gray('Version:')} ${data.version}`, data);
        }
      );
    });
}
