/**
 * CLI program definition
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { registerChannelCommands } from './commands/channels.js';
import { registerEventCommands } from './commands/events.js';
import { registerMessageCommands } from './commands/messages.js';
import { registerServerCommands } from './commands/server.js';

export const VERSION = '0.1.0';

const BANNER = `
${chalk.cyan('  __  __ _      _   _      ')}
${chalk.cyan(' |  \\/  (_)_ __| |_| |__   ')}
${chalk.cyan(" | |\\/| | | '__| __| '_ \\  ")}
${chalk.cyan(' | |  | | | |  | |_| | | | ')}
${chalk.cyan(' |_|  |_|_|_|   \\__|_| |_| ')}
${chalk.gray('     REST client v' + VERSION)}
`;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mirth-client')
    .description('Query and control a Mirth Connect server over its REST API')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('--url <url>', 'API root, e.g. https://localhost:8443/api')
    .option('-u, --user <username>', 'Username for authentication')
    .option('-p, --password <password>', 'Password for authentication')
    .option('--insecure', 'Skip TLS certificate verification')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output');

  registerServerCommands(program);
  registerChannelCommands(program);
  registerMessageCommands(program);
  registerEventCommands(program);

  program.addHelpText('before', BANNER);
  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# List all channels')}
  $ mirth-client --user admin channels

  ${chalk.gray('# Restart a channel')}
  $ mirth-client channels stop <channelId> && mirth-client channels start <channelId>

  ${chalk.gray('# Errored messages of a channel')}
  $ mirth-client messages list <channelId> --status ERROR

  ${chalk.gray('# Send a file to a channel')}
  $ mirth-client messages send <channelId> @message.hl7

  ${chalk.gray('# Failed logins')}
  $ mirth-client events --name Login --outcome FAILURE
`
  );

  return program;
}
