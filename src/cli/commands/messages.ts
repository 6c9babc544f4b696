/**
 * Message Commands
 *
 * Commands for browsing channel messages and sending new ones.
 */

import * as fs from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { MirthValidationError } from '../../client/errors.js';
import { formatMessageDetails, formatMessageTable, summarizeMessageStatus } from '../lib/OutputFormatter.js';
import { parseCount, runCommand } from '../lib/session.js';

interface ListOptions {
  limit: string;
  offset: string;
  status?: string[];
  content?: boolean;
}

interface SendOptions {
  binary?: boolean;
  errors: boolean;
}

/**
 * Message data from the command line; `@path` reads the file
 */
export function readMessageData(data: string): string {
  if (!data.startsWith('@')) {
    return data;
  }
  const filePath = data.slice(1);
  if (!fs.existsSync(filePath)) {
    throw new MirthValidationError(`File not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function registerMessageCommands(program: Command): void {
  const messagesCmd = program.command('messages').description('Browse and send channel messages');

  // ==========================================================================
  // messages list <channelId>
  // ==========================================================================
  messagesCmd
    .command('list <channelId>')
    .description('List messages of a channel, newest first')
    .option('-l, --limit <n>', 'Maximum messages to return', '20')
    .option('-o, --offset <n>', 'Messages to skip', '0')
    .option('-s, --status <status>', 'Filter by status (repeatable)', collect)
    .option('-c, --content', 'Include message content')
    .action(async (channelId: string, options: ListOptions, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching messages...',
        (mirth) =>
          mirth.channel(channelId).getMessages({
            limit: parseCount(options.limit, 'limit'),
            offset: parseCount(options.offset, 'offset'),
            status: options.status,
            includeContent: options.content ?? false,
          }),
        (messages, formatter) => {
          if (messages.length === 0) {
            formatter.warn('No messages found');
            return;
          }
          formatter.output(
            `${formatMessageTable(messages)}\n\n${chalk.gray(`${messages.length} message(s)`)}`,
            messages
          );
        }
      );
    });

  // ==========================================================================
  // messages get <channelId> <messageId>
  // ==========================================================================
  messagesCmd
    .command('get <channelId> <messageId>')
    .description('Show one message with its connector messages')
    .option('--no-content', 'Leave out message content')
    .action(async (channelId: string, messageId: string, options: { content: boolean }, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching message...',
        (mirth) => mirth.channel(channelId).getMessage(parseCount(messageId, 'messageId'), options.content),
        (message, formatter) => {
          if (!message) {
            formatter.warn(`Message ${messageId} not found`);
            return;
          }
          formatter.output(formatMessageDetails(message), message);
        }
      );
    });

  // ==========================================================================
  // messages send <channelId> <data>
  // ==========================================================================
  messagesCmd
    .command('send <channelId> <data>')
    .description('Send raw data to a channel (use @file to send a file)')
    .option('-b, --binary', 'Data is base64-encoded binary')
    .option('--no-errors', 'Do not fail when a connector reports ERROR')
    .action(async (channelId: string, data: string, options: SendOptions, cmd: Command) => {
      await runCommand(
        cmd,
        'Sending message...',
        (mirth) =>
          mirth.channel(channelId).postMessage(readMessageData(data), {
            binary: options.binary ?? false,
            raiseErrors: options.errors,
          }),
        (message, formatter) => {
          if (!message) {
            formatter.success(`Message sent to ${channelId}`);
            return;
          }
          const status = summarizeMessageStatus(message);
          formatter.output(
            `${chalk.green('✔')} Message ${message.messageId} sent to ${channelId} (${status})`,
            message
          );
        }
      );
    });
}
