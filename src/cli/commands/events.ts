/**
 * Event Commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatEventDetails, formatEventTable } from '../lib/OutputFormatter.js';
import { parseCount, runCommand } from '../lib/session.js';

interface EventListOptions {
  limit: string;
  offset: string;
  level?: string;
  outcome?: string;
  name?: string;
}

export function registerEventCommands(program: Command): void {
  const eventsCmd = program.command('events').description('Browse server events');

  eventsCmd
    .option('-l, --limit <n>', 'Maximum events to return', '20')
    .option('-o, --offset <n>', 'Events to skip', '0')
    .option('--level <level>', 'Filter by level (INFORMATION, WARNING, ERROR)')
    .option('--outcome <outcome>', 'Filter by outcome (SUCCESS, FAILURE)')
    .option('-n, --name <text>', 'Filter by event name')
    .action(async (options: EventListOptions, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching events...',
        (mirth) =>
          mirth.getEvents({
            limit: parseCount(options.limit, 'limit'),
            offset: parseCount(options.offset, 'offset'),
            level: options.level?.toUpperCase(),
            outcome: options.outcome?.toUpperCase(),
            name: options.name,
          }),
        (events, formatter) => {
          if (events.length === 0) {
            formatter.warn('No events found');
            return;
          }
          formatter.output(`${formatEventTable(events)}\n\n${chalk.gray(`${events.length} event(s)`)}`, events);
        }
      );
    });

  eventsCmd
    .command('get <eventId>')
    .description('Show one event with its attributes')
    .action(async (eventId: string, _options: unknown, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching event...',
        (mirth) => mirth.getEvent(parseCount(eventId, 'eventId')),
        (event, formatter) => {
          if (!event) {
            formatter.warn(`Event ${eventId} not found`);
            return;
          }
          formatter.output(formatEventDetails(event), event);
        }
      );
    });
}
