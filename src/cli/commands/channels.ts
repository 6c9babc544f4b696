/**
 * Channel Commands
 *
 * Commands for listing, inspecting and controlling channels.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ChannelCommand } from '../../client/Channel.js';
import {
  formatChannelTable,
  formatDashboardTable,
  formatGroupTable,
  formatStatisticsTable,
} from '../lib/OutputFormatter.js';
import { runCommand } from '../lib/session.js';

interface ControlCommand {
  command: ChannelCommand;
  description: string;
  progress: string;
  done: string;
}

const CONTROL_COMMANDS: ControlCommand[] = [
  { command: 'start', description: 'Start a channel', progress: 'Starting', done: 'Started' },
  { command: 'stop', description: 'Stop a channel', progress: 'Stopping', done: 'Stopped' },
  { command: 'pause', description: 'Pause a channel', progress: 'Pausing', done: 'Paused' },
  { command: 'resume', description: 'Resume a paused channel', progress: 'Resuming', done: 'Resumed' },
  { command: 'deploy', description: 'Deploy a channel', progress: 'Deploying', done: 'Deployed' },
  { command: 'undeploy', description: 'Undeploy a channel', progress: 'Undeploying', done: 'Undeployed' },
];

export function registerChannelCommands(program: Command): void {
  const channelsCmd = program.command('channels').description('List and manage channels');

  // ==========================================================================
  // channels (list all)
  // ==========================================================================
  channelsCmd
    .option('-n, --name <name>', 'Only channels with exactly this name')
    .action(async (options: { name?: string }, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching channels...',
        (mirth) => mirth.getChannels(options.name),
        (channels, formatter) => {
          if (channels.length === 0) {
            formatter.warn('No channels found');
            return;
          }
          const json = channels.map(({ id, name, description, revision }) => ({ id, name, description, revision }));
          formatter.output(`${formatChannelTable(channels)}\n\n${chalk.gray(`${channels.length} channel(s)`)}`, json);
        }
      );
    });

  // ==========================================================================
  // channels get <id>
  // ==========================================================================
  channelsCmd
    .command('get <channelId>')
    .description('Get channel metadata')
    .action(async (channelId: string, _options: unknown, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching channel...',
        (mirth) => mirth.channel(channelId).getInfo(),
        (info, formatter) => {
          const lines = [
            chalk.bold(`Channel: ${info.name}`),
            '',
            `  ${chalk.gray('ID:')}          ${info.id}`,
            `  ${chalk.gray('Revision:')}    ${info.revision}`,
            `  ${chalk.gray('Description:')} ${info.description ?? '-'}`,
          ];
          formatter.output(lines.join('\n'), info);
        }
      );
    });

  // ==========================================================================
  // channels stats [id]
  // ==========================================================================
  channelsCmd
    .command('stats [channelId]')
    .description('Message statistics for one channel, or all channels')
    .action(async (channelId: string | undefined, _options: unknown, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching statistics...',
        async (mirth) =>
          channelId ? [await mirth.channel(channelId).getStatistics()] : mirth.getChannelStatisticsList(),
        (statistics, formatter) => {
          formatter.output(formatStatisticsTable(statistics), channelId ? statistics[0] : statistics);
        }
      );
    });

  // ==========================================================================
  // channels statuses
  // ==========================================================================
  channelsCmd
    .command('statuses')
    .description('Dashboard status of deployed channels')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching channel statuses...',
        (mirth) => mirth.getDashboardStatuses(),
        (statuses, formatter) => {
          if (statuses.length === 0) {
            formatter.warn('No deployed channels');
            return;
          }
          formatter.output(formatDashboardTable(statuses), statuses);
        }
      );
    });

  // ==========================================================================
  // channels groups
  // ==========================================================================
  channelsCmd
    .command('groups')
    .description('List channel groups')
    .action(async (_options: unknown, cmd: Command) => {
      await runCommand(
        cmd,
        'Fetching channel groups...',
        (mirth) => mirth.getChannelGroups(),
        (groups, formatter) => {
          if (groups.length === 0) {
            formatter.warn('No channel groups found');
            return;
          }
          formatter.output(formatGroupTable(groups), groups);
        }
      );
    });

  // ==========================================================================
  // channels start|stop|pause|resume|deploy|undeploy <id>
  // ==========================================================================
  for (const { command, description, progress, done } of CONTROL_COMMANDS) {
    channelsCmd
      .command(`${command} <channelId>`)
      .description(description)
      .action(async (channelId: string, _options: unknown, cmd: Command) => {
        await runCommand(
          cmd,
          `${progress} channel...`,
          async (mirth) => {
            const channel = mirth.channel(channelId);
            switch (command) {
              case 'start':
                await channel.start();
                break;
              case 'stop':
                await channel.stop();
                break;
              case 'pause':
                await channel.pause();
                break;
              case 'resume':
                await channel.resume();
                break;
              case 'deploy':
                await channel.deploy();
                break;
              case 'undeploy':
                await channel.undeploy();
                break;
            }
            return channelId;
          },
          (id, formatter) => formatter.success(`${done} channel ${id}`)
        );
      });
  }
}
