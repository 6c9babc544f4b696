/**
 * Output Formatter
 *
 * Table and detail rendering for CLI commands, plus an OutputFormatter
 * that switches between human output and JSON.
 */

import chalk from 'chalk';
import type { Channel } from '../../client/Channel.js';
import type {
  ChannelGroup,
  ChannelMessageModel,
  ChannelStatistics,
  DashboardStatus,
  EventModel,
} from '../../models/index.js';

type Colorize = (text: string) => string;

const plain: Colorize = (text) => text;

// =============================================================================
// Color Helpers
// =============================================================================

export function getStateColor(state: string): Colorize {
  switch (state) {
    case 'STARTED':
      return chalk.green;
    case 'STOPPED':
      return chalk.red;
    case 'PAUSED':
      return chalk.yellow;
    case 'STARTING':
    case 'STOPPING':
    case 'PAUSING':
    case 'DEPLOYING':
    case 'UNDEPLOYING':
      return chalk.cyan;
    default:
      return chalk.white;
  }
}

/**
 * Color for a connector message status (SENT, ERROR, FILTERED, ...)
 */
export function getMessageStatusColor(status: string): Colorize {
  switch (status) {
    case 'SENT':
      return chalk.green;
    case 'ERROR':
      return chalk.red;
    case 'FILTERED':
      return chalk.yellow;
    case 'QUEUED':
      return chalk.cyan;
    default:
      return chalk.white;
  }
}

export function getEventLevelColor(level: string): Colorize {
  switch (level) {
    case 'ERROR':
      return chalk.red;
    case 'WARNING':
      return chalk.yellow;
    default:
      return chalk.white;
  }
}

// =============================================================================
// Format Helpers
// =============================================================================

export function formatDate(date: Date | undefined): string {
  if (!date) return '-';
  return date.toISOString().replace('T', ' ').replace('Z', '');
}

export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str;
  const padding = ' '.repeat(width - str.length);
  return align === 'left' ? str + padding : padding + str;
}

// =============================================================================
// Table Formatting
// =============================================================================

export interface TableColumn {
  header: string;
  width: number;
  align?: 'left' | 'right';
  /** Applied after padding so color codes don't skew widths */
  color?: (value: string) => Colorize;
}

/**
 * Render rows of plain strings as a boxed table
 */
export function createTable(data: string[][], columns: TableColumn[]): string {
  const widths = columns.map((col, i) =>
    Math.max(col.width, col.header.length, ...data.map((row) => (row[i] ?? '').length))
  );

  const border = (left: string, mid: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(mid) + right;

  const row = (cells: string[], colored: boolean): string =>
    '│' +
    columns
      .map((col, i) => {
        const value = cells[i] ?? '';
        const padded = pad(value, widths[i] ?? 0, col.align);
        const color = colored && col.color ? col.color(value) : plain;
        return ` ${color(padded)} `;
      })
      .join('│') +
    '│';

  const lines = [
    border('┌', '┬', '┐'),
    row(
      columns.map((col) => col.header),
      false
    ),
    border('├', '┼', '┤'),
    ...data.map((cells) => row(cells, true)),
    border('└', '┴', '┘'),
  ];

  return lines.join('\n');
}

// =============================================================================
// Specific Formatters
// =============================================================================

export function formatChannelTable(channels: Channel[]): string {
  const columns: TableColumn[] = [
    { header: 'ID', width: 36 },
    { header: 'NAME', width: 24 },
    { header: 'REV', width: 3, align: 'right' },
    { header: 'DESCRIPTION', width: 30 },
  ];

  const data = channels.map((channel) => [
    channel.id,
    truncate(channel.name ?? '-', 40),
    channel.revision ?? '-',
    truncate(channel.description ?? '', 50),
  ]);

  return createTable(data, columns);
}

export function formatDashboardTable(statuses: DashboardStatus[]): string {
  const columns: TableColumn[] = [
    { header: 'ID', width: 36 },
    { header: 'NAME', width: 24 },
    { header: 'STATE', width: 10, color: getStateColor },
    { header: 'DEPLOYED', width: 23 },
  ];

  const data = statuses.map((status) => [
    status.channelId,
    truncate(status.name, 40),
    status.state,
    formatDate(status.deployedDate),
  ]);

  return createTable(data, columns);
}

export function formatStatisticsTable(statistics: ChannelStatistics[]): string {
  const errorColor = (value: string): Colorize => (value === '0' ? plain : chalk.red);
  const columns: TableColumn[] = [
    { header: 'CHANNEL', width: 36 },
    { header: 'RECV', width: 6, align: 'right' },
    { header: 'FILT', width: 6, align: 'right' },
    { header: 'QUEUED', width: 6, align: 'right' },
    { header: 'SENT', width: 6, align: 'right' },
    { header: 'ERR', width: 5, align: 'right', color: errorColor },
  ];

  const data = statistics.map((stats) => [
    stats.channelId,
    String(stats.received),
    String(stats.filtered),
    String(stats.queued),
    String(stats.sent),
    String(stats.error),
  ]);

  return createTable(data, columns);
}

export function formatGroupTable(groups: ChannelGroup[]): string {
  const columns: TableColumn[] = [
    { header: 'ID', width: 36 },
    { header: 'NAME', width: 24 },
    { header: 'CHANNELS', width: 8, align: 'right' },
  ];

  const data = groups.map((group) => [group.id, truncate(group.name, 40), String(group.channels.length)]);

  return createTable(data, columns);
}

/**
 * Status of a message as shown in lists: the source connector's (metadata id 0),
 * or ERROR if any connector errored
 */
export function summarizeMessageStatus(message: ChannelMessageModel): string {
  const connectors = Object.values(message.connectorMessages);
  if (connectors.some((connector) => connector.status === 'ERROR')) {
    return 'ERROR';
  }
  return message.connectorMessages[0]?.status ?? connectors[0]?.status ?? '-';
}

export function formatMessageTable(messages: ChannelMessageModel[]): string {
  const columns: TableColumn[] = [
    { header: 'ID', width: 8, align: 'right' },
    { header: 'RECEIVED', width: 23 },
    { header: 'STATUS', width: 11, color: getMessageStatusColor },
    { header: 'CONNECTORS', width: 10, align: 'right' },
  ];

  const data = messages.map((message) => [
    String(message.messageId),
    formatDate(message.receivedDate),
    summarizeMessageStatus(message),
    String(Object.keys(message.connectorMessages).length),
  ]);

  return createTable(data, columns);
}

export function formatEventTable(events: EventModel[]): string {
  const outcomeColor = (value: string): Colorize => (value === 'SUCCESS' ? chalk.green : chalk.red);
  const columns: TableColumn[] = [
    { header: 'ID', width: 6, align: 'right' },
    { header: 'DATE/TIME', width: 23 },
    { header: 'LEVEL', width: 11, color: getEventLevelColor },
    { header: 'NAME', width: 30 },
    { header: 'OUTCOME', width: 7, color: outcomeColor },
  ];

  const data = events.map((event) => [
    String(event.id),
    formatDate(event.dateTime),
    event.level,
    truncate(event.name, 40),
    event.outcome,
  ]);

  return createTable(data, columns);
}

export function formatMessageDetails(message: ChannelMessageModel): string {
  const lines = [
    chalk.bold(`Message ID: ${message.messageId}`),
    '',
    `  ${chalk.gray('Channel ID:')}   ${message.channelId}`,
    `  ${chalk.gray('Server ID:')}    ${message.serverId}`,
    `  ${chalk.gray('Received:')}     ${formatDate(message.receivedDate)}`,
    `  ${chalk.gray('Processed:')}    ${message.processed ? chalk.green('Yes') : chalk.yellow('No')}`,
    '',
    chalk.bold('Connector Messages:'),
  ];

  for (const [metaDataId, connector] of Object.entries(message.connectorMessages)) {
    const status = connector.status ?? '-';
    lines.push(
      '',
      `  ${chalk.cyan(connector.connectorName ?? connector.channelName)} (${metaDataId}):`,
      `    ${chalk.gray('Status:')}        ${getMessageStatusColor(status)(status)}`,
      `    ${chalk.gray('Received:')}      ${formatDate(connector.receivedDate)}`,
      `    ${chalk.gray('Send Attempts:')} ${connector.sendAttempts}`
    );
    if (connector.errorCode !== 0) {
      lines.push(`    ${chalk.gray('Error Code:')}    ${chalk.red(String(connector.errorCode))}`);
    }
    for (const [label, data] of [
      ['Raw', connector.raw],
      ['Encoded', connector.encoded],
      ['Sent', connector.sent],
      ['Response', connector.response],
    ] as const) {
      if (data?.content) {
        lines.push(`    ${chalk.gray(`${label}:`)}`, ...data.content.split('\n').map((line) => `      ${line}`));
      }
    }
  }

  return lines.join('\n');
}

export function formatEventDetails(event: EventModel): string {
  const lines = [
    chalk.bold(`Event ${event.id}: ${event.name}`),
    '',
    `  ${chalk.gray('Date/Time:')}   ${formatDate(event.dateTime)}`,
    `  ${chalk.gray('Level:')}       ${getEventLevelColor(event.level)(event.level)}`,
    `  ${chalk.gray('Outcome:')}     ${event.outcome}`,
    `  ${chalk.gray('User ID:')}     ${event.userId ?? '-'}`,
    `  ${chalk.gray('IP Address:')}  ${event.ipAddress ?? '-'}`,
  ];

  const attributes = Object.entries(event.attributes);
  if (attributes.length > 0) {
    lines.push('', chalk.bold('Attributes:'));
    for (const [key, value] of attributes) {
      lines.push(`  ${chalk.gray(`${key}:`)} ${value ?? ''}`);
    }
  }

  return lines.join('\n');
}

// =============================================================================
// Output Helper
// =============================================================================

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Writes command output as text or JSON
 */
export class OutputFormatter {
  constructor(private readonly jsonMode = false) {}

  get isJson(): boolean {
    return this.jsonMode;
  }

  output(text: string, jsonData: unknown): void {
    console.log(this.jsonMode ? formatJson(jsonData) : text);
  }

  success(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: true, message }));
    } else {
      console.log(chalk.green('✔') + ' ' + message);
    }
  }

  error(message: string, details?: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + message);
      if (details) {
        console.error(chalk.gray(details));
      }
    }
  }

  warn(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ warning: message }));
    } else {
      console.log(chalk.yellow('⚠') + ' ' + message);
    }
  }
}
