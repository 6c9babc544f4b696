/**
 * Logging Transports
 *
 * Console output goes to stderr so that command output written to stdout
 * (tables, JSON) can be piped without log lines mixed in.
 */

import winston from 'winston';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

const ALL_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'];

/**
 * Text line format:
 * INFO  2026-02-10T14:30:15.042Z [mirth-api] Logged in as admin
 */
export function buildTextFormat(): winston.Logform.Format {
  return winston.format.printf((info) => {
    const level = info.level.toUpperCase().padEnd(5);
    const component = info['component'];
    const componentPart = typeof component === 'string' ? ` [${component}]` : '';
    const errorStack = info['errorStack'];
    let line = `${level} ${new Date().toISOString()}${componentPart} ${String(info.message)}`;
    if (typeof errorStack === 'string') {
      line += '\n' + errorStack;
    }
    return line;
  });
}

function buildFormat(format: 'text' | 'json'): winston.Logform.Format {
  return format === 'json'
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : buildTextFormat();
}

export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(private readonly format: 'text' | 'json') {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format),
      stderrLevels: ALL_LEVELS,
    });
  }
}

export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private readonly filePath: string,
    private readonly format: 'text' | 'json'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
