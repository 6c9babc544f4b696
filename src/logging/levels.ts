/**
 * Log levels, most verbose first
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.TRACE]: 0,
  [LogLevel.DEBUG]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.WARN]: 3,
  [LogLevel.ERROR]: 4,
};

/**
 * Parse a level name (case-insensitive). Unknown names fall back to INFO.
 */
export function parseLogLevel(value: string): LogLevel {
  const upper = value.trim().toUpperCase();
  if (upper === 'WARNING') return LogLevel.WARN;
  for (const level of Object.values(LogLevel)) {
    if (level === upper) return level;
  }
  return LogLevel.INFO;
}

/**
 * True when a message at `messageLevel` passes a `threshold`
 */
export function shouldDisplayLogLevel(messageLevel: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[threshold];
}
