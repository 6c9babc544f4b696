/**
 * Logger Factory
 *
 * Creates the root winston logger and caches per-component Logger wrappers.
 *
 *   const logger = getLogger('mirth-api');
 *   logger.debug('GET /channels -> 200');
 *
 * getLogger() lazily initializes with settings from the environment, so
 * initializeLogging() is only needed to add transports.
 */

import winston from 'winston';
import { getLoggingConfig } from './config.js';
import { LogLevel } from './levels.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston ranks lower numbers as higher priority
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [new ConsoleTransport(config.logFormat).createWinstonTransport()];

  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }

  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }

  const logger = winston.createLogger({
    levels: WINSTON_LEVELS,
    level: toWinstonLevel(currentGlobalLevel),
    transports,
    exitOnError: false,
  });
  rootLogger = logger;

  setGlobalLevelProvider(() => currentGlobalLevel);

  // Re-wire cached loggers to the new root
  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, logger));
  }

  return logger;
}

export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component, rootLogger ?? initializeLogging());
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
  if (rootLogger) {
    rootLogger.level = toWinstonLevel(level);
  }
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const logger = rootLogger;
  if (!logger) return;

  await new Promise<void>((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
