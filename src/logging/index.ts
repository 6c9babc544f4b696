export { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './levels.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration } from './config.js';
export { Logger } from './Logger.js';
export {
  getLogger,
  getGlobalLevel,
  initializeLogging,
  resetLogging,
  setGlobalLevel,
  shutdownLogging,
} from './LoggerFactory.js';
export { ConsoleTransport, FileTransport } from './transports.js';
export type { LogTransport } from './transports.js';
