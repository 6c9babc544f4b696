import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getLoggingConfig, resetLoggingConfig } from '../../../src/logging/config.js';
import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from '../../../src/logging/levels.js';

describe('LoggingConfig', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetLoggingConfig();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetLoggingConfig();
  });

  describe('defaults', () => {
    it('should use INFO, text and no file', () => {
      delete process.env['LOG_LEVEL'];
      delete process.env['LOG_FORMAT'];
      delete process.env['LOG_FILE'];

      expect(getLoggingConfig()).toEqual({ logLevel: LogLevel.INFO, logFormat: 'text', logFile: undefined });
    });
  });

  describe('environment', () => {
    it('should read LOG_LEVEL, LOG_FORMAT and LOG_FILE', () => {
      process.env['LOG_LEVEL'] = 'warning';
      process.env['LOG_FORMAT'] = 'json';
      process.env['LOG_FILE'] = '/tmp/mirth-client.log';

      expect(getLoggingConfig()).toEqual({
        logLevel: LogLevel.WARN,
        logFormat: 'json',
        logFile: '/tmp/mirth-client.log',
      });
    });

    it('should fall back to text for unknown formats', () => {
      process.env['LOG_FORMAT'] = 'yaml';
      expect(getLoggingConfig().logFormat).toBe('text');
    });

    it('should cache until reset', () => {
      process.env['LOG_LEVEL'] = 'ERROR';
      expect(getLoggingConfig().logLevel).toBe(LogLevel.ERROR);

      process.env['LOG_LEVEL'] = 'DEBUG';
      expect(getLoggingConfig().logLevel).toBe(LogLevel.ERROR);

      resetLoggingConfig();
      expect(getLoggingConfig().logLevel).toBe(LogLevel.DEBUG);
    });
  });
});

describe('log levels', () => {
  it('should parse names case-insensitively', () => {
    expect(parseLogLevel('trace')).toBe(LogLevel.TRACE);
    expect(parseLogLevel(' Debug ')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARNING')).toBe(LogLevel.WARN);
  });

  it('should fall back to INFO for unknown names', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });

  it('should compare against a threshold', () => {
    expect(shouldDisplayLogLevel(LogLevel.WARN, LogLevel.INFO)).toBe(true);
    expect(shouldDisplayLogLevel(LogLevel.INFO, LogLevel.INFO)).toBe(true);
    expect(shouldDisplayLogLevel(LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
  });
});
