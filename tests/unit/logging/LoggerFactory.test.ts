import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import winston from 'winston';
import {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  resetLogging,
} from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { LogLevel } from '../../../src/logging/levels.js';
import type { LogTransport } from '../../../src/logging/transports.js';

describe('LoggerFactory', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetLogging();
    resetLoggingConfig();
  });

  afterEach(() => {
    resetLogging();
    resetLoggingConfig();
    process.env = { ...originalEnv };
  });

  describe('initializeLogging', () => {
    it('should initialize without errors', () => {
      expect(() => initializeLogging()).not.toThrow();
    });

    it('should respect LOG_LEVEL env var', () => {
      process.env['LOG_LEVEL'] = 'DEBUG';
      resetLoggingConfig();
      initializeLogging();
      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    });

    it('should add extra transports', () => {
      const extra: LogTransport = {
        name: 'silent',
        createWinstonTransport: () => new winston.transports.Console({ silent: true }),
      };
      const root = initializeLogging([extra]);
      expect(root.transports).toHaveLength(2);
    });

    it('should re-wire cached loggers after re-initialization', () => {
      initializeLogging();
      const loggerBefore = getLogger('rewire-test');

      initializeLogging();
      const loggerAfter = getLogger('rewire-test');

      expect(loggerAfter.getComponent()).toBe('rewire-test');
      expect(loggerAfter).not.toBe(loggerBefore);
    });
  });

  describe('getLogger', () => {
    it('should cache Logger instances by component', () => {
      initializeLogging();
      expect(getLogger('component-a')).toBe(getLogger('component-a'));
      expect(getLogger('component-a')).not.toBe(getLogger('component-b'));
    });

    it('should lazy-initialize if called before initializeLogging', () => {
      const logger = getLogger('lazy-component');
      expect(logger.getComponent()).toBe('lazy-component');
    });
  });

  describe('setGlobalLevel / getGlobalLevel', () => {
    it('should default to INFO', () => {
      delete process.env['LOG_LEVEL'];
      resetLoggingConfig();
      initializeLogging();
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });

    it('should affect Logger level filtering', () => {
      initializeLogging();
      const logger = getLogger('runtime-level-test');

      setGlobalLevel(LogLevel.INFO);
      expect(logger.isDebugEnabled()).toBe(false);

      setGlobalLevel(LogLevel.DEBUG);
      expect(logger.isDebugEnabled()).toBe(true);
    });

    it('should set the winston level of the root logger', () => {
      const root = initializeLogging();
      setGlobalLevel(LogLevel.WARN);
      expect(root.level).toBe('warn');
    });
  });

  describe('resetLogging', () => {
    it('should clear cached loggers', () => {
      initializeLogging();
      const before = getLogger('reset-test');
      resetLogging();
      initializeLogging();
      expect(getLogger('reset-test')).not.toBe(before);
    });

    it('should reset global level to INFO', () => {
      initializeLogging();
      setGlobalLevel(LogLevel.TRACE);
      resetLogging();
      expect(getGlobalLevel()).toBe(LogLevel.INFO);
    });
  });
});
