import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  resetLogging,
  shutdownLogging,
} from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { resetDebugRegistry } from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import { Logger } from '../../../src/logging/Logger.js';

describe('LoggerFactory', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env['LOG_FILE'];
    delete process.env['X12_DEBUG_COMPONENTS'];
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
  });

  afterEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
    process.env = { ...originalEnv };
  });

  describe('initializeLogging', () => {
    it('should respect the LOG_LEVEL variable', () => {
      process.env['LOG_LEVEL'] = 'DEBUG';
      resetLoggingConfig();

      const root = initializeLogging();

      expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
      expect(root.level).toBe('debug');
    });

    it('should re-initialize cleanly on repeated calls', () => {
      initializeLogging();
      initializeLogging();

      expect(getLogger('x12-engine')).toBeInstanceOf(Logger);
    });
  });

  describe('getLogger', () => {
    it('should cache Logger instances by component', () => {
      initializeLogging();

      expect(getLogger('x12-engine')).toBe(getLogger('x12-engine'));
      expect(getLogger('x12-engine')).not.toBe(getLogger('x12-walker'));
    });

    it('should lazy-initialize when called before initializeLogging', () => {
      expect(getLogger('x12-tokenizer')).toBeInstanceOf(Logger);
    });

    it('should re-wire cached loggers after re-initialization', () => {
      initializeLogging();
      const before = getLogger('x12-engine');

      initializeLogging();

      expect(getLogger('x12-engine')).not.toBe(before);
    });
  });

  describe('setGlobalLevel / getGlobalLevel', () => {
    it('should update the level at runtime and affect filtering', () => {
      process.env['LOG_LEVEL'] = 'INFO';
      resetLoggingConfig();
      initializeLogging();
      const logger = getLogger('x12-walker');

      expect(logger.isTraceEnabled()).toBe(false);
      setGlobalLevel(LogLevel.TRACE);
      expect(getGlobalLevel()).toBe(LogLevel.TRACE);
      expect(logger.isTraceEnabled()).toBe(true);
    });
  });

  describe('resetLogging', () => {
    it('should clear cached loggers and reset the level to INFO', () => {
      initializeLogging();
      setGlobalLevel(LogLevel.ERROR);
      const before = getLogger('x12-cli');

      resetLogging();

      expect(getGlobalLevel()).toBe(LogLevel.INFO);
      expect(getLogger('x12-cli')).not.toBe(before);
    });
  });

  describe('shutdownLogging', () => {
    it('should flush and drop the root logger', async () => {
      initializeLogging();
      const before = getLogger('x12-cli');

      await shutdownLogging();

      expect(getLogger('x12-cli')).not.toBe(before);
    });

    it('should resolve when logging was never initialized', async () => {
      await expect(shutdownLogging()).resolves.toBeUndefined();
    });
  });

  describe('environment integration', () => {
    it('should apply debug components from X12_DEBUG_COMPONENTS', () => {
      process.env['LOG_LEVEL'] = 'INFO';
      process.env['X12_DEBUG_COMPONENTS'] = 'x12-walker:TRACE';
      resetLoggingConfig();
      initializeLogging();

      expect(getLogger('x12-walker').isTraceEnabled()).toBe(true);
      expect(getLogger('x12-engine').isTraceEnabled()).toBe(false);
    });
  });
});
