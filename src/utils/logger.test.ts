/**
 * Tests for logger utility (src/utils/logger.ts)
 *
 * Tests the following functionality:
 * - Logger initialization and configuration
 * - Development vs production vs test defaults
 * - Child logger creation with context
 * - Log level management
 * - Sensitive data redaction
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Writable } from 'stream';
import { pino } from 'pino';
import {
  initLogger,
  resetLogger,
  createLogger,
  getRootLogger,
  setLogLevel,
  parseLogLevel,
  flushLogger,
  buildLoggerOptions,
  type LoggerConfig,
} from './logger.js';

vi.mock('fs', () => ({
  default: {
    existsSync: vi.fn(),
    mkdirSync: vi.fn(),
  },
}));

describe('Logger', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = process.env;
    process.env = { ...originalEnv };
    delete process.env.NODE_ENV;
    delete process.env.LOG_LEVEL;
    delete process.env.VITEST;
    resetLogger();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetLogger();
  });

  describe('initLogger', () => {
    it('should default to debug outside production', () => {
      const logger = initLogger({ prettyPrint: false, fileLogging: false });

      expect(logger.level).toBe('debug');
    });

    it('should default to info in production', () => {
      process.env.NODE_ENV = 'production';

      const logger = initLogger({ fileLogging: false });

      expect(logger.level).toBe('info');
    });

    it('should be silent under the test runner unless LOG_LEVEL is set', () => {
      process.env.NODE_ENV = 'test';

      expect(initLogger().level).toBe('silent');

      resetLogger();
      process.env.LOG_LEVEL = 'warn';
      expect(initLogger().level).toBe('warn');
    });

    it('should respect custom log level from config', () => {
      const config: LoggerConfig = { level: 'warn', prettyPrint: false, fileLogging: false };

      expect(initLogger(config).level).toBe('warn');
    });

    it('should respect LOG_LEVEL environment variable', () => {
      process.env.LOG_LEVEL = 'ERROR';

      expect(initLogger({ prettyPrint: false, fileLogging: false }).level).toBe('error');
    });

    it('should return same logger instance on subsequent calls', () => {
      const logger1 = initLogger({ prettyPrint: false, fileLogging: false });
      const logger2 = initLogger();

      expect(logger1).toBe(logger2);
    });

    it('should add metadata to base bindings', () => {
      const logger = initLogger({
        prettyPrint: false,
        fileLogging: false,
        metadata: { service: 'supervisor' },
      });

      expect(logger.bindings()).toEqual({ service: 'supervisor' });
    });
  });

  describe('createLogger', () => {
    it('should bind the component context', () => {
      process.env.NODE_ENV = 'test';
      const logger = createLogger('Dispatcher', { workflowId: 'wf-1' });

      expect(logger.bindings()).toMatchObject({ context: 'Dispatcher', workflowId: 'wf-1' });
    });

    it('should share the root logger', () => {
      process.env.NODE_ENV = 'test';
      const root = getRootLogger();

      expect(getRootLogger()).toBe(root);
    });
  });

  describe('setLogLevel', () => {
    it('should change root level at runtime', () => {
      process.env.NODE_ENV = 'test';
      setLogLevel('trace');

      expect(getRootLogger().level).toBe('trace');
    });
  });

  describe('parseLogLevel', () => {
    it('should accept known levels case-insensitively', () => {
      expect(parseLogLevel('Info')).toBe('info');
      expect(parseLogLevel('fatal')).toBe('fatal');
    });

    it('should reject unknown levels', () => {
      expect(parseLogLevel('verbose')).toBeUndefined();
      expect(parseLogLevel(undefined)).toBeUndefined();
    });
  });

  describe('redaction', () => {
    it('should censor nested sensitive fields', () => {
      const lines: string[] = [];
      const sink = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          lines.push(chunk.toString());
          callback();
        },
      });
      const logger = pino(buildLoggerOptions({ prettyPrint: false, level: 'info' }), sink);

      logger.info({ client: { authToken: 'test-secret', url: 'http://localhost:8003' } }, 'call');

      const entry: unknown = JSON.parse(lines[0] ?? '{}');
      expect(entry).toMatchObject({
        client: { authToken: '[REDACTED]', url: 'http://localhost:8003' },
      });
    });
  });

  describe('flushLogger', () => {
    it('should resolve without a root logger', async () => {
      await expect(flushLogger()).resolves.toBeUndefined();
    });
  });
});
