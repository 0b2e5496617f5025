/**
 * Logger Factory Module
 *
 * Centralized logging built on Pino:
 * - Development (pretty print) vs Production (JSON) environments
 * - Rotating file output through the pino-roll transport
 * - Child loggers with a `context` binding per component
 * - Sensitive data redaction
 *
 * Under the test runner the root logger is silent unless LOG_LEVEL is set.
 *
 * @module utils/logger
 */

import pino from 'pino';
import type { Logger, Level, LoggerOptions, DestinationStream } from 'pino';
import path from 'path';
import fs from 'fs';

/**
 * Log levels supported by Pino
 */
export type LogLevel = Level;

/**
 * Logger configuration interface
 */
export interface LoggerConfig {
  /** Log level (default: 'info' in production, 'debug' in development) */
  level?: LogLevel;
  /** Enable pretty print (default: auto-detected from NODE_ENV) */
  prettyPrint?: boolean;
  /** Log to file (default: false in development, true in production) */
  fileLogging?: boolean;
  /** Log directory (default: './logs') */
  logDir?: string;
  /** Fields to redact from logs */
  redact?: string[];
  /** Additional metadata to include in all logs */
  metadata?: Record<string, unknown>;
}

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Sensitive field patterns that should be redacted
 */
const SENSITIVE_FIELDS = [
  'authToken',
  'apiKey',
  'token',
  'password',
  'secret',
  'authorization',
  'cookie',
];

const LOG_FILE_NAME = 'a2a-supervisor.log';

let rootLogger: Logger | null = null;

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production';
}

function isTestRun(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
}

/**
 * Narrow an arbitrary string to a Pino level.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  return VALID_LEVELS.find((level) => level === normalized);
}

function getDefaultLogLevel(): LogLevel {
  return parseLogLevel(process.env.LOG_LEVEL) ?? (isDevelopment() ? 'debug' : 'info');
}

function levelFormatter(label: string): Record<string, string> {
  return { level: label };
}

function getDevelopmentConfig(): LoggerOptions {
  return {
    level: getDefaultLogLevel(),
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        singleLine: false,
        messageFormat: '[{context}] {msg}',
      },
    },
    formatters: { level: levelFormatter },
  };
}

function getProductionConfig(): LoggerOptions {
  return {
    level: getDefaultLogLevel(),
    formatters: { level: levelFormatter },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };
}

function getTestConfig(): LoggerOptions {
  return {
    level: parseLogLevel(process.env.LOG_LEVEL) ?? 'silent',
    formatters: { level: levelFormatter },
  };
}

function getBaseConfig(prettyPrint?: boolean): LoggerOptions {
  if (isTestRun()) {
    return getTestConfig();
  }
  const pretty = prettyPrint ?? isDevelopment();
  return pretty ? getDevelopmentConfig() : getProductionConfig();
}

/**
 * Build the rotating file destination.
 *
 * pino-roll runs as a transport in a worker thread, so the directory is
 * created up front on this side.
 */
function setupFileLogging(logDir: string): DestinationStream {
  const logsPath = path.resolve(process.cwd(), logDir);

  if (!fs.existsSync(logsPath)) {
    fs.mkdirSync(logsPath, { recursive: true });
  }

  return pino.transport({
    target: 'pino-roll',
    options: {
      file: path.join(logsPath, LOG_FILE_NAME),
      size: '10m',
      limit: { count: 30 },
    },
  });
}

function redactPaths(fields: string[]): string[] {
  return fields.flatMap((field) => [field, `*.${field}`]);
}

/**
 * Resolve the Pino options for a logger configuration.
 *
 * File logging forces JSON output since a pino transport and a destination
 * stream cannot be combined.
 */
export function buildLoggerOptions(config: LoggerConfig = {}, fileLogging = false): LoggerOptions {
  const base = getBaseConfig(fileLogging ? false : config.prettyPrint);

  const options: LoggerOptions = {
    ...base,
    level: config.level ?? base.level,
    redact: {
      paths: redactPaths(config.redact ?? SENSITIVE_FIELDS),
      censor: '[REDACTED]',
    },
  };
  if (config.metadata) {
    options.base = { ...config.metadata };
  }
  return options;
}

/**
 * Initialize the root logger
 *
 * Creates the singleton root logger with environment-specific configuration.
 * Calling it again returns the existing instance.
 *
 * @example
 * ```typescript
 * const logger = initLogger({ level: 'info' });
 * logger.info('Supervisor starting');
 * ```
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  if (rootLogger) {
    return rootLogger;
  }

  const logDir = config.logDir ?? process.env.LOG_DIR ?? './logs';
  const fileLogging = (config.fileLogging ?? !isDevelopment()) && !isTestRun();
  const options = buildLoggerOptions(config, fileLogging);

  rootLogger = fileLogging ? pino(options, setupFileLogging(logDir)) : pino(options);

  return rootLogger;
}

/**
 * Create a child logger with context
 *
 * Child loggers inherit the root configuration and include the `context`
 * field in every entry.
 *
 * @param context - Component name (e.g., 'Dispatcher', 'A2AClient')
 * @param metadata - Additional bindings for every entry
 */
export function createLogger(context: string, metadata?: Record<string, unknown>): Logger {
  return getRootLogger().child({ context, ...metadata });
}

/**
 * Get the root logger, initializing it from the environment on first use.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Update the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

/**
 * Drop the root logger so the next call re-initializes it.
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Flush any pending log entries
 *
 * Useful for ensuring logs are written before process exit.
 */
export function flushLogger(): Promise<void> {
  const logger = rootLogger;
  if (!logger) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    logger.flush(() => resolve());
  });
}
