/**
 * Error Handling Module
 *
 * Classification, severity and structured logging for errors raised while
 * dispatching workflows:
 * - Error categorization (configuration, network, protocol, ...)
 * - User-facing message creation
 * - Standardized error logging with Pino
 *
 * @module utils/error-handler
 */

import type { Logger } from 'pino';
import { createLogger } from './logger.js';
import {
  A2AClientError,
  ConfigurationError,
  DuplicateWorkflowError,
  InvalidTransitionError,
  MalformedResponseError,
  StageInvocationError,
  TimeoutError,
  UnknownWorkflowError,
  WorkflowValidationError,
  formatError,
  isRetryable,
} from './errors.js';

/**
 * Error categories for classification and handling
 */
export enum ErrorCategory {
  /** Missing or invalid configuration (agent URLs, config file) */
  CONFIGURATION = 'CONFIGURATION',
  /** Connection failures, refused or reset sockets */
  NETWORK = 'NETWORK',
  /** Agent answered with an error or an unexpected shape */
  PROTOCOL = 'PROTOCOL',
  /** Invalid input */
  VALIDATION = 'VALIDATION',
  TIMEOUT = 'TIMEOUT',
  /** Task state store misuse */
  STATE = 'STATE',
  /** Access denied by an agent */
  PERMISSION = 'PERMISSION',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Fatal - process should exit */
  FATAL = 'fatal',
  /** Error - operation failed but system can continue */
  ERROR = 'error',
  /** Warning - expected failure (bad input, unknown id) */
  WARN = 'warn',
}

/**
 * Extra fields attached to the log entry
 */
export interface ErrorContext {
  workflowId?: string;
  stage?: string;
  agent?: string;
  [key: string]: unknown;
}

/**
 * Outcome of {@link handleError}
 */
export interface ErrorReport {
  message: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  userMessage: string;
}

let errorLogger: Logger | undefined;

function getErrorHandlerLogger(): Logger {
  if (!errorLogger) {
    errorLogger = createLogger('ErrorHandler');
  }
  return errorLogger;
}

function classifyByMessage(error: Error): ErrorCategory {
  const message = error.message.toLowerCase();

  if (
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('socket hang up')
  ) {
    return ErrorCategory.NETWORK;
  }
  if (message.includes('timeout') || message.includes('timed out')) {
    return ErrorCategory.TIMEOUT;
  }
  if (
    message.includes('unauthorized') ||
    message.includes('forbidden') ||
    message.includes('permission')
  ) {
    return ErrorCategory.PERMISSION;
  }
  if (message.includes('invalid') || message.includes('required')) {
    return ErrorCategory.VALIDATION;
  }
  return ErrorCategory.UNKNOWN;
}

function classifyClientError(error: A2AClientError): ErrorCategory {
  if (error instanceof MalformedResponseError || error.options.rpcCode !== undefined) {
    return ErrorCategory.PROTOCOL;
  }
  const status = error.options.status;
  if (status === 401 || status === 403) {
    return ErrorCategory.PERMISSION;
  }
  if (status !== undefined) {
    return ErrorCategory.PROTOCOL;
  }
  const byMessage = classifyByMessage(error);
  return byMessage === ErrorCategory.UNKNOWN ? ErrorCategory.NETWORK : byMessage;
}

/**
 * Classify an error based on its type and message.
 *
 * A {@link StageInvocationError} is classified by its cause, so a stage that
 * timed out reports `TIMEOUT` rather than a generic failure.
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof StageInvocationError) {
    return error.cause === undefined ? ErrorCategory.UNKNOWN : classifyError(error.cause);
  }
  if (error instanceof ConfigurationError) {
    return ErrorCategory.CONFIGURATION;
  }
  if (error instanceof WorkflowValidationError) {
    return ErrorCategory.VALIDATION;
  }
  if (error instanceof TimeoutError) {
    return ErrorCategory.TIMEOUT;
  }
  if (
    error instanceof UnknownWorkflowError ||
    error instanceof DuplicateWorkflowError ||
    error instanceof InvalidTransitionError
  ) {
    return ErrorCategory.STATE;
  }
  if (error instanceof A2AClientError) {
    return classifyClientError(error);
  }
  if (error instanceof Error) {
    return classifyByMessage(error);
  }
  return ErrorCategory.UNKNOWN;
}

/**
 * Determine the severity level for an error
 */
export function getSeverity(error: unknown): ErrorSeverity {
  switch (classifyError(error)) {
    case ErrorCategory.CONFIGURATION:
      return ErrorSeverity.FATAL;
    case ErrorCategory.VALIDATION:
    case ErrorCategory.STATE:
      return ErrorSeverity.WARN;
    default:
      return ErrorSeverity.ERROR;
  }
}

/**
 * Create a user-friendly error message
 */
export function createUserMessage(error: unknown): string {
  if (!(error instanceof Error)) {
    return 'An unknown error occurred';
  }

  switch (classifyError(error)) {
    case ErrorCategory.NETWORK:
      return 'A worker agent could not be reached. Check that it is running.';
    case ErrorCategory.TIMEOUT:
      return 'A worker agent did not answer in time.';
    case ErrorCategory.PROTOCOL:
      return 'A worker agent returned an unexpected response.';
    case ErrorCategory.VALIDATION:
      return `Invalid request: ${error.message}`;
    case ErrorCategory.PERMISSION:
      return 'A worker agent rejected the supervisor credentials.';
    case ErrorCategory.CONFIGURATION:
      return `Configuration error: ${error.message}`;
    case ErrorCategory.STATE:
      return error.message;
    default:
      return 'An unexpected error occurred. Please try again.';
  }
}

/**
 * Log an error with full context using Pino
 */
export function logError(error: unknown, context: ErrorContext = {}, customLogger?: Logger): void {
  const logger = customLogger ?? getErrorHandlerLogger();
  const category = classifyError(error);
  const message = error instanceof Error ? error.message : String(error);

  const logData: Record<string, unknown> = {
    err: error instanceof Error ? error : undefined,
    error: formatError(error),
    category,
    retryable: isRetryable(error),
    ...context,
  };

  switch (getSeverity(error)) {
    case ErrorSeverity.FATAL:
      logger.fatal(logData, message);
      break;
    case ErrorSeverity.ERROR:
      logger.error(logData, message);
      break;
    case ErrorSeverity.WARN:
      logger.warn(logData, message);
      break;
  }
}

/**
 * Handle an error with logging and optional user notification
 */
export function handleError(
  error: unknown,
  context: ErrorContext = {},
  options: {
    log?: boolean;
    userNotifier?: (message: string) => void;
    customLogger?: Logger;
  } = {}
): ErrorReport {
  const { log = true, userNotifier, customLogger } = options;

  const report: ErrorReport = {
    message: error instanceof Error ? error.message : String(error),
    category: classifyError(error),
    severity: getSeverity(error),
    retryable: isRetryable(error),
    userMessage: createUserMessage(error),
  };

  if (log) {
    logError(error, context, customLogger);
  }

  if (userNotifier) {
    userNotifier(report.userMessage);
  }

  return report;
}
