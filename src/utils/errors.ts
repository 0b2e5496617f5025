/**
 * Error types for the supervisor.
 *
 * Every error serializes through `toJSON()` so it can be logged by pino or
 * returned inside a JSON-RPC error `data` field.
 *
 * @module utils/errors
 */

import type { InvocableStage, WorkflowPhase } from '../workflow/types.js';

/**
 * A single field-level validation problem.
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

function causeMessage(cause: unknown): string | undefined {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? undefined : String(cause);
}

function withCause(message: string, cause: unknown): string {
  const detail = causeMessage(cause);
  return detail ? `${message} (caused by: ${detail})` : message;
}

/**
 * Raised when a workflow request fails validation. No task state exists
 * for the request when this is thrown.
 */
export class WorkflowValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message);
    this.name = 'WorkflowValidationError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      issues: this.issues,
      stack: this.stack,
    };
  }
}

export interface StageInvocationErrorOptions {
  stage: InvocableStage;
  agent?: string;
  workflowId?: string;
  cause?: unknown;
}

/**
 * A stage handler failed: timeout, unreachable agent, malformed response
 * or a missing agent URL.
 */
export class StageInvocationError extends Error {
  readonly stage: InvocableStage;
  readonly agent?: string;
  readonly workflowId?: string;

  constructor(message: string, options: StageInvocationErrorOptions) {
    super(withCause(message, options.cause), { cause: options.cause });
    this.name = 'StageInvocationError';
    this.stage = options.stage;
    this.agent = options.agent;
    this.workflowId = options.workflowId;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      stage: this.stage,
      agent: this.agent,
      workflowId: this.workflowId,
      cause: causeMessage(this.cause),
      stack: this.stack,
    };
  }
}

/**
 * Lookup or advance on a workflow id the store has never seen.
 */
export class UnknownWorkflowError extends Error {
  constructor(public readonly workflowId: string) {
    super(`Unknown workflow: ${workflowId}`);
    this.name = 'UnknownWorkflowError';
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, workflowId: this.workflowId };
  }
}

export class DuplicateWorkflowError extends Error {
  constructor(public readonly workflowId: string) {
    super(`Workflow already exists: ${workflowId}`);
    this.name = 'DuplicateWorkflowError';
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, workflowId: this.workflowId };
  }
}

/**
 * Rejected phase transition (out of a terminal phase, backwards, or to a
 * phase the workflow's pattern does not contain).
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly workflowId: string,
    public readonly from: WorkflowPhase,
    public readonly to: WorkflowPhase,
    reason: string
  ) {
    super(`Invalid transition ${from} -> ${to} for workflow ${workflowId}: ${reason}`);
    this.name = 'InvalidTransitionError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      workflowId: this.workflowId,
      from: this.from,
      to: this.to,
    };
  }
}

/**
 * An operation exceeded its time budget.
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly operation?: string
  ) {
    super(message);
    this.name = 'TimeoutError';
  }

  getTimeoutDuration(): string {
    if (this.timeoutMs < 1000) {
      return `${this.timeoutMs}ms`;
    }
    if (this.timeoutMs < 60000) {
      return `${(this.timeoutMs / 1000).toFixed(1)}s`;
    }
    return `${(this.timeoutMs / 60000).toFixed(1)}m`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      timeoutMs: this.timeoutMs,
      timeoutDuration: this.getTimeoutDuration(),
      operation: this.operation,
      stack: this.stack,
    };
  }
}

export interface A2AClientErrorOptions {
  agentUrl?: string;
  method?: string;
  /** HTTP status code of the failed response */
  status?: number;
  /** JSON-RPC error code returned by the agent */
  rpcCode?: number;
  retryable?: boolean;
  cause?: unknown;
}

/**
 * Failure talking to a worker agent over A2A.
 */
export class A2AClientError extends Error {
  readonly options: A2AClientErrorOptions;

  constructor(message: string, options: A2AClientErrorOptions = {}) {
    super(withCause(message, options.cause), { cause: options.cause });
    this.name = 'A2AClientError';
    this.options = options;
  }

  isRetryable(): boolean {
    return this.options.retryable ?? false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      agentUrl: this.options.agentUrl,
      method: this.options.method,
      status: this.options.status,
      rpcCode: this.options.rpcCode,
      retryable: this.isRetryable(),
      cause: causeMessage(this.cause),
      stack: this.stack,
    };
  }
}

/**
 * An agent answered with a body that does not match the A2A wire shape.
 */
export class MalformedResponseError extends A2AClientError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
    options: Omit<A2AClientErrorOptions, 'retryable'> = {}
  ) {
    super(message, { ...options, retryable: false });
    this.name = 'MalformedResponseError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, key: this.key, stack: this.stack };
  }
}

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN']);

function getErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check if an error is retryable.
 *
 * Only transport-level failures qualify; protocol and validation errors
 * fail the same way on every attempt.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof A2AClientError) {
    return error.isRetryable();
  }
  if (error instanceof Error) {
    const code = getErrorCode(error);
    return code !== undefined && RETRYABLE_CODES.has(code);
  }
  return false;
}

/**
 * Format an error for structured logging.
 */
export function formatError(error: unknown): Record<string, unknown> {
  if (
    error instanceof WorkflowValidationError ||
    error instanceof StageInvocationError ||
    error instanceof UnknownWorkflowError ||
    error instanceof DuplicateWorkflowError ||
    error instanceof InvalidTransitionError ||
    error instanceof TimeoutError ||
    error instanceof A2AClientError ||
    error instanceof ConfigurationError
  ) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
