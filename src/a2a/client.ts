/**
 * A2A client for worker agents.
 *
 * Wraps the JSON-RPC client of `@a2a-js/sdk`. A message is sent once; only
 * transport failures before the agent has answered are retried. When the
 * agent answers with a task that is still running, `tasks/get` is polled
 * until the task settles and the message is never sent again.
 *
 * Authentication, per-request timeouts and the Docker hostname rewrite
 * live in the fetch function handed to the SDK client.
 *
 * @module a2a/client
 */

import { randomUUID } from 'crypto';
import { AGENT_CARD_PATH } from '@a2a-js/sdk';
import { A2AClient as JsonRpcClient } from '@a2a-js/sdk/client';
import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { A2AClientError, TimeoutError, isRetryable } from '../utils/errors.js';
import { delayMs, retry } from '../utils/retry.js';
import { toUnifiedResponse, type DataMergeMode } from './parts.js';
import {
  TERMINAL_TASK_STATES,
  type AgentCard,
  type Message,
  type Part,
  type Task,
  type TaskState,
  type UnifiedResponse,
} from './types.js';

/** Compose service names rewritten to localhost outside Docker */
export const DOCKER_HOSTNAMES = [
  'supervisor-agent',
  'planner-agent',
  'knowledge-agent',
  'browser-agent',
  'executor-agent',
  'data-collector-agent',
  'analysis-agent',
  'trading-agent',
];

const FAILED_TASK_STATES: readonly TaskState[] = ['failed', 'rejected', 'canceled'];
const SETTLED_TASK_STATES: readonly TaskState[] = [...TERMINAL_TASK_STATES, 'input-required', 'auth-required'];

export interface A2AClientOptions {
  baseUrl: string;
  /** Bearer token sent with every request */
  authToken?: string;
  /** Per HTTP request (default: 60000) */
  requestTimeoutMs?: number;
  /** Retries of `message/send` after the first attempt (default: 3) */
  maxRetries?: number;
  /** Initial backoff delay (default: 1000) */
  retryDelayMs?: number;
  /** Interval between `tasks/get` calls (default: 10000) */
  pollIntervalMs?: number;
  /** Give up polling after this long (default: 120000) */
  maxWaitMs?: number;
  /** Consecutive `tasks/get` failures tolerated (default: 5) */
  maxPollFailures?: number;
  /** When false, Docker service hostnames in the card URL become localhost */
  isDocker?: boolean;
  idGenerator?: () => string;
  /** Underlying fetch (default: the global one) */
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export interface SendOptions {
  contextId?: string;
  /** How multiple data parts are combined (default: smart) */
  mergeMode?: DataMergeMode;
  signal?: AbortSignal;
}

/**
 * Replace a Docker service hostname with localhost.
 */
export function rewriteDockerUrl(url: string, hostnames: readonly string[] = DOCKER_HOSTNAMES): string {
  for (const host of hostnames) {
    const prefix = `http://${host}`;
    if (url.startsWith(prefix)) {
      return `http://localhost${url.slice(prefix.length)}`;
    }
  }
  return url;
}

/** 429 and 5xx are worth another attempt */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

/**
 * Settle with `operation`, or reject with the signal's reason once it aborts.
 */
function abortable<T>(operation: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return operation;
  }
  signal.throwIfAborted();

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void operation.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

export class A2AClient {
  private readonly baseUrl: string;
  private readonly authToken?: string;
  private readonly requestTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly maxPollFailures: number;
  private readonly isDocker: boolean;
  private readonly idGenerator: () => string;
  private readonly baseFetch: typeof fetch;
  private readonly logger: Logger;
  private connection?: Promise<JsonRpcClient>;

  constructor(options: A2AClientOptions) {
    this.baseUrl = trimSlash(options.baseUrl);
    this.authToken = options.authToken;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.pollIntervalMs = options.pollIntervalMs ?? 10000;
    this.maxWaitMs = options.maxWaitMs ?? 120000;
    this.maxPollFailures = options.maxPollFailures ?? 5;
    this.isDocker = options.isDocker ?? false;
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.baseFetch = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createLogger('A2AClient', { agentUrl: this.baseUrl });
  }

  /**
   * The agent card. Outside Docker a compose hostname in its URL is
   * reported as localhost, matching where requests actually go.
   */
  async getAgentCard(): Promise<AgentCard> {
    const client = await this.connect();
    const card = await client.getAgentCard();
    return this.isDocker ? card : { ...card, url: rewriteDockerUrl(card.url) };
  }

  /**
   * Single `message/send` call without retries or polling.
   */
  async sendMessage(message: Message, signal?: AbortSignal): Promise<Task | Message> {
    const client = await abortable(this.connect(), signal);
    const response = await abortable(client.sendMessage({ message, configuration: { blocking: true } }), signal);
    if ('error' in response) {
      throw this.rpcError('message/send', response.error);
    }
    return response.result;
  }

  async getTask(taskId: string, signal?: AbortSignal): Promise<Task> {
    const client = await abortable(this.connect(), signal);
    const response = await abortable(client.getTask({ id: taskId }), signal);
    if ('error' in response) {
      throw this.rpcError('tasks/get', response.error);
    }
    return response.result;
  }

  /**
   * Poll `tasks/get` until the task settles.
   *
   * Consecutive transport failures back off by half an interval each and
   * abort the wait once `maxPollFailures` is reached. A JSON-RPC error ends
   * the wait at once.
   *
   * @throws TimeoutError when the task is still running after `maxWaitMs`
   */
  async waitForTask(task: Task, signal?: AbortSignal): Promise<Task> {
    const startedAt = Date.now();
    let current = task;
    let failures = 0;

    while (!this.isSettled(current)) {
      const delay = this.pollIntervalMs * (1 + failures * 0.5);
      if (Date.now() - startedAt + delay > this.maxWaitMs) {
        throw new TimeoutError(`Task ${task.id} did not finish within ${this.maxWaitMs}ms`, this.maxWaitMs, 'tasks/get');
      }
      await delayMs(delay, signal);

      try {
        current = await this.getTask(task.id, signal);
        failures = 0;
        this.logger.debug({ taskId: task.id, state: current.status.state }, 'Polled task');
      } catch (error) {
        if (signal?.aborted || !isRetryable(error)) {
          throw error;
        }
        failures++;
        this.logger.warn({ err: error, taskId: task.id, failures }, 'Task poll failed');
        if (failures >= this.maxPollFailures) {
          throw error;
        }
      }
    }

    return current;
  }

  /**
   * Send parts as one user message and return the merged response.
   *
   * @throws A2AClientError when the agent fails, rejects or cancels the task
   */
  async sendParts(parts: Part[], options: SendOptions = {}): Promise<UnifiedResponse> {
    const message: Message = {
      kind: 'message',
      messageId: this.idGenerator(),
      role: 'user',
      parts,
      ...(options.contextId ? { contextId: options.contextId } : {}),
    };

    const accepted = await retry(() => this.sendMessage(message, options.signal), {
      maxRetries: this.maxRetries,
      initialDelayMs: this.retryDelayMs,
      signal: options.signal,
      onRetry: (attempt, error, delay) => {
        this.logger.warn({ err: error, attempt, delayMs: delay }, 'Retrying agent call');
      },
    });
    const settled = accepted.kind === 'task' ? await this.waitForTask(accepted, options.signal) : accepted;

    const response = toUnifiedResponse(settled, options.mergeMode);
    if (FAILED_TASK_STATES.includes(response.state)) {
      throw new A2AClientError(
        `Agent task ${response.taskId ?? 'unknown'} ended in state ${response.state}${response.text ? `: ${response.text}` : ''}`,
        { agentUrl: this.baseUrl, method: 'message/send', retryable: false }
      );
    }
    return response;
  }

  sendText(text: string, options: SendOptions = {}): Promise<UnifiedResponse> {
    return this.sendParts([{ kind: 'text', text }], options);
  }

  private connect(): Promise<JsonRpcClient> {
    if (!this.connection) {
      this.connection = JsonRpcClient.fromCardUrl(`${this.baseUrl}/${AGENT_CARD_PATH}`, {
        fetchImpl: this.fetchWithAuth,
      }).catch((error: unknown) => {
        // the next call fetches the card again
        this.connection = undefined;
        throw error;
      });
    }
    return this.connection;
  }

  private readonly fetchWithAuth: typeof fetch = async (input, init) => {
    const url = requestUrl(input);
    const target = this.isDocker ? url : rewriteDockerUrl(url);
    if (target !== url) {
      this.logger.debug({ from: url, to: target }, 'Converted Docker URL to localhost');
    }

    const headers = new Headers(init?.headers);
    if (this.authToken) {
      headers.set('Authorization', `Bearer ${this.authToken}`);
    }
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const signal = init?.signal ? AbortSignal.any([init.signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await this.baseFetch(target, { ...init, headers, signal });
    } catch (error) {
      throw new A2AClientError(`Request to ${target} failed`, {
        agentUrl: target,
        retryable: !init?.signal?.aborted,
        cause: error,
      });
    }

    if (!response.ok) {
      throw new A2AClientError(`HTTP ${response.status} from ${target}`, {
        agentUrl: target,
        status: response.status,
        retryable: isRetryableStatus(response.status),
      });
    }
    return response;
  };

  private rpcError(method: string, error: { code: number; message: string }): A2AClientError {
    return new A2AClientError(`Agent returned error ${error.code}: ${error.message}`, {
      agentUrl: this.baseUrl,
      method,
      rpcCode: error.code,
      retryable: false,
    });
  }

  private isSettled(task: Task): boolean {
    const state = task.status.state;
    if (SETTLED_TASK_STATES.includes(state)) {
      return true;
    }
    // Some agents never leave `unknown` but still attach their output
    if (state === 'unknown') {
      return (task.artifacts?.length ?? 0) > 0 || (task.history ?? []).some((m) => m.role === 'agent');
    }
    return false;
  }
}
