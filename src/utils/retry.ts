/**
 * Retry utility for transient failures.
 *
 * Exponential backoff for A2A client calls. The workflow dispatcher never
 * retries a stage; retries happen only below it, inside a single agent call.
 */

import { isRetryable } from './errors.js';

/**
 * Retry configuration options.
 */
export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000ms) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000ms) */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  /** Whether to jitter the delay (default: true) */
  jitter?: boolean;
  /** Decides whether a failure is worth another attempt (default: isRetryable) */
  shouldRetry?: (error: Error) => boolean;
  /** Callback called before each retry */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Stops further attempts and cuts the backoff sleep short */
  signal?: AbortSignal;
}

const DEFAULT_RETRY_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  shouldRetry: isRetryable,
  onRetry: () => {},
};

/**
 * Backoff delay before retry number `attempt + 1`, without jitter.
 */
export function computeBackoff(attempt: number, options: RetryOptions = {}): number {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const baseDelay = opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt);
  return Math.min(baseDelay, opts.maxDelayMs);
}

/**
 * Retry an operation with exponential backoff.
 *
 * @param operation - Operation to retry (should return a Promise)
 * @param options - Retry configuration options
 * @returns Result of the operation
 * @throws Last error if all retries fail
 */
export async function retry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };

  let lastError: Error = new Error('Operation was not attempted');

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxRetries || !opts.shouldRetry(lastError)) {
        break;
      }

      const delay = computeBackoff(attempt, opts);
      const jitteredDelay = opts.jitter ? delay * (0.5 + Math.random() * 0.5) : delay;

      opts.onRetry(attempt + 1, lastError, jitteredDelay);

      await delayMs(jitteredDelay, options.signal);
    }
  }

  throw lastError;
}

/**
 * Delay helper. Rejects with the signal's reason as soon as it aborts.
 */
export function delayMs(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
