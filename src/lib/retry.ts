/**
 * Retry with bounded exponential backoff.
 *
 * Used at infrastructure call sites only (model provider transients, container
 * start failures). Task-level failures go through the task retry budget.
 */

import type { InfraRetryConfig } from '../types/config.js';
import { isTransientModelError } from '../types/model.js';
import type { ModelCompletion, ModelProvider, ModelRequest } from '../types/model.js';

export interface RetryOptions {
  /** Total attempts including the first (default 3) */
  maxAttempts?: number;
  /** Delay before the second attempt (default 1000) */
  baseDelayMs?: number;
  /** Cap on a single delay (default 10000) */
  maxDelayMs?: number;
  /** Name used in log lines */
  label?: string;
  /** Errors for which this returns false are rethrown at once */
  isRetryable?: (error: unknown) => boolean;
  /** Replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before attempt `attempt + 1`, for a zero-based `attempt`.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

/**
 * Maps the config section onto retry options.
 */
export function retryOptionsFrom(config: InfraRetryConfig, label: string): RetryOptions {
  return {
    maxAttempts: config.max_attempts,
    baseDelayMs: config.base_delay_ms,
    maxDelayMs: config.max_delay_ms,
    label,
  };
}

/**
 * Calls `fn` until it resolves, a non-retryable error is thrown, or the
 * attempts run out; the last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  const baseDelay = options.baseDelayMs ?? 1000;
  const maxDelay = options.maxDelayMs ?? 10_000;
  const label = options.label ?? 'operation';
  const isRetryable = options.isRetryable ?? (() => true);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt + 1 >= maxAttempts || !isRetryable(error)) {
        throw error;
      }
      const delay = backoffDelay(attempt, baseDelay, maxDelay);
      console.warn(
        `[RETRY] ${label} failed (attempt ${attempt + 1}/${maxAttempts}), retrying in ${delay}ms: ${error instanceof Error ? error.message : String(error)}`
      );
      await sleep(delay);
    }
  }
}

/**
 * Model Provider wrapper that retries transient failures with backoff.
 * Fatal errors and exhausted transients propagate unchanged.
 */
export class RetryingModelProvider implements ModelProvider {
  constructor(
    private readonly inner: ModelProvider,
    private readonly options: RetryOptions
  ) {}

  complete(request: ModelRequest): Promise<ModelCompletion> {
    return withRetry(() => this.inner.complete(request), {
      ...this.options,
      label: `${this.options.label ?? 'model'} (${request.role})`,
      isRetryable: isTransientModelError,
    });
  }
}
