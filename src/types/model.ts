/**
 * Model Provider capability.
 *
 * Every model call (planning, generation, validation, security analysis) goes
 * through this interface. Implementations classify failures as transient
 * (worth retrying) or fatal (abort the project).
 */

import type { ModelRole } from './config.js';
import type { ModelUsage } from './task.js';

export interface ModelRequest {
  role: ModelRole;
  prompt: string;
  /** Structured context serialized into the call */
  context?: Record<string, unknown>;
}

export interface ModelCompletion {
  text: string;
  usage: ModelUsage;
}

export interface ModelProvider {
  complete(request: ModelRequest): Promise<ModelCompletion>;
}

/**
 * Retryable failure: timeout, rate limit, dropped connection.
 */
export class TransientModelError extends Error {
  constructor(
    message: string,
    public readonly role: ModelRole,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'TransientModelError';
  }
}

/**
 * Non-retryable failure: bad credentials, unknown model, broken provider.
 */
export class FatalModelError extends Error {
  constructor(
    message: string,
    public readonly role: ModelRole,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'FatalModelError';
  }
}

export function isTransientModelError(error: unknown): error is TransientModelError {
  return error instanceof TransientModelError;
}

export function isFatalModelError(error: unknown): error is FatalModelError {
  return error instanceof FatalModelError;
}

/** Usage value for calls that report nothing */
export const ZERO_USAGE: ModelUsage = Object.freeze({ cost_usd: 0, tokens: 0 });
