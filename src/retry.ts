/**
 * Retry Utilities
 *
 * Exponential backoff with jitter for transient collaborator faults.
 * The task runner uses this for read-only status probes only; mutating
 * calls are never retried.
 */

import { TransportError } from "./errors.js";
import type { RetryOptions } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export type RetryConfig = Required<RetryOptions>;

export const RETRY_DEFAULTS: RetryConfig = {
  maxAttempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitterFactor: 0.2,
};

/**
 * Transport error codes that are safe to retry.
 */
export const RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EAI_AGAIN",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "UNAVAILABLE",
  "DEADLINE_EXCEEDED",
  "SERVICE_UNAVAILABLE",
]);

const RETRYABLE_PATTERNS = [
  "throttl",
  "too many requests",
  "rate limit",
  "temporarily unavailable",
  "service unavailable",
  "connection reset",
  "socket hang up",
  "network error",
  "fetch failed",
];

// =============================================================================
// Error Checking
// =============================================================================

/**
 * Determine whether a collaborator error is safe to retry.
 */
export function shouldRetryError(error: unknown): boolean {
  if (!(error instanceof TransportError)) return false;

  if (error.code && RETRYABLE_CODES.has(error.code)) return true;

  // 429 = throttled, 5xx = server errors
  const statusCode = error.statusCode;
  if (statusCode === 429) return true;
  if (statusCode !== undefined && statusCode >= 500 && statusCode < 600) return true;

  const message = error.message.toLowerCase();
  return RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern));
}

// =============================================================================
// Retry Execution
// =============================================================================

/**
 * Backoff before attempt `attempt + 1`.
 */
export function computeBackoffMs(attempt: number, config: RetryConfig): number {
  const baseDelay = config.minDelayMs * 2 ** (attempt - 1);
  const cappedDelay = Math.min(baseDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(config.minDelayMs, cappedDelay + jitter);
}

/**
 * Execute a function, retrying transient transport errors.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions & { onRetry?: (error: unknown, attempt: number, delayMs: number) => void },
): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options?.maxAttempts ?? RETRY_DEFAULTS.maxAttempts,
    minDelayMs: options?.minDelayMs ?? RETRY_DEFAULTS.minDelayMs,
    maxDelayMs: options?.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs,
    jitterFactor: options?.jitterFactor ?? RETRY_DEFAULTS.jitterFactor,
  };

  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= config.maxAttempts) break;
      if (!shouldRetryError(error)) break;

      const delayMs = computeBackoffMs(attempt, config);
      options?.onRetry?.(error, attempt, delayMs);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw lastError;
}

/**
 * Create a pre-configured retry runner.
 */
export function createRetryRunner(options?: RetryOptions) {
  return <T>(fn: () => Promise<T>) => withRetry(fn, options);
}
