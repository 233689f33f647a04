/**
 * Retry with bounded attempts.
 *
 * Backoff formula: delay = min(baseDelayMs * backoffFactor^(attempt - 1), maxDelayMs)
 *
 * The build's own policies use backoffFactor 1, i.e. a fixed delay between
 * attempts.
 */

import type { Logger } from "./types.js";

/** Default backoff factor if not specified in the policy. */
const DEFAULT_BACKOFF_FACTOR = 1;

/** Default maximum delay if not specified in the policy. */
const DEFAULT_MAX_DELAY_MS = 60_000;

export interface RetryPolicy {
  /** Total number of attempts, including the first one. */
  readonly maxAttempts: number;
  /** Delay in milliseconds before the second attempt. */
  readonly baseDelayMs: number;
  /** Maximum delay cap in milliseconds. */
  readonly maxDelayMs?: number;
  /** Backoff multiplier (default: 1, fixed delay). */
  readonly backoffFactor?: number;
}

/** Sleep for the specified number of milliseconds. */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function until it resolves or the attempts run out.
 *
 * `fn` receives the 1-based attempt number. Each failure but the last is
 * logged as a warning; after the last one the final error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  logger: Logger,
  label = "operation",
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const maxDelayMs = policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const backoffFactor = policy.backoffFactor ?? DEFAULT_BACKOFF_FACTOR;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      const message = err instanceof Error ? err.message : String(err);

      if (attempt < maxAttempts) {
        const delay = Math.min(
          policy.baseDelayMs * Math.pow(backoffFactor, attempt - 1),
          maxDelayMs,
        );
        logger.warn(
          `[forge:retry] ${label}: attempt ${attempt}/${maxAttempts} failed: ${message}. ` +
          `Retrying in ${delay}ms...`,
        );
        await sleep(delay);
      } else {
        logger.warn(`[forge:retry] ${label}: all ${maxAttempts} attempts exhausted. Last error: ${message}`);
      }
    }
  }

  throw lastError;
}
