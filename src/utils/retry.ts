import { logger } from "@infrastructure/logging/Logger";
import { describeError } from "@typesLocal/AppError";

export interface RetryPolicy {
  /** Attempts after the first one; 0 disables retrying. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 200,
  maxDelayMs: 2000,
};

export const NO_RETRY: RetryPolicy = {
  maxRetries: 0,
  baseDelayMs: 0,
  maxDelayMs: 0,
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Backoff before retry number `retry` (1-based): base, 2×base, 4×base, … capped. */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
}

/**
 * Runs `fn`, retrying failures that `isRetryable` accepts with exponential
 * backoff. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  operation: string,
  isRetryable: (error: unknown) => boolean,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<T> {
  for (let retry = 0; ; retry += 1) {
    if (retry > 0) {
      await delay(backoffDelay(policy, retry));
    }

    try {
      return await fn();
    } catch (error: unknown) {
      if (retry >= policy.maxRetries || !isRetryable(error)) {
        throw error;
      }

      logger.log("warn", "LLM_RETRY", {
        attempt: retry + 1,
        error: describeError(error).message,
        operation,
      });
    }
  }
}
