import { errorMessage, Logger } from "./logger";

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

export async function withRetry<T>(
  operation: string,
  run: () => Promise<T>,
  policy: RetryPolicy,
  logger: Logger,
  wait: Sleep = sleep
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await run();
    } catch (error) {
      lastError = error;
      if (attempt === attempts) {
        break;
      }
      const delayMs = backoffDelay(policy, attempt);
      logger.warn("retry_scheduled", {
        operation,
        attempt,
        max_attempts: attempts,
        backoff_ms: delayMs,
        error: errorMessage(error)
      });
      await wait(delayMs);
    }
  }

  logger.error("retry_exhausted", { operation, attempts, error: errorMessage(lastError) });
  throw lastError;
}
