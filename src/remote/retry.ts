import { setTimeout as delay } from 'node:timers/promises';
import { RemoteApiError } from '../errors.js';

export interface RetryPolicy {
  /** Total attempts including the first */
  attempts: number;
  baseDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 500,
};

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Delay before the next attempt, doubling each time: base, 2×base, 4×base...
 * `attemptNumber` is the attempt that just failed (1-based).
 */
export function backoffDelay(policy: RetryPolicy, attemptNumber: number): number {
  return policy.baseDelayMs * 2 ** Math.max(attemptNumber - 1, 0);
}

export interface RetryOptions {
  sleep?: Sleep;
  onRetry?: (error: RemoteApiError, attemptNumber: number, delayMs: number) => void;
}

/**
 * Runs `operation`, retrying only transient remote failures until the policy's
 * attempts are used up. Everything else propagates on the first failure.
 */
export async function withRetry<T>(
  operation: (attemptNumber: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = error instanceof RemoteApiError && error.retryable;
      if (!retryable || attempt >= attempts) throw error;
      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
