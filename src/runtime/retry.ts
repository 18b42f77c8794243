import { setTimeout as delay } from "node:timers/promises";

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
  backoffFactor: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface WithRetryOptions {
  sleep?: SleepFn;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, nextAttempt: number) => void;
}

export const defaultRetryPolicy: RetryPolicy = {
  attempts: 1,
  delayMs: 0,
  backoffFactor: 2
};

export function resolveRetryPolicy(policy: Partial<RetryPolicy> = {}): RetryPolicy {
  const resolved: RetryPolicy = {
    ...defaultRetryPolicy,
    ...policy
  };

  if (!Number.isInteger(resolved.attempts) || resolved.attempts < 1) {
    throw new Error(`Invalid retry attempts '${resolved.attempts}': expected an integer greater than or equal to 1.`);
  }

  if (!Number.isFinite(resolved.delayMs) || resolved.delayMs < 0) {
    throw new Error(`Invalid retry delay '${resolved.delayMs}': expected a non-negative number of milliseconds.`);
  }

  if (!Number.isFinite(resolved.backoffFactor) || resolved.backoffFactor < 1) {
    throw new Error(`Invalid retry backoff factor '${resolved.backoffFactor}': expected a number greater than or equal to 1.`);
  }

  return resolved;
}

export function retryDelayFor(policy: RetryPolicy, attempt: number): number {
  return Math.round(policy.delayMs * policy.backoffFactor ** (attempt - 1));
}

/**
 * Runs `operation` until it resolves or the policy's attempts are used up.
 * The last error is rethrown. An aborted signal stops further attempts.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: WithRetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.attempts || options.signal?.aborted) {
        throw error;
      }

      options.onRetry?.(error, attempt, attempt + 1);
      const waitMs = retryDelayFor(policy, attempt);
      if (waitMs > 0) {
        await sleep(waitMs, options.signal);
      }
    }
  }
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}
