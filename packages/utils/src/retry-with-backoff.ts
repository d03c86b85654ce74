import { setTimeout as sleep } from 'node:timers/promises';

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  minDelayMs?: number;
  /** Relative jitter applied on both sides of the delay, `0.2` means ±20%. */
  jitterRatio?: number;
}

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryWithBackoffOptions extends BackoffOptions {
  maxAttempts: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  wait?: (delayMs: number) => Promise<unknown>;
  random?: () => number;
}

const DEFAULT_JITTER_RATIO = 0.2;

export function computeBackoffDelayMs(
  attempt: number,
  { baseDelayMs, maxDelayMs, minDelayMs = 0, jitterRatio = DEFAULT_JITTER_RATIO }: BackoffOptions,
  random: () => number = Math.random,
): number {
  const exponential = baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const clamped = Math.min(maxDelayMs, Math.max(minDelayMs, exponential));
  const jitter = 1 + (random() * 2 - 1) * jitterRatio;
  return Math.floor(clamped * jitter);
}

/**
 * Runs `operation` until it resolves, `shouldRetry` rejects the error, or `maxAttempts`
 * tries have been made. The error of the last try is rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryWithBackoffOptions,
): Promise<T> {
  const { maxAttempts, shouldRetry = () => true, onRetry, wait = sleep, random } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) throw error;

      const delayMs = computeBackoffDelayMs(attempt, options, random);
      onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }
}
