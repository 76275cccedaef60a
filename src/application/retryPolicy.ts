export interface RetryPolicy {
  maxAttempts: number;
  /** Wait before retry n (1-based) is `delaysMs[n - 1]`; the last entry repeats. */
  delaysMs: number[];
  isRetryable: (error: unknown) => boolean;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function exponentialDelays(baseMs: number, retries: number) {
  return Array.from({ length: Math.max(0, retries) }, (_, index) => baseMs * 2 ** index);
}

export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: { sleep?: Sleep; onRetry?: (error: unknown, attempt: number, delayMs: number) => Promise<void> | void } = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
        throw error;
      }
      const delayMs = policy.delaysMs[Math.min(attempt, policy.delaysMs.length) - 1] ?? 0;
      await hooks.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
