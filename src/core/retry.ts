export interface RetryPolicy {
  intervalMs: number;
  maxAttempts: number;
}

export type PollOutcome<T> =
  | { status: 'resolved'; value: T; attempts: number }
  | { status: 'exhausted'; attempts: number };

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Calls `attempt` until it yields a value other than `undefined`, waiting
 * `intervalMs` between tries. Never sleeps after the last attempt.
 */
export async function poll<T>(
  attempt: (attemptNumber: number) => Promise<T | undefined>,
  policy: RetryPolicy,
  wait: Sleep = sleep
): Promise<PollOutcome<T>> {
  for (let n = 1; n <= policy.maxAttempts; n++) {
    const value = await attempt(n);
    if (value !== undefined) {
      return { status: 'resolved', value, attempts: n };
    }
    if (n < policy.maxAttempts) {
      await wait(policy.intervalMs);
    }
  }
  return { status: 'exhausted', attempts: policy.maxAttempts };
}

export function toRetryPolicy(settings: { pollIntervalMs: number; maxAttempts: number }): RetryPolicy {
  return { intervalMs: settings.pollIntervalMs, maxAttempts: settings.maxAttempts };
}
