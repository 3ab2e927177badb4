/**
 * Bounded polling shared by readiness checks, connectivity probes and the
 * manager reachability check.
 */

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
  /** Multiplier applied to the delay after each attempt. 1 keeps it fixed. */
  backoffFactor?: number;
  maxDelayMs?: number;
}

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

export type PollResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number };

export interface PollOptions {
  sleep?: Sleeper;
  onRetry?: (attempt: number, nextDelayMs: number) => void;
}

/**
 * Call `probe` until it returns a non-null value or the attempt budget is
 * spent. There is no delay after the last attempt.
 */
export async function pollUntil<T>(
  probe: (attempt: number) => Promise<T | null>,
  policy: RetryPolicy,
  options: PollOptions = {},
): Promise<PollResult<T>> {
  const wait = options.sleep ?? sleep;
  const factor = policy.backoffFactor ?? 1;
  let delay = policy.delayMs;

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    const value = await probe(attempt);
    if (value !== null) {
      return { ok: true, value, attempts: attempt };
    }

    if (attempt < policy.attempts) {
      options.onRetry?.(attempt, delay);
      await wait(delay);
      delay = Math.min(delay * factor, policy.maxDelayMs ?? Number.POSITIVE_INFINITY);
    }
  }

  return { ok: false, attempts: policy.attempts };
}
