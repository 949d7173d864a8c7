export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly maxRateLimitDelayMs: number;
  /** Wall-clock budget for one dispatch, retries and waits included. */
  readonly deadlineMs: number;
  /** Budget for a single attempt; unset means only the deadline applies. */
  readonly attemptTimeoutMs?: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5_000,
  maxRateLimitDelayMs: 30_000,
  deadlineMs: 60_000,
};

/** Largest delay a Node.js timer accepts; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

const positive = (value: number | undefined, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) && value > 0 ? value : fallback;

const nonNegative = (value: number | undefined, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : fallback;

const timerBound = (ms: number): number => Math.min(ms, MAX_TIMER_MS);

/**
 * Fills in defaults. Zero delays are honoured; delays a timer cannot hold are
 * capped at {@link MAX_TIMER_MS}. The deadline is not capped: the exchange
 * re-arms its deadline timer instead.
 */
export const resolvePolicy = (policy: Partial<RetryPolicy> = {}): RetryPolicy => {
  const baseDelayMs = timerBound(nonNegative(policy.baseDelayMs, DEFAULT_RETRY_POLICY.baseDelayMs));
  return {
    maxAttempts: Math.floor(positive(policy.maxAttempts, DEFAULT_RETRY_POLICY.maxAttempts)),
    baseDelayMs,
    maxDelayMs: timerBound(Math.max(baseDelayMs, nonNegative(policy.maxDelayMs, DEFAULT_RETRY_POLICY.maxDelayMs))),
    maxRateLimitDelayMs: timerBound(
      nonNegative(policy.maxRateLimitDelayMs, DEFAULT_RETRY_POLICY.maxRateLimitDelayMs),
    ),
    deadlineMs: positive(policy.deadlineMs, DEFAULT_RETRY_POLICY.deadlineMs),
    attemptTimeoutMs:
      policy.attemptTimeoutMs === undefined ? undefined : timerBound(positive(policy.attemptTimeoutMs, 1)),
  } satisfies RetryPolicy;
};

/** Exponential backoff with full jitter: uniform in `[0, min(max, base * 2^(n-1))]`. */
export const backoffDelay = (policy: RetryPolicy, attemptNumber: number, random: () => number): number => {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** Math.max(attemptNumber - 1, 0));
  return Math.floor(ceiling * Math.min(Math.max(random(), 0), 1));
};

export const rateLimitDelay = (
  policy: RetryPolicy,
  attemptNumber: number,
  hintMs: number | undefined,
  random: () => number,
): number => Math.min(hintMs ?? backoffDelay(policy, attemptNumber, random), policy.maxRateLimitDelayMs);
