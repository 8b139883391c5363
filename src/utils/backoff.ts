export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Exponential backoff with equal jitter: the delay lands between half and
 * all of `min(maxDelay, base * 2^(attempt-1))`.
 */
export function exponentialBackoffMs(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(attempt - 1, 0);
  const ceiling = Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** exponent);
  return Math.round(ceiling * (0.5 + random() * 0.5));
}

/** Linear backoff used for relay reconnects. */
export function linearBackoffMs(attempt: number, stepMs: number): number {
  return stepMs * Math.max(attempt, 1);
}
