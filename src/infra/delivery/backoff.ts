export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /**
   * Upper bound of the random extra delay, as a fraction of the capped delay
   */
  jitterRatio?: number;
}

export const DEFAULT_JITTER_RATIO = 0.2;

/**
 * Delay before the next attempt once `attempt` attempts have failed:
 * base * 2^(attempt - 1), capped at maxDelayMs, plus up to 20% jitter.
 */
export const computeBackoff = (
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number => {
  const exponent = Math.max(0, attempt - 1);
  const capped = Math.min(options.baseDelayMs * 2 ** exponent, options.maxDelayMs);
  const jitter = capped * (options.jitterRatio ?? DEFAULT_JITTER_RATIO) * random();
  return Math.round(capped + jitter);
};
