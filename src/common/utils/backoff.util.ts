import { RetryConfig } from '../interfaces/retry-config.interface';

export const delay = (ms: number): Promise<void> => {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
};

/**
 * Delay to wait after the given (1-based) failed attempt.
 *
 * Exponential when `backoff` is set, capped at `maxDelay`, then spread by
 * `jitter` so concurrent retriers do not line up.
 */
export const computeBackoffDelay = (
  config: RetryConfig,
  attempt: number,
  random: () => number = Math.random,
): number => {
  const base = config.backoff
    ? config.delay * Math.pow(config.backoffFactor || 2, attempt - 1)
    : config.delay;
  const capped = config.maxDelay !== undefined ? Math.min(base, config.maxDelay) : base;
  const jitter = Math.min(Math.max(config.jitter ?? 0, 0), 1);

  if (jitter === 0) {
    return Math.round(capped);
  }

  const spread = capped * jitter;
  return Math.max(0, Math.round(capped - spread + random() * spread * 2));
};
