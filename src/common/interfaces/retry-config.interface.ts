export interface RetryConfig {
  maxAttempts: number;
  delay: number;
  backoff?: boolean;
  backoffFactor?: number;
  maxDelay?: number;
  /** Fraction of the computed delay added or removed at random, 0..1 */
  jitter?: number;
}
