/**
 * Reconnect backoff policy: exponential growth, capped, with additive jitter
 * so a fleet of relays does not reconnect in lockstep.
 */

export interface BackoffPolicy {
  /** Delay floor in ms, used for the first attempt */
  initialDelayMs: number;
  /** Delay cap in ms */
  maxDelayMs: number;
  /** Growth factor per consecutive failure */
  multiplier: number;
  /** Extra random delay as a fraction of the base delay (0 = none, 1 = up to 100%) */
  jitter: number;
}

export const DEFAULT_BACKOFF_POLICY: Readonly<BackoffPolicy> = Object.freeze({
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitter: 1,
});

/**
 * Delay before reconnect attempt number `attempt` (1-based).
 *
 * base  = min(max, initial * multiplier^(attempt - 1))
 * delay = min(max, base + base * jitter * random())
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const base = Math.min(policy.maxDelayMs, policy.initialDelayMs * Math.pow(policy.multiplier, exponent));
  const jittered = base + base * policy.jitter * random();
  return Math.round(Math.min(policy.maxDelayMs, jittered));
}
