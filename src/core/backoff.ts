export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
  /** Fraction in [0, 1) added on top of the exponential delay. */
  jitter: number;
}

/**
 * Delay before retry number `attempt` (1-based: the attempt that just failed).
 * Jitter only ever adds less than a full doubling, so the result never
 * decreases as `attempt` grows, whatever `random` returns.
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy, random: () => number = Math.random) {
  const n = Math.max(1, Math.floor(attempt));
  const raw = policy.baseMs * Math.pow(2, n - 1);
  const jitter = Math.min(Math.max(policy.jitter, 0), 0.999);
  const withJitter = raw * (1 + jitter * random());
  return Math.max(1, Math.round(Math.min(policy.maxMs, withJitter)));
}
