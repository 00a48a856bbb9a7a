export interface BackoffPolicy {
  baseBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
}

/**
 * Delay before retry number `attempt` (1-based). Jitter stays below the gap
 * to the next exponential step and the result is floored at the previous
 * delay, so successive delays never shrink until `maxBackoffMs`, and never go
 * below `baseBackoffMs`.
 */
export function backoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  previousDelayMs = 0,
  retryAfterMs = 0,
  random: () => number = Math.random,
): number {
  const { baseBackoffMs, backoffMultiplier } = policy;
  const cap = Math.max(policy.maxBackoffMs, baseBackoffMs);
  const raw = baseBackoffMs * backoffMultiplier ** Math.max(0, attempt - 1);
  const jitter = backoffMultiplier > 1 ? random() * raw * (backoffMultiplier - 1) : 0;
  const delay = Math.max(raw + jitter, previousDelayMs, retryAfterMs, baseBackoffMs);
  return Math.round(Math.min(cap, delay));
}
