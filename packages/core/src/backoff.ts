export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
  jitterMs: number;
}

export type RandomSource = () => number;

export function jitter(baseMs: number, rangeMs = 1000, random: RandomSource = Math.random): number {
  return baseMs + Math.floor(random() * rangeMs);
}

/** Random ms in [minMs, maxMs]. */
export function randomWaitMs(minMs: number, maxMs: number, random: RandomSource = Math.random): number {
  return minMs + Math.floor(random() * (maxMs - minMs + 1));
}

/**
 * Wait before the next attempt, given the 1-based number of the attempt that just failed:
 * min(maxMs, baseMs * 2^(attempt-1)) plus up to jitterMs.
 */
export function backoffDelayMs(
  failedAttempt: number,
  policy: BackoffPolicy,
  random: RandomSource = Math.random,
): number {
  const exp = policy.baseMs * 2 ** Math.max(0, failedAttempt - 1);
  return jitter(Math.min(policy.maxMs, exp), policy.jitterMs, random);
}
