export type BackoffPolicy = {
  baseMs: number;
  capMs: number;
  /** Fractional spread around the delay, 0.1 = ±10%. */
  jitter: number;
};

/**
 * `min(cap, base * 2^previousRetries)` with symmetric jitter. `random` is
 * injectable so tests can pin it.
 */
export function computeBackoffMs(
  policy: BackoffPolicy,
  previousRetries: number,
  random: () => number = Math.random,
): number {
  const exp = Math.min(
    policy.capMs,
    policy.baseMs * Math.pow(2, Math.max(0, previousRetries)),
  );
  const spread = exp * policy.jitter * (random() * 2 - 1);
  return Math.max(0, Math.floor(exp + spread));
}
