export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Exponential backoff with "equal jitter": half of the capped exponential
 * delay is fixed, the other half is random.
 */
export function backoffDelay(
  retryIndex: number,
  policy: BackoffPolicy,
  random: () => number,
): number {
  const exponential = Math.min(
    policy.maxDelayMs,
    policy.baseDelayMs * 2 ** retryIndex,
  );
  const half = exponential / 2;
  return half + random() * half;
}
