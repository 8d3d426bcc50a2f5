export interface BackoffPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  factor?: number;
  maxDelayMs?: number;
}

export type BackoffState =
  | { status: "pending"; attempts: number; delayMs: number }
  | { status: "exhausted"; attempts: number };

export const DEFAULT_BACKOFF: BackoffPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  factor: 2,
  maxDelayMs: 30000
};

export function startBackoff(): BackoffState {
  return { status: "pending", attempts: 0, delayMs: 0 };
}

/**
 * Advances the state after a failed attempt. `delayMs` is how long to wait
 * before the next one: base, base*factor, base*factor^2, ... capped at maxDelayMs.
 */
export function recordFailure(state: BackoffState, policy: BackoffPolicy): BackoffState {
  const attempts = state.attempts + 1;
  if (attempts >= Math.max(1, policy.maxAttempts)) {
    return { status: "exhausted", attempts };
  }
  const factor = policy.factor ?? 2;
  const delay = policy.baseDelayMs * Math.pow(factor, attempts - 1);
  const delayMs = Math.min(delay, policy.maxDelayMs ?? Number.POSITIVE_INFINITY);
  return { status: "pending", attempts, delayMs };
}
