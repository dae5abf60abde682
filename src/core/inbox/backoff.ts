export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
}

export interface BackoffState {
  intervalMs: number;
  consecutiveFailures: number;
}

export type CycleStatus = 'success' | 'partial' | 'failed' | 'skipped';

export function initialBackoff(policy: BackoffPolicy): BackoffState {
  return { intervalMs: policy.baseMs, consecutiveFailures: 0 };
}

/**
 * Failed cycles double the interval up to the cap, a clean cycle resets it,
 * and partial or skipped cycles leave it where it is.
 */
export function nextBackoff(state: BackoffState, status: CycleStatus, policy: BackoffPolicy): BackoffState {
  switch (status) {
    case 'success':
      return initialBackoff(policy);
    case 'failed': {
      const consecutiveFailures = state.consecutiveFailures + 1;
      return {
        consecutiveFailures,
        intervalMs: Math.min(policy.baseMs * 2 ** consecutiveFailures, policy.maxMs),
      };
    }
    default:
      return state;
  }
}
