export type FailureReason = 'quota_exceeded' | 'server_error' | 'not_found' | 'unresolved' | 'error';

export interface AccountFailure {
  username: string;
  reason: FailureReason;
  message: string;
}

/**
 * Per-run counters. Created fresh for every cycle and threaded through
 * each stage; nothing survives between runs.
 */
export interface RunStats {
  accountsTotal: number;
  /** Includes accounts skipped as unresolved, so it equals succeeded + failed. */
  accountsAttempted: number;
  accountsSucceeded: number;
  accountsFailed: number;
  accountsSkippedUnresolved: number;
  identitiesResolved: number;
  postsFetched: number;
  postsNew: number;
  postsDuplicate: number;
  requests: number;
  quotaHits: number;
  retries: number;
  failures: AccountFailure[];
  /** Accounts that have now failed `starvation_threshold` cycles in a row. */
  starved: string[];
}

export function createRunStats(): RunStats {
  return {
    accountsTotal: 0,
    accountsAttempted: 0,
    accountsSucceeded: 0,
    accountsFailed: 0,
    accountsSkippedUnresolved: 0,
    identitiesResolved: 0,
    postsFetched: 0,
    postsNew: 0,
    postsDuplicate: 0,
    requests: 0,
    quotaHits: 0,
    retries: 0,
    failures: [],
    starved: [],
  };
}

export function recordFailure(stats: RunStats, failure: AccountFailure): void {
  stats.accountsFailed++;
  stats.failures.push(failure);
}
