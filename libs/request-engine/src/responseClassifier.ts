import type { AttemptOutcome, RetryPredicate } from './types';

export type Verdict = 'success' | 'retryable' | 'terminal';

export interface Classification {
  verdict: Verdict;
  /** Why the attempt did not succeed. Absent on success. */
  message?: string;
}

/** Statuses retried by every engine, on the grounds that they signal transient overload. */
export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([500, 503]);

export const statusMessage = (status: number): string => `Server returned statuscode ${status}`;

const isSuccessStatus = (status: number): boolean => status >= 200 && status <= 299;

/**
 * Decides what the retry loop does with one attempt.
 *
 * 4xx responses are never retried: they are deterministic and would repeat.
 */
export function classifyAttempt(
  outcome: Pick<AttemptOutcome, 'status' | 'error'>,
  shouldRetry?: RetryPredicate,
): Classification {
  const { status, error } = outcome;

  if (!error && isSuccessStatus(status)) {
    return { verdict: 'success' };
  }

  const message = error?.message ?? statusMessage(status);

  if (RETRYABLE_STATUSES.has(status) || (status > 0 && shouldRetry?.(status) === true)) {
    return { verdict: 'retryable', message };
  }

  // connect timeouts only: the request was never delivered
  if (error?.transportKind === 'connect_timeout') {
    return { verdict: 'retryable', message };
  }

  return { verdict: 'terminal', message };
}
