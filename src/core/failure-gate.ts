import { HighFailureRateError } from './errors.js';
import type { RunState } from '../types/aggregation.js';

export const DEFAULT_MAX_FAILURE_RATE = 0.10;

export function failureRate(failedCount: number, totalPages: number): number {
  return totalPages === 0 ? 0 : failedCount / totalPages;
}

/**
 * Reject a run whose failed share of pages is above `maxFailureRate`.
 * At or below the threshold the (possibly short) total is accepted.
 */
export function assertFailureRate(
  state: Pick<RunState, 'failedPages'>,
  totalPages: number,
  maxFailureRate: number = DEFAULT_MAX_FAILURE_RATE
): void {
  const failedCount = state.failedPages.length;
  if (failureRate(failedCount, totalPages) > maxFailureRate) {
    throw new HighFailureRateError(failedCount, totalPages);
  }
}
