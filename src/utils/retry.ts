import { logger } from './logger.js';
import { describeError } from '../core/errors.js';

const log = logger.createContext('retry');

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 2000;

export interface RetryOptions {
  maxAttempts?: number;  // Default: 3
  delayMs?: number;      // Default: 2000, fixed between attempts
  label?: string;        // Shown in attempt logs
  quiet?: boolean;       // Log failed attempts at verbose instead of error
  onAttemptFailed?: (error: unknown, attempt: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run an operation until it resolves or the attempts run out.
 *
 * The delay is fixed; there is no backoff or jitter. When every attempt fails
 * the error of the last attempt is rethrown unchanged.
 */
export async function withRetries<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const delayMs = options.delayMs ?? DEFAULT_RETRY_DELAY_MS;
  const label = options.label ?? 'operation';
  const report = options.quiet ? log.verbose.bind(log) : log.error.bind(log);
  const note = options.quiet ? log.verbose.bind(log) : log.normal.bind(log);

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      log.verbose(`${label}: attempt ${attempt}/${maxAttempts}`);
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      report(`${label}: attempt ${attempt} failed: ${describeError(error)}`);
      options.onAttemptFailed?.(error, attempt);

      if (attempt < maxAttempts) {
        note(`${label}: waiting ${delayMs}ms before retry...`);
        await sleep(delayMs);
      } else {
        report(`${label}: all ${maxAttempts} attempts exhausted`);
      }
    }
  }

  throw lastError;
}
