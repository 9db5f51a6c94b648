/**
 * Error kinds raised by the collectors.
 *
 * TransportError and DecodeError stay inside a single page fetch and become a
 * failed page outcome. DiscoveryError and HighFailureRateError escape the run
 * and are only caught by the outer retry wrapper.
 */

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = 'TransportError';
    this.status = options?.status;
  }

  readonly status?: number;
}

export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'DecodeError';
  }
}

export class DiscoveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'DiscoveryError';
  }
}

export class HighFailureRateError extends Error {
  constructor(
    readonly failedCount: number,
    readonly totalPages: number
  ) {
    super(`${failedCount} of ${totalPages} pages failed (${formatRate(failedCount, totalPages)}), above the accepted failure rate`);
    this.name = 'HighFailureRateError';
  }
}

export class ConfigError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing environment variables: ${missing.join(', ')}`);
    this.name = 'ConfigError';
  }
}

function formatRate(failed: number, total: number): string {
  return total === 0 ? '0%' : `${((failed / total) * 100).toFixed(1)}%`;
}

/**
 * Render any thrown value as a single-line message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
