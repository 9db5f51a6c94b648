import { AggregateEngine, type AggregateOptions } from '../engines/aggregate-engine.js';
import { createLeaderboardDecoder } from '../core/page-decoder.js';
import { checkConnectivity } from '../drivers/connectivity.js';
import { withRetries, type RetryOptions } from '../utils/retry.js';
import type { AggregationResult } from '../types/aggregation.js';
import type { SheetJob } from '../types/job.js';
import type { Transport } from '../types/transport.js';

export const CAP_LEADERBOARD_URL = 'https://api.cap.app/v1/caps/leaderboard';
export const CAP_FIELD = 'caps';

export interface CapCollectOptions {
  aggregate?: Omit<AggregateOptions, 'baseUrl' | 'decoder'>;
  retry?: RetryOptions;
}

/**
 * Check the proxy, then sum `caps` over every leaderboard page
 */
export async function collectCapTotal(transport: Transport, options: CapCollectOptions = {}): Promise<AggregationResult> {
  await withRetries(() => checkConnectivity(transport), { ...options.retry, label: 'connectivity check' });

  const engine = new AggregateEngine(transport);
  return engine.aggregate({
    ...options.aggregate,
    baseUrl: CAP_LEADERBOARD_URL,
    decoder: createLeaderboardDecoder(CAP_FIELD)
  });
}

export const capJob: SheetJob = {
  kind: 'sheet',
  name: 'cap',
  description: 'Total caps across the Cap leaderboard',
  requires: ['proxy'],
  worksheet: 'Cap',
  dateFormat: 'YYYY-MM-DD',
  collect: ctx => ctx.withBrowser(async browser => {
    const result = await collectCapTotal(browser, {
      retry: ctx.retry,
      aggregate: { pageRetryDelayMs: ctx.pageRetryDelayMs }
    });
    return [result.grandTotal];
  })
};
