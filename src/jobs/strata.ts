import { z } from 'zod';
import { NumericSchema } from '../core/page-decoder.js';
import { DecodeError } from '../core/errors.js';
import { fetchJson } from '../core/transport.js';
import { checkConnectivity } from '../drivers/connectivity.js';
import { requireValue } from '../utils/config.js';
import { withRetries } from '../utils/retry.js';
import { logger, formatNumber } from '../utils/logger.js';
import type { SheetJob } from '../types/job.js';
import type { Transport } from '../types/transport.js';

const log = logger.createContext('strata');

const StrataStatsSchema = z.object({
  data: z.object({
    info: z.object({ points: NumericSchema }),
    account: z.object({
      points: z.object({ total: NumericSchema })
    })
  })
});

export interface StrataStats {
  globalPoints: number;
  accountPoints: number;
}

export function strataStatsUrl(walletAddress: string): string {
  const url = new URL('https://api.strata.money/points/stats');
  url.searchParams.set('accountAddress', walletAddress);
  url.searchParams.set('season', '1');
  url.searchParams.set('chainId', '1');
  return url.toString();
}

/**
 * Both point values are required; either one missing rejects the payload
 */
export function decodeStrataStats(body: unknown): StrataStats {
  const result = StrataStatsSchema.safeParse(body);
  if (!result.success) {
    throw new DecodeError('Missing points data in response');
  }
  return {
    globalPoints: result.data.data.info.points,
    accountPoints: result.data.data.account.points.total
  };
}

export async function fetchStrataStats(transport: Transport, walletAddress: string): Promise<StrataStats> {
  const session = await transport.open();
  try {
    const stats = decodeStrataStats(await fetchJson(session, strataStatsUrl(walletAddress), 30000));
    log.normal(`Global points: ${formatNumber(stats.globalPoints)}, account points: ${formatNumber(stats.accountPoints)}`);
    return stats;
  } finally {
    await session.close();
  }
}

export const strataJob: SheetJob = {
  kind: 'sheet',
  name: 'strata',
  description: 'Strata global and account points',
  requires: ['proxy', 'walletAddress'],
  worksheet: 'Strata',
  dateFormat: 'DD/MM/YYYY',
  collect: ctx => ctx.withBrowser(async browser => {
    const walletAddress = requireValue(ctx.config, 'walletAddress');
    await withRetries(() => checkConnectivity(browser), { ...ctx.retry, label: 'connectivity check' });
    const stats = await fetchStrataStats(browser, walletAddress);
    return [stats.globalPoints, stats.accountPoints];
  })
};
