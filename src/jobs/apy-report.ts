import { z } from 'zod';
import { NumericSchema } from '../core/page-decoder.js';
import { DecodeError, describeError } from '../core/errors.js';
import { fetchJson } from '../core/transport.js';
import { checkConnectivity } from '../drivers/connectivity.js';
import { withRetries } from '../utils/retry.js';
import { logger } from '../utils/logger.js';
import type { ReportJob } from '../types/job.js';
import type { Transport } from '../types/transport.js';

const log = logger.createContext('apy-report');

const HTTP_TIMEOUT_MS = 10000;
const BROWSER_TIMEOUT_MS = 60000;

export const AVANT_APY_URLS = {
  savusd: 'https://app.avantprotocol.com/api/apy/savusd',
  avusdx: 'https://app.avantprotocol.com/api/apy/avusdx'
} as const;

export const MIDAS_APY_URL = 'https://api-prod.midas.app/api/data/apys';

export const YIELDFI_APY_URLS = {
  yusd: 'https://ctrl.yield.fi/t/apy/yusd/apyHistory',
  vyusd: 'https://ctrl.yield.fi/t/apy/vyusd/apyHistory'
} as const;

export const INFINIFI_PROTOCOL_URL = 'https://eth-api.infinifi.xyz/api/protocol/data';

/** APYs in percent, `null` where the source could not be read */
export interface CompetitorApys {
  savusd: number | null;
  avusdx: number | null;
  mhyper: number | null;
  yusd: number | null;
  vyusd: number | null;
  siusd: number | null;
}

const AvantApySchema = z.object({ apy: NumericSchema });
const MidasApysSchema = z.object({ mhyper: NumericSchema });
const YieldFiHistorySchema = z.object({
  apy_history: z.array(z.object({ apy: NumericSchema })).min(1)
});
const InfinifiProtocolSchema = z.object({
  data: z.object({
    staked: z.object({
      siUSD: z.object({ average7dAPY: NumericSchema })
    })
  })
});

export function roundApy(value: number): number {
  return Math.round(value * 100) / 100;
}

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, source: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new DecodeError(`Unexpected ${source} payload: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return result.data;
}

async function getJson(transport: Transport, url: string, timeoutMs: number): Promise<Record<string, unknown>> {
  const session = await transport.open();
  try {
    return await fetchJson(session, url, timeoutMs);
  } finally {
    await session.close();
  }
}

/**
 * Run one source read; a failure is logged and reported as `null`
 */
async function readApy(source: string, read: () => Promise<number>): Promise<number | null> {
  try {
    const apy = roundApy(await read());
    log.verbose(`${source}: ${apy}%`);
    return apy;
  } catch (error) {
    log.warn(`Could not read ${source} APY: ${describeError(error)}`);
    return null;
  }
}

export function fetchAvantApy(transport: Transport, key: keyof typeof AVANT_APY_URLS): Promise<number | null> {
  return readApy(`Avant ${key}`, async () =>
    decode(AvantApySchema, await getJson(transport, AVANT_APY_URLS[key], HTTP_TIMEOUT_MS), 'Avant').apy
  );
}

export function fetchMhyperApy(transport: Transport): Promise<number | null> {
  return readApy('Midas mHyper', async () =>
    decode(MidasApysSchema, await getJson(transport, MIDAS_APY_URL, HTTP_TIMEOUT_MS), 'Midas').mhyper * 100
  );
}

export function fetchYieldFiApy(transport: Transport, key: keyof typeof YIELDFI_APY_URLS): Promise<number | null> {
  return readApy(`YieldFi ${key}`, async () =>
    decode(YieldFiHistorySchema, await getJson(transport, YIELDFI_APY_URLS[key], HTTP_TIMEOUT_MS), 'YieldFi').apy_history[0].apy
  );
}

export function fetchInfinifiSiusdApy(transport: Transport): Promise<number | null> {
  return readApy('Infinifi siUSD', async () =>
    decode(InfinifiProtocolSchema, await getJson(transport, INFINIFI_PROTOCOL_URL, BROWSER_TIMEOUT_MS), 'Infinifi').data.staked.siUSD.average7dAPY * 100
  );
}

export async function collectCompetitorApys(http: Transport, browser: Transport): Promise<CompetitorApys> {
  const [savusd, avusdx, mhyper, yusd, vyusd] = await Promise.all([
    fetchAvantApy(http, 'savusd'),
    fetchAvantApy(http, 'avusdx'),
    fetchMhyperApy(http),
    fetchYieldFiApy(http, 'yusd'),
    fetchYieldFiApy(http, 'vyusd')
  ]);
  const siusd = await fetchInfinifiSiusdApy(browser);

  return { savusd, avusdx, mhyper, yusd, vyusd, siusd };
}

function formatApy(value: number | null): string {
  return value === null ? '❌' : `${value}%`;
}

/**
 * Telegram HTML body: bold title, one underlined block per provider
 */
export function formatCompetitorReport(apys: CompetitorApys): string {
  const lines = [
    '<b>Competitor Report 📊</b>\n',
    '<u>Avant</u>',
    `savUSD APY (Daily): ${formatApy(apys.savusd)}`,
    `avUSDx APY (Weekly): ${formatApy(apys.avusdx)}\n`,
    '<u>mHyper</u>',
    `mHyper APY (7 Day): ${formatApy(apys.mhyper)}\n`,
    '<u>YieldFi</u>',
    `yUSD APY (7 Day): ${formatApy(apys.yusd)}`,
    `vyUSD APY (7 Day): ${formatApy(apys.vyusd)}\n`,
    '<u>Infinifi</u>',
    `siUSD APY: ${formatApy(apys.siusd)}`
  ];
  return lines.join('\n');
}

export const apyReportJob: ReportJob = {
  kind: 'report',
  name: 'apy-report',
  description: 'Competitor APY report sent to Telegram',
  requires: ['proxy', 'telegramKey', 'chatId'],
  compose: ctx => ctx.withBrowser(async browser => {
    await withRetries(() => checkConnectivity(browser), { ...ctx.retry, label: 'connectivity check' });
    const apys = await collectCompetitorApys(ctx.http, browser);
    return formatCompetitorReport(apys);
  })
};
