import { describe, it, expect, beforeAll } from 'vitest';
import { decodeStrataStats, strataStatsUrl, strataJob } from '../src/jobs/strata.js';
import { CONNECTIVITY_CHECK_URL } from '../src/drivers/connectivity.js';
import { ConfigError, DecodeError } from '../src/core/errors.js';
import { logger, LogLevel } from '../src/utils/logger.js';
import type { BrowserLike } from '../src/types/transport.js';
import type { JobContext } from '../src/types/job.js';
import { FakeBrowser, FakeTransport, ok } from './fake-transport.js';

const WALLET = '0x0000000000000000000000000000000000000001';

const statsBody = {
  data: {
    info: { points: 1500000, season: 1 },
    account: { address: WALLET, points: { total: '2,500', rank: 12 } }
  }
};

function contextWith(browser: FakeBrowser, walletAddress?: string): JobContext {
  return {
    config: { logLevel: LogLevel.QUIET, walletAddress },
    date: new Date(2026, 9, 19),
    dryRun: false,
    withBrowser: <T>(fn: (browser: BrowserLike) => Promise<T>): Promise<T> => fn(browser),
    http: new FakeTransport(() => ok('{}')),
    retry: { delayMs: 0 }
  };
}

describe('strata', () => {
  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  describe('strataStatsUrl', () => {
    it('should build the stats query for a wallet', () => {
      expect(strataStatsUrl(WALLET))
        .toBe(`https://api.strata.money/points/stats?accountAddress=${WALLET}&season=1&chainId=1`);
    });
  });

  describe('decodeStrataStats', () => {
    it('should read global and account points', () => {
      expect(decodeStrataStats(statsBody)).toEqual({ globalPoints: 1500000, accountPoints: 2500 });
    });

    it('should require both values', () => {
      const withoutAccount = { data: { info: { points: 10 } } };
      const withoutGlobal = { data: { info: {}, account: { points: { total: 1 } } } };

      expect(() => decodeStrataStats(withoutAccount)).toThrow(DecodeError);
      expect(() => decodeStrataStats(withoutAccount)).toThrow('Missing points data in response');
      expect(() => decodeStrataStats(withoutGlobal)).toThrow('Missing points data in response');
    });
  });

  describe('strataJob', () => {
    it('should check connectivity and collect both columns', async () => {
      const browser = new FakeBrowser(url =>
        url === CONNECTIVITY_CHECK_URL ? ok({ origin: '203.0.113.7' }) : ok(statsBody)
      );

      const values = await strataJob.collect(contextWith(browser, WALLET));

      expect(values).toEqual([1500000, 2500]);
      expect(browser.requests).toEqual([CONNECTIVITY_CHECK_URL, strataStatsUrl(WALLET)]);
      expect(browser.live).toBe(0);
    });

    it('should fail before any request without a wallet address', async () => {
      const browser = new FakeBrowser(() => ok(statsBody));

      await expect(strataJob.collect(contextWith(browser))).rejects.toBeInstanceOf(ConfigError);
      expect(browser.requests).toEqual([]);
    });

    it('should use the strata worksheet keyed by day first', () => {
      expect(strataJob.worksheet).toBe('Strata');
      expect(strataJob.dateFormat).toBe('DD/MM/YYYY');
    });
  });
});
