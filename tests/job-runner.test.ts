import { describe, it, expect, vi, beforeAll } from 'vitest';
import { runJob, requiredKeys } from '../src/services/job-runner.js';
import { capJob } from '../src/jobs/cap.js';
import { CONNECTIVITY_CHECK_URL } from '../src/drivers/connectivity.js';
import { logger, LogLevel } from '../src/utils/logger.js';
import type { BrowserLike } from '../src/types/transport.js';
import type { JobContext, ReportJob, SheetJob } from '../src/types/job.js';
import type { CellValue } from '../src/types/sheet.js';
import { FakeBrowser, FakeTransport, leaderboardPage, ok } from './fake-transport.js';
import { FakeSheetsClient } from './fake-sheets.js';

const unusedTransport = new FakeTransport(url => {
  throw new Error(`unexpected request to ${url}`);
});

function testContext(overrides: Partial<JobContext> = {}): JobContext {
  return {
    config: { logLevel: LogLevel.QUIET },
    date: new Date(2026, 9, 19),
    dryRun: false,
    withBrowser: async () => {
      throw new Error('browser not expected');
    },
    http: unusedTransport,
    retry: { delayMs: 0 },
    pageRetryDelayMs: 0,
    ...overrides
  };
}

function sheetJob(collect: () => Promise<CellValue[]>): SheetJob {
  return {
    kind: 'sheet',
    name: 'points',
    description: 'test job',
    requires: [],
    worksheet: 'Points',
    dateFormat: 'DD/MM/YYYY',
    collect
  };
}

describe('runJob', () => {
  beforeAll(() => {
    logger.setLevel(LogLevel.QUIET);
  });

  describe('sheet jobs', () => {
    it('should skip without collecting when today is already filled', async () => {
      const collect = vi.fn(async (): Promise<CellValue[]> => [1]);
      const sheets = new FakeSheetsClient([['Date', 'Points'], ['19/10/2026', '500']]);

      const result = await runJob(sheetJob(collect), testContext(), { sheets });

      expect(result).toEqual({ status: 'skipped', job: 'points', dateKey: '19/10/2026', rowIndex: 2 });
      expect(collect).not.toHaveBeenCalled();
      expect(sheets.updates).toEqual([]);
    });

    it('should fill an existing empty row', async () => {
      const sheets = new FakeSheetsClient([['Date', 'Points'], ['19/10/2026', '']]);

      const result = await runJob(sheetJob(async () => [750, 3]), testContext(), { sheets });

      expect(result).toEqual({
        status: 'written',
        job: 'points',
        dateKey: '19/10/2026',
        range: "'Points'!A2:C2",
        values: [750, 3]
      });
      expect(sheets.updates).toEqual([{ range: "'Points'!A2:C2", values: [['19/10/2026', 750, 3]] }]);
    });

    it('should append a new row after the last one', async () => {
      const sheets = new FakeSheetsClient([['Date', 'Points'], ['18/10/2026', '700']]);

      await runJob(sheetJob(async () => [750]), testContext(), { sheets });

      expect(sheets.updates).toEqual([{ range: "'Points'!A3:B3", values: [['19/10/2026', 750]] }]);
    });

    it('should retry collection and write once', async () => {
      const sheets = new FakeSheetsClient([['Date', 'Points']]);
      let calls = 0;
      const collect = async (): Promise<CellValue[]> => {
        calls++;
        if (calls < 3) throw new Error('proxy refused');
        return [10];
      };

      const result = await runJob(sheetJob(collect), testContext(), { sheets });

      expect(result.status).toBe('written');
      expect(calls).toBe(3);
      expect(sheets.updates).toHaveLength(1);
    });

    it('should rethrow the last error once retries run out', async () => {
      const sheets = new FakeSheetsClient([['Date', 'Points']]);
      let calls = 0;
      const collect = async (): Promise<CellValue[]> => {
        calls++;
        throw new Error(`attempt ${calls} failed`);
      };

      await expect(runJob(sheetJob(collect), testContext(), { sheets })).rejects.toThrow('attempt 3 failed');
      expect(sheets.updates).toEqual([]);
    });

    it('should preview without touching the sheet in a dry run', async () => {
      const result = await runJob(sheetJob(async () => [1234, 'n/a']), testContext({ dryRun: true }), {});

      expect(result).toEqual({ status: 'dry-run', job: 'points', preview: '19/10/2026 1,234, n/a' });
    });

    it('should require a sheets client outside a dry run', async () => {
      await expect(runJob(sheetJob(async () => [1]), testContext(), {}))
        .rejects.toThrow('Job points needs a spreadsheet client');
    });
  });

  describe('report jobs', () => {
    const reportJob: ReportJob = {
      kind: 'report',
      name: 'digest',
      description: 'test report',
      requires: [],
      compose: async () => '<b>Digest</b>'
    };

    it('should send the composed message', async () => {
      const send = vi.fn(async (_message: string) => {});

      const result = await runJob(reportJob, testContext(), { notifier: { send } });

      expect(result).toEqual({ status: 'sent', job: 'digest', message: '<b>Digest</b>' });
      expect(send).toHaveBeenCalledWith('<b>Digest</b>');
    });

    it('should return the message as a preview in a dry run', async () => {
      const result = await runJob(reportJob, testContext({ dryRun: true }), {});

      expect(result).toEqual({ status: 'dry-run', job: 'digest', preview: '<b>Digest</b>' });
    });
  });

  describe('cap job', () => {
    it('should launch no browser when the day is already recorded', async () => {
      let launches = 0;
      const sheets = new FakeSheetsClient([['Date', 'Caps'], ['2026-10-19', '98,765']]);
      const ctx = testContext({
        withBrowser: async <T>(fn: (browser: BrowserLike) => Promise<T>): Promise<T> => {
          launches++;
          return fn(new FakeBrowser(() => ok('{}')));
        }
      });

      const result = await runJob(capJob, ctx, { sheets });

      expect(result.status).toBe('skipped');
      expect(launches).toBe(0);
    });

    it('should check connectivity, aggregate and write the total', async () => {
      const browser = new FakeBrowser(url =>
        url === CONNECTIVITY_CHECK_URL ? ok({ origin: '203.0.113.7' }) : leaderboardPage(3, [10, 20])
      );
      const sheets = new FakeSheetsClient([['Date', 'Caps'], ['2026-10-17', '1'], ['2026-10-18', '2']]);
      const ctx = testContext({
        withBrowser: <T>(fn: (browser: BrowserLike) => Promise<T>): Promise<T> => fn(browser)
      });

      const result = await runJob(capJob, ctx, { sheets });

      expect(result).toEqual({
        status: 'written',
        job: 'cap',
        dateKey: '2026-10-19',
        range: "'Cap'!A4:B4",
        values: [90]
      });
      expect(browser.requests[0]).toBe(CONNECTIVITY_CHECK_URL);
      // connectivity + discovery + 3 workers
      expect(browser.opened).toBe(5);
      expect(browser.live).toBe(0);
    });
  });
});

describe('requiredKeys', () => {
  const sheet = sheetJob(async () => []);

  it('should add sheet credentials to sheet jobs', () => {
    expect(requiredKeys({ ...sheet, requires: ['proxy'] })).toEqual(['proxy', 'serviceAccount', 'sheetId']);
  });

  it('should drop the proxy when proxying is off', () => {
    expect(requiredKeys({ ...sheet, requires: ['proxy', 'walletAddress'] }, { noProxy: true }))
      .toEqual(['walletAddress', 'serviceAccount', 'sheetId']);
  });

  it('should skip sink credentials in a dry run', () => {
    const report: ReportJob = {
      kind: 'report',
      name: 'digest',
      description: 'test report',
      requires: ['proxy', 'telegramKey', 'chatId'],
      compose: async () => ''
    };

    expect(requiredKeys(sheet, { dryRun: true })).toEqual([]);
    expect(requiredKeys(report, { dryRun: true })).toEqual(['proxy']);
    expect(requiredKeys(report)).toEqual(['proxy', 'telegramKey', 'chatId']);
  });
});
