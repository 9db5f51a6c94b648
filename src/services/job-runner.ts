import { logger, formatNumber } from '../utils/logger.js';
import { withRetries } from '../utils/retry.js';
import { formatDateKey } from '../utils/date-key.js';
import type { AppConfig, ConfigKey } from '../utils/config.js';
import { withBrowserTransport } from '../drivers/browser.js';
import { HttpTransport } from '../drivers/http.js';
import { DailySheetStore } from './sheet-store.js';
import type { Notifier } from '../providers/telegram.js';
import type { Job, JobContext, JobResult, ReportJob, SheetJob } from '../types/job.js';
import type { CellValue, SheetsClient } from '../types/sheet.js';

const log = logger.createContext('job-runner');

export interface RunnerDeps {
  sheets?: SheetsClient;
  notifier?: Notifier;
}

export interface ContextOptions {
  date?: Date;
  dryRun?: boolean;
  noProxy?: boolean;
  headed?: boolean;
}

/**
 * Context for a real run: a proxied headless browser launched per attempt
 * and a plain HTTP transport.
 */
export function createJobContext(config: AppConfig, options: ContextOptions = {}): JobContext {
  const proxy = options.noProxy ? undefined : config.proxy;
  return {
    config,
    date: options.date ?? new Date(),
    dryRun: options.dryRun ?? false,
    withBrowser: fn => withBrowserTransport({ proxy, headless: !options.headed }, fn),
    http: new HttpTransport(),
    retry: {}
  };
}

/**
 * Configuration keys a job needs in this run. The proxy is optional when
 * proxying is switched off; the sheet credentials are unused in a dry run.
 */
export function requiredKeys(job: Job, options: Pick<ContextOptions, 'noProxy' | 'dryRun'> = {}): ConfigKey[] {
  const keys = new Set<ConfigKey>(job.requires);
  if (options.noProxy) keys.delete('proxy');
  if (job.kind === 'sheet' && !options.dryRun) {
    keys.add('serviceAccount');
    keys.add('sheetId');
  }
  if (job.kind === 'report' && options.dryRun) {
    keys.delete('telegramKey');
    keys.delete('chatId');
  }
  return [...keys];
}

export async function runJob(job: Job, ctx: JobContext, deps: RunnerDeps): Promise<JobResult> {
  return job.kind === 'sheet'
    ? runSheetJob(job, ctx, deps)
    : runReportJob(job, ctx, deps);
}

async function runSheetJob(job: SheetJob, ctx: JobContext, deps: RunnerDeps): Promise<JobResult> {
  const dateKey = formatDateKey(ctx.date, job.dateFormat);

  if (ctx.dryRun) {
    const values = await withRetries(() => job.collect(ctx), { label: job.name, ...ctx.retry });
    return { status: 'dry-run', job: job.name, preview: `${dateKey} ${formatValues(values)}` };
  }

  if (!deps.sheets) {
    throw new Error(`Job ${job.name} needs a spreadsheet client`);
  }
  const store = new DailySheetStore(deps.sheets, job.worksheet);
  const row = await store.findRow(dateKey);
  if (row.filled) {
    logger.skip(job.name, `row ${row.rowIndex} for ${dateKey} already filled`);
    return { status: 'skipped', job: job.name, dateKey, rowIndex: row.rowIndex };
  }

  const values = await withRetries(() => job.collect(ctx), { label: job.name, ...ctx.retry });
  const range = await store.writeRow(row, dateKey, values);
  log.normal(`${job.worksheet} row ${row.rowIndex} updated with ${formatValues(values)}`);

  return { status: 'written', job: job.name, dateKey, range, values };
}

async function runReportJob(job: ReportJob, ctx: JobContext, deps: RunnerDeps): Promise<JobResult> {
  const message = await withRetries(() => job.compose(ctx), { label: job.name, ...ctx.retry });

  if (ctx.dryRun) {
    return { status: 'dry-run', job: job.name, preview: message };
  }
  if (!deps.notifier) {
    throw new Error(`Job ${job.name} needs a notifier`);
  }

  await deps.notifier.send(message);
  return { status: 'sent', job: job.name, message };
}

function formatValues(values: CellValue[]): string {
  return values.map(value => (typeof value === 'number' ? formatNumber(value) : value)).join(', ');
}
