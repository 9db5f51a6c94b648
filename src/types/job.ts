import type { AppConfig, ConfigKey } from '../utils/config.js';
import type { DateKeyFormat } from '../utils/date-key.js';
import type { RetryOptions } from '../utils/retry.js';
import type { CellValue } from './sheet.js';
import type { BrowserLike, Transport } from './transport.js';

export interface JobContext {
  config: AppConfig;
  date: Date;
  dryRun: boolean;
  /** Launch a browser for the duration of `fn`, closed on every exit path */
  withBrowser<T>(fn: (browser: BrowserLike) => Promise<T>): Promise<T>;
  http: Transport;
  retry: RetryOptions;        // Outer retry policy, also used for pre-steps
  pageRetryDelayMs?: number;  // Delay before a single page is retried
}

interface JobBase {
  name: string;
  description: string;
  requires: ConfigKey[];
}

export interface SheetJob extends JobBase {
  kind: 'sheet';
  worksheet: string;
  dateFormat: DateKeyFormat;
  /** Values for columns B onwards */
  collect(ctx: JobContext): Promise<CellValue[]>;
}

export interface ReportJob extends JobBase {
  kind: 'report';
  /** Build the chat message */
  compose(ctx: JobContext): Promise<string>;
}

export type Job = SheetJob | ReportJob;

export type JobResult =
  | { status: 'written'; job: string; dateKey: string; range: string; values: CellValue[] }
  | { status: 'skipped'; job: string; dateKey: string; rowIndex: number }
  | { status: 'sent'; job: string; message: string }
  | { status: 'dry-run'; job: string; preview: string };
