import { logger, formatNumber, formatProgress, formatTime } from '../utils/logger.js';
import { withRetries } from '../utils/retry.js';
import { planBatches, workerSlot, DEFAULT_BATCH_SIZE, DEFAULT_MAX_CONCURRENT } from '../core/batch-plan.js';
import { assertFailureRate, DEFAULT_MAX_FAILURE_RATE } from '../core/failure-gate.js';
import { DiscoveryError, describeError } from '../core/errors.js';
import { fetchOk } from '../core/transport.js';
import type { PageDecoder } from '../core/page-decoder.js';
import type { Transport, TransportSession } from '../types/transport.js';
import type {
  AggregationResult,
  Batch,
  BatchProgress,
  PageOutcome,
  RunPhase,
  RunState
} from '../types/aggregation.js';

const log = logger.createContext('aggregate-engine');

export interface AggregateOptions {
  baseUrl: string;              // Paginated endpoint, `page` is set as a query parameter
  decoder: PageDecoder;
  batchSize?: number;           // Default: 18
  maxConcurrent?: number;       // Default: 6
  pageTimeoutMs?: number;       // Default: 20000
  discoveryTimeoutMs?: number;  // Default: 30000
  pageRetryDelayMs?: number;    // Default: 1000
  maxFailureRate?: number;      // Default: 0.10
  onBatchComplete?: (progress: BatchProgress) => void;
}

type ResolvedOptions = Required<Omit<AggregateOptions, 'onBatchComplete'>> & Pick<AggregateOptions, 'onBatchComplete'>;

/** Attempts per page: the first try plus one retry */
const PAGE_ATTEMPTS = 2;

export function pageUrl(baseUrl: string, page: number): string {
  const url = new URL(baseUrl);
  url.searchParams.set('page', String(page));
  return url.toString();
}

/**
 * Fetch and decode one page on the given worker, retrying once.
 * Never rejects: a page that fails twice becomes a failure outcome.
 */
export async function fetchPage(
  page: number,
  worker: TransportSession,
  options: Pick<ResolvedOptions, 'baseUrl' | 'decoder' | 'pageTimeoutMs' | 'pageRetryDelayMs'>
): Promise<PageOutcome> {
  const url = pageUrl(options.baseUrl, page);
  try {
    const pageSum = await withRetries(
      async () => options.decoder.pageSum(await fetchOk(worker, url, options.pageTimeoutMs)),
      { maxAttempts: PAGE_ATTEMPTS, delayMs: options.pageRetryDelayMs, label: `page ${page}`, quiet: true }
    );
    return { kind: 'success', page, pageSum };
  } catch (error) {
    return { kind: 'failure', page, reason: describeError(error) };
  }
}

export function createRunState(): RunState {
  return { grandTotal: 0, processedCount: 0, failedPages: [] };
}

export function foldOutcome(state: RunState, outcome: PageOutcome): void {
  if (outcome.kind === 'success') {
    state.grandTotal += outcome.pageSum;
    state.processedCount++;
  } else {
    state.failedPages.push(outcome.page);
    log.verbose(`Page ${outcome.page} failed: ${outcome.reason}`);
  }
}

/**
 * Sums one numeric field over every page of a paginated endpoint.
 *
 * Pages are fetched in batches; each batch opens its own set of transport
 * sessions and closes them before the next batch starts, so at most
 * `maxConcurrent` sessions are alive at any time. Inside a batch, pages run in
 * chunks of `maxConcurrent`, one page per session, and results are folded into
 * the run state only after the whole chunk has settled.
 */
export class AggregateEngine {
  private phase: RunPhase = 'idle';

  constructor(private transport: Transport) {}

  getPhase(): RunPhase {
    return this.phase;
  }

  async aggregate(options: AggregateOptions): Promise<AggregationResult> {
    const startTime = Date.now();
    const settings: ResolvedOptions = {
      baseUrl: options.baseUrl,
      decoder: options.decoder,
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
      maxConcurrent: options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT,
      pageTimeoutMs: options.pageTimeoutMs ?? 20000,
      discoveryTimeoutMs: options.discoveryTimeoutMs ?? 30000,
      pageRetryDelayMs: options.pageRetryDelayMs ?? 1000,
      maxFailureRate: options.maxFailureRate ?? DEFAULT_MAX_FAILURE_RATE,
      onBatchComplete: options.onBatchComplete
    };

    log.verbose('Aggregate configuration:');
    log.verbose(`  Endpoint: ${settings.baseUrl}`);
    log.verbose(`  Batch size: ${settings.batchSize}, max concurrent: ${settings.maxConcurrent}`);
    log.verbose(`  Page timeout: ${settings.pageTimeoutMs}ms, retry delay: ${settings.pageRetryDelayMs}ms`);
    log.verbose(`  Max failure rate: ${settings.maxFailureRate}`);

    try {
      this.setPhase('discovering');
      const totalPages = await this.discover(settings);
      log.normal(`Detected ${totalPages} total pages`);

      this.setPhase('scheduling');
      const batches = planBatches(totalPages, settings.batchSize, settings.maxConcurrent);
      const state = createRunState();

      for (const batch of batches) {
        await this.runBatch(batch, settings, state);
        const done = state.processedCount + state.failedPages.length;
        log.normal(`Batch ${batch.number}/${batches.length}: ${formatProgress(done, totalPages)}, running total ${formatNumber(state.grandTotal)}`);
        settings.onBatchComplete?.({ batch, totalPages, state });
      }

      this.setPhase('gating');
      if (state.failedPages.length > 0) {
        log.warn(`Failed pages: ${state.failedPages.length} (${state.failedPages.join(', ')})`);
      } else {
        log.normal('All pages processed successfully');
      }
      assertFailureRate(state, totalPages, settings.maxFailureRate);

      this.setPhase('succeeded');
      const duration = Date.now() - startTime;
      log.normal(`Aggregated ${formatNumber(state.grandTotal)} over ${state.processedCount} pages in ${formatTime(duration)}`);

      return {
        totalPages,
        grandTotal: state.grandTotal,
        processedCount: state.processedCount,
        failedPages: [...state.failedPages],
        duration
      };
    } catch (error) {
      this.setPhase('failed');
      throw error;
    }
  }

  /**
   * Read the page count from page 1, with the same single retry pages get
   */
  private async discover(settings: ResolvedOptions): Promise<number> {
    let session: TransportSession;
    try {
      session = await this.transport.open();
    } catch (error) {
      throw new DiscoveryError(`Could not open a session for discovery: ${describeError(error)}`, { cause: error });
    }

    try {
      return await withRetries(
        async () => settings.decoder.totalPages(
          await fetchOk(session, pageUrl(settings.baseUrl, 1), settings.discoveryTimeoutMs)
        ),
        { maxAttempts: PAGE_ATTEMPTS, delayMs: settings.pageRetryDelayMs, label: 'discovery' }
      );
    } catch (error) {
      throw new DiscoveryError(`Could not determine page count: ${describeError(error)}`, { cause: error });
    } finally {
      await closeSessions([session]);
    }
  }

  private async runBatch(batch: Batch, settings: ResolvedOptions, state: RunState): Promise<void> {
    log.debug(`Batch ${batch.number}: pages ${batch.pages[0]}-${batch.pages[batch.pages.length - 1]} on ${batch.workerCount} workers`);
    const workers = await this.openWorkers(batch.workerCount);

    try {
      for (const chunk of batch.chunks) {
        this.setPhase('dispatching');
        const outcomes = await Promise.all(
          chunk.map((page, slot) => fetchPage(page, workers[workerSlot(slot, workers.length)], settings))
        );

        this.setPhase('folding');
        for (const outcome of outcomes) {
          foldOutcome(state, outcome);
        }
      }
    } finally {
      await closeSessions(workers);
    }
  }

  private async openWorkers(count: number): Promise<TransportSession[]> {
    const workers: TransportSession[] = [];
    try {
      for (let i = 0; i < count; i++) {
        workers.push(await this.transport.open());
      }
    } catch (error) {
      await closeSessions(workers);
      throw error;
    }
    return workers;
  }

  private setPhase(phase: RunPhase): void {
    if (this.phase !== phase) {
      log.debug(`${this.phase} -> ${phase}`);
      this.phase = phase;
    }
  }
}

async function closeSessions(sessions: TransportSession[]): Promise<void> {
  const results = await Promise.allSettled(sessions.map(session => session.close()));
  for (const result of results) {
    if (result.status === 'rejected') {
      log.error(`Failed to close session: ${describeError(result.reason)}`);
    }
  }
}
