import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { chromium } from 'playwright';
import type { BrowserContext, Page, Response } from 'playwright';
import { formatProxyForPlaywright, describeProxy } from './proxy.js';
import { TransportError, describeError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import type { Proxy } from '../types/proxy.js';
import type { BrowserLike, CaptureOptions, TransportResponse, TransportSession } from '../types/transport.js';

const log = logger.createContext('browser');

export interface BrowserTransportOptions {
  proxy?: Proxy;
  headless?: boolean;   // Defaults to true
  settleMs?: number;    // Pause after navigation before reading the page, defaults to 500
}

/**
 * A tab in the shared browser context. Reading a JSON endpoint in Chromium
 * renders it inside a <pre>, so the body is taken from there when present.
 */
class PageSession implements TransportSession {
  constructor(
    private page: Page,
    private settleMs: number
  ) {}

  async fetch(url: string, timeoutMs: number): Promise<TransportResponse> {
    try {
      const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
      if (!response) {
        throw new TransportError(`No response for ${url}`);
      }
      if (this.settleMs > 0) {
        await this.page.waitForTimeout(this.settleMs);
      }

      const pre = await this.page.$('pre');
      const body = pre ? await pre.innerText() : await this.page.innerText('body');
      return { status: response.status(), body };
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(`Request to ${url} failed: ${describeError(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}

/**
 * Headless Chromium with a throwaway profile directory and optional proxy.
 * Each `open()` is a new tab in the same context.
 */
export class BrowserTransport implements BrowserLike {
  private constructor(
    private context: BrowserContext,
    private userDataDir: string,
    private settleMs: number
  ) {}

  static async launch(options: BrowserTransportOptions = {}): Promise<BrowserTransport> {
    const userDataDir = await mkdtemp(join(tmpdir(), 'collector-profile-'));
    try {
      const context = await chromium.launchPersistentContext(userDataDir, {
        headless: options.headless ?? true,
        proxy: options.proxy ? formatProxyForPlaywright(options.proxy) : undefined,
        ignoreHTTPSErrors: true,
        viewport: { width: 1920, height: 1080 },
        locale: 'en-US'
      });

      context.on('close', () => log.debug('Browser context closed'));
      log.normal(`Launched chromium (${describeProxy(options.proxy)})`);

      return new BrowserTransport(context, userDataDir, options.settleMs ?? 500);
    } catch (error) {
      await rm(userDataDir, { recursive: true, force: true });
      throw new TransportError(`Failed to launch browser: ${describeError(error)}`, { cause: error });
    }
  }

  async open(): Promise<TransportSession> {
    try {
      return new PageSession(await this.context.newPage(), this.settleMs);
    } catch (error) {
      throw new TransportError(`Failed to open tab: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Load a page and return the first JSON network response that matches.
   * Scrolls and finally reloads the page to provoke lazy requests.
   * Waits 8s after load and navigates with a 60s timeout unless told otherwise.
   */
  async captureJson(url: string, options: CaptureOptions): Promise<unknown> {
    const waitMs = options.waitMs ?? 8000;
    const timeoutMs = options.timeoutMs ?? 60000;
    const page = await this.context.newPage();

    let captured: unknown = undefined;
    const pending: Promise<void>[] = [];

    page.on('response', (response: Response) => {
      if (!options.match(response.url())) return;
      log.debug(`Inspecting ${response.url()} [${response.status()}]`);
      pending.push(readJson(response).then(body => {
        if (captured === undefined && body !== undefined && options.accept(body)) {
          log.normal(`Captured API response from ${response.url()}`);
          captured = body;
        }
      }));
    });

    const isCaptured = async (): Promise<boolean> => {
      await Promise.all(pending);
      return captured !== undefined;
    };

    try {
      await page.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs });
      await page.waitForTimeout(waitMs);
      if (await isCaptured()) return captured;

      log.normal('Data not captured yet, scrolling...');
      for (let i = 0; i < 3; i++) {
        await page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
        await page.waitForTimeout(2000);
        if (await isCaptured()) return captured;
      }

      await page.evaluate(() => window.scrollTo(0, 0));
      await page.waitForTimeout(3000);
      if (await isCaptured()) return captured;

      log.normal('Reloading page...');
      await page.reload({ waitUntil: 'networkidle', timeout: timeoutMs });
      await page.waitForTimeout(5000);
      if (await isCaptured()) return captured;

      throw new TransportError(`No matching API response captured from ${url}`);
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(`Capture from ${url} failed: ${describeError(error)}`, { cause: error });
    } finally {
      await page.close();
    }
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await rm(this.userDataDir, { recursive: true, force: true });
    }
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    log.debug(`Could not parse response from ${response.url()}: ${describeError(error)}`);
    return undefined;
  }
}

/**
 * Launch a browser for the duration of `fn`; it is closed on every exit path
 */
export async function withBrowserTransport<T>(
  options: BrowserTransportOptions,
  fn: (transport: BrowserTransport) => Promise<T>
): Promise<T> {
  const transport = await BrowserTransport.launch(options);
  try {
    return await fn(transport);
  } finally {
    await transport.close();
  }
}
