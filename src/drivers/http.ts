import { TransportError, describeError } from '../core/errors.js';
import type { Transport, TransportResponse, TransportSession } from '../types/transport.js';

class HttpSession implements TransportSession {
  constructor(private headers: Record<string, string>) {}

  async fetch(url: string, timeoutMs: number): Promise<TransportResponse> {
    try {
      const response = await fetch(url, {
        headers: this.headers,
        signal: AbortSignal.timeout(timeoutMs)
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      throw new TransportError(`Request to ${url} failed: ${describeError(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    // Nothing held between requests
  }
}

/**
 * Plain HTTP transport for endpoints that answer without a browser
 */
export class HttpTransport implements Transport {
  constructor(private headers: Record<string, string> = { Accept: 'application/json' }) {}

  async open(): Promise<TransportSession> {
    return new HttpSession(this.headers);
  }
}
