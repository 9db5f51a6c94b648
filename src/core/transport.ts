import { TransportError } from './errors.js';
import { parseEnvelope } from './page-decoder.js';
import type { TransportSession } from '../types/transport.js';

/**
 * Fetch a URL and return its body, treating any non-2xx status as a transport failure
 */
export async function fetchOk(session: TransportSession, url: string, timeoutMs: number): Promise<string> {
  const response = await session.fetch(url, timeoutMs);
  if (response.status < 200 || response.status >= 300) {
    throw new TransportError(`HTTP ${response.status}`, { status: response.status });
  }
  return response.body;
}

export async function fetchJson(session: TransportSession, url: string, timeoutMs: number): Promise<Record<string, unknown>> {
  return parseEnvelope(await fetchOk(session, url, timeoutMs));
}
