import { fetchOk } from '../core/transport.js';
import { logger } from '../utils/logger.js';
import type { Transport } from '../types/transport.js';

const log = logger.createContext('connectivity');

export const CONNECTIVITY_CHECK_URL = 'https://httpbin.org/ip';

/**
 * Load an echo endpoint through the transport and log what it reports,
 * which for a proxied browser is the proxy's exit IP.
 */
export async function checkConnectivity(
  transport: Transport,
  options: { url?: string; timeoutMs?: number } = {}
): Promise<string> {
  const session = await transport.open();
  try {
    const body = await fetchOk(session, options.url ?? CONNECTIVITY_CHECK_URL, options.timeoutMs ?? 30000);
    log.normal(`Proxy IP content: ${body.trim()}`);
    return body;
  } finally {
    await session.close();
  }
}
