import { logger } from './logger.js';
import { describeError } from '../core/errors.js';

const log = logger.createContext('error-handlers');

/**
 * Install global process error handlers so a stray rejection from a closing
 * browser tab does not take a job down.
 * Call once at startup.
 */
export function installGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    const message = describeError(reason);
    if (isBrowserError(message)) {
      log.error('Unhandled browser error (non-fatal):', message);
      return;
    }

    log.error('Unhandled Promise Rejection:', reason);
    process.exitCode = 1;
  });

  process.on('uncaughtException', (err: Error, origin: string) => {
    if (isBrowserError(err.message)) {
      log.error('Uncaught browser error (non-fatal):', err.message);
      return;
    }

    // The process is in an undefined state
    log.error('FATAL: Uncaught Exception:', err);
    log.error('Origin:', origin);
    process.exit(1);
  });

  log.debug('Global error handlers installed');
}

/**
 * Exit status for the CLI: a failure recorded by the handlers above wins
 * over the job's own result
 */
export function resolveExitCode(code: number): number {
  const pending = Number(process.exitCode ?? 0);
  return pending !== 0 ? pending : code;
}

/**
 * Check if an error is related to a page, context or browser being closed
 */
export function isBrowserError(message: string | null | undefined): boolean {
  if (!message) return false;

  const lowerMessage = message.toLowerCase();
  return lowerMessage.includes('target page, context or browser has been closed') ||
         lowerMessage.includes('browser has been closed') ||
         lowerMessage.includes('context has been closed') ||
         lowerMessage.includes('target closed') ||
         lowerMessage.includes('websocket') ||
         lowerMessage.includes('disconnected') ||
         lowerMessage.includes('connection closed') ||
         lowerMessage.includes('browser is closed') ||
         lowerMessage.includes('execution context was destroyed') ||
         lowerMessage.includes('page has been closed');
}
