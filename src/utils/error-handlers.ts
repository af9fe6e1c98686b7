import { errorMessage } from '../core/errors.js';
import { logger } from './logger.js';

const log = logger.createContext('error-handlers');

let installed = false;

/**
 * Install global process error handlers so a browser that disappears
 * mid-crawl does not take the whole run down.
 * Safe to call more than once.
 */
export function installGlobalErrorHandlers(): void {
  if (installed) return;
  installed = true;

  process.on('unhandledRejection', (reason: unknown) => {
    const message = errorMessage(reason);
    if (isBrowserError(message)) {
      log.warn(`Unhandled browser error (non-fatal): ${message}`);
      return;
    }
    log.error(`Unhandled promise rejection: ${message}`);
  });

  process.on('uncaughtException', (err: Error, origin: string) => {
    if (isBrowserError(err.message)) {
      log.warn(`Uncaught browser error (non-fatal): ${err.message}`);
      return;
    }
    // The process is in an undefined state
    log.error(`FATAL: uncaught exception (${origin}): ${err.message}`, err.stack);
    process.exit(1);
  });

  log.debug('Global error handlers installed');
}

/**
 * Check if an error is related to the browser, context or page being closed.
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
