import { errorMessage } from '../core/errors.js';
import { navigateWithRetries, outcomeForStatus } from './retry.js';
import type { OriginThrottle } from './retry.js';
import type { PageNavigator } from '../types/navigator.js';
import type { ContextualLogger } from '../utils/logger.js';

export interface FetchResult {
  succeeded: boolean;
  content?: string;
  error?: Error;
}

/**
 * One way of getting a page's markup. Strategies report failure in the
 * result instead of throwing so the chain can move on.
 */
export interface FetchStrategy {
  readonly name: string;
  fetch(url: string, signal?: AbortSignal): Promise<FetchResult>;
}

export interface ChainResult extends FetchResult {
  /** Name of the strategy that produced the content. */
  strategy?: string;
  attempts: number;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Ordered fallback list: the first strategy that succeeds wins.
 */
export class FetchChain {
  constructor(
    private readonly strategies: readonly FetchStrategy[],
    private readonly log?: ContextualLogger
  ) {}

  get names(): string[] {
    return this.strategies.map(strategy => strategy.name);
  }

  async fetch(url: string, signal?: AbortSignal): Promise<ChainResult> {
    const failures: string[] = [];
    let attempts = 0;

    for (const strategy of this.strategies) {
      signal?.throwIfAborted();
      attempts++;
      let result: FetchResult;
      try {
        result = await strategy.fetch(url, signal);
      } catch (error) {
        result = { succeeded: false, error: toError(error) };
      }

      if (result.succeeded) {
        return { ...result, strategy: strategy.name, attempts };
      }

      const reason = result.error?.message ?? 'no content';
      failures.push(`${strategy.name}: ${reason}`);
      this.log?.debug(`Fetch strategy ${strategy.name} failed for ${url}: ${reason}`);
    }

    return {
      succeeded: false,
      attempts,
      error: new Error(failures.length > 0 ? failures.join('; ') : 'No fetch strategies configured')
    };
  }
}

export interface NavigatorFetchOptions {
  maxRetries: number;
  retryDelayMs: number;
  waitForLoadMs: number;
  log?: ContextualLogger;
}

/**
 * Load the item in the crawl's own browser page.
 */
export function navigatorFetchStrategy(navigator: PageNavigator, options: NavigatorFetchOptions): FetchStrategy {
  return {
    name: 'navigator',
    async fetch(url, signal) {
      try {
        const document = await navigateWithRetries(navigator, url, { ...options, signal });
        await navigator.pause(options.waitForLoadMs);
        return { succeeded: true, content: await document.content() };
      } catch (error) {
        return { succeeded: false, error: toError(error) };
      }
    }
  };
}

export interface HttpFetchOptions {
  timeoutMs: number;
  userAgent?: string;
  throttle?: OriginThrottle;
}

/**
 * Plain HTTP GET. Feeds every response status into the origin throttle.
 */
export function httpFetchStrategy(options: HttpFetchOptions): FetchStrategy {
  return {
    name: 'http',
    async fetch(url, signal) {
      await options.throttle?.wait(url, signal);

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeoutMs);
      const forwardAbort = () => controller.abort();
      signal?.addEventListener('abort', forwardAbort, { once: true });

      const headers: Record<string, string> = { Accept: 'text/html,application/xhtml+xml' };
      if (options.userAgent) {
        headers['User-Agent'] = options.userAgent;
      }

      try {
        const response = await fetch(url, { headers, signal: controller.signal, redirect: 'follow' });
        options.throttle?.record(url, outcomeForStatus(response.status));
        if (!response.ok) {
          return { succeeded: false, error: new Error(`HTTP ${response.status} ${response.statusText}`.trim()) };
        }
        return { succeeded: true, content: await response.text() };
      } catch (error) {
        options.throttle?.record(url, timedOut ? 'timeout' : 'error');
        return {
          succeeded: false,
          error: timedOut ? new Error(`Timed out after ${options.timeoutMs}ms`) : new Error(errorMessage(error))
        };
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', forwardAbort);
      }
    }
  };
}
