import { NavigationError, errorMessage } from '../core/errors.js';
import { getOrigin } from '../core/utils/url-utils.js';
import type { ContextualLogger } from '../utils/logger.js';
import type { DocumentHandle, PageNavigator } from '../types/navigator.js';

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface NavigationRetryOptions {
  maxRetries: number;
  retryDelayMs: number;
  signal?: AbortSignal;
  log?: ContextualLogger;
}

/**
 * Load a URL, retrying with a fixed delay. Exhausting the attempts raises a
 * NavigationError, which ends the crawl of the current source.
 */
export async function navigateWithRetries(
  navigator: PageNavigator,
  url: string,
  options: NavigationRetryOptions
): Promise<DocumentHandle> {
  const attempts = Math.max(1, options.maxRetries);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    options.signal?.throwIfAborted();
    try {
      options.log?.debug(`Navigation attempt ${attempt}/${attempts} to ${url}`);
      return await navigator.navigate(url);
    } catch (error) {
      lastError = error;
      options.log?.warn(`Attempt ${attempt}/${attempts}: error loading ${url}: ${errorMessage(error)}`);
      if (attempt < attempts) {
        await sleep(options.retryDelayMs, options.signal);
      }
    }
  }

  throw new NavigationError(`Failed to navigate to ${url} after ${attempts} attempts`, {
    context: { url, attempts, lastError: errorMessage(lastError) },
    cause: lastError
  });
}

export interface BreakerOptions {
  /** Consecutive failures that trip the breaker. */
  ceiling: number;
  /** Unit of the exponential backoff; 2^n of these. */
  baseDelayMs?: number;
  capMs?: number;
}

/**
 * Counts back-to-back item failures across a download phase. Any success
 * resets the count; reaching the ceiling trips it for good.
 */
export class ConsecutiveErrorBreaker {
  private consecutive = 0;
  private trippedAt?: number;
  private readonly baseDelayMs: number;
  private readonly capMs: number;

  constructor(private readonly options: BreakerOptions) {
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.capMs = options.capMs ?? 300_000;
  }

  get consecutiveErrors(): number {
    return this.consecutive;
  }

  get ceiling(): number {
    return this.options.ceiling;
  }

  get tripped(): boolean {
    return this.trippedAt !== undefined;
  }

  recordSuccess(): void {
    if (!this.tripped) {
      this.consecutive = 0;
    }
  }

  /**
   * @returns true when this failure trips the breaker
   */
  recordFailure(): boolean {
    this.consecutive += 1;
    if (this.consecutive >= this.options.ceiling && !this.tripped) {
      this.trippedAt = this.consecutive;
    }
    return this.tripped;
  }

  /** Delay before the next attempt: min(2^n units, cap). */
  backoffMs(): number {
    return Math.min(2 ** this.consecutive * this.baseDelayMs, this.capMs);
  }
}

export type ThrottleOutcome = 'success' | 'rate_limited' | 'not_found' | 'timeout' | 'error';

export function outcomeForStatus(status: number): ThrottleOutcome {
  if (status === 429) return 'rate_limited';
  if (status === 404) return 'not_found';
  if (status === 408 || status === 504) return 'timeout';
  return status >= 200 && status < 400 ? 'success' : 'error';
}

export interface OriginThrottleOptions {
  minDelayMs: number;
  maxDelayMs: number;
}

/**
 * Adaptive per-origin delay. Each origin starts at the floor, doubles on
 * 429/404/timeout up to the ceiling and drops back to the floor after a
 * single success. Other errors leave the delay where it is.
 */
export class OriginThrottle {
  private delays = new Map<string, number>();
  private lastRequest = new Map<string, number>();

  constructor(private readonly options: OriginThrottleOptions) {}

  delayFor(url: string): number {
    return this.delays.get(getOrigin(url)) ?? this.options.minDelayMs;
  }

  record(url: string, outcome: ThrottleOutcome): number {
    const origin = getOrigin(url);
    const current = this.delays.get(origin) ?? this.options.minDelayMs;
    let next = current;

    switch (outcome) {
      case 'success':
        next = this.options.minDelayMs;
        break;
      case 'rate_limited':
      case 'not_found':
      case 'timeout':
        next = Math.min(Math.max(current, 1) * 2, this.options.maxDelayMs);
        break;
      case 'error':
        break;
    }

    this.delays.set(origin, next);
    return next;
  }

  /**
   * Reserve the origin's next request slot, then wait for it. The slot is
   * taken before sleeping so concurrent callers queue behind each other.
   */
  async wait(url: string, signal?: AbortSignal): Promise<void> {
    const origin = getOrigin(url);
    const now = Date.now();
    const last = this.lastRequest.get(origin);
    const slot = last === undefined ? now : Math.max(now, last + this.delayFor(url));
    this.lastRequest.set(origin, slot);
    if (slot > now) {
      await sleep(slot - now, signal);
    }
  }
}
