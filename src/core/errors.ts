/**
 * Failure taxonomy for crawls.
 *
 * Item-level failures (DownloadError) are absorbed into counters and only
 * escalate through the consecutive-error breaker. Everything else ends the
 * crawl of the source it was raised for, never the run.
 */

export type FailureReason =
  | 'disabled'
  | 'configuration'
  | 'navigation_failed'
  | 'selector_missing'
  | 'download_failed'
  | 'consecutive_errors'
  | 'timeout'
  | 'interrupted'
  | 'unknown';

export interface ErrorContext {
  source?: string;
  url?: string;
  selector?: string;
  pageNumber?: number;
  attempts?: number;
  [key: string]: string | number | boolean | undefined;
}

export class CrawlError extends Error {
  readonly reason: FailureReason;
  readonly retryable: boolean;
  readonly context: ErrorContext;

  constructor(
    reason: FailureReason,
    message: string,
    options: { retryable?: boolean; context?: ErrorContext; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'CrawlError';
    this.reason = reason;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
  }
}

/** A selector or setting the variant needs is not configured. Never retried. */
export class ConfigurationError extends CrawlError {
  constructor(message: string, context: ErrorContext = {}) {
    super('configuration', message, { context });
    this.name = 'ConfigurationError';
  }
}

/** A page failed to load after every retry. Fatal for the source. */
export class NavigationError extends CrawlError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('navigation_failed', message, { ...options, retryable: true });
    this.name = 'NavigationError';
  }
}

/** An expected element never appeared. */
export class SelectorError extends CrawlError {
  constructor(message: string, context: ErrorContext = {}) {
    super('selector_missing', message, { context });
    this.name = 'SelectorError';
  }
}

/** One item could not be fetched or extracted. */
export class DownloadError extends CrawlError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('download_failed', message, { ...options, retryable: true });
    this.name = 'DownloadError';
  }
}

/** The consecutive-error breaker tripped during downloads. */
export class BreakerTrippedError extends CrawlError {
  constructor(message: string, context: ErrorContext = {}) {
    super('consecutive_errors', message, { context });
    this.name = 'BreakerTrippedError';
  }
}

/** The wall-clock budget for one source was exceeded. */
export class SchedulerTimeout extends CrawlError {
  constructor(source: string, timeoutMs: number) {
    super('timeout', `Crawl of ${source} exceeded ${timeoutMs}ms`, {
      context: { source, timeoutMs }
    });
    this.name = 'SchedulerTimeout';
  }
}

/** The whole run was cancelled, e.g. by SIGINT. */
export class RunInterrupted extends CrawlError {
  constructor(signalName = 'SIGINT') {
    super('interrupted', `Run interrupted by ${signalName}`, { context: { signal: signalName } });
    this.name = 'RunInterrupted';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function failureReasonOf(error: unknown): FailureReason {
  return error instanceof CrawlError ? error.reason : 'unknown';
}
