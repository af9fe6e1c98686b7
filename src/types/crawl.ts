import type { FailureReason } from '../core/errors.js';

export interface CrawlStats {
  pagesScraped: number;
  jobsFound: number;
  newCount: number;
  cachedCount: number;
  earlyStopped: boolean;
  errors: number;
}

export interface DownloadStats {
  total: number;
  processed: number;
  skippedSession: number;
  skippedExisting: number;
  errors: number;
  /** Set when the consecutive-error breaker stopped the download phase. */
  aborted: boolean;
}

export interface ScrapeResult {
  readonly source: string;
  readonly backendType: string;
  readonly success: boolean;
  readonly failureReason?: FailureReason;
  readonly message?: string;
  readonly stats: Readonly<CrawlStats>;
  readonly downloadStats: Readonly<DownloadStats>;
  readonly durationMs: number;
}

export function emptyCrawlStats(): CrawlStats {
  return {
    pagesScraped: 0,
    jobsFound: 0,
    newCount: 0,
    cachedCount: 0,
    earlyStopped: false,
    errors: 0
  };
}

export function emptyDownloadStats(total = 0): DownloadStats {
  return {
    total,
    processed: 0,
    skippedSession: 0,
    skippedExisting: 0,
    errors: 0,
    aborted: false
  };
}

export function skippedTotal(stats: DownloadStats): number {
  return stats.skippedSession + stats.skippedExisting;
}
