import { SchedulerTimeout, errorMessage } from '../core/errors.js';
import { partitionByBackend } from '../core/partition.js';
import type { BackendPartition } from '../core/partition.js';
import { emptyCrawlStats, emptyDownloadStats, skippedTotal } from '../types/crawl.js';
import type { ScrapeResult } from '../types/crawl.js';
import type { SourceDescriptor } from '../types/source.js';
import { crawlSource, toScrapeResult } from './crawl-engine.js';
import type { CrawlDependencies } from './crawl-engine.js';
import { formatTime, logger } from '../utils/logger.js';

const log = logger.createContext('scheduler');

export interface RunStats {
  sitesProcessed: number;
  sitesFailed: number;
  pagesScraped: number;
  jobsFound: number;
  jobsDownloaded: number;
  jobsSkipped: number;
  downloadErrors: number;
}

export function emptyRunStats(): RunStats {
  return {
    sitesProcessed: 0,
    sitesFailed: 0,
    pagesScraped: 0,
    jobsFound: 0,
    jobsDownloaded: 0,
    jobsSkipped: 0,
    downloadErrors: 0
  };
}

export function statsOf(result: ScrapeResult): RunStats {
  return {
    sitesProcessed: 1,
    sitesFailed: result.success ? 0 : 1,
    pagesScraped: result.stats.pagesScraped,
    jobsFound: result.stats.jobsFound,
    jobsDownloaded: result.downloadStats.processed,
    jobsSkipped: skippedTotal(result.downloadStats),
    downloadErrors: result.downloadStats.errors
  };
}

export function mergeRunStats(a: RunStats, b: RunStats): RunStats {
  return {
    sitesProcessed: a.sitesProcessed + b.sitesProcessed,
    sitesFailed: a.sitesFailed + b.sitesFailed,
    pagesScraped: a.pagesScraped + b.pagesScraped,
    jobsFound: a.jobsFound + b.jobsFound,
    jobsDownloaded: a.jobsDownloaded + b.jobsDownloaded,
    jobsSkipped: a.jobsSkipped + b.jobsSkipped,
    downloadErrors: a.downloadErrors + b.downloadErrors
  };
}

/**
 * Crawls one source. Must honour the signal and is expected not to throw.
 */
export type SourceCrawler = (source: SourceDescriptor, signal: AbortSignal) => Promise<ScrapeResult>;

export function createSourceCrawler(deps: Omit<CrawlDependencies, 'signal'>): SourceCrawler {
  return (source, signal) => crawlSource(source, { ...deps, signal });
}

export interface SchedulerOptions {
  crawl: SourceCrawler;
  /** Wall-clock budget per source. */
  sourceTimeoutMs: number;
  onResult?: (result: ScrapeResult) => void;
}

export interface SchedulerRun {
  results: ScrapeResult[];
  stats: RunStats;
  /** Enabled sources never started because the run was cancelled. */
  notStarted: string[];
  durationMs: number;
}

interface PartitionRun {
  results: ScrapeResult[];
  stats: RunStats;
  notStarted: string[];
}

/**
 * Runs one worker per backend partition concurrently; sources inside a
 * partition run one after another, each under its own timeout. A failed or
 * timed-out source never stops its worker.
 */
export class CrawlScheduler {
  constructor(private readonly options: SchedulerOptions) {}

  /**
   * @param signal - cancels the whole run: the running crawl of every
   *   partition is aborted and nothing further is started
   */
  async run(sources: readonly SourceDescriptor[], signal?: AbortSignal): Promise<SchedulerRun> {
    const startedAt = Date.now();
    const partitions = partitionByBackend(sources);

    for (const source of sources) {
      if (!source.enabled) {
        logger.skip(source.name, 'disabled');
      }
    }

    log.normal(
      `Running ${partitions.reduce((n, p) => n + p.sources.length, 0)} sources in ${partitions.length} partitions ` +
        `(${partitions.map(p => `${p.backendType}: ${p.sources.length}`).join(', ')})`
    );

    const partitionRuns = await Promise.all(partitions.map(partition => this.runPartition(partition, signal)));

    const order = new Map(sources.map((source, index) => [source.name, index]));
    const results = partitionRuns
      .flatMap(run => run.results)
      .sort((a, b) => (order.get(a.source) ?? 0) - (order.get(b.source) ?? 0));

    return {
      results,
      stats: partitionRuns.map(run => run.stats).reduce(mergeRunStats, emptyRunStats()),
      notStarted: partitionRuns.flatMap(run => run.notStarted),
      durationMs: Date.now() - startedAt
    };
  }

  private async runPartition(partition: BackendPartition, signal?: AbortSignal): Promise<PartitionRun> {
    const partitionLog = log.child(partition.backendType);
    const results: ScrapeResult[] = [];
    const notStarted: string[] = [];

    for (const source of partition.sources) {
      if (signal?.aborted) {
        notStarted.push(source.name);
        continue;
      }

      logger.processing(source.name, `${partition.backendType} crawl started`);
      const result = await this.runWithTimeout(source, signal);
      results.push(result);

      if (result.success) {
        logger.success(
          source.name,
          `${result.stats.pagesScraped} pages, ${result.stats.jobsFound} found, ` +
            `${result.downloadStats.processed} downloaded, ${skippedTotal(result.downloadStats)} skipped ` +
            `(${formatTime(result.durationMs)})`
        );
      } else {
        logger.failure(source.name, `${result.failureReason ?? 'unknown'}: ${result.message ?? ''}`);
      }
      this.options.onResult?.(result);
    }

    partitionLog.debug(`Partition finished: ${results.length} crawled, ${notStarted.length} not started`);
    return {
      results,
      stats: results.map(statsOf).reduce(mergeRunStats, emptyRunStats()),
      notStarted
    };
  }

  /**
   * Run one crawl, aborting it when its budget runs out or the run is
   * cancelled. Returns as soon as the abort fires, even if the crawl is slow
   * to notice.
   */
  private async runWithTimeout(source: SourceDescriptor, runSignal?: AbortSignal): Promise<ScrapeResult> {
    const startedAt = Date.now();
    const controller = new AbortController();
    const timeoutMs = this.options.sourceTimeoutMs;

    const timer = setTimeout(() => controller.abort(new SchedulerTimeout(source.name, timeoutMs)), timeoutMs);
    const forwardCancel = () => controller.abort(runSignal?.reason);
    runSignal?.addEventListener('abort', forwardCancel, { once: true });

    let removeAbortListener = () => {};
    const aborted = new Promise<never>((_, reject) => {
      const onAbort = () => reject(controller.signal.reason);
      controller.signal.addEventListener('abort', onAbort, { once: true });
      removeAbortListener = () => controller.signal.removeEventListener('abort', onAbort);
    });

    try {
      return await Promise.race([this.options.crawl(source, controller.signal), aborted]);
    } catch (error) {
      log.error(`${source.name}: ${errorMessage(error)}`);
      return toScrapeResult({
        source,
        success: false,
        stats: emptyCrawlStats(),
        downloadStats: emptyDownloadStats(),
        startedAt,
        error
      });
    } finally {
      clearTimeout(timer);
      removeAbortListener();
      runSignal?.removeEventListener('abort', forwardCancel);
    }
  }
}
