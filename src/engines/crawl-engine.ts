import {
  BreakerTrippedError,
  ConfigurationError,
  CrawlError,
  SchedulerTimeout,
  SelectorError,
  errorMessage,
  failureReasonOf
} from '../core/errors.js';
import { DownloadCache } from '../lib/cache.js';
import { CrawlSession } from '../lib/crawl-session.js';
import { downloadAll } from '../lib/downloader.js';
import { assessPage, earlyStopPolicyFor, reachedPageLimit, shouldStopEarly } from '../lib/early-stop.js';
import { FetchChain, httpFetchStrategy, navigatorFetchStrategy } from '../lib/fetch-chain.js';
import type { FetchStrategy } from '../lib/fetch-chain.js';
import { navigateWithRetries } from '../lib/retry.js';
import type { OriginThrottle } from '../lib/retry.js';
import { createStrategy } from '../scrapers/index.js';
import type { CrawlOutcome, CrawlStrategy, StrategyContext } from '../scrapers/types.js';
import { emptyCrawlStats, emptyDownloadStats } from '../types/crawl.js';
import type { CrawlStats, DownloadStats, ScrapeResult } from '../types/crawl.js';
import type { CrawlSettings } from '../types/config.js';
import type { DocumentHandle, NavigatorFactory, PageNavigator } from '../types/navigator.js';
import type { SourceDescriptor } from '../types/source.js';
import type { ContentExtractor } from '../drivers/content-extractor.js';
import type { DiagnosticsCollector } from '../drivers/diagnostics.js';
import { formatTime, logger } from '../utils/logger.js';
import type { ContextualLogger } from '../utils/logger.js';

const log = logger.createContext('crawl');

export interface CrawlDependencies {
  settings: CrawlSettings;
  navigatorFactory: NavigatorFactory;
  extractor: ContentExtractor;
  diagnostics: DiagnosticsCollector;
  /** Adaptive per-origin delay for the plain HTTP fallback. */
  throttle?: OriginThrottle;
  /** Fall back to a plain HTTP GET when the browser cannot load an item. Default: true */
  httpFallback?: boolean;
  signal?: AbortSignal;
}

function sameLinks(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((link, i) => link === b[i]);
}

/**
 * Generic pagination driver: setup, then extract -> early-stop check ->
 * advance until the strategy runs out of pages, the page ceiling is hit or
 * the early-stop heuristic fires.
 */
export async function runCrawl(strategy: CrawlStrategy, ctx: StrategyContext): Promise<CrawlOutcome> {
  const { session, source } = ctx;
  const policy = earlyStopPolicyFor(source, ctx.settings);

  if (strategy.setup) {
    await strategy.setup(ctx);
  }
  if (strategy.run) {
    return strategy.run(ctx);
  }

  let previous: string[] = [];

  while (true) {
    ctx.signal.throwIfAborted();
    const page = session.pageNumber;
    ctx.log.verbose(`Scraping page ${page}...`);

    const links = await strategy.extractItemLinks(ctx);

    if (links.length === 0) {
      if (strategy.emptyPageEndsCrawl) {
        ctx.log.verbose(`No items on page ${page} - reached the end`);
        break;
      }
      if (page === 1) {
        throw new SelectorError(`No items found on the first page of ${source.name}`, {
          source: source.name,
          url: ctx.navigator.current().url(),
          pageNumber: page
        });
      }
      ctx.log.verbose(`No items on page ${page} - treating as end of results`);
      break;
    }

    if (page > 1 && sameLinks(links, previous)) {
      ctx.log.warn(`Page ${page} repeats the previous page; stopping pagination`);
      break;
    }
    previous = links;

    session.collect(links);
    const assessment = await assessPage(ctx.cache, source.name, links);
    session.stats.newCount += assessment.newCount;
    session.stats.cachedCount += assessment.cachedCount;
    ctx.log.verbose(
      `Page ${page}: ${links.length} links (${assessment.newCount} new, ${assessment.cachedCount} cached, ${session.linkCount} total)`
    );

    if (shouldStopEarly(policy, assessment)) {
      session.stats.earlyStopped = true;
      ctx.log.normal(
        `Early stop on page ${page}: ${assessment.newCount} new links <= ${policy.minNewJobsPerPage}`
      );
      break;
    }

    if (reachedPageLimit(policy, page)) {
      ctx.log.verbose(`Reached max pages (${policy.maxPages})`);
      break;
    }

    if (!(await strategy.advanceToNextPage(ctx))) {
      ctx.log.verbose('Reached last page');
      break;
    }
    session.nextPage();
  }

  return { links: session.collectedLinks() };
}

function buildFetchChain(navigator: PageNavigator, deps: CrawlDependencies, childLog: ContextualLogger): FetchChain {
  const { settings } = deps;
  const strategies: FetchStrategy[] = [
    navigatorFetchStrategy(navigator, {
      maxRetries: settings.maxRetries,
      retryDelayMs: settings.retryDelayMs,
      waitForLoadMs: settings.waitForLoadMs,
      log: childLog
    })
  ];
  if (deps.httpFallback ?? true) {
    strategies.push(
      httpFetchStrategy({
        timeoutMs: settings.pageLoadTimeoutMs,
        userAgent: settings.userAgent,
        throttle: deps.throttle
      })
    );
  }
  return new FetchChain(strategies, childLog);
}

function currentDocument(navigator: PageNavigator | undefined, sourceLog: ContextualLogger): DocumentHandle | undefined {
  if (!navigator) return undefined;
  try {
    return navigator.current();
  } catch (error) {
    sourceLog.debug(`No document to capture: ${errorMessage(error)}`);
    return undefined;
  }
}

interface ResultInput {
  source: SourceDescriptor;
  success: boolean;
  stats: CrawlStats;
  downloadStats: DownloadStats;
  startedAt: number;
  error?: unknown;
}

export function toScrapeResult(input: ResultInput): ScrapeResult {
  return Object.freeze({
    source: input.source.name,
    backendType: input.source.backendType,
    success: input.success,
    failureReason: input.success ? undefined : failureReasonOf(input.error),
    message: input.error === undefined ? undefined : errorMessage(input.error),
    stats: Object.freeze({ ...input.stats }),
    downloadStats: Object.freeze({ ...input.downloadStats }),
    durationMs: Date.now() - input.startedAt
  });
}

/**
 * Crawl one source end to end: open a navigator, load the seed page, run the
 * strategy, download what it collected. Never throws; every failure ends up
 * in the returned result.
 */
export async function crawlSource(source: SourceDescriptor, deps: CrawlDependencies): Promise<ScrapeResult> {
  const startedAt = Date.now();
  const sourceLog = log.child(source.name);
  const signal = deps.signal ?? new AbortController().signal;

  let strategy: CrawlStrategy;
  try {
    strategy = createStrategy(source);
  } catch (error) {
    sourceLog.error(`Configuration error: ${errorMessage(error)}`);
    return toScrapeResult({
      source,
      success: false,
      stats: emptyCrawlStats(),
      downloadStats: emptyDownloadStats(),
      startedAt,
      error
    });
  }

  const session = new CrawlSession({ dedupe: strategy.dedupeLinks });
  let downloadStats = emptyDownloadStats();
  let navigator: PageNavigator | undefined;

  const closeNavigator = async () => {
    if (!navigator) return;
    const current = navigator;
    navigator = undefined;
    try {
      await current.close();
    } catch (error) {
      sourceLog.debug(`Error closing navigator: ${errorMessage(error)}`);
    }
  };
  const onAbort = () => {
    void closeNavigator();
  };

  try {
    signal.throwIfAborted();
    signal.addEventListener('abort', onAbort, { once: true });

    sourceLog.verbose(`Starting ${source.backendType} crawl of ${source.url}`);
    const opened = await deps.navigatorFactory(source.name);
    navigator = opened;
    signal.throwIfAborted();

    const cache = new DownloadCache({
      cacheDir: deps.settings.cacheDir,
      fetchChain: buildFetchChain(opened, deps, sourceLog),
      extractor: deps.extractor,
      signal,
      log: sourceLog
    });

    const ctx: StrategyContext = {
      source,
      settings: deps.settings,
      navigator: opened,
      session,
      cache,
      extractor: deps.extractor,
      signal,
      log: sourceLog
    };

    await navigateWithRetries(opened, source.url, {
      maxRetries: deps.settings.maxRetries,
      retryDelayMs: deps.settings.retryDelayMs,
      signal,
      log: sourceLog
    });
    await opened.pause(deps.settings.waitForLoadMs);

    const outcome = await runCrawl(strategy, ctx);
    sourceLog.verbose(`Pages scraped: ${session.stats.pagesScraped}, links found: ${session.stats.jobsFound}`);

    downloadStats = outcome.downloadStats ?? (await downloadAll(ctx, outcome.links));

    if (downloadStats.aborted) {
      throw new BreakerTrippedError(`Downloads for ${source.name} stopped after repeated failures`, {
        source: source.name,
        errors: downloadStats.errors
      });
    }

    const result = toScrapeResult({ source, success: true, stats: session.snapshot(), downloadStats, startedAt });
    sourceLog.verbose(`Finished in ${formatTime(result.durationMs)}`);
    return result;
  } catch (caught) {
    const error: unknown = signal.aborted ? signal.reason : caught;
    session.stats.errors++;
    sourceLog.error(`Crawl failed: ${errorMessage(error)}`);

    if (!(error instanceof SchedulerTimeout) && !(error instanceof ConfigurationError) && !(error instanceof BreakerTrippedError)) {
      await deps.diagnostics.capture(
        {
          source: source.name,
          errorType: error instanceof Error ? error.name : 'Error',
          message: errorMessage(error),
          url: error instanceof CrawlError ? error.context.url : undefined,
          selector: error instanceof CrawlError ? error.context.selector : undefined,
          stack: error instanceof Error ? error.stack : undefined,
          context: error instanceof CrawlError ? error.context : undefined
        },
        currentDocument(navigator, sourceLog)
      );
    }

    return toScrapeResult({ source, success: false, stats: session.snapshot(), downloadStats, startedAt, error });
  } finally {
    signal.removeEventListener('abort', onAbort);
    await closeNavigator();
  }
}
