import type { BackendType, SourceDescriptor } from '../types/source.js';
import type { CrawlSettings } from '../types/config.js';
import type { DownloadStats } from '../types/crawl.js';
import type { PageNavigator } from '../types/navigator.js';
import type { CrawlSession } from '../lib/crawl-session.js';
import type { DownloadCache } from '../lib/cache.js';
import type { ContentExtractor } from '../drivers/content-extractor.js';
import type { ContextualLogger } from '../utils/logger.js';

/**
 * Everything a strategy may touch during one crawl.
 */
export interface StrategyContext {
  readonly source: SourceDescriptor;
  readonly settings: CrawlSettings;
  readonly navigator: PageNavigator;
  readonly session: CrawlSession;
  readonly cache: DownloadCache;
  readonly extractor: ContentExtractor;
  readonly signal: AbortSignal;
  readonly log: ContextualLogger;
}

/**
 * What a finished crawl hands to the download phase. Strategies that
 * download while they crawl report `downloadStats` and leave `links` empty.
 */
export interface CrawlOutcome {
  links: string[];
  downloadStats?: DownloadStats;
}

export interface CrawlStrategy {
  readonly type: BackendType;

  /**
   * An empty page means "past the last page" rather than a broken selector,
   * so the first-page selector diagnostic is not raised.
   */
  readonly emptyPageEndsCrawl?: boolean;

  /** Keep collected links in an insertion-ordered set. */
  readonly dedupeLinks?: boolean;

  /**
   * Runs once after the seed page has loaded. Throwing here ends the crawl.
   */
  setup?: (ctx: StrategyContext) => Promise<void>;

  /**
   * Links visible on the current page. Does NOT paginate.
   */
  extractItemLinks: (ctx: StrategyContext) => Promise<string[]>;

  /**
   * Attempts to move to the next page.
   * @returns `false` when there are no further pages (a normal end, not a failure)
   */
  advanceToNextPage: (ctx: StrategyContext) => Promise<boolean>;

  /**
   * Replaces the generic extract/advance loop entirely.
   */
  run?: (ctx: StrategyContext) => Promise<CrawlOutcome>;
}

export type StrategyFactory = (source: SourceDescriptor) => CrawlStrategy;
