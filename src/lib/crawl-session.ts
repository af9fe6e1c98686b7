import { emptyCrawlStats } from '../types/crawl.js';
import type { CrawlStats } from '../types/crawl.js';

export interface CrawlSessionOptions {
  /** Accumulate links in an insertion-ordered set instead of a list. */
  dedupe?: boolean;
}

/**
 * Mutable state of one crawl. Created by the engine for a single source and
 * dropped when the crawl returns.
 *
 * `handledUrls` is the run-scoped layer of processed-URL tracking; the durable
 * layer is the cache directory itself.
 */
export class CrawlSession {
  readonly stats: CrawlStats = emptyCrawlStats();
  readonly handledUrls = new Set<string>();
  private page = 1;
  private readonly links: string[] | Set<string>;

  constructor(options: CrawlSessionOptions = {}) {
    this.links = options.dedupe ? new Set<string>() : [];
  }

  get pageNumber(): number {
    return this.page;
  }

  get dedupes(): boolean {
    return this.links instanceof Set;
  }

  nextPage(): number {
    this.page += 1;
    return this.page;
  }

  /**
   * Record one page worth of extracted links. Returns how many were appended
   * (fewer than given when deduplicating).
   */
  collect(pageLinks: readonly string[]): number {
    const before = this.linkCount;
    if (this.links instanceof Set) {
      for (const link of pageLinks) {
        this.links.add(link);
      }
    } else {
      this.links.push(...pageLinks);
    }
    this.stats.pagesScraped = this.page;
    this.stats.jobsFound = this.linkCount;
    return this.linkCount - before;
  }

  get linkCount(): number {
    return this.links instanceof Set ? this.links.size : this.links.length;
  }

  collectedLinks(): string[] {
    return [...this.links];
  }

  snapshot(): CrawlStats {
    return { ...this.stats };
  }
}
