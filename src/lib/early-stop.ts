import type { DownloadCache } from './cache.js';
import type { SourceDescriptor } from '../types/source.js';
import type { CrawlSettings } from '../types/config.js';

export interface EarlyStopPolicy {
  enabled: boolean;
  minNewJobsPerPage: number;
  /** Hard page ceiling, independent of the cache. */
  maxPages?: number;
}

export interface PageAssessment {
  newCount: number;
  cachedCount: number;
}

export function earlyStopPolicyFor(source: SourceDescriptor, settings: Pick<CrawlSettings, 'maxPagesOverride'>): EarlyStopPolicy {
  return {
    enabled: source.settings.early_stop ?? true,
    minNewJobsPerPage: source.settings.min_new_jobs_per_page ?? 0,
    maxPages: settings.maxPagesOverride ?? source.settings.max_pages
  };
}

/**
 * Probe each of a page's links against the cache directory. Existence only;
 * nothing is fetched.
 */
export async function assessPage(
  cache: DownloadCache,
  sourceName: string,
  links: readonly string[]
): Promise<PageAssessment> {
  const hits = await Promise.all(links.map(link => cache.isCached(sourceName, link)));
  const cachedCount = hits.filter(Boolean).length;
  return { newCount: links.length - cachedCount, cachedCount };
}

export function shouldStopEarly(policy: EarlyStopPolicy, assessment: PageAssessment): boolean {
  return policy.enabled && assessment.newCount <= policy.minNewJobsPerPage;
}

export function reachedPageLimit(policy: EarlyStopPolicy, pageNumber: number): boolean {
  return policy.maxPages !== undefined && pageNumber >= policy.maxPages;
}
