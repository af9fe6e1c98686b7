import { fillUrlPattern } from '../core/utils/url-utils.js';
import { navigateWithRetries } from '../lib/retry.js';
import type { SourceDescriptor } from '../types/source.js';
import type { CrawlStrategy } from './types.js';
import { hrefsOf, requireSelector, waitForItems, waitForLoad } from './shared.js';

export const DEFAULT_URL_PATTERN = '{base_url}?page={page_num}';

/**
 * URL-templated pagination: links are read from `job_table`, the next page
 * is reached by substituting the page number into `url_pattern`. There is no
 * next button, so an empty table on a fresh page marks the end.
 */
export function createUrlPaginationStrategy(source: SourceDescriptor): CrawlStrategy {
  const jobTable = requireSelector(source, 'job_table');
  const jobLink = source.selectors.job_link ?? 'a';
  const pattern = source.settings.url_pattern ?? DEFAULT_URL_PATTERN;
  const waitMin = source.settings.wait_between_pages_min ?? 0;
  const waitMax = source.settings.wait_between_pages_max ?? 0;
  let pageNum = source.settings.start_page ?? 1;

  return {
    type: 'url_pagination',
    emptyPageEndsCrawl: true,

    async setup(ctx) {
      await waitForItems(ctx, ctx.navigator.current(), jobTable);
    },

    async extractItemLinks(ctx) {
      const table = await ctx.navigator.current().selectOne(jobTable);
      if (!table) {
        ctx.log.debug(`No ${jobTable} on page ${pageNum}`);
        return [];
      }
      const links = await hrefsOf(await table.selectAll(jobLink));
      ctx.log.debug(`Extracted ${links.length} links from page ${pageNum}`);
      return links;
    },

    async advanceToNextPage(ctx) {
      pageNum += 1;
      const nextUrl = fillUrlPattern(pattern, source.url, pageNum);
      ctx.log.debug(`Navigating to page ${pageNum}: ${nextUrl}`);

      await navigateWithRetries(ctx.navigator, nextUrl, {
        maxRetries: ctx.settings.maxRetries,
        retryDelayMs: ctx.settings.retryDelayMs,
        signal: ctx.signal,
        log: ctx.log
      });
      await waitForLoad(ctx);

      if (waitMin > 0 && waitMax > 0) {
        const waitMs = Math.round((waitMin + Math.random() * Math.max(0, waitMax - waitMin)) * 1000);
        ctx.log.debug(`Waiting ${(waitMs / 1000).toFixed(1)}s before next page`);
        await ctx.navigator.pause(waitMs);
      }

      return true;
    }
  };
}
