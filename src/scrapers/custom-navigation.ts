import { ConfigurationError } from '../core/errors.js';
import { resolveUrl, withBaseUrl } from '../core/utils/url-utils.js';
import { navigateWithRetries } from '../lib/retry.js';
import type { SourceDescriptor } from '../types/source.js';
import type { CrawlStrategy } from './types.js';
import { dismissCookieModal, hrefsOf, requireSelector, waitForItems, waitForLoad } from './shared.js';

/**
 * Stateful navigation for boards that need a pre-crawl step (cookie modal)
 * and list the same posting on several pages. Links go into a set; the next
 * page is the `href` of `next_page`, prefixed with `base_url` when relative.
 */
export function createCustomNavigationStrategy(source: SourceDescriptor): CrawlStrategy {
  const jobLink = requireSelector(source, 'job_link');
  const nextPage = source.selectors.next_page;
  const baseUrl = source.settings.base_url;
  const handleCookies = source.settings.handle_cookies ?? false;
  const cookieModalClass = handleCookies ? requireSelector(source, 'cookie_modal_class') : undefined;
  const visitedPages = new Set<string>([source.url]);

  if (baseUrl !== undefined && baseUrl.trim() === '') {
    throw new ConfigurationError(`settings.base_url for ${source.name} is empty`, { source: source.name });
  }

  return {
    type: 'custom_navigation',
    dedupeLinks: true,

    async setup(ctx) {
      if (cookieModalClass) {
        ctx.log.debug(`Handling cookie consent for modal: ${cookieModalClass}`);
        await dismissCookieModal(ctx, cookieModalClass);
        await ctx.navigator.pause(1000);
      }
      await waitForItems(ctx, ctx.navigator.current(), jobLink);
    },

    async extractItemLinks(ctx) {
      const links = await hrefsOf(await ctx.navigator.current().selectAll(jobLink));
      ctx.log.debug(`Extracted ${links.length} links (unique so far: ${ctx.session.linkCount})`);
      return links;
    },

    async advanceToNextPage(ctx) {
      if (!nextPage) {
        ctx.log.debug('No pagination configured');
        return false;
      }

      const document = ctx.navigator.current();
      const button = await document.selectOne(nextPage);
      if (!button) {
        ctx.log.verbose('No next page link found');
        return false;
      }

      const href = await button.attribute('href');
      if (!href) {
        ctx.log.verbose('Next page link has no href');
        return false;
      }

      const nextUrl = baseUrl ? withBaseUrl(baseUrl, href) : resolveUrl(href, document.url());
      if (!nextUrl) {
        ctx.log.warn(`Could not resolve next page link ${href}`);
        return false;
      }
      if (visitedPages.has(nextUrl)) {
        ctx.log.verbose(`Next page ${nextUrl} was already visited`);
        return false;
      }
      visitedPages.add(nextUrl);

      ctx.log.debug(`Navigating to next page: ${nextUrl}`);
      await navigateWithRetries(ctx.navigator, nextUrl, {
        maxRetries: ctx.settings.maxRetries,
        retryDelayMs: ctx.settings.retryDelayMs,
        signal: ctx.signal,
        log: ctx.log
      });
      await waitForLoad(ctx);
      return true;
    }
  };
}
