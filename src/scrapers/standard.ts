import { errorMessage } from '../core/errors.js';
import type { SourceDescriptor } from '../types/source.js';
import type { CrawlStrategy } from './types.js';
import { hrefsOf, requireSelector, waitForItems, waitForLoad } from './shared.js';

/**
 * Selector pagination: links from `job_link` on the top-level document,
 * next page by clicking `next_page`.
 *
 * `next_page_disabled` is checked before looking for the next button so a
 * slow-rendering button is not mistaken for the last page. Once the end is
 * seen the strategy stays terminal without touching the page again.
 */
export function createStandardStrategy(source: SourceDescriptor): CrawlStrategy {
  const jobLink = requireSelector(source, 'job_link');
  const nextPage = source.selectors.next_page;
  const nextPageDisabled = source.selectors.next_page_disabled;
  let terminal = false;

  return {
    type: 'standard',

    async setup(ctx) {
      await waitForItems(ctx, ctx.navigator.current(), jobLink);
    },

    async extractItemLinks(ctx) {
      const links = await hrefsOf(await ctx.navigator.current().selectAll(jobLink));
      ctx.log.debug(`Extracted ${links.length} links using ${jobLink}`);
      return links;
    },

    async advanceToNextPage(ctx) {
      if (terminal) {
        return false;
      }
      if (!nextPage) {
        ctx.log.debug('No pagination configured for this site');
        terminal = true;
        return false;
      }

      const document = ctx.navigator.current();
      if (nextPageDisabled && (await document.selectOne(nextPageDisabled))) {
        ctx.log.verbose('Reached last page - next button is disabled');
        terminal = true;
        return false;
      }

      const button = await document.selectOne(nextPage);
      if (!button) {
        ctx.log.verbose('No next button found');
        terminal = true;
        return false;
      }

      try {
        await button.click();
      } catch (error) {
        ctx.log.error(`Error clicking next button: ${errorMessage(error)}`);
        ctx.session.stats.errors++;
        terminal = true;
        return false;
      }

      await waitForLoad(ctx);
      await waitForItems(ctx, ctx.navigator.current(), jobLink);
      return true;
    }
  };
}
