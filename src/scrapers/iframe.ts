import { SelectorError, errorMessage } from '../core/errors.js';
import type { SourceDescriptor } from '../types/source.js';
import type { DocumentHandle } from '../types/navigator.js';
import type { CrawlStrategy } from './types.js';
import { disabledCheckScript, hrefsOf, requireSelector, waitForItems } from './shared.js';

const DEFAULT_FRAME_SETTLE_MS = 2000;

/**
 * Nested-context pagination. Same mechanics as the standard strategy, but
 * extraction and the next button live inside the frame named by `iframe`.
 * Entering the frame is part of setup and a failure there ends the crawl.
 */
export function createIframeStrategy(source: SourceDescriptor): CrawlStrategy {
  const frameSelector = requireSelector(source, 'iframe');
  const jobLink = requireSelector(source, 'job_link');
  const nextPage = source.selectors.next_page;
  const nextPageDisabled = source.selectors.next_page_disabled;
  const disabledCheck = source.selectors.next_page_disabled_check;
  const settleMs = source.settings.frame_settle_ms ?? DEFAULT_FRAME_SETTLE_MS;
  let frame: DocumentHandle | null = null;
  let terminal = false;

  function requireFrame(): DocumentHandle {
    if (!frame) {
      throw new SelectorError(`Frame ${frameSelector} has not been entered`, { source: source.name, selector: frameSelector });
    }
    return frame;
  }

  return {
    type: 'iframe',

    async setup(ctx) {
      const page = ctx.navigator.current();
      await waitForItems(ctx, page, frameSelector);
      frame = await page.enterFrame(frameSelector);
      if (!frame) {
        throw new SelectorError(`Could not enter frame ${frameSelector}`, {
          source: source.name,
          selector: frameSelector,
          url: page.url(),
          pageNumber: ctx.session.pageNumber
        });
      }
      ctx.log.verbose(`Entered frame ${frameSelector}`);
      await ctx.navigator.pause(settleMs);
      await waitForItems(ctx, frame, jobLink);
    },

    async extractItemLinks(ctx) {
      const links = await hrefsOf(await requireFrame().selectAll(jobLink));
      ctx.log.debug(`Extracted ${links.length} links from frame`);
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

      const document = requireFrame();

      if (disabledCheck) {
        const disabled = await document.evaluate(disabledCheckScript(nextPage, disabledCheck));
        if (disabled === true) {
          ctx.log.verbose('Reached last page - next button is disabled or not found');
          terminal = true;
          return false;
        }
      } else if (nextPageDisabled && (await document.selectOne(nextPageDisabled))) {
        ctx.log.verbose('Reached last page - next button is disabled');
        terminal = true;
        return false;
      }

      const button = await document.selectOne(nextPage);
      if (!button) {
        ctx.log.verbose('No next button found in frame');
        terminal = true;
        return false;
      }

      try {
        await button.click();
      } catch (error) {
        ctx.log.error(`Error clicking next button in frame: ${errorMessage(error)}`);
        ctx.session.stats.errors++;
        terminal = true;
        return false;
      }

      ctx.signal.throwIfAborted();
      await ctx.navigator.pause(settleMs);
      return true;
    }
  };
}
