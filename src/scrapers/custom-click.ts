import { DownloadError, SelectorError, errorMessage } from '../core/errors.js';
import { stripQuery } from '../core/utils/url-utils.js';
import { ConsecutiveErrorBreaker, sleep } from '../lib/retry.js';
import { emptyDownloadStats } from '../types/crawl.js';
import type { SourceDescriptor } from '../types/source.js';
import type { CrawlStrategy, StrategyContext } from './types.js';
import { requireSelector, waitForLoad } from './shared.js';

/**
 * `job_123` -> `123`; ids without an underscore are used whole.
 */
export function jobIdFromButtonId(buttonId: string): string {
  const parts = buttonId.split('_');
  return parts.length > 1 ? parts[1] : buttonId;
}

/**
 * Stable URL for a posting that only exists as inline content of the list
 * page: the list URL without its query, the board's `cid`, and the job id.
 */
export function buildJobUrl(listUrl: string, jobId: string): string {
  const base = stripQuery(listUrl);
  let cid: string | null = null;
  try {
    cid = new URL(listUrl).searchParams.get('cid');
  } catch {
    cid = null;
  }
  const params = cid === null ? `jobId=${jobId}` : `cid=${cid}&jobId=${jobId}`;
  return `${base}?${params}&source=CareerSite`;
}

/**
 * Click-through boards (no pagination): every `job_button` opens a posting
 * inline, which is extracted and stored right away before returning to the
 * list through `back_button`. Download happens during the crawl, under the
 * consecutive-error breaker.
 */
export function createCustomClickStrategy(source: SourceDescriptor): CrawlStrategy {
  const jobButton = requireSelector(source, 'job_button');
  const backButton = source.selectors.back_button;
  const viewAllButton = source.selectors.view_all_button;
  const clickBack = source.settings.click_back_after_job ?? true;
  const viewAllAfterBack = source.settings.click_view_all_after_back ?? true;

  async function clickViewAll(ctx: StrategyContext): Promise<void> {
    if (!viewAllButton) return;
    const button = await ctx.navigator.current().selectOne(viewAllButton);
    if (!button) {
      ctx.log.debug(`No "view all" button (${viewAllButton})`);
      return;
    }
    await button.click();
    await waitForLoad(ctx);
    ctx.log.debug('Clicked "view all" button');
  }

  async function returnToList(ctx: StrategyContext): Promise<void> {
    if (!backButton) return;
    const button = await ctx.navigator.current().selectOne(backButton);
    if (!button) {
      throw new SelectorError(`Back button ${backButton} not found`, { source: source.name, selector: backButton });
    }
    await button.click();
    await waitForLoad(ctx);
  }

  return {
    type: 'custom_click',

    async extractItemLinks() {
      return [];
    },

    async advanceToNextPage() {
      return false;
    },

    async run(ctx) {
      const { session, cache, extractor, log } = ctx;

      try {
        await clickViewAll(ctx);
      } catch (error) {
        log.warn(`Could not click "view all" button: ${errorMessage(error)}`);
      }

      const buttons = await ctx.navigator.current().selectAll(jobButton);
      const buttonIds: string[] = [];
      for (const button of buttons) {
        const id = await button.attribute('id');
        if (id) buttonIds.push(id);
      }

      session.stats.pagesScraped = 1;
      session.stats.jobsFound = buttonIds.length;
      const stats = emptyDownloadStats(buttonIds.length);

      if (buttonIds.length === 0) {
        throw new SelectorError(`No job buttons found with selector ${jobButton}`, {
          source: source.name,
          selector: jobButton,
          pageNumber: 1
        });
      }
      log.verbose(`Found ${buttonIds.length} job buttons`);

      const breaker = new ConsecutiveErrorBreaker({
        ceiling: source.settings.max_consecutive_errors ?? ctx.settings.maxConsecutiveErrors,
        baseDelayMs: ctx.settings.backoffBaseMs,
        capMs: ctx.settings.backoffCapMs
      });

      for (const buttonId of buttonIds) {
        ctx.signal.throwIfAborted();

        const button = await ctx.navigator.current().selectOne(`[id="${buttonId}"]`);
        if (!button) {
          log.warn(`Could not find button with id ${buttonId}, skipping`);
          continue;
        }

        const jobId = jobIdFromButtonId(buttonId);
        const title = (await button.attribute('aria-label')) ?? `Job ${jobId}`;
        const jobUrl = buildJobUrl(ctx.navigator.current().url(), jobId);

        if (session.handledUrls.has(jobUrl)) {
          stats.skippedSession++;
          log.debug(`Already processed in this crawl: ${title}`);
          continue;
        }
        if (await cache.isCached(source.name, jobUrl)) {
          stats.skippedExisting++;
          session.handledUrls.add(jobUrl);
          log.debug(`Skipping already cached: ${title}`);
          continue;
        }

        try {
          await button.click();
          await waitForLoad(ctx);

          const text = extractor.extract(await ctx.navigator.current().content(), jobUrl);
          if (!text) {
            throw new DownloadError(`No readable content for ${title}`, { context: { source: source.name, url: jobUrl } });
          }
          await cache.store(source.name, jobUrl, text);
          session.handledUrls.add(jobUrl);
          stats.processed++;
          breaker.recordSuccess();
          log.verbose(`Processed ${stats.processed}: ${title}`);

          if (clickBack) {
            await returnToList(ctx);
            if (viewAllAfterBack) {
              await clickViewAll(ctx);
            }
          }
        } catch (error) {
          stats.errors++;
          session.stats.errors++;
          log.error(`Error processing job ${buttonId}: ${errorMessage(error)}`);

          if (breaker.recordFailure()) {
            log.error(`Stopping after ${breaker.consecutiveErrors} consecutive errors`);
            stats.aborted = true;
            break;
          }

          const waitMs = breaker.backoffMs();
          log.warn(`Consecutive errors: ${breaker.consecutiveErrors}, waiting ${waitMs}ms`);
          await sleep(waitMs, ctx.signal);

          try {
            await returnToList(ctx);
          } catch (backError) {
            log.debug(`Could not return to list: ${errorMessage(backError)}`);
          }
        }
      }

      log.verbose(`Processed ${stats.processed} jobs`);
      return { links: [], downloadStats: stats };
    }
  };
}
