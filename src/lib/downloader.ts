import { ConsecutiveErrorBreaker, sleep } from './retry.js';
import { emptyDownloadStats, skippedTotal } from '../types/crawl.js';
import type { DownloadStats } from '../types/crawl.js';
import type { StrategyContext } from '../scrapers/types.js';
import { formatProgress } from '../utils/logger.js';

/**
 * Download phase for strategies that collect links: every link goes through
 * the cache, failures feed the consecutive-error breaker.
 */
export async function downloadAll(ctx: StrategyContext, links: readonly string[]): Promise<DownloadStats> {
  const { source, settings, session, cache, log } = ctx;
  const valid = links.filter(link => link.length > 0);
  if (valid.length < links.length) {
    log.warn(`Filtered out ${links.length - valid.length} empty URLs from link list`);
  }

  const stats = emptyDownloadStats(valid.length);
  const sleepBetweenMs = (source.settings.sleep_between_jobs ?? 0) * 1000;
  const breaker = new ConsecutiveErrorBreaker({
    ceiling: source.settings.max_consecutive_errors ?? settings.maxConsecutiveErrors,
    baseDelayMs: settings.backoffBaseMs,
    capMs: settings.backoffCapMs
  });

  log.verbose(`Starting download of ${valid.length} postings`);

  for (const url of valid) {
    ctx.signal.throwIfAborted();
    const result = await cache.ensureDownloaded(source.name, url, session.handledUrls);

    switch (result.status) {
      case 'alreadyCached':
        if (result.layer === 'session') {
          stats.skippedSession++;
          log.debug(`Skipped (already handled in this crawl): ${url}`);
        } else {
          stats.skippedExisting++;
          log.debug(`Skipped (cached): ${url}`);
        }
        breaker.recordSuccess();
        break;

      case 'downloaded':
        stats.processed++;
        breaker.recordSuccess();
        log.debug(`Downloaded ${formatProgress(stats.processed + skippedTotal(stats), stats.total)}: ${url}`);
        if (sleepBetweenMs > 0) {
          await sleep(sleepBetweenMs, ctx.signal);
        }
        break;

      case 'failed': {
        stats.errors++;
        log.error(`Error downloading ${url}: ${result.error.message}`);
        if (breaker.recordFailure()) {
          stats.aborted = true;
          log.error(`Stopping downloads after ${breaker.consecutiveErrors} consecutive errors`);
          return stats;
        }
        const waitMs = breaker.backoffMs();
        log.warn(`Consecutive errors: ${breaker.consecutiveErrors}, waiting ${waitMs}ms`);
        await sleep(waitMs, ctx.signal);
        break;
      }
    }
  }

  log.verbose(
    `Download complete: ${stats.processed} processed, ${skippedTotal(stats)} skipped, ${stats.errors} errors`
  );
  return stats;
}
