import { readdir } from 'node:fs/promises';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RunInterrupted } from '../src/core/errors.js';
import { partitionByBackend } from '../src/core/partition.js';
import { CheerioContentExtractor } from '../src/drivers/content-extractor.js';
import type { DiagnosticsCollector } from '../src/drivers/diagnostics.js';
import { toScrapeResult } from '../src/engines/crawl-engine.js';
import { CrawlScheduler, createSourceCrawler, mergeRunStats, emptyRunStats } from '../src/engines/scheduler.js';
import type { SourceCrawler } from '../src/engines/scheduler.js';
import { sleep } from '../src/lib/retry.js';
import { emptyCrawlStats, emptyDownloadStats } from '../src/types/crawl.js';
import type { ScrapeResult } from '../src/types/crawl.js';
import type { BackendType, SourceDescriptor } from '../src/types/source.js';
import { FakeWeb, listingPage, postingPage } from './helpers/fake-web.js';
import { makeSource, makeTempDir, removeDir, testSettings } from './helpers/context.js';

function src(name: string, backendType: BackendType, enabled = true): SourceDescriptor {
  return makeSource({ name, url: `https://${name}.test/`, backendType, enabled });
}

function succeeded(source: SourceDescriptor, startedAt = Date.now()): ScrapeResult {
  return toScrapeResult({ source, success: true, stats: emptyCrawlStats(), downloadStats: emptyDownloadStats(), startedAt });
}

/** Crawler that takes `ms` per source and records start order. */
function timedCrawler(ms: number, started: string[] = []): SourceCrawler {
  return async (source, signal) => {
    started.push(source.name);
    const startedAt = Date.now();
    await sleep(ms, signal);
    return succeeded(source, startedAt);
  };
}

const noDiagnostics: DiagnosticsCollector = {
  async capture() {}
};

describe('partitionByBackend', () => {
  it('groups enabled sources by type in order of first appearance', () => {
    const partitions = partitionByBackend([
      src('a', 'standard'),
      src('c', 'url_pagination'),
      src('off', 'iframe', false),
      src('b', 'standard')
    ]);

    expect(partitions.map(p => [p.backendType, p.sources.map(s => s.name)])).toEqual([
      ['standard', ['a', 'b']],
      ['url_pagination', ['c']]
    ]);
  });
});

describe('CrawlScheduler', () => {
  it('runs partitions concurrently', async () => {
    const scheduler = new CrawlScheduler({ crawl: timedCrawler(100), sourceTimeoutMs: 5000 });

    const run = await scheduler.run([src('a', 'standard'), src('b', 'iframe'), src('c', 'url_pagination')]);

    expect(run.results.map(r => r.success)).toEqual([true, true, true]);
    expect(run.durationMs).toBeLessThan(250);
  });

  it('runs sources of one partition one after another', async () => {
    const started: string[] = [];
    const scheduler = new CrawlScheduler({ crawl: timedCrawler(100, started), sourceTimeoutMs: 5000 });

    const run = await scheduler.run([src('a', 'standard'), src('b', 'standard')]);

    expect(started).toEqual(['a', 'b']);
    expect(run.durationMs).toBeGreaterThanOrEqual(190);
  });

  it('returns results in input order with merged stats', async () => {
    const scheduler = new CrawlScheduler({ crawl: timedCrawler(0), sourceTimeoutMs: 5000 });

    const run = await scheduler.run([src('a', 'standard'), src('c', 'iframe'), src('b', 'standard')]);

    expect(run.results.map(r => r.source)).toEqual(['a', 'c', 'b']);
    expect(run.stats).toMatchObject({ sitesProcessed: 3, sitesFailed: 0 });
  });

  it('skips disabled sources without counting them', async () => {
    const started: string[] = [];
    const scheduler = new CrawlScheduler({ crawl: timedCrawler(0, started), sourceTimeoutMs: 5000 });

    const run = await scheduler.run([src('a', 'standard'), src('off', 'standard', false)]);

    expect(started).toEqual(['a']);
    expect(run.stats.sitesProcessed).toBe(1);
  });

  it('times out a slow source and moves on to the next', async () => {
    const aborted: string[] = [];
    const crawl: SourceCrawler = async (source, signal) => {
      if (source.name === 'slow') {
        signal.addEventListener('abort', () => aborted.push(source.name));
        // Ignores the signal on purpose; the scheduler must not wait for it
        await new Promise(() => {});
      }
      return succeeded(source);
    };
    const seen: string[] = [];
    const scheduler = new CrawlScheduler({ crawl, sourceTimeoutMs: 50, onResult: r => seen.push(r.source) });

    const run = await scheduler.run([src('slow', 'standard'), src('fast', 'standard')]);

    expect(run.results[0]).toMatchObject({
      source: 'slow',
      success: false,
      failureReason: 'timeout',
      message: 'Crawl of slow exceeded 50ms'
    });
    expect(run.results[1]).toMatchObject({ source: 'fast', success: true });
    expect(aborted).toEqual(['slow']);
    expect(seen).toEqual(['slow', 'fast']);
    expect(run.stats).toMatchObject({ sitesProcessed: 2, sitesFailed: 1 });
  });

  it('turns a throwing crawler into a failed result', async () => {
    const crawl: SourceCrawler = async () => {
      throw new Error('crawler bug');
    };
    const scheduler = new CrawlScheduler({ crawl, sourceTimeoutMs: 1000 });

    const run = await scheduler.run([src('a', 'standard')]);

    expect(run.results[0]).toMatchObject({ success: false, failureReason: 'unknown', message: 'crawler bug' });
  });

  it('stops starting sources once the run is cancelled', async () => {
    const controller = new AbortController();
    const crawl: SourceCrawler = async (source, signal) => {
      controller.abort(new RunInterrupted('SIGINT'));
      await sleep(1000, signal);
      return succeeded(source);
    };
    const scheduler = new CrawlScheduler({ crawl, sourceTimeoutMs: 5000 });

    const run = await scheduler.run([src('a', 'standard'), src('b', 'standard')], controller.signal);

    expect(run.results).toHaveLength(1);
    expect(run.results[0]).toMatchObject({ source: 'a', failureReason: 'interrupted' });
    expect(run.notStarted).toEqual(['b']);
  });

  it('merges run stats field by field', () => {
    const a = { ...emptyRunStats(), sitesProcessed: 1, jobsFound: 4 };
    const b = { ...emptyRunStats(), sitesProcessed: 2, jobsFound: 1, sitesFailed: 1 };

    expect(mergeRunStats(a, b)).toEqual({ ...emptyRunStats(), sitesProcessed: 3, jobsFound: 5, sitesFailed: 1 });
  });
});

describe('end to end', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  const X = (n: string) => `https://x.test/job/${n}`;
  const Y = (n: string) => `https://y.test/job/${n}`;
  const range = (prefix: string, from: number, to: number) =>
    Array.from({ length: to - from + 1 }, (_, i) => `${prefix}${from + i}`);

  const aPage1 = range('a', 1, 5).map(X);
  const aPage2 = range('a', 6, 10).map(X);
  const bLinks = range('b', 1, 2).map(X);
  const cLinks = range('c', 1, 3).map(Y);
  const table = (links: readonly string[]) =>
    `<table class="jobs">${links.map(link => `<tr><td><a href="${link}">${link}</a></td></tr>`).join('')}</table>`;

  const web = () => {
    const pages: Record<string, string> = {
      'https://x.test/a': listingPage(aPage1, '<a class="next" href="https://x.test/a?page=2">Next</a>'),
      'https://x.test/a?page=2': listingPage(aPage2),
      'https://x.test/b': listingPage(bLinks),
      'https://y.test/c': table(cLinks),
      'https://y.test/c?page=2': table([])
    };
    for (const link of [...aPage1, ...aPage2, ...bLinks, ...cLinks]) {
      pages[link] = postingPage(link, `Posting at ${link}`);
    }
    return new FakeWeb({ pages });
  };

  const sources = [
    makeSource({
      name: 'A',
      url: 'https://x.test/a',
      backendType: 'standard',
      selectors: { job_link: 'a.job', next_page: 'a.next' }
    }),
    makeSource({ name: 'B', url: 'https://x.test/b', backendType: 'standard', selectors: { job_link: 'a.job' } }),
    makeSource({ name: 'C', url: 'https://y.test/c', backendType: 'url_pagination', selectors: { job_table: 'table.jobs' } })
  ];

  const perSource = (results: readonly ScrapeResult[]) =>
    Object.fromEntries(results.map(r => [r.source, [r.success, r.stats.pagesScraped, r.stats.jobsFound]]));

  it('crawls every page of every source, then finds nothing new on the second run', async () => {
    const settings = testSettings(root);
    const fake = web();
    const scheduler = () =>
      new CrawlScheduler({
        crawl: createSourceCrawler({
          settings,
          navigatorFactory: fake.factory,
          extractor: new CheerioContentExtractor(),
          diagnostics: noDiagnostics,
          httpFallback: false
        }),
        sourceTimeoutMs: settings.sourceTimeoutMs
      });

    const first = await scheduler().run(sources);

    expect(perSource(first.results)).toEqual({
      A: [true, 2, 10],
      B: [true, 1, 2],
      C: [true, 1, 3]
    });
    expect(first.stats).toEqual({
      sitesProcessed: 3,
      sitesFailed: 0,
      pagesScraped: 4,
      jobsFound: 15,
      jobsDownloaded: 15,
      jobsSkipped: 0,
      downloadErrors: 0
    });
    expect(await readdir(settings.cacheDir)).toHaveLength(15);

    const second = await scheduler().run(sources);

    expect(perSource(second.results)).toEqual({
      A: [true, 1, 5],
      B: [true, 1, 2],
      C: [true, 1, 3]
    });
    expect(second.stats).toMatchObject({ sitesFailed: 0, jobsDownloaded: 0, jobsSkipped: 10 });
    expect(second.results.every(r => r.stats.earlyStopped)).toBe(true);
    expect(fake.visitCount('https://x.test/a?page=2')).toBe(1);
    expect(fake.visitCount('https://y.test/c?page=2')).toBe(1);
    expect(await readdir(settings.cacheDir)).toHaveLength(15);
  });
});
