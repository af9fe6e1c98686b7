import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { downloadAll } from '../src/lib/downloader.js';
import { FakeWeb, postingPage } from './helpers/fake-web.js';
import { makeSource, makeTempDir, removeDir, strategyContext, testSettings } from './helpers/context.js';

const LIST = 'https://example.com/jobs';
const job = (n: number) => `https://example.com/job/${n}`;

describe('downloadAll', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('downloads new links and skips handled or cached ones', async () => {
    const web = new FakeWeb({
      pages: {
        [LIST]: '<p>list</p>',
        [job(2)]: postingPage('Two', 'Second posting')
      }
    });
    const source = makeSource({ name: 'acme', url: LIST, backendType: 'standard', selectors: { job_link: 'a' } });
    const { ctx } = await strategyContext(web, source, testSettings(root));
    await ctx.cache.store('acme', job(1), 'First posting');

    const stats = await downloadAll(ctx, [job(1), job(2), job(2), '', job(3)]);

    expect(stats).toEqual({
      total: 4,
      processed: 1,
      skippedSession: 1,
      skippedExisting: 1,
      errors: 1,
      aborted: false
    });
    expect(await ctx.cache.isCached('acme', job(2))).toBe(true);
    expect(web.visitCount(job(2))).toBe(1);
  });

  it('stops after the configured number of consecutive failures', async () => {
    const web = new FakeWeb({ pages: { [LIST]: '<p>list</p>' } });
    const source = makeSource({
      name: 'acme',
      url: LIST,
      backendType: 'standard',
      selectors: { job_link: 'a' },
      settings: { max_consecutive_errors: 2 }
    });
    const { ctx } = await strategyContext(web, source, testSettings(root));

    const stats = await downloadAll(ctx, [job(1), job(2), job(3), job(4)]);

    expect(stats.errors).toBe(2);
    expect(stats.aborted).toBe(true);
    expect(web.visitCount(job(3))).toBe(0);
  });

  it('keeps going when failures are interleaved with successes', async () => {
    const web = new FakeWeb({
      pages: {
        [LIST]: '<p>list</p>',
        [job(2)]: postingPage('Two', 'Body'),
        [job(4)]: postingPage('Four', 'Body')
      }
    });
    const source = makeSource({
      name: 'acme',
      url: LIST,
      backendType: 'standard',
      selectors: { job_link: 'a' },
      settings: { max_consecutive_errors: 2 }
    });
    const { ctx } = await strategyContext(web, source, testSettings(root));

    const stats = await downloadAll(ctx, [job(1), job(2), job(3), job(4), job(5)]);

    expect(stats).toMatchObject({ processed: 2, errors: 3, aborted: false });
  });
});
