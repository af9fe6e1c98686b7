import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigurationError, SelectorError } from '../src/core/errors.js';
import { runCrawl } from '../src/engines/crawl-engine.js';
import { availableTypes, createStrategy } from '../src/scrapers/index.js';
import { FakeWeb, listingPage } from './helpers/fake-web.js';
import { makeSource, makeTempDir, removeDir, strategyContext, testSettings } from './helpers/context.js';

const job = (n: number) => `https://example.com/job/${n}`;

describe('strategy registry', () => {
  it('knows all five backend types', () => {
    expect(availableTypes()).toEqual(['standard', 'iframe', 'url_pagination', 'custom_click', 'custom_navigation']);
  });

  it('rejects sources missing a required selector', () => {
    const cases = [
      makeSource({ name: 's', url: 'https://example.com', backendType: 'standard' }),
      makeSource({ name: 'i', url: 'https://example.com', backendType: 'iframe', selectors: { job_link: 'a' } }),
      makeSource({ name: 'u', url: 'https://example.com', backendType: 'url_pagination' }),
      makeSource({ name: 'c', url: 'https://example.com', backendType: 'custom_click' }),
      makeSource({
        name: 'n',
        url: 'https://example.com',
        backendType: 'custom_navigation',
        selectors: { job_link: 'a' },
        settings: { handle_cookies: true }
      })
    ];

    for (const source of cases) {
      expect(() => createStrategy(source)).toThrow(ConfigurationError);
    }
  });

  it('names the missing selector', () => {
    const source = makeSource({ name: 'acme', url: 'https://example.com', backendType: 'standard' });
    expect(() => createStrategy(source)).toThrow('standard source acme needs selectors.job_link');
  });
});

describe('standard strategy', () => {
  const LIST = 'https://example.com/jobs';
  const PAGE2 = 'https://example.com/jobs?page=2';
  const source = makeSource({
    name: 'acme',
    url: LIST,
    backendType: 'standard',
    selectors: { job_link: 'a.job', next_page: 'a.next', next_page_disabled: 'a.next.disabled' }
  });
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function web(): FakeWeb {
    return new FakeWeb({
      pages: {
        [LIST]: listingPage([job(1), job(2)], '<a class="next" href="/jobs?page=2">Next</a>'),
        [PAGE2]: listingPage([job(3)], '<a class="next disabled">Next</a>')
      }
    });
  }

  it('follows the next button until it is disabled', async () => {
    const fake = web();
    const { ctx } = await strategyContext(fake, source, testSettings(root));

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(outcome.links).toEqual([job(1), job(2), job(3)]);
    expect(ctx.session.stats).toMatchObject({ pagesScraped: 2, jobsFound: 3, newCount: 3, earlyStopped: false });
    expect(fake.visits).toEqual([LIST, PAGE2]);
  });

  it('stays terminal once the last page has been seen', async () => {
    const fake = web();
    const { ctx, navigator } = await strategyContext(fake, source, testSettings(root));
    const strategy = createStrategy(source);
    await runCrawl(strategy, ctx);
    const clicks = fake.clicks.length;

    await navigator.navigate(LIST);

    expect(await strategy.advanceToNextPage(ctx)).toBe(false);
    expect(fake.clicks.length).toBe(clicks);
  });

  it('stops early without paginating when the first page is fully cached', async () => {
    const fake = web();
    const { ctx } = await strategyContext(fake, source, testSettings(root));
    await ctx.cache.store('acme', job(1), 'one');
    await ctx.cache.store('acme', job(2), 'two');

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(outcome.links).toEqual([job(1), job(2)]);
    expect(ctx.session.stats).toMatchObject({ earlyStopped: true, newCount: 0, cachedCount: 2, pagesScraped: 1 });
    expect(fake.clicks).toEqual([]);
    expect(fake.visits).toEqual([LIST]);
  });

  it('honours the page ceiling', async () => {
    const fake = web();
    const { ctx } = await strategyContext(fake, source, testSettings(root, { maxPagesOverride: 1 }));

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(outcome.links).toEqual([job(1), job(2)]);
    expect(fake.clicks).toEqual([]);
  });

  it('fails when the first page has no items', async () => {
    const fake = new FakeWeb({ pages: { [LIST]: listingPage([]) } });
    const { ctx } = await strategyContext(fake, source, testSettings(root));

    await expect(runCrawl(createStrategy(source), ctx)).rejects.toBeInstanceOf(SelectorError);
  });

  it('ends pagination when the next button cannot be clicked', async () => {
    const fake = new FakeWeb({
      pages: { [LIST]: listingPage([job(1)], '<a class="next" data-fail-click href="/jobs?page=2">Next</a>') }
    });
    const { ctx } = await strategyContext(fake, source, testSettings(root));

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(outcome.links).toEqual([job(1)]);
    expect(ctx.session.stats.errors).toBe(1);
    expect(fake.visits).toEqual([LIST]);
  });

  it('stops when a page repeats the previous one', async () => {
    const fake = new FakeWeb({
      pages: { [LIST]: listingPage([job(1)], '<a class="next" href="/jobs">Next</a>') }
    });
    const { ctx } = await strategyContext(fake, source, testSettings(root));

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(outcome.links).toEqual([job(1)]);
    expect(ctx.session.stats.pagesScraped).toBe(1);
  });
});

describe('iframe strategy', () => {
  const LIST = 'https://example.com/careers';
  const FRAME1 = 'https://example.com/frame?p=1';
  const FRAME2 = 'https://example.com/frame?p=2';
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  const pages = {
    [LIST]: '<html><body><iframe id="jobs" src="/frame?p=1"></iframe></body></html>',
    [FRAME1]: listingPage([job(1), job(2)], '<a class="next" href="/frame?p=2">Next</a>'),
    [FRAME2]: listingPage([job(3)])
  };

  it('paginates inside the frame', async () => {
    const source = makeSource({
      name: 'embedded',
      url: LIST,
      backendType: 'iframe',
      selectors: { iframe: 'iframe#jobs', job_link: 'a.job', next_page: 'a.next' },
      settings: { frame_settle_ms: 5 }
    });
    const fake = new FakeWeb({ pages });
    const { ctx, navigator } = await strategyContext(fake, source, testSettings(root));

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(outcome.links).toEqual([job(1), job(2), job(3)]);
    expect(fake.visits).toEqual([LIST, FRAME1, FRAME2]);
    expect(navigator.current().url()).toBe(LIST);
    expect(navigator.pauses.filter(ms => ms === 5)).toHaveLength(2);
  });

  it('uses the disabled-check script when configured', async () => {
    const scripts: string[] = [];
    const source = makeSource({
      name: 'embedded',
      url: LIST,
      backendType: 'iframe',
      selectors: {
        iframe: 'iframe#jobs',
        job_link: 'a.job',
        next_page: 'a.next',
        next_page_disabled_check: "el => el.classList.contains('off')"
      },
      settings: { frame_settle_ms: 0 }
    });
    const fake = new FakeWeb({
      pages,
      evaluate: script => {
        scripts.push(script);
        return true;
      }
    });
    const { ctx } = await strategyContext(fake, source, testSettings(root));

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(outcome.links).toEqual([job(1), job(2)]);
    expect(scripts).toHaveLength(1);
    expect(scripts[0]).toContain('document.querySelector("a.next")');
    expect(scripts[0]).toContain("el => el.classList.contains('off')");
    expect(fake.clicks).toEqual([]);
  });

  it('fails when the frame cannot be entered', async () => {
    const source = makeSource({
      name: 'embedded',
      url: LIST,
      backendType: 'iframe',
      selectors: { iframe: 'iframe#missing', job_link: 'a.job' }
    });
    const fake = new FakeWeb({ pages });
    const { ctx } = await strategyContext(fake, source, testSettings(root));

    await expect(runCrawl(createStrategy(source), ctx)).rejects.toThrow('Could not enter frame iframe#missing');
  });
});

describe('url_pagination strategy', () => {
  const BASE = 'https://example.net/search';
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function table(links: string[]): string {
    const rows = links.map(link => `<tr><td><a href="${link}">Role</a></td></tr>`).join('');
    return `<html><body><a href="https://example.net/about">About</a><table class="jobs">${rows}</table></body></html>`;
  }

  it('walks page numbers until a page comes back empty', async () => {
    const source = makeSource({
      name: 'paged',
      url: BASE,
      backendType: 'url_pagination',
      selectors: { job_table: 'table.jobs', job_link: 'a' }
    });
    const fake = new FakeWeb({
      pages: {
        [BASE]: table([job(1), job(2)]),
        [`${BASE}?page=2`]: table([job(3)]),
        [`${BASE}?page=3`]: table([])
      }
    });
    const { ctx } = await strategyContext(fake, source, testSettings(root));

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(outcome.links).toEqual([job(1), job(2), job(3)]);
    expect(ctx.session.stats.pagesScraped).toBe(2);
    expect(fake.visits).toEqual([BASE, `${BASE}?page=2`, `${BASE}?page=3`]);
  });

  it('fills a custom pattern starting after start_page', async () => {
    const source = makeSource({
      name: 'paged',
      url: BASE,
      backendType: 'url_pagination',
      selectors: { job_table: 'table.jobs' },
      settings: { url_pattern: '{base_url}/p/{page_num}', start_page: 0, max_pages: 2 }
    });
    const fake = new FakeWeb({
      pages: {
        [BASE]: table([job(1)]),
        [`${BASE}/p/1`]: table([job(2)])
      }
    });
    const { ctx } = await strategyContext(fake, source, testSettings(root));

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(outcome.links).toEqual([job(1), job(2)]);
    expect(fake.visits).toEqual([BASE, `${BASE}/p/1`]);
  });
});

describe('custom_navigation strategy', () => {
  const LIST = 'https://example.io/careers';
  const PAGE2 = 'https://example.io/careers?p=2';
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  const source = makeSource({
    name: 'linked',
    url: LIST,
    backendType: 'custom_navigation',
    selectors: { job_link: 'a.job', next_page: 'a.next', cookie_modal_class: 'cookie-banner' },
    settings: { handle_cookies: true, base_url: 'https://example.io' }
  });

  it('dismisses the cookie modal and deduplicates links across pages', async () => {
    const fake = new FakeWeb({
      pages: {
        [LIST]: listingPage(
          [job(1), job(2)],
          '<div class="cookie-banner"><button class="accept-cookies">OK</button></div><a class="next" href="/careers?p=2">More</a>'
        ),
        [PAGE2]: listingPage([job(2), job(3)], '<a class="next" href="/careers?p=2">More</a>')
      }
    });
    const { ctx } = await strategyContext(fake, source, testSettings(root), { dedupe: true });

    const outcome = await runCrawl(createStrategy(source), ctx);

    expect(fake.clicks).toEqual(['accept-cookies']);
    expect(outcome.links).toEqual([job(1), job(2), job(3)]);
    expect(ctx.session.stats.jobsFound).toBe(3);
    expect(fake.visits).toEqual([LIST, PAGE2]);
  });

  it('removes the modal by script when no accept button matches', async () => {
    const scripts: string[] = [];
    const fake = new FakeWeb({
      pages: { [LIST]: listingPage([job(1)], '<div class="cookie-banner">We use cookies</div>') },
      evaluate: script => {
        scripts.push(script);
        return true;
      }
    });
    const { ctx } = await strategyContext(fake, source, testSettings(root), { dedupe: true });

    await runCrawl(createStrategy(source), ctx);

    expect(scripts).toHaveLength(1);
    expect(scripts[0]).toContain('document.querySelector(".cookie-banner")');
  });

  it('rejects an empty base_url', () => {
    const broken = makeSource({ ...source, settings: { base_url: ' ' } });
    expect(() => createStrategy(broken)).toThrow('settings.base_url for linked is empty');
  });
});
