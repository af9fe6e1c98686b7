import { chromium } from 'playwright';
import type { Browser, BrowserContext, ElementHandle, Frame, Page } from 'playwright';
import { errorMessage } from '../core/errors.js';
import type { DocumentHandle, NavigatorFactory, PageElement, PageNavigator } from '../types/navigator.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('browser');

export interface PlaywrightNavigatorOptions {
  headless?: boolean;
  userAgent?: string;
  pageLoadTimeoutMs: number;
  /** Block image downloads. Default: true */
  blockImages?: boolean;
}

class PlaywrightElement implements PageElement {
  constructor(private readonly handle: ElementHandle<Element>) {}

  attribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  href(): Promise<string | null> {
    return this.handle.evaluate(el => {
      const raw = el.getAttribute('href');
      if (!raw) return null;
      try {
        return new URL(raw, document.baseURI).toString();
      } catch {
        return null;
      }
    });
  }

  async text(): Promise<string> {
    return (await this.handle.textContent()) ?? '';
  }

  click(): Promise<void> {
    return this.handle.click();
  }

  async selectAll(selector: string): Promise<PageElement[]> {
    const handles = await this.handle.$$(selector);
    return handles.map(handle => new PlaywrightElement(handle));
  }
}

class PlaywrightDocument implements DocumentHandle {
  constructor(
    private readonly target: Page | Frame,
    readonly kind: 'page' | 'frame'
  ) {}

  url(): string {
    return this.target.url();
  }

  async selectOne(selector: string): Promise<PageElement | null> {
    const handle = await this.target.$(selector);
    return handle ? new PlaywrightElement(handle) : null;
  }

  async selectAll(selector: string): Promise<PageElement[]> {
    const handles = await this.target.$$(selector);
    return handles.map(handle => new PlaywrightElement(handle));
  }

  evaluate(script: string): Promise<unknown> {
    return this.target.evaluate<unknown>(script);
  }

  content(): Promise<string> {
    return this.target.content();
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.target.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
      return true;
    } catch (error) {
      log.debug(`waitForSelector(${selector}) gave up: ${errorMessage(error)}`);
      return false;
    }
  }

  async enterFrame(selector: string): Promise<DocumentHandle | null> {
    const element = await this.target.$(selector);
    const frame = await element?.contentFrame();
    return frame ? new PlaywrightDocument(frame, 'frame') : null;
  }
}

/**
 * One browser context and page per crawl.
 */
class PlaywrightNavigator implements PageNavigator {
  private readonly document: PlaywrightDocument;
  private closed = false;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: PlaywrightNavigatorOptions
  ) {
    this.document = new PlaywrightDocument(page, 'page');
  }

  async navigate(url: string): Promise<DocumentHandle> {
    const response = await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.options.pageLoadTimeoutMs
    });
    if (response && response.status() >= 400) {
      throw new Error(`HTTP ${response.status()} loading ${url}`);
    }
    return this.document;
  }

  current(): DocumentHandle {
    return this.document;
  }

  pause(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.context.close();
  }
}

export interface PlaywrightNavigatorPool {
  factory: NavigatorFactory;
  close(): Promise<void>;
}

/**
 * Launch a local Chromium and hand out an isolated navigator per source.
 */
export async function launchPlaywrightNavigators(options: PlaywrightNavigatorOptions): Promise<PlaywrightNavigatorPool> {
  const browser: Browser = await chromium.launch({ headless: options.headless ?? true });
  const blockImages = options.blockImages ?? true;

  let closing = false;

  browser.on('disconnected', () => {
    if (!closing) {
      log.error('Local browser disconnected');
    }
  });

  const factory: NavigatorFactory = async sourceName => {
    const context = await browser.newContext({ userAgent: options.userAgent });
    context.setDefaultTimeout(options.pageLoadTimeoutMs);
    if (blockImages) {
      await context.route('**/*', route =>
        route.request().resourceType() === 'image' ? route.abort() : route.continue()
      );
    }
    const page = await context.newPage();
    log.debug(`Opened browser context for ${sourceName}`);
    return new PlaywrightNavigator(context, page, options);
  };

  return {
    factory,
    async close() {
      closing = true;
      await browser.close();
    }
  };
}
