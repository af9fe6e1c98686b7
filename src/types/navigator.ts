/**
 * Contract for the page automation layer. The crawl engine only talks to
 * pages through these interfaces; `drivers/playwright-navigator.ts` is the
 * production implementation.
 */

export interface PageElement {
  attribute(name: string): Promise<string | null>;
  /** Absolute link target, resolved the way the DOM resolves `a.href`. */
  href(): Promise<string | null>;
  text(): Promise<string>;
  click(): Promise<void>;
  /** Descendants of this element matching the selector. */
  selectAll(selector: string): Promise<PageElement[]>;
}

/**
 * A document the crawler can query: the top-level page or a nested frame.
 */
export interface DocumentHandle {
  readonly kind: 'page' | 'frame';
  url(): string;
  selectOne(selector: string): Promise<PageElement | null>;
  selectAll(selector: string): Promise<PageElement[]>;
  evaluate(script: string): Promise<unknown>;
  content(): Promise<string>;
  /** Polls until the selector matches or the timeout elapses. */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  enterFrame(selector: string): Promise<DocumentHandle | null>;
}

export interface PageNavigator {
  /** Loads the URL in the top-level page. Rejects when the page fails to load. */
  navigate(url: string): Promise<DocumentHandle>;
  current(): DocumentHandle;
  pause(ms: number): Promise<void>;
  close(): Promise<void>;
}

export type NavigatorFactory = (sourceName: string) => Promise<PageNavigator>;
