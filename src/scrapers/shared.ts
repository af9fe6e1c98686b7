import { ConfigurationError, errorMessage } from '../core/errors.js';
import type { SourceDescriptor } from '../types/source.js';
import type { DocumentHandle, PageElement } from '../types/navigator.js';
import type { StrategyContext } from './types.js';

/**
 * Common cookie consent buttons, tried in order before falling back to
 * removing the modal from the DOM.
 */
export const COOKIE_ACCEPT_SELECTORS = [
  'button[data-action="init--explicit-consent-modal#accept"]',
  'button[aria-label*="accept" i]',
  'button:has-text("Accept")',
  'button:has-text("I agree")',
  '.accept-cookies',
  '#accept-cookies'
] as const;

const MODAL_CLOSE_WAIT_MS = 1000;

export function requireSelector(source: SourceDescriptor, key: string): string {
  const value = source.selectors[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${source.backendType} source ${source.name} needs selectors.${key}`, {
      source: source.name,
      selector: key
    });
  }
  return value;
}

/**
 * Absolute hrefs of the given elements, skipping ones without a link.
 */
export async function hrefsOf(elements: readonly PageElement[]): Promise<string[]> {
  const hrefs = await Promise.all(elements.map(element => element.href()));
  return hrefs.filter((href): href is string => typeof href === 'string' && href.length > 0);
}

export async function waitForLoad(ctx: StrategyContext): Promise<void> {
  ctx.signal.throwIfAborted();
  await ctx.navigator.pause(ctx.settings.waitForLoadMs);
}

/**
 * Wait for the listing selector to show up. Not finding it is left to the
 * extraction step to judge.
 */
export async function waitForItems(ctx: StrategyContext, document: DocumentHandle, selector: string): Promise<boolean> {
  ctx.log.debug(`Waiting for ${selector}`);
  const found = await document.waitForSelector(selector, ctx.settings.elementWaitMs);
  if (!found) {
    ctx.log.warn(`Timeout waiting for ${selector} on ${document.url()}`);
  }
  return found;
}

/**
 * Builds a script that applies a predicate (function source) to the element
 * matching `selector`. A missing element counts as disabled.
 */
export function disabledCheckScript(selector: string, predicate: string): string {
  return `(() => { const el = document.querySelector(${JSON.stringify(selector)}); if (!el) return true; const check = (${predicate}); return Boolean(check(el)); })()`;
}

function removeModalScript(modalClass: string): string {
  return `(() => { const modal = document.querySelector(${JSON.stringify(`.${modalClass}`)}); if (!modal) return false; modal.remove(); document.body.style.overflow = 'auto'; return true; })()`;
}

/**
 * Dismiss a cookie consent modal identified by its class name.
 * @returns whether the modal was found and handled
 */
export async function dismissCookieModal(ctx: StrategyContext, modalClass: string): Promise<boolean> {
  const document = ctx.navigator.current();
  const modal = await document.selectOne(`.${modalClass}`);
  if (!modal) {
    ctx.log.debug(`No cookie modal .${modalClass} present`);
    return false;
  }

  for (const selector of COOKIE_ACCEPT_SELECTORS) {
    try {
      const button = await document.selectOne(selector);
      if (button) {
        await button.click();
        await ctx.navigator.pause(MODAL_CLOSE_WAIT_MS);
        ctx.log.debug(`Accepted cookies with ${selector}`);
        return true;
      }
    } catch (error) {
      ctx.log.debug(`Cookie button ${selector} not usable: ${errorMessage(error)}`);
    }
  }

  const removed = await ctx.navigator.current().evaluate(removeModalScript(modalClass));
  ctx.log.debug(removed === true ? 'Removed cookie modal via script' : 'Cookie modal could not be removed');
  return removed === true;
}
