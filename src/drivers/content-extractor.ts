import * as cheerio from 'cheerio';

/**
 * Turns raw page markup into the text stored in the cache.
 */
export interface ContentExtractor {
  /** @returns clean text, or null when the page has no readable content */
  extract(html: string, url: string): string | null;
}

const NOISE = 'script, style, noscript, iframe, svg, nav, footer, aside, form, [role="navigation"], [aria-hidden="true"], #cookie-banner, .cookie-banner';
const MAIN = 'main, article, [role="main"], .job-description, .content, #content';
const BLOCKS = 'p, li, h1, h2, h3, h4, h5, h6, tr, dt, dd, div, section, br';

/**
 * Cheerio based extractor. Keeps block structure as line breaks so postings
 * with bullet lists stay readable.
 */
export class CheerioContentExtractor implements ContentExtractor {
  extract(html: string, _url: string): string | null {
    const $ = cheerio.load(html);

    $(NOISE).remove();

    let root = $(MAIN).first();
    if (root.length === 0) {
      root = $('body');
    }
    if (root.length === 0) {
      return null;
    }

    root.find(BLOCKS).each((_, el) => {
      $(el).append('\n');
    });

    const title = $('title').first().text().trim();
    const body = root
      .text()
      .split('\n')
      .map(line => line.replace(/\s+/g, ' ').trim())
      .filter(line => line.length > 0)
      .join('\n');

    if (!body) {
      return null;
    }
    return title && !body.startsWith(title) ? `${title}\n\n${body}` : body;
  }
}
