/**
 * URL utility functions
 */

/**
 * Get origin (protocol + host) from a full URL, used to key per-origin throttles.
 * Unparseable input is returned unchanged so it still forms a stable key.
 */
export function getOrigin(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return url;
  }
}

/**
 * Resolve a possibly relative link against the page it was found on.
 * @returns the absolute URL, or null for empty/unresolvable links
 */
export function resolveUrl(href: string | null | undefined, pageUrl: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Prefix a configured base URL onto a relative link. Absolute links pass through.
 */
export function withBaseUrl(baseUrl: string | undefined, href: string): string {
  if (!baseUrl || /^https?:\/\//i.test(href)) {
    return href;
  }
  return baseUrl + href;
}

/**
 * Substitute `{base_url}` and `{page_num}` into a pagination template,
 * e.g. `{base_url}?page={page_num}`.
 */
export function fillUrlPattern(pattern: string, baseUrl: string, pageNum: number): string {
  return pattern
    .replace(/\{base_url\}/g, () => baseUrl)
    .replace(/\{page_num\}/g, () => String(pageNum));
}

/**
 * URL without its query string or fragment.
 */
export function stripQuery(url: string): string {
  return url.split(/[?#]/, 1)[0];
}
