import { describe, it, expect } from 'vitest';
import {
  fillUrlPattern,
  getOrigin,
  resolveUrl,
  stripQuery,
  withBaseUrl
} from '../src/core/utils/url-utils.js';

describe('url-utils', () => {
  it('keys origins by protocol and host', () => {
    expect(getOrigin('https://jobs.example.com:8443/a/b?c=1')).toBe('https://jobs.example.com:8443');
    expect(getOrigin('not a url')).toBe('not a url');
  });

  it('resolves relative links against the page', () => {
    expect(resolveUrl('/job/7', 'https://example.com/list?page=1')).toBe('https://example.com/job/7');
    expect(resolveUrl('job/7', 'https://example.com/list/')).toBe('https://example.com/list/job/7');
    expect(resolveUrl('', 'https://example.com/')).toBeNull();
    expect(resolveUrl(null, 'https://example.com/')).toBeNull();
  });

  it('prefixes base_url onto relative links only', () => {
    expect(withBaseUrl('https://example.io', '/careers?p=2')).toBe('https://example.io/careers?p=2');
    expect(withBaseUrl('https://example.io', 'https://other.io/x')).toBe('https://other.io/x');
    expect(withBaseUrl(undefined, '/x')).toBe('/x');
  });

  it('fills pagination templates', () => {
    expect(fillUrlPattern('{base_url}?page={page_num}', 'https://example.net/search', 3)).toBe(
      'https://example.net/search?page=3'
    );
    expect(fillUrlPattern('{base_url}/p/{page_num}/{page_num}', 'https://x.test', 2)).toBe('https://x.test/p/2/2');
  });

  it('inserts the base URL literally', () => {
    expect(fillUrlPattern('{base_url}&page={page_num}', 'https://x.test/s?q=$&x=$1', 4)).toBe('https://x.test/s?q=$&x=$1&page=4');
  });

  it('strips query and fragment', () => {
    expect(stripQuery('https://c.test/list?cid=42#top')).toBe('https://c.test/list');
    expect(stripQuery('https://c.test/list#top')).toBe('https://c.test/list');
    expect(stripQuery('https://c.test/list')).toBe('https://c.test/list');
  });
});
