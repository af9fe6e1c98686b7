import { createHash, randomUUID } from 'node:crypto';
import { access, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError, DownloadError, errorMessage } from '../core/errors.js';
import { isFlatFileName } from '../types/source.js';
import type { FetchChain } from './fetch-chain.js';
import type { ContentExtractor } from '../drivers/content-extractor.js';
import type { ContextualLogger } from '../utils/logger.js';

export type EnsureResult =
  | { status: 'alreadyCached'; layer: 'session' | 'disk' }
  | { status: 'downloaded'; path: string }
  | { status: 'failed'; error: DownloadError };

export interface DownloadCacheOptions {
  cacheDir: string;
  /** Needed by ensureDownloaded; a cache used only for lookups and store() can omit it. */
  fetchChain?: FetchChain;
  extractor?: ContentExtractor;
  signal?: AbortSignal;
  log?: ContextualLogger;
}

/**
 * File name of the cache entry for an item: `{sourceName}_{sha256hex(url)}.txt`.
 */
export function cacheKey(sourceName: string, url: string): string {
  if (!url) {
    throw new Error(`Cannot derive a cache key for an empty URL (source ${sourceName})`);
  }
  if (!isFlatFileName(sourceName)) {
    throw new ConfigurationError(`Source name ${sourceName} cannot be used in a cache file name`, { source: sourceName });
  }
  const digest = createHash('sha256').update(url, 'utf8').digest('hex');
  return `${sourceName}_${digest}.txt`;
}

export function formatEntry(url: string, text: string): string {
  return `${url}\n\n${text}`;
}

/**
 * Flat, content-addressed store of downloaded items. A file's existence is
 * the only "already downloaded" signal; entries are never rewritten or
 * removed here.
 *
 * The existence check and the write are not atomic with respect to each
 * other, so two crawls of the same source running at once may both fetch an
 * item. The scheduler never runs a source twice concurrently.
 */
export class DownloadCache {
  private dirReady?: Promise<void>;

  constructor(private readonly options: DownloadCacheOptions) {}

  get cacheDir(): string {
    return this.options.cacheDir;
  }

  pathFor(sourceName: string, url: string): string {
    return path.join(this.options.cacheDir, cacheKey(sourceName, url));
  }

  async isCached(sourceName: string, url: string): Promise<boolean> {
    const entry = this.pathFor(sourceName, url);
    try {
      await access(entry);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Make sure an item is on disk. Checks the crawl's in-memory set, then the
   * cache directory, and only then fetches, extracts and writes.
   *
   * @param handled - run-scoped set of URLs already dealt with; successful
   *   downloads and disk hits are added to it
   */
  async ensureDownloaded(sourceName: string, url: string, handled?: Set<string>): Promise<EnsureResult> {
    if (handled?.has(url)) {
      return { status: 'alreadyCached', layer: 'session' };
    }

    if (await this.isCached(sourceName, url)) {
      handled?.add(url);
      return { status: 'alreadyCached', layer: 'disk' };
    }

    const { fetchChain, extractor } = this.options;
    if (!fetchChain || !extractor) {
      return {
        status: 'failed',
        error: new DownloadError('Download cache has no fetch chain or extractor', { context: { source: sourceName, url } })
      };
    }

    const fetched = await fetchChain.fetch(url, this.options.signal);
    if (!fetched.succeeded || fetched.content === undefined) {
      return {
        status: 'failed',
        error: new DownloadError(`Could not fetch ${url}: ${fetched.error?.message ?? 'no content'}`, {
          context: { source: sourceName, url, attempts: fetched.attempts },
          cause: fetched.error
        })
      };
    }

    const text = extractor.extract(fetched.content, url);
    if (!text) {
      return {
        status: 'failed',
        error: new DownloadError(`No readable content extracted from ${url}`, {
          context: { source: sourceName, url, strategy: fetched.strategy }
        })
      };
    }

    try {
      const written = await this.store(sourceName, url, text);
      handled?.add(url);
      this.options.log?.debug(`Cached ${url} via ${fetched.strategy ?? 'unknown'}`);
      return { status: 'downloaded', path: written };
    } catch (error) {
      return {
        status: 'failed',
        error: new DownloadError(`Could not write cache entry for ${url}: ${errorMessage(error)}`, {
          context: { source: sourceName, url },
          cause: error
        })
      };
    }
  }

  /**
   * Write an entry for content obtained without the fetch chain. The entry
   * is written to a temporary file first and renamed into place.
   */
  async store(sourceName: string, url: string, text: string): Promise<string> {
    await this.ensureDir();
    const target = this.pathFor(sourceName, url);
    const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await writeFile(temp, formatEntry(url, text), 'utf8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
    return target;
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = mkdir(this.options.cacheDir, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.dirReady = undefined;
          throw error;
        }
      );
    }
    return this.dirReady;
  }
}
