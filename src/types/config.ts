import { z } from 'zod';
import { JobBoardGroupSchema } from './source.js';

export const CrawlConfigSchema = z.object({
  paths: z.object({
    cache_dir: z.string().default('cache'),
    logs_dir: z.string().default('logs'),
  }).default({}),
  browser: z.object({
    headless: z.boolean().default(true),
    user_agent: z.string().optional(),
    timeouts: z.object({
      page_load_ms: z.number().int().positive().default(20000),
      wait_for_load_ms: z.number().int().nonnegative().default(2000),
      element_wait_ms: z.number().int().positive().default(20000),
      element_poll_ms: z.number().int().positive().default(500),
    }).default({}),
    retries: z.object({
      max_retries: z.number().int().positive().default(3),
      retry_delay_ms: z.number().int().nonnegative().default(5000),
      max_consecutive_errors: z.number().int().positive().default(8),
      backoff_base_ms: z.number().int().nonnegative().default(1000),
      backoff_cap_seconds: z.number().positive().default(300),
    }).default({}),
  }).default({}),
  scheduler: z.object({
    source_timeout_seconds: z.number().positive().default(1800),
  }).default({}),
  throttle: z.object({
    min_delay_ms: z.number().int().nonnegative().default(1000),
    max_delay_ms: z.number().int().positive().default(60000),
  }).default({}),
  job_boards: z.array(JobBoardGroupSchema).default([]),
});

export type CrawlConfig = z.infer<typeof CrawlConfigSchema>;

/**
 * Runtime tunables threaded from the loaded config down to every crawl.
 * Times are in milliseconds.
 */
export interface CrawlSettings {
  cacheDir: string;
  logsDir: string;
  headless: boolean;
  userAgent?: string;
  pageLoadTimeoutMs: number;
  waitForLoadMs: number;
  elementWaitMs: number;
  elementPollMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxConsecutiveErrors: number;
  /** Unit of the 2^n breaker backoff. */
  backoffBaseMs: number;
  backoffCapMs: number;
  sourceTimeoutMs: number;
  throttleMinDelayMs: number;
  throttleMaxDelayMs: number;
  maxPagesOverride?: number;
}

export function toCrawlSettings(config: CrawlConfig): CrawlSettings {
  const { paths, browser, scheduler, throttle } = config;
  return {
    cacheDir: paths.cache_dir,
    logsDir: paths.logs_dir,
    headless: browser.headless,
    userAgent: browser.user_agent,
    pageLoadTimeoutMs: browser.timeouts.page_load_ms,
    waitForLoadMs: browser.timeouts.wait_for_load_ms,
    elementWaitMs: browser.timeouts.element_wait_ms,
    elementPollMs: browser.timeouts.element_poll_ms,
    maxRetries: browser.retries.max_retries,
    retryDelayMs: browser.retries.retry_delay_ms,
    maxConsecutiveErrors: browser.retries.max_consecutive_errors,
    backoffBaseMs: browser.retries.backoff_base_ms,
    backoffCapMs: browser.retries.backoff_cap_seconds * 1000,
    sourceTimeoutMs: scheduler.source_timeout_seconds * 1000,
    throttleMinDelayMs: throttle.min_delay_ms,
    throttleMaxDelayMs: throttle.max_delay_ms,
  };
}
