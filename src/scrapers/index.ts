import { BACKEND_TYPES } from '../types/source.js';
import type { BackendType, SourceDescriptor } from '../types/source.js';
import type { CrawlStrategy, StrategyFactory } from './types.js';
import { createStandardStrategy } from './standard.js';
import { createIframeStrategy } from './iframe.js';
import { createUrlPaginationStrategy } from './url-pagination.js';
import { createCustomClickStrategy } from './custom-click.js';
import { createCustomNavigationStrategy } from './custom-navigation.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('strategies');

/**
 * One factory per backend type. The source's `backendType` picks the
 * strategy once, when the crawl starts.
 */
export const STRATEGIES: Readonly<Record<BackendType, StrategyFactory>> = {
  standard: createStandardStrategy,
  iframe: createIframeStrategy,
  url_pagination: createUrlPaginationStrategy,
  custom_click: createCustomClickStrategy,
  custom_navigation: createCustomNavigationStrategy
};

/**
 * Build a fresh strategy for one crawl.
 * @throws ConfigurationError when the source lacks a selector or setting its type needs
 */
export function createStrategy(source: SourceDescriptor): CrawlStrategy {
  const strategy = STRATEGIES[source.backendType](source);
  log.debug(`Created ${strategy.type} strategy for ${source.name}`);
  return strategy;
}

export function availableTypes(): BackendType[] {
  return [...BACKEND_TYPES];
}

export type { CrawlStrategy, CrawlOutcome, StrategyContext, StrategyFactory } from './types.js';
