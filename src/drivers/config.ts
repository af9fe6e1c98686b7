import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { ConfigurationError, errorMessage } from '../core/errors.js';
import { CrawlConfigSchema } from '../types/config.js';
import type { CrawlConfig } from '../types/config.js';
import type { SourceDescriptor } from '../types/source.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('config');

export const DEFAULT_CONFIG_PATH = 'config.yaml';

export interface SourceFilter {
  group?: string;
  site?: string;
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an already-parsed configuration document.
 */
export function parseConfig(raw: unknown, origin = 'configuration'): Readonly<CrawlConfig> {
  const parsed = CrawlConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${origin}: ${describeIssues(parsed.error)}`, { file: origin });
  }
  return deepFreeze(parsed.data);
}

/**
 * Read and validate the YAML configuration file. The result is frozen.
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<Readonly<CrawlConfig>> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${errorMessage(error)}`, { file: configPath });
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${configPath}: ${errorMessage(error)}`, { file: configPath });
  }

  const config = parseConfig(raw, configPath);
  log.debug(`Loaded ${config.job_boards.length} job board groups from ${configPath}`);
  return config;
}

/**
 * Build the frozen source descriptors the scheduler runs. Site-level
 * selectors and settings override their group's. Disabled groups and sites
 * are returned with `enabled: false` so they can still be listed.
 *
 * @throws ConfigurationError for duplicate names or a filter matching nothing
 */
export function sourcesFromConfig(config: Readonly<CrawlConfig>, filter: SourceFilter = {}): SourceDescriptor[] {
  if (filter.group && filter.site) {
    throw new ConfigurationError('Filter by group or by site, not both');
  }

  if (filter.group && !config.job_boards.some(board => board.group === filter.group)) {
    throw new ConfigurationError(`Unknown group: ${filter.group}`, { group: filter.group });
  }

  const sources: SourceDescriptor[] = [];
  const seen = new Set<string>();

  for (const board of config.job_boards) {
    if (filter.group && board.group !== filter.group) {
      continue;
    }

    for (const site of board.sites) {
      if (seen.has(site.name)) {
        throw new ConfigurationError(`Duplicate source name: ${site.name}`, { source: site.name });
      }
      seen.add(site.name);

      if (filter.site && site.name !== filter.site) {
        continue;
      }

      sources.push(
        Object.freeze({
          name: site.name,
          url: site.url,
          group: board.group,
          backendType: board.type,
          selectors: Object.freeze({ ...board.selectors, ...site.selectors }),
          settings: Object.freeze({ ...board.settings, ...site.settings }),
          enabled: board.enabled && site.enabled
        })
      );
    }
  }

  if (filter.site && sources.length === 0) {
    throw new ConfigurationError(`Unknown site: ${filter.site}`, { source: filter.site });
  }

  return sources;
}
