#!/usr/bin/env node

/**
 * CLI for crawl runs
 * Usage:
 *   npm run crawl -- [run] [options]   # Crawl every enabled source
 *   npm run crawl -- list [options]    # List configured sources
 */

import { ConfigurationError, RunInterrupted, errorMessage } from '../src/core/errors.js';
import { partitionByBackend } from '../src/core/partition.js';
import { DEFAULT_CONFIG_PATH, loadConfig, sourcesFromConfig } from '../src/drivers/config.js';
import { CheerioContentExtractor } from '../src/drivers/content-extractor.js';
import { FileDiagnostics } from '../src/drivers/diagnostics.js';
import { launchPlaywrightNavigators } from '../src/drivers/playwright-navigator.js';
import { CrawlScheduler, createSourceCrawler } from '../src/engines/scheduler.js';
import { OriginThrottle } from '../src/lib/retry.js';
import { RunReporter } from '../src/services/run-reporter.js';
import { toCrawlSettings } from '../src/types/config.js';
import type { CrawlSettings } from '../src/types/config.js';
import type { SourceDescriptor } from '../src/types/source.js';
import { ArgumentError, USAGE, parseArgs } from '../src/utils/cli-args.js';
import type { CrawlOptions, ParsedArgs } from '../src/utils/cli-args.js';
import { installGlobalErrorHandlers } from '../src/utils/error-handlers.js';
import { LogLevel, logger, parseLogLevel } from '../src/utils/logger.js';

installGlobalErrorHandlers();

const log = logger.createContext('crawl-cli');

function configureLogging(options: CrawlOptions): void {
  if (options.debug) {
    logger.setLevel(LogLevel.DEBUG);
  } else if (options.verbose) {
    logger.setLevel(LogLevel.VERBOSE);
  } else if (options.quiet) {
    logger.setLevel(LogLevel.QUIET);
  } else {
    logger.setLevel(parseLogLevel(process.env.CRAWL_LOG_LEVEL));
  }
}

function runLabel(options: CrawlOptions): string {
  return options.site ?? options.group ?? 'all';
}

function listSources(sources: readonly SourceDescriptor[]): void {
  for (const partition of partitionByBackend(sources)) {
    console.log(`${partition.backendType} (${partition.sources.length})`);
    for (const source of partition.sources) {
      console.log(`  ${source.name.padEnd(24)} ${source.group.padEnd(16)} ${source.url}`);
    }
  }
  const disabled = sources.filter(source => !source.enabled);
  if (disabled.length > 0) {
    console.log(`disabled (${disabled.length})`);
    for (const source of disabled) {
      console.log(`  ${source.name.padEnd(24)} ${source.group.padEnd(16)} ${source.url}`);
    }
  }
}

async function runCrawl(sources: readonly SourceDescriptor[], settings: CrawlSettings, options: CrawlOptions): Promise<boolean> {
  const reporter = new RunReporter(runLabel(options), settings.logsDir).attach();
  const controller = new AbortController();

  const onSigint = () => {
    if (controller.signal.aborted) {
      log.warn('Second interrupt, exiting immediately');
      process.exit(130);
    }
    log.warn('Interrupted, stopping running crawls...');
    reporter.markInterrupted();
    controller.abort(new RunInterrupted('SIGINT'));
  };
  process.on('SIGINT', onSigint);

  const pool = await launchPlaywrightNavigators({
    headless: options.headed ? false : settings.headless,
    userAgent: settings.userAgent,
    pageLoadTimeoutMs: settings.pageLoadTimeoutMs
  });

  try {
    const scheduler = new CrawlScheduler({
      crawl: createSourceCrawler({
        settings,
        navigatorFactory: pool.factory,
        extractor: new CheerioContentExtractor(),
        diagnostics: new FileDiagnostics(settings.logsDir),
        throttle: new OriginThrottle({
          minDelayMs: settings.throttleMinDelayMs,
          maxDelayMs: settings.throttleMaxDelayMs
        }),
        httpFallback: !options.noHttpFallback
      }),
      sourceTimeoutMs: settings.sourceTimeoutMs
    });

    const run = await scheduler.run(sources, controller.signal);
    reporter.recordRun(run);
  } finally {
    process.off('SIGINT', onSigint);
    await pool.close();
  }

  const summary = reporter.finish();
  reporter.printSummary(summary);
  try {
    const file = await reporter.writeSummary(summary);
    logger.quiet(`Summary written to ${file}`);
  } catch (error) {
    log.error(`Could not write run summary: ${errorMessage(error)}`);
  }
  return !reporter.hasFailures;
}

async function main(): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }
  const { command, options } = parsed;
  configureLogging(options);

  const config = await loadConfig(options.config ?? DEFAULT_CONFIG_PATH);
  const settings: CrawlSettings = {
    ...toCrawlSettings(config),
    ...(options.maxPages !== undefined ? { maxPagesOverride: options.maxPages } : {}),
    ...(options.timeout !== undefined ? { sourceTimeoutMs: options.timeout * 1000 } : {})
  };
  const sources = sourcesFromConfig(config, { group: options.group, site: options.site });

  if (command === 'list') {
    listSources(sources);
    return 0;
  }

  if (!sources.some(source => source.enabled)) {
    log.warn('No enabled sources to crawl');
    return 0;
  }

  return (await runCrawl(sources, settings, options)) ? 0 : 1;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      log.error(error.message);
    } else {
      log.error(`Fatal error: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
    }
    process.exitCode = 1;
  });
