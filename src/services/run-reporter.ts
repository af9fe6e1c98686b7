import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { FailureReason } from '../core/errors.js';
import type { SchedulerRun } from '../engines/scheduler.js';
import { logger } from '../utils/logger.js';
import type { LogSeverity } from '../utils/logger.js';

const log = logger.createContext('run-reporter');

export interface FailedSource {
  source: string;
  reason: FailureReason;
  message?: string;
}

export interface RunCounters {
  sitesProcessed: number;
  sitesFailed: number;
  jobsFound: number;
  jobsDownloaded: number;
  jobsSkipped: number;
  errors: number;
  warnings: number;
}

export interface RunSummary extends RunCounters {
  label: string;
  startTime: string;
  endTime: string;
  durationSeconds: number;
  durationHuman: string;
  interrupted: boolean;
  failedSources: FailedSource[];
  notStarted: string[];
}

export function formatDuration(seconds: number): string {
  const whole = Math.floor(seconds);
  return `${Math.floor(whole / 60)}m ${whole % 60}s`;
}

function fileTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

/**
 * Collects run-level counters. Warnings and errors are counted from the
 * logger for as long as the reporter is attached.
 */
export class RunReporter {
  private readonly startedAt: Date;
  private endedAt?: Date;
  private counters: RunCounters = {
    sitesProcessed: 0,
    sitesFailed: 0,
    jobsFound: 0,
    jobsDownloaded: 0,
    jobsSkipped: 0,
    errors: 0,
    warnings: 0
  };
  private failed: FailedSource[] = [];
  private notStarted: string[] = [];
  private interrupted = false;
  private detach?: () => void;

  constructor(
    private readonly label: string,
    private readonly logsDir: string,
    now: Date = new Date()
  ) {
    this.startedAt = now;
  }

  attach(): this {
    this.detach?.();
    this.detach = logger.addListener((severity: LogSeverity) => {
      if (severity === 'error') {
        this.counters.errors++;
      } else {
        this.counters.warnings++;
      }
    });
    return this;
  }

  recordRun(run: SchedulerRun): void {
    this.counters.sitesProcessed += run.stats.sitesProcessed;
    this.counters.sitesFailed += run.stats.sitesFailed;
    this.counters.jobsFound += run.stats.jobsFound;
    this.counters.jobsDownloaded += run.stats.jobsDownloaded;
    this.counters.jobsSkipped += run.stats.jobsSkipped;
    for (const result of run.results) {
      if (!result.success) {
        this.failed.push({ source: result.source, reason: result.failureReason ?? 'unknown', message: result.message });
      }
    }
    this.notStarted.push(...run.notStarted);
  }

  markInterrupted(): void {
    this.interrupted = true;
  }

  get hasFailures(): boolean {
    return this.interrupted || this.counters.sitesFailed > 0;
  }

  finish(now: Date = new Date()): RunSummary {
    this.detach?.();
    this.detach = undefined;
    this.endedAt = this.endedAt ?? now;

    const durationSeconds = Math.max(0, (this.endedAt.getTime() - this.startedAt.getTime()) / 1000);
    return {
      label: this.label,
      startTime: this.startedAt.toISOString(),
      endTime: this.endedAt.toISOString(),
      durationSeconds: Math.round(durationSeconds * 10) / 10,
      durationHuman: formatDuration(durationSeconds),
      ...this.counters,
      interrupted: this.interrupted,
      failedSources: [...this.failed],
      notStarted: [...this.notStarted]
    };
  }

  /**
   * Write the summary to `{logsDir}/summaries/crawl_{label}_{timestamp}.json`.
   * @returns the written file path
   */
  async writeSummary(summary: RunSummary = this.finish()): Promise<string> {
    const dir = path.join(this.logsDir, 'summaries');
    await mkdir(dir, { recursive: true });
    const safeLabel = this.label.replace(/[^a-zA-Z0-9._-]+/g, '_');
    const file = path.join(dir, `crawl_${safeLabel}_${fileTimestamp(this.startedAt)}.json`);
    await writeFile(file, JSON.stringify(summary, null, 2), 'utf8');
    log.verbose(`Wrote run summary to ${file}`);
    return file;
  }

  printSummary(summary: RunSummary): void {
    logger.separator();
    logger.quiet(`Run ${summary.label} finished in ${summary.durationHuman}`);
    logger.quiet(`  Sites processed: ${summary.sitesProcessed} (${summary.sitesFailed} failed)`);
    logger.quiet(
      `  Jobs found: ${summary.jobsFound}, downloaded: ${summary.jobsDownloaded}, skipped: ${summary.jobsSkipped}`
    );
    logger.quiet(`  Errors: ${summary.errors}, warnings: ${summary.warnings}`);
    for (const failure of summary.failedSources) {
      logger.quiet(`  ✗ ${failure.source}: ${failure.reason}${failure.message ? ` (${failure.message})` : ''}`);
    }
    if (summary.notStarted.length > 0) {
      logger.quiet(`  Not started: ${summary.notStarted.join(', ')}`);
    }
  }
}
