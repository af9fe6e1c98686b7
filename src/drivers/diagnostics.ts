import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from '../core/errors.js';
import type { ErrorContext } from '../core/errors.js';
import type { DocumentHandle } from '../types/navigator.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('diagnostics');

export interface DiagnosticReport {
  source: string;
  errorType: string;
  message: string;
  url?: string;
  selector?: string;
  stack?: string;
  context?: ErrorContext;
}

/**
 * Receives failures worth a closer look. Capturing must never fail a crawl.
 */
export interface DiagnosticsCollector {
  capture(report: DiagnosticReport, document?: DocumentHandle): Promise<void>;
}

function safeName(value: string): string {
  return value.replace(/[^a-zA-Z0-9._-]+/g, '_');
}

function timestamp(date = new Date()): string {
  return date.toISOString().replace(/[:.]/g, '-');
}

/**
 * Writes a JSON context file, plus an HTML dump when a document is at hand,
 * under `{logsDir}/errors/`.
 */
export class FileDiagnostics implements DiagnosticsCollector {
  private readonly errorsDir: string;

  constructor(logsDir: string) {
    this.errorsDir = path.join(logsDir, 'errors');
  }

  async capture(report: DiagnosticReport, document?: DocumentHandle): Promise<void> {
    const base = path.join(this.errorsDir, `${safeName(report.source)}_${safeName(report.errorType)}_${timestamp()}`);

    try {
      await mkdir(this.errorsDir, { recursive: true });

      let htmlFile: string | undefined;
      let pageUrl = report.url;
      if (document) {
        pageUrl = pageUrl ?? document.url();
        try {
          htmlFile = `${base}.html`;
          await writeFile(htmlFile, await document.content(), 'utf8');
        } catch (error) {
          htmlFile = undefined;
          log.debug(`Could not dump page HTML for ${report.source}: ${errorMessage(error)}`);
        }
      }

      const payload = {
        timestamp: new Date().toISOString(),
        source: report.source,
        errorType: report.errorType,
        message: report.message,
        url: pageUrl,
        selector: report.selector,
        context: report.context ?? {},
        stack: report.stack,
        htmlFile
      };
      await writeFile(`${base}.json`, JSON.stringify(payload, null, 2), 'utf8');
      log.verbose(`Saved error context for ${report.source} to ${base}.json`);
    } catch (error) {
      log.warn(`Could not capture error context for ${report.source}: ${errorMessage(error)}`);
    }
  }
}

