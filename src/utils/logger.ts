export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3
}

interface LoggerConfig {
  level: LogLevel;
}

export type LogSeverity = 'warn' | 'error';

/**
 * Receives every warning and error, whatever the configured level.
 * The run reporter uses this to count them.
 */
export type LogListener = (severity: LogSeverity, message: string, context?: string) => void;

class Logger {
  private static instance: Logger;
  private config: LoggerConfig = {
    level: LogLevel.NORMAL
  };
  private listeners = new Set<LogListener>();

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  createContext(context: string): ContextualLogger {
    return new ContextualLogger(context, this);
  }

  /**
   * @returns a function that removes the listener
   */
  addListener(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  log(level: LogLevel, message: string, context?: string, data?: unknown): void {
    if (level > this.config.level) return;

    const formattedMessage = this.format(message, context);

    // In quiet mode, only show essential completion messages
    if (this.config.level === LogLevel.QUIET) {
      if (level === LogLevel.QUIET) {
        console.log(formattedMessage);
      }
      return;
    }

    console.log(formattedMessage);
    if (data !== undefined) {
      console.log(data);
    }
  }

  quiet(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.QUIET, message, context, data);
  }

  normal(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.NORMAL, message, context, data);
  }

  verbose(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.VERBOSE, message, context, data);
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  warn(message: string, context?: string, data?: unknown): void {
    this.notify('warn', message, context);
    if (this.config.level > LogLevel.QUIET) {
      console.warn(`⚠️  ${this.format(message, context)}`);
      if (data !== undefined) {
        console.warn(data);
      }
    }
  }

  error(message: string, context?: string, data?: unknown): void {
    this.notify('error', message, context);
    // Errors always show unless in quiet mode
    if (this.config.level > LogLevel.QUIET) {
      console.error(this.format(message, context));
      if (data !== undefined) {
        console.error(data);
      }
    }
  }

  // Progress indicators
  success(site: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`✓ ${site.padEnd(20)} ${message}`);
    }
  }

  failure(site: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`✗ ${site.padEnd(20)} ${message}`);
    }
  }

  processing(site: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`⏳ ${site.padEnd(20)} ${message}`);
    }
  }

  skip(site: string, message: string): void {
    if (this.config.level >= LogLevel.NORMAL) {
      console.log(`⏸  ${site.padEnd(20)} ${message}`);
    }
  }

  separator(): void {
    if (this.config.level >= LogLevel.NORMAL && this.config.level < LogLevel.DEBUG) {
      console.log('━'.repeat(50));
    }
  }

  private format(message: string, context?: string): string {
    const prefix = context ? `[${context}] ` : '';
    return `${prefix}${message}`;
  }

  private notify(severity: LogSeverity, message: string, context?: string): void {
    for (const listener of this.listeners) {
      listener(severity, message, context);
    }
  }
}

// Contextual logger for component-specific logging
export class ContextualLogger {
  constructor(
    private context: string,
    private logger: Logger
  ) {}

  quiet(message: string, data?: unknown): void {
    this.logger.quiet(message, this.context, data);
  }

  normal(message: string, data?: unknown): void {
    this.logger.normal(message, this.context, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.verbose(message, this.context, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.context, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.context, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.context, data);
  }

  /**
   * Derive a logger for a sub-component, e.g. `crawl` -> `crawl:acme`.
   */
  child(name: string): ContextualLogger {
    return new ContextualLogger(`${this.context}:${name}`, this.logger);
  }
}

export const logger = Logger.getInstance();

export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.NORMAL;

  switch (level.toLowerCase()) {
    case 'quiet':
    case 'q':
      return LogLevel.QUIET;
    case 'verbose':
    case 'v':
      return LogLevel.VERBOSE;
    case 'debug':
    case 'd':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

export const formatTime = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const formatProgress = (current: number, total: number): string => {
  const percentage = total === 0 ? 100 : Math.floor((current / total) * 100);
  return `${current}/${total} (${percentage}%)`;
};
