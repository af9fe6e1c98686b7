export type CrawlCommand = 'run' | 'list';

export interface CrawlOptions {
  config?: string;
  group?: string;
  site?: string;
  maxPages?: number;
  /** Per-source wall-clock budget in seconds. */
  timeout?: number;
  verbose?: boolean;
  debug?: boolean;
  quiet?: boolean;
  headed?: boolean;
  noHttpFallback?: boolean;
}

export interface ParsedArgs {
  command: CrawlCommand;
  options: CrawlOptions;
}

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

const COMMANDS: readonly CrawlCommand[] = ['run', 'list'];

function isCommand(value: string): value is CrawlCommand {
  return COMMANDS.some(command => command === value);
}

function positiveInt(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ArgumentError(`${flag} expects a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Parse command line arguments supporting both formats:
 * - --param=value
 * - --param value
 *
 * The command defaults to `run` when the first argument is a flag.
 *
 * @throws ArgumentError for unknown commands or flags, missing or malformed
 *   values, and `--group` combined with `--site`
 */
export function parseArgs(args: string[]): ParsedArgs {
  let rest = args;
  let command: CrawlCommand = 'run';
  const first = args[0];
  if (first !== undefined && !first.startsWith('-')) {
    if (!isCommand(first)) {
      throw new ArgumentError(`Unknown command: ${first} (expected ${COMMANDS.join(' or ')})`);
    }
    command = first;
    rest = args.slice(1);
  }

  const options: CrawlOptions = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = rest[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ArgumentError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    if (flag === '--config') {
      options.config = value();
    } else if (flag === '--group') {
      options.group = value();
    } else if (flag === '--site') {
      options.site = value();
    } else if (flag === '--max-pages') {
      options.maxPages = positiveInt(flag, value());
    } else if (flag === '--timeout') {
      options.timeout = positiveInt(flag, value());
    } else if (flag === '--verbose' || flag === '-v') {
      options.verbose = true;
    } else if (flag === '--debug') {
      options.debug = true;
    } else if (flag === '--quiet' || flag === '-q') {
      options.quiet = true;
    } else if (flag === '--headed') {
      options.headed = true;
    } else if (flag === '--no-http-fallback') {
      options.noHttpFallback = true;
    } else {
      throw new ArgumentError(`Unknown option: ${arg}`);
    }
  }

  if (options.group && options.site) {
    throw new ArgumentError('--group and --site cannot be used together');
  }

  return { command, options };
}

export const USAGE = `Usage: crawl [run|list] [options]

Options:
  --config <path>       Configuration file (default: config.yaml)
  --group <name>        Only crawl sources in this group
  --site <name>         Only crawl this source
  --max-pages <n>       Override max_pages for every source
  --timeout <seconds>   Per-source wall-clock budget
  --headed              Show the browser window
  --no-http-fallback    Fetch listings through the browser only
  -v, --verbose         Verbose logging
  --debug               Debug logging
  -q, --quiet           Only print the run summary`;
