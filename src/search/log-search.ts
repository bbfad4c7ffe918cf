/**
 * Log search across deployment jobs
 *
 * For every deployment, in the order received, the job trace is fetched into
 * the cache and scanned line by line. Jobs with at least one matching line are
 * reported and their log is kept; the others are deleted straight away. The
 * whole sequence is always processed.
 *
 * @module search/log-search
 */

import type { JobCache } from '../cache.js';
import { ConfigError } from '../errors.js';
import { NoopLogger, type Logger } from '../observability.js';
import type { JobsService } from '../services/jobs.js';
import type { CacheEntry, Deployment } from '../types.js';

/** Pattern used when none is given; matches every line. */
export const DEFAULT_PATTERN = '.*';

/** Extension of cached job logs. */
export const LOG_EXTENSION = 'log';

/**
 * Receives output lines (stdout in the CLI)
 */
export type OutputSink = (line: string) => void;

/**
 * Compile a user-supplied regular expression.
 *
 * @throws {ConfigError} If the pattern is not a valid regular expression
 */
export function compilePattern(source: string = DEFAULT_PATTERN): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    throw new ConfigError(
      `Invalid regular expression "${source}"`,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Split text into lines. A trailing newline does not start another line;
 * empty text is a single empty line.
 */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

const UNITS: ReadonlyArray<readonly [string, number]> = [
  ['days', 86400],
  ['hours', 3600],
  ['minutes', 60],
];

/**
 * Format how long ago a moment was, in the largest whole unit.
 *
 * @example
 * ```typescript
 * formatRelativeTime(new Date(now.getTime() - 3661_000), now); // "1 hours ago"
 * ```
 */
export function formatRelativeTime(from: Date, now: Date = new Date()): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - from.getTime()) / 1000));
  for (const [unit, size] of UNITS) {
    if (seconds >= size) {
      return `${Math.floor(seconds / size)} ${unit} ago`;
    }
  }
  return `${seconds} seconds ago`;
}

/**
 * Dependencies of a log search
 */
export interface LogSearchOptions {
  jobs: JobsService;
  cache: JobCache;
  output: OutputSink;
  logger?: Logger;
  /**
   * Clock used for relative times (default: current time)
   */
  now?: () => Date;
}

/**
 * Searches job traces of deployments for a pattern
 *
 * @example
 * ```typescript
 * const search = new LogSearch({ jobs, cache, output: console.log });
 * const entries = await search.run(deployments.list({ status: 'failed' }), compilePattern('ERROR'));
 * ```
 */
export class LogSearch {
  private readonly jobs: JobsService;
  private readonly cache: JobCache;
  private readonly output: OutputSink;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: LogSearchOptions) {
    this.jobs = options.jobs;
    this.cache = options.cache;
    this.output = options.output;
    this.logger = options.logger ?? new NoopLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Process every deployment in order
   *
   * @returns One cache entry per deployment; unmatched ones are no longer retained
   */
  async run(
    deployments: AsyncIterable<Deployment>,
    pattern: RegExp = compilePattern()
  ): Promise<CacheEntry[]> {
    // test() on a global or sticky expression would carry lastIndex between lines
    const matcher = pattern.global || pattern.sticky
      ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
      : pattern;

    const entries: CacheEntry[] = [];
    for await (const deployment of deployments) {
      entries.push(await this.searchJob(deployment, matcher));
    }
    this.logger.debug(
      `Searched ${entries.length} jobs, ${entries.filter((entry) => entry.retained).length} matched`
    );
    return entries;
  }

  /**
   * Fetch, cache and scan a single job's trace
   */
  async searchJob(deployment: Deployment, pattern: RegExp): Promise<CacheEntry> {
    const trace = await this.jobs.getTrace(deployment.jobId);
    const entry = await this.cache.write(deployment.jobId, LOG_EXTENSION, trace);

    const matches = splitLines(trace).filter((line) => pattern.test(line));
    if (matches.length === 0) {
      return this.cache.discard(entry);
    }

    this.output(this.summarize(deployment));
    for (const line of matches) {
      this.output(line);
    }
    return entry;
  }

  /**
   * One-line description of a matching job
   */
  summarize(deployment: Deployment): string {
    const age = formatRelativeTime(deployment.createdAt, this.now());
    return `job ${deployment.jobId} ${this.jobs.jobUrl(deployment.jobId)} by ${deployment.userName} on ${deployment.environmentSlug}, ${age}`;
  }
}
