/**
 * `search-logs`: search the job logs behind recent deployments.
 *
 * @module cli/search-logs
 */

import { JobCache, SEARCH_LOGS_CACHE } from '../cache.js';
import { LogSearch, DEFAULT_PATTERN, compilePattern } from '../search/log-search.js';
import {
  createLogger,
  createProgram,
  createRuntime,
  parseProgram,
  reportFailure,
  resolveDependencies,
  type CliDependencies,
  type ConnectionOptions,
} from './shared.js';

export interface SearchLogsOptions extends ConnectionOptions {
  regex: string;
  env?: string;
  status?: string;
}

/**
 * Execute a search with parsed options
 *
 * @returns Exit code
 */
export async function searchLogs(options: SearchLogsOptions, deps: CliDependencies): Promise<number> {
  const logger = createLogger(options.debug, deps);
  try {
    const pattern = compilePattern(options.regex);
    const { services } = await createRuntime(options, deps, logger);

    const cache = new JobCache(SEARCH_LOGS_CACHE, { root: deps.cacheRoot, logger });
    if (options.clean) {
      await cache.clear();
    }

    const search = new LogSearch({
      jobs: services.jobs,
      cache,
      output: deps.stdout,
      logger,
      now: deps.now,
    });
    await search.run(
      services.deployments.list({ environment: options.env, status: options.status }),
      pattern
    );
    return 0;
  } catch (error) {
    return reportFailure(error, logger, options.debug);
  }
}

/**
 * Run the tool with command-line arguments (without node and script path)
 *
 * @returns Exit code
 */
export async function run(args: readonly string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps = resolveDependencies(overrides);
  let exitCode = 0;

  const program = createProgram(
    'search-logs',
    'Search the job logs of recent deployments for a regular expression',
    deps
  )
    .option('-r, --regex <pattern>', 'regular expression matched against each log line', DEFAULT_PATTERN)
    .option('-e, --env <environment>', 'only deployments to this environment')
    .option('-s, --status <status>', 'only deployments with this status (e.g. success, failed)')
    .allowExcessArguments(false)
    .action(async (options: SearchLogsOptions) => {
      exitCode = await searchLogs(options, deps);
    });

  const parseExit = await parseProgram(program, args);
  return parseExit ?? exitCode;
}
