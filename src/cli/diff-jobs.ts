/**
 * `diff-jobs`: compare one artifact file between two job runs.
 *
 * @module cli/diff-jobs
 */

import { InvalidArgumentError } from 'commander';
import { DIFF_JOBS_CACHE, JobCache } from '../cache.js';
import { ArtifactDiff } from '../diff/artifact-diff.js';
import { parseCommand } from '../process.js';
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

/** Diff program specification used when `--difftool` is not given. */
export const DEFAULT_DIFF_TOOL_SPEC = 'diff -u';

export interface DiffJobsOptions extends ConnectionOptions {
  difftool: string;
  preprocess?: string;
}

/**
 * Positional arguments of the diff tool
 */
export interface DiffJobsArguments {
  leftJobId: number;
  rightJobId: number;
  artifactPath: string;
}

/**
 * Commander argument parser for job identifiers
 */
export function parseJobId(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new InvalidArgumentError('Job id must be a positive integer.');
  }
  return Number(value);
}

/**
 * Execute a diff with parsed arguments
 *
 * @returns Exit code
 */
export async function diffJobs(
  args: DiffJobsArguments,
  options: DiffJobsOptions,
  deps: CliDependencies
): Promise<number> {
  const logger = createLogger(options.debug, deps);
  try {
    const diffTool = parseCommand(options.difftool);
    const preprocess = options.preprocess === undefined ? undefined : parseCommand(options.preprocess);
    const { services, runner } = await createRuntime(options, deps, logger);

    const cache = new JobCache(DIFF_JOBS_CACHE, { root: deps.cacheRoot, logger });
    if (options.clean) {
      await cache.clear();
    }

    const differ = new ArtifactDiff({ jobs: services.jobs, cache, runner, logger });
    await differ.run({ ...args, preprocess, diffTool });
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
    'diff-jobs',
    'Diff an artifact file between two job runs',
    deps
  )
    .argument('<JOB_ID_LEFT>', 'job whose artifact is shown on the left', parseJobId)
    .argument('<JOB_ID_RIGHT>', 'job whose artifact is shown on the right', parseJobId)
    .argument('<ARTIFACT_PATH>', 'file path inside the artifact archive, e.g. reports/junit.xml')
    .option('--difftool <command>', 'diff program; both file paths are appended', DEFAULT_DIFF_TOOL_SPEC)
    .option('--preprocess <command>', 'filter each file through this program (stdin to stdout) before diffing')
    .allowExcessArguments(false)
    .action(async (leftJobId: number, rightJobId: number, artifactPath: string, options: DiffJobsOptions) => {
      exitCode = await diffJobs({ leftJobId, rightJobId, artifactPath }, options, deps);
    });

  const parseExit = await parseProgram(program, args);
  return parseExit ?? exitCode;
}
