/**
 * Artifact diff between two job runs
 *
 * Fetches the same artifact file of two jobs into the cache, optionally pipes
 * each copy through a preprocessing program, and opens both files in a diff
 * program.
 *
 * @module diff/artifact-diff
 */

import { readFile } from 'node:fs/promises';
import { posix } from 'node:path';
import type { JobCache } from '../cache.js';
import { DiffToolError, PreprocessError, SpawnFailedError } from '../errors.js';
import { NoopLogger, type Logger } from '../observability.js';
import { describeExit, type ProcessResult, type ProcessRunner } from '../process.js';
import type { JobsService } from '../services/jobs.js';
import type { ArtifactPair, CacheEntry } from '../types.js';

/** Diff program used when none is configured. */
export const DEFAULT_DIFF_TOOL: readonly string[] = ['diff', '-u'];

/** Cache file extension for artifacts without one. */
export const FALLBACK_EXTENSION = 'artifact';

/**
 * One diff invocation
 */
export interface ArtifactDiffRequest {
  leftJobId: number;
  rightJobId: number;
  /**
   * Path of the file inside the artifact archive
   */
  artifactPath: string;
  /**
   * Filter applied to each file before diffing (stdin to stdout)
   */
  preprocess?: readonly string[];
  /**
   * Diff program; both file paths are appended (default: `diff -u`)
   */
  diffTool?: readonly string[];
}

/**
 * Dependencies of an artifact diff
 */
export interface ArtifactDiffOptions {
  jobs: JobsService;
  cache: JobCache;
  runner: ProcessRunner;
  logger?: Logger;
}

/**
 * Extension used for the cache files of an artifact path
 */
export function artifactExtension(artifactPath: string): string {
  const ext = posix.extname(artifactPath).replace(/^\./, '');
  return ext === '' ? FALLBACK_EXTENSION : ext;
}

/**
 * Diffs one artifact file between two jobs
 *
 * @example
 * ```typescript
 * const differ = new ArtifactDiff({ jobs, cache, runner });
 * await differ.run({
 *   leftJobId: 100,
 *   rightJobId: 101,
 *   artifactPath: 'report.xml',
 *   preprocess: parseCommand('xmllint --format -'),
 * });
 * ```
 */
export class ArtifactDiff {
  private readonly jobs: JobsService;
  private readonly cache: JobCache;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;

  constructor(options: ArtifactDiffOptions) {
    this.jobs = options.jobs;
    this.cache = options.cache;
    this.runner = options.runner;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Fetch, preprocess and diff.
   *
   * @throws {NetworkError} If either artifact cannot be fetched
   * @throws {PreprocessError} If the preprocessing program fails; the diff program is not run
   * @throws {DiffToolError} If the diff program cannot be launched
   */
  async run(request: ArtifactDiffRequest): Promise<ArtifactPair> {
    const ext = artifactExtension(request.artifactPath);

    // Left strictly before right.
    const left = await this.fetch(request.leftJobId, request.artifactPath, ext);
    const right = await this.fetch(request.rightJobId, request.artifactPath, ext);

    if (request.preprocess && request.preprocess.length > 0) {
      await this.preprocess(left, request.preprocess);
      // The same job on both sides shares one cache file, already filtered.
      if (right.localPath !== left.localPath) {
        await this.preprocess(right, request.preprocess);
      }
    }

    const pair: ArtifactPair = {
      leftJobId: request.leftJobId,
      rightJobId: request.rightJobId,
      artifactPath: request.artifactPath,
      leftFile: left.localPath,
      rightFile: right.localPath,
    };

    await this.launchDiff(request.diffTool ?? DEFAULT_DIFF_TOOL, pair);
    return pair;
  }

  private async fetch(jobId: number, artifactPath: string, ext: string): Promise<CacheEntry> {
    const content = await this.jobs.getArtifactFile(jobId, artifactPath);
    return this.cache.write(jobId, ext, content);
  }

  /**
   * Pipe a cache file through the preprocessing program and replace it with the output
   */
  private async preprocess(entry: CacheEntry, command: readonly string[]): Promise<CacheEntry> {
    const input = await readFile(entry.localPath);

    let result: ProcessResult;
    try {
      result = await this.runner.run(command, { input, stdio: 'pipe' });
    } catch (error) {
      if (error instanceof SpawnFailedError) {
        throw new PreprocessError(`Preprocessing job ${entry.jobId} failed: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (result.exitCode !== 0) {
      throw new PreprocessError(
        `Preprocessing job ${entry.jobId} failed: ${command[0] ?? ''} ${describeExit(result)}`,
        { exitCode: result.exitCode ?? undefined, stderr: result.stderr }
      );
    }

    this.logger.debug(`Preprocessed job ${entry.jobId}`, { bytes: result.stdout.length });
    return this.cache.replace(entry, result.stdout);
  }

  /**
   * Run the diff program on both files; its exit status is not interpreted
   */
  private async launchDiff(diffTool: readonly string[], pair: ArtifactPair): Promise<void> {
    const argv = [...diffTool, pair.leftFile, pair.rightFile];
    try {
      const result = await this.runner.run(argv, { stdio: 'inherit' });
      this.logger.debug(`Diff program ${describeExit(result)}`);
    } catch (error) {
      if (error instanceof SpawnFailedError) {
        throw new DiffToolError(error.message, error);
      }
      throw error;
    }
  }
}
