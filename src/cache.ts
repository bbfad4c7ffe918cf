/**
 * On-disk cache of fetched job logs and artifacts.
 *
 * One directory per tool under the system temp directory; files are named
 * `<jobId>.<ext>`. Nothing expires automatically: retained files stay until the
 * user runs a tool with `--clean` or removes them. Concurrent runs of the same
 * tool share the directory without locking.
 *
 * @module cache
 */

import { mkdir, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { NoopLogger, type Logger } from './observability.js';
import type { CacheEntry } from './types.js';

/** Cache directory name of the log search tool. */
export const SEARCH_LOGS_CACHE = 'gitlab-search-logs';

/** Cache directory name of the artifact diff tool. */
export const DIFF_JOBS_CACHE = 'gitlab-diff-jobs';

/**
 * Job-keyed file cache
 */
export class JobCache {
  readonly directory: string;
  private readonly logger: Logger;

  /**
   * @param name - Directory name, one per tool
   * @param options.root - Parent directory (default: the OS temp directory)
   */
  constructor(name: string, options: { root?: string; logger?: Logger } = {}) {
    this.directory = join(options.root ?? tmpdir(), name);
    this.logger = options.logger ?? new NoopLogger();
  }

  async ensure(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
  }

  pathFor(jobId: number, ext: string): string {
    return join(this.directory, `${jobId}.${ext}`);
  }

  /**
   * Store content for a job and return the retained entry
   */
  async write(jobId: number, ext: string, content: string | Buffer): Promise<CacheEntry> {
    await this.ensure();
    const localPath = this.pathFor(jobId, ext);
    await writeFile(localPath, content);
    this.logger.debug(`Cached job ${jobId}`, { path: localPath });
    return { jobId, localPath, retained: true };
  }

  /**
   * Replace an entry's content through a temporary file and a rename
   */
  async replace(entry: CacheEntry, content: string | Buffer): Promise<CacheEntry> {
    const tempPath = `${entry.localPath}.tmp`;
    await writeFile(tempPath, content);
    await rename(tempPath, entry.localPath);
    return { ...entry, retained: true };
  }

  /**
   * Delete an entry's file
   */
  async discard(entry: CacheEntry): Promise<CacheEntry> {
    await rm(entry.localPath, { force: true });
    this.logger.debug(`Discarded cached job ${entry.jobId}`, { path: entry.localPath });
    return { ...entry, retained: false };
  }

  /**
   * Remove every file in the cache directory
   *
   * @returns Number of removed files
   */
  async clear(): Promise<number> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }

    for (const name of names) {
      await rm(join(this.directory, name), { recursive: true, force: true });
    }
    this.logger.debug(`Cleared ${names.length} cached files`, { directory: this.directory });
    return names.length;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
