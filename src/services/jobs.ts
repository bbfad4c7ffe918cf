/**
 * GitLab Jobs Service
 *
 * Read access to a job's trace and to single files of its artifact archive.
 *
 * @module services/jobs
 */

import type { GitLabClient } from '../client.js';
import { encodePathSegment } from '../encoding.js';

/**
 * Service for reading GitLab CI/CD job output
 *
 * @example
 * ```typescript
 * const jobs = new JobsService(client);
 * const log = await jobs.getTrace(42);
 * const report = await jobs.getArtifactFile(42, 'reports/junit.xml');
 * ```
 */
export class JobsService {
  private readonly projectPath: string;

  constructor(private readonly client: GitLabClient) {
    this.projectPath = `/projects/${encodePathSegment(client.getConfig().repoSlug)}`;
  }

  /**
   * Get the complete job log (trace)
   *
   * @throws {NetworkError} If the job does not exist or the request fails
   */
  async getTrace(jobId: number): Promise<string> {
    return this.client.getText(this.traceUrl(jobId));
  }

  /**
   * Download a single file from the job's artifact archive
   *
   * @param jobId - Job identifier
   * @param artifactPath - Path inside the archive, e.g. "reports/junit.xml"
   * @throws {NetworkError} If the job or the file does not exist
   */
  async getArtifactFile(jobId: number, artifactPath: string): Promise<Buffer> {
    return this.client.getBuffer(this.artifactUrl(jobId, artifactPath));
  }

  traceUrl(jobId: number): string {
    return this.client.buildUrl(`${this.projectPath}/jobs/${jobId}/trace`);
  }

  /**
   * Each path segment is encoded on its own; separators are kept
   */
  artifactUrl(jobId: number, artifactPath: string): string {
    const encodedPath = artifactPath
      .split('/')
      .filter((segment) => segment.length > 0)
      .map(encodePathSegment)
      .join('/');
    return this.client.buildUrl(`${this.projectPath}/jobs/${jobId}/artifacts/${encodedPath}`);
  }

  /**
   * Web link to the job page
   */
  jobUrl(jobId: number): string {
    const { serverUrl, repoSlug } = this.client.getConfig();
    return `${serverUrl}/${repoSlug}/-/jobs/${jobId}`;
  }
}

/**
 * Create a new JobsService instance
 */
export function createJobsService(client: GitLabClient): JobsService {
  return new JobsService(client);
}
