/**
 * Domain records shared by the GitLab job tools.
 */

/**
 * A recorded event where a CI job deployed to an environment
 */
export interface Deployment {
  readonly jobId: number;
  readonly userName: string;
  readonly environmentSlug: string;
  readonly createdAt: Date;
}

/**
 * A fetched log or artifact stored on local disk.
 * `retained: false` means the file has been deleted.
 */
export interface CacheEntry {
  readonly jobId: number;
  readonly localPath: string;
  readonly retained: boolean;
}

/**
 * The unit of work of one artifact diff
 */
export interface ArtifactPair {
  readonly leftJobId: number;
  readonly rightJobId: number;
  readonly artifactPath: string;
  readonly leftFile: string;
  readonly rightFile: string;
}

/**
 * Server-side deployment filters
 */
export interface DeploymentQuery {
  /**
   * Environment name; sent as an empty value when absent
   */
  environment?: string;

  /**
   * Deployment status (created, running, success, failed, canceled, blocked)
   */
  status?: string;
}
