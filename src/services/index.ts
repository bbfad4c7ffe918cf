/**
 * GitLab Services
 *
 * @module services
 */

import type { GitLabClient } from '../client.js';
import type { Logger } from '../observability.js';
import { DeploymentsService, createDeploymentsService } from './deployments.js';
import { JobsService, createJobsService } from './jobs.js';

export { DeploymentsService, createDeploymentsService, DEPLOYMENTS_PAGE_SIZE } from './deployments.js';
export { JobsService, createJobsService } from './jobs.js';

/**
 * The services both tools draw on
 */
export interface GitLabServices {
  deployments: DeploymentsService;
  jobs: JobsService;
}

/**
 * Creates every service from one client instance
 */
export function createGitLabServices(client: GitLabClient, logger?: Logger): GitLabServices {
  return {
    deployments: createDeploymentsService(client, logger),
    jobs: createJobsService(client),
  };
}
