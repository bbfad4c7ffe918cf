/**
 * GitLab Deployments Service
 *
 * Enumerates one page of a project's deployments, newest first, filtered on
 * the server side by environment and status.
 *
 * @module services/deployments
 */

import { z } from 'zod';
import type { GitLabClient } from '../client.js';
import { encodePathSegment } from '../encoding.js';
import { ParseError } from '../errors.js';
import { NoopLogger, type Logger } from '../observability.js';
import type { Deployment, DeploymentQuery } from '../types.js';

/**
 * Page size of the single deployments request. Deployments beyond the first
 * page are not visited.
 */
export const DEPLOYMENTS_PAGE_SIZE = 100;

const deploymentSchema = z.object({
  created_at: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'not a valid timestamp',
  }),
  deployable: z.object({ id: z.number().int() }).nullable(),
  user: z.object({ name: z.string() }),
  environment: z.object({ slug: z.string() }),
});

const deploymentListSchema = z.array(deploymentSchema);

/**
 * Service for listing GitLab deployments
 *
 * @example
 * ```typescript
 * const deployments = new DeploymentsService(client);
 * for await (const deployment of deployments.list({ environment: 'production' })) {
 *   console.log(deployment.jobId, deployment.userName);
 * }
 * ```
 */
export class DeploymentsService {
  private readonly logger: Logger;

  constructor(private readonly client: GitLabClient, logger?: Logger) {
    this.logger = logger ?? new NoopLogger();
  }

  /**
   * Build the deployments request URL
   */
  listUrl(query: DeploymentQuery = {}): string {
    const repo = encodePathSegment(this.client.getConfig().repoSlug);
    return this.client.buildUrl(`/projects/${repo}/deployments`, {
      sort: 'desc',
      environment: query.environment ?? '',
      status: query.status,
      per_page: DEPLOYMENTS_PAGE_SIZE,
    });
  }

  /**
   * List deployments in the order the service returns them (newest first).
   *
   * The request is issued when iteration starts; the sequence is not
   * restartable without calling list() again.
   *
   * @throws {NetworkError} If the request fails
   * @throws {ParseError} If the response is not a JSON array of deployments
   */
  async *list(query: DeploymentQuery = {}): AsyncGenerator<Deployment> {
    const url = this.listUrl(query);
    const body = await this.client.getJson(url);

    const parsed = deploymentListSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ParseError(
        `Unexpected deployments response${where}: ${issue?.message ?? 'invalid shape'}`,
        parsed.error
      );
    }

    this.logger.debug(`Fetched ${parsed.data.length} deployments`, { url });

    for (const record of parsed.data) {
      if (record.deployable === null) {
        this.logger.debug('Skipping deployment without a job', {
          environment: record.environment.slug,
        });
        continue;
      }
      yield {
        jobId: record.deployable.id,
        userName: record.user.name,
        environmentSlug: record.environment.slug,
        createdAt: new Date(record.created_at),
      };
    }
  }
}

/**
 * Create a new DeploymentsService instance
 */
export function createDeploymentsService(client: GitLabClient, logger?: Logger): DeploymentsService {
  return new DeploymentsService(client, logger);
}
