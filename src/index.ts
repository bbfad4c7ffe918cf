/**
 * GitLab job tools
 *
 * Request orchestration and local caching behind the `search-logs` and
 * `diff-jobs` command-line tools:
 * - Configuration from options, environment and the local git remote
 * - Authenticated, fail-fast GET requests
 * - Deployment enumeration, job traces and artifact files
 * - A job-keyed file cache handed to external filter and diff programs
 *
 * @example
 * ```typescript
 * import { resolveConfig, GitLabClient, createGitLabServices } from 'gitlab-job-tools';
 *
 * const config = await resolveConfig({ repo: 'group/project', token: 'test-token' });
 * const services = createGitLabServices(new GitLabClient(config));
 * for await (const deployment of services.deployments.list({ environment: 'production' })) {
 *   console.log(deployment.jobId);
 * }
 * ```
 *
 * @module gitlab-job-tools
 */

// Configuration
export {
  type ToolConfig,
  type ConfigInput,
  type ConfigSources,
  resolveConfig,
  normalizeServerUrl,
  DEFAULT_SERVER_URL,
  API_VERSION,
  ENV_TOKEN,
  ENV_SERVER,
  ENV_REPO,
} from './config.js';
export { type RemoteInfo, parseRemoteUrl, detectRemote } from './remote.js';
export { SecretString, bearerAuthorization } from './auth.js';

// Error types
export * from './errors.js';

// Client
export {
  type FetchFn,
  type FetchInit,
  type FetchResponse,
  type QueryParams,
  type ClientOptions,
  GitLabClient,
} from './client.js';
export { encodePathSegment } from './encoding.js';

// Services
export * from './services/index.js';

// Cache, search and diff
export { JobCache, SEARCH_LOGS_CACHE, DIFF_JOBS_CACHE } from './cache.js';
export {
  type OutputSink,
  type LogSearchOptions,
  LogSearch,
  compilePattern,
  splitLines,
  formatRelativeTime,
  DEFAULT_PATTERN,
  LOG_EXTENSION,
} from './search/log-search.js';
export {
  type ArtifactDiffRequest,
  type ArtifactDiffOptions,
  ArtifactDiff,
  artifactExtension,
  DEFAULT_DIFF_TOOL,
  FALLBACK_EXTENSION,
} from './diff/artifact-diff.js';

// External programs
export {
  type ProcessRunner,
  type ProcessResult,
  type RunOptions,
  SpawnProcessRunner,
  parseCommand,
  formatCommand,
  describeExit,
} from './process.js';

// Logging
export * from './observability.js';

// Types
export * from './types.js';
