/**
 * Connection configuration for the GitLab job tools.
 *
 * Each field is resolved independently, from the highest priority source that
 * provides it: explicit option, environment variable, the local git remote,
 * then the built-in default. The result is frozen and never changes during a run.
 */

import { z } from 'zod';
import { SecretString } from './auth.js';
import { ConfigError } from './errors.js';
import type { RemoteInfo } from './remote.js';

/** Default GitLab server. */
export const DEFAULT_SERVER_URL = 'https://gitlab.com';

/** GitLab REST API version used for every request. */
export const API_VERSION = 'v4';

/** Environment variables read during resolution. */
export const ENV_TOKEN = 'GITLAB_TOKEN';
export const ENV_SERVER = 'GITLAB_BASE_URL';
export const ENV_REPO = 'GITLAB_REPO';

/**
 * Resolved, immutable configuration
 */
export interface ToolConfig {
  /**
   * Base URL of the GitLab instance, without trailing slash
   */
  readonly serverUrl: string;

  /**
   * Repository identifier, e.g. "group/subgroup/project"
   */
  readonly repoSlug: string;

  /**
   * Access token sent as a bearer credential
   */
  readonly token: SecretString;

  /**
   * Whether diagnostic output (equivalent commands, cache decisions) is enabled
   */
  readonly debugEnabled: boolean;
}

/**
 * Values given explicitly on the command line
 */
export interface ConfigInput {
  token?: string;
  server?: string;
  repo?: string;
  debug?: boolean;
}

/**
 * Where to look for values that were not given explicitly
 */
export interface ConfigSources {
  /**
   * Environment variables (default: process.env)
   */
  env?: NodeJS.ProcessEnv;

  /**
   * Remote detection; only consulted when server or repository is still unknown
   */
  detectRemote?: () => Promise<RemoteInfo | undefined>;
}

const serverUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'must start with http:// or https://',
  });

/**
 * First value that is set and non-empty
 */
function firstPresent(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== '')?.trim();
}

/**
 * Validate and normalise a server URL.
 *
 * @throws {ConfigError} If the value is not an absolute http(s) URL
 */
export function normalizeServerUrl(value: string): string {
  const result = serverUrlSchema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? 'invalid URL';
    throw new ConfigError(`Invalid GitLab server URL "${value}": ${reason}`);
  }
  return value.replace(/\/+$/, '');
}

/**
 * Resolve the configuration for one run.
 *
 * @throws {ConfigError} If no token or repository could be found, or the server is invalid
 *
 * @example
 * ```typescript
 * const config = await resolveConfig(
 *   { repo: 'group/project' },
 *   { env: { GITLAB_TOKEN: 'test-token' } }
 * );
 * config.serverUrl; // 'https://gitlab.com'
 * ```
 */
export async function resolveConfig(
  input: ConfigInput,
  sources: ConfigSources = {}
): Promise<ToolConfig> {
  const env = sources.env ?? process.env;

  const token = firstPresent(input.token, env[ENV_TOKEN]);
  let server = firstPresent(input.server, env[ENV_SERVER]);
  let repo = firstPresent(input.repo, env[ENV_REPO]);

  if ((server === undefined || repo === undefined) && sources.detectRemote) {
    const remote = await sources.detectRemote();
    server ??= remote?.serverUrl;
    repo ??= remote?.repoSlug;
  }

  if (token === undefined) {
    throw new ConfigError(
      `No GitLab token: pass --token or set ${ENV_TOKEN}`
    );
  }

  const slug = repo?.replace(/^\/+|\/+$/g, '');
  if (slug === undefined || slug === '') {
    throw new ConfigError(
      `No repository: pass --repo, set ${ENV_REPO}, or run inside a git checkout with a GitLab remote`
    );
  }

  return Object.freeze({
    serverUrl: normalizeServerUrl(server ?? DEFAULT_SERVER_URL),
    repoSlug: slug,
    token: new SecretString(token),
    debugEnabled: input.debug ?? false,
  });
}
