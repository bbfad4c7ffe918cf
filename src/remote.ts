/**
 * Server and repository detection from the local git checkout.
 * @module remote
 */

import type { ProcessRunner } from './process.js';
import { SpawnFailedError } from './errors.js';
import { NoopLogger, type Logger } from './observability.js';

/**
 * Server and repository slug derived from a remote URL
 */
export interface RemoteInfo {
  serverUrl: string;
  repoSlug: string;
}

const HTTP_REMOTE = /^(https?):\/\/(?:[^@/]+@)?([^/]+)\/(.+?)(?:\.git)?\/?$/;
const SCP_REMOTE = /^[^@\s/]+@([^:\s/]+):\/?(.+?)(?:\.git)?\/?$/;

/**
 * Parse a git remote URL.
 *
 * Supports `http(s)://[user@]host/path[.git]` and the SCP-like `user@host:path[.git]`
 * form. Any other form yields undefined.
 *
 * @example
 * ```typescript
 * parseRemoteUrl('git@gitlab.example.com:group/proj.git');
 * // => { serverUrl: 'https://gitlab.example.com', repoSlug: 'group/proj' }
 * ```
 */
export function parseRemoteUrl(url: string): RemoteInfo | undefined {
  const trimmed = url.trim();

  const http = HTTP_REMOTE.exec(trimmed);
  if (http) {
    return { serverUrl: `${http[1]}://${http[2]}`, repoSlug: http[3] };
  }

  const scp = SCP_REMOTE.exec(trimmed);
  if (scp) {
    return { serverUrl: `https://${scp[1]}`, repoSlug: scp[2] };
  }

  return undefined;
}

/**
 * Read the first configured remote of the git repository in the working directory.
 *
 * Resolves to undefined when no usable remote is found.
 */
export async function detectRemote(
  runner: ProcessRunner,
  logger: Logger = new NoopLogger()
): Promise<RemoteInfo | undefined> {
  let output: string;
  try {
    const result = await runner.run(['git', 'config', '--get-regexp', '^remote\\..*\\.url$']);
    if (result.exitCode !== 0) {
      logger.debug('No git remote configured', { exitCode: result.exitCode });
      return undefined;
    }
    output = result.stdout.toString();
  } catch (error) {
    if (error instanceof SpawnFailedError) {
      logger.debug('git is not available for remote detection', { reason: error.message });
      return undefined;
    }
    throw error;
  }

  // Each line reads "remote.<name>.url <url>", in configuration order.
  const firstLine = output.split('\n').find((line) => line.trim().length > 0);
  if (!firstLine) {
    return undefined;
  }
  const url = firstLine.trim().split(/\s+/).slice(1).join(' ');
  const info = parseRemoteUrl(url);
  if (!info) {
    logger.debug('Remote URL not recognised', { url });
  }
  return info;
}
