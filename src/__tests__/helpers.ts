/**
 * Shared fixtures for the test suites.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SecretString } from '../auth.js';
import { GitLabClient } from '../client.js';
import type { ToolConfig } from '../config.js';
import type { Logger } from '../observability.js';
import { MockFetch } from '../__mocks__/http.js';

export const SERVER_URL = 'https://gitlab.example.com';
export const API_URL = `${SERVER_URL}/api/v4`;
export const PROJECT_URL = `${API_URL}/projects/group%2fproj`;

export function createTestConfig(overrides: Partial<Omit<ToolConfig, 'token'>> = {}): ToolConfig {
  return {
    serverUrl: SERVER_URL,
    repoSlug: 'group/proj',
    token: new SecretString('test-token'),
    debugEnabled: false,
    ...overrides,
  };
}

export function createTestClient(
  http: MockFetch,
  options: { config?: ToolConfig; logger?: Logger } = {}
): GitLabClient {
  return new GitLabClient(options.config ?? createTestConfig(), {
    fetch: http.fetch,
    logger: options.logger,
  });
}

/**
 * A fresh temporary directory, removed by the returned cleanup
 */
export async function createTempDir(): Promise<{ path: string; cleanup: () => Promise<void> }> {
  const path = await mkdtemp(join(tmpdir(), 'gitlab-job-tools-test-'));
  return {
    path,
    cleanup: () => rm(path, { recursive: true, force: true }),
  };
}
