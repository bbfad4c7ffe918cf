/**
 * End-to-end tests of both command-line tools against in-process stand-ins.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { run as searchLogs } from '../cli/search-logs.js';
import { run as diffJobs, parseJobId } from '../cli/diff-jobs.js';
import type { CliDependencies } from '../cli/shared.js';
import { MockFetch } from '../__mocks__/http.js';
import { MockProcessRunner, inputText } from '../__mocks__/process.js';
import { PROJECT_URL, SERVER_URL, createTempDir } from './helpers.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');
const CONNECTION = ['--server', SERVER_URL, '--repo', 'group/proj'];

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

describe('command-line tools', () => {
  let root: { path: string; cleanup: () => Promise<void> };
  let http: MockFetch;
  let runner: MockProcessRunner;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    root = await createTempDir();
    http = new MockFetch();
    runner = new MockProcessRunner();
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await root.cleanup();
  });

  function deps(env: NodeJS.ProcessEnv = { GITLAB_TOKEN: 'test-token' }): Partial<CliDependencies> {
    return {
      env,
      stdout: (line) => stdout.push(line),
      stderr: (text) => stderr.push(text),
      fetch: http.fetch,
      runner,
      cacheRoot: root.path,
      now: () => NOW,
    };
  }

  describe('search-logs', () => {
    beforeEach(() => {
      http
        .onJson('/deployments', [
          {
            created_at: '2024-05-01T10:00:00.000Z',
            deployable: { id: 42 },
            user: { name: 'Alice' },
            environment: { slug: 'production' },
          },
        ])
        .onText('/jobs/42/trace', 'Preparing\nERROR: disk full\n');
    });

    it('should print matching jobs and exit 0', async () => {
      const code = await searchLogs([...CONNECTION, '-r', 'ERROR', '--status', 'success'], deps());

      expect(code).toBe(0);
      expect(stdout).toEqual([
        'job 42 https://gitlab.example.com/group/proj/-/jobs/42 by Alice on production, 2 hours ago',
        'ERROR: disk full',
      ]);
      expect(stderr).toEqual([]);
      expect(http.getUrls()[0]).toBe(
        `${PROJECT_URL}/deployments?sort=desc&environment=&status=success&per_page=100`
      );
    });

    it('should pass the environment filter', async () => {
      await searchLogs([...CONNECTION, '--env', 'production'], deps());

      expect(http.getUrls()[0]).toBe(
        `${PROJECT_URL}/deployments?sort=desc&environment=production&per_page=100`
      );
    });

    it('should detect server and repository from the git remote', async () => {
      runner.on('git', () => ({
        stdout: Buffer.from('remote.origin.url git@gitlab.example.com:group/proj.git\n'),
      }));

      const code = await searchLogs([], deps());

      expect(code).toBe(0);
      expect(runner.getPrograms()).toEqual(['git']);
      expect(http.getUrls()[0]).toBe(`${PROJECT_URL}/deployments?sort=desc&environment=&per_page=100`);
    });

    it('should exit 1 without a token', async () => {
      const code = await searchLogs(CONNECTION, deps({}));

      expect(code).toBe(1);
      expect(stderr.join('')).toBe('error: No GitLab token: pass --token or set GITLAB_TOKEN\n');
      expect(http.getUrls()).toEqual([]);
    });

    it('should exit 1 for an invalid pattern', async () => {
      const code = await searchLogs([...CONNECTION, '--regex', '('], deps());

      expect(code).toBe(1);
      expect(stderr.join('')).toBe('error: Invalid regular expression "("\n');
    });

    it('should suggest --debug after a failed request', async () => {
      const failing = new MockFetch().onJson('/deployments', { message: '401 Unauthorized' }, 401);
      const code = await searchLogs(CONNECTION, { ...deps(), fetch: failing.fetch });

      expect(code).toBe(1);
      expect(stderr.join('')).toBe(
        'error: Unauthorized - check your GitLab token (HTTP 401: 401 Unauthorized)\n' +
        'warn: Re-run with --debug to see the underlying request\n'
      );
    });

    it('should show the equivalent requests with --debug', async () => {
      const code = await searchLogs([...CONNECTION, '--debug'], deps());

      expect(code).toBe(0);
      expect(stderr).toContain(
        `debug: curl --silent --show-error --fail --header 'Authorization: Bearer [REDACTED]' ` +
        `${PROJECT_URL}/deployments?sort=desc&environment=&per_page=100\n`
      );
      expect(stderr.join('')).not.toContain('test-token');
    });

    it('should empty the cache with --clean', async () => {
      const stale = join(root.path, 'gitlab-search-logs', '99.log');
      await mkdir(join(root.path, 'gitlab-search-logs'), { recursive: true });
      await writeFile(stale, 'old log');

      const code = await searchLogs([...CONNECTION, '--clean', '-r', 'ERROR'], deps());

      expect(code).toBe(0);
      await expect(exists(stale)).resolves.toBe(false);
      await expect(exists(join(root.path, 'gitlab-search-logs', '42.log'))).resolves.toBe(true);
    });

    it('should exit 1 for unknown options', async () => {
      const code = await searchLogs(['--bogus'], deps());

      expect(code).toBe(1);
      expect(stderr.join('')).toContain("unknown option '--bogus'");
    });

    it('should exit 1 for unexpected arguments', async () => {
      const code = await searchLogs([...CONNECTION, 'extra'], deps());

      expect(code).toBe(1);
      expect(http.getUrls()).toEqual([]);
    });
  });

  describe('diff-jobs', () => {
    const cacheFile = (jobId: number): string => join(root.path, 'gitlab-diff-jobs', `${jobId}.xml`);

    beforeEach(() => {
      http
        .onText('/jobs/100/artifacts/report.xml', 'b\na\n')
        .onText('/jobs/101/artifacts/report.xml', 'c\nb\n');
    });

    it('should diff the two artifacts and exit 0', async () => {
      const code = await diffJobs([...CONNECTION, '100', '101', 'report.xml'], deps());

      expect(code).toBe(0);
      expect(runner.getRuns().map((r) => r.argv)).toEqual([
        ['diff', '-u', cacheFile(100), cacheFile(101)],
      ]);
    });

    it('should preprocess and use a custom diff program', async () => {
      const inputs: string[] = [];
      runner.on('sort', (_argv, options) => {
        const text = inputText(options);
        inputs.push(text);
        return { stdout: Buffer.from(`${text.split('\n').filter(Boolean).sort().join('\n')}\n`) };
      });

      const code = await diffJobs(
        [...CONNECTION, '--preprocess', 'sort', '--difftool', 'vimdiff -R', '100', '101', 'report.xml'],
        deps()
      );

      expect(code).toBe(0);
      expect(inputs).toEqual(['b\na\n', 'c\nb\n']);
      expect(runner.getRuns().map((r) => r.argv)).toEqual([
        ['sort'],
        ['sort'],
        ['vimdiff', '-R', cacheFile(100), cacheFile(101)],
      ]);
    });

    it('should report a failing preprocessor with its stderr', async () => {
      runner.on('sort', () => ({ exitCode: 2, stderr: 'sort: bad input\n' }));

      const code = await diffJobs([...CONNECTION, '--preprocess', 'sort', '100', '101', 'report.xml'], deps());

      expect(code).toBe(1);
      expect(stderr.join('')).toBe(
        'error: Preprocessing job 100 failed: sort exited with code 2\n' +
        'error: sort: bad input\n'
      );
      expect(runner.getPrograms()).toEqual(['sort']);
    });

    it('should reject shell operators before any request', async () => {
      const code = await diffJobs(
        [...CONNECTION, '--preprocess', 'sort | uniq', '100', '101', 'report.xml'],
        deps()
      );

      expect(code).toBe(1);
      expect(stderr.join('')).toBe('error: Unsupported shell operator "|" in command: sort | uniq\n');
      expect(http.getUrls()).toEqual([]);
    });

    it('should reject an invalid job id', async () => {
      const code = await diffJobs([...CONNECTION, 'abc', '101', 'report.xml'], deps());

      expect(code).toBe(1);
      expect(stderr.join('')).toContain('Job id must be a positive integer.');
      expect(http.getUrls()).toEqual([]);
    });

    it('should require the artifact path', async () => {
      const code = await diffJobs([...CONNECTION, '100', '101'], deps());

      expect(code).toBe(1);
      expect(stderr.join('')).toContain("missing required argument 'ARTIFACT_PATH'");
    });
  });
});

describe('parseJobId', () => {
  it('should accept positive integers', () => {
    expect(parseJobId('42')).toBe(42);
  });

  it('should reject anything else', () => {
    for (const value of ['0', '-1', '1.5', '1e3', '', 'abc']) {
      expect(() => parseJobId(value)).toThrow('Job id must be a positive integer.');
    }
  });
});
