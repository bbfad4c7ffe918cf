/**
 * Tests for job trace and artifact access.
 */

import { describe, it, expect } from 'vitest';
import { JobsService } from '../services/jobs.js';
import { MockFetch } from '../__mocks__/http.js';
import { PROJECT_URL, createTestClient, createTestConfig } from './helpers.js';

describe('JobsService', () => {
  it('should fetch a job trace', async () => {
    const http = new MockFetch().onText('/jobs/42/trace', 'step 1\nstep 2\n');
    const jobs = new JobsService(createTestClient(http));

    await expect(jobs.getTrace(42)).resolves.toBe('step 1\nstep 2\n');
    expect(http.getUrls()).toEqual([`${PROJECT_URL}/jobs/42/trace`]);
  });

  it('should fetch an artifact file as bytes', async () => {
    const http = new MockFetch().on('/jobs/100/artifacts/', { body: Buffer.from('<xml/>') });
    const jobs = new JobsService(createTestClient(http));

    const content = await jobs.getArtifactFile(100, 'reports/junit.xml');

    expect(content.toString()).toBe('<xml/>');
    expect(http.getUrls()).toEqual([`${PROJECT_URL}/jobs/100/artifacts/reports/junit.xml`]);
  });

  it('should encode each artifact path segment on its own', () => {
    const jobs = new JobsService(createTestClient(new MockFetch()));

    expect(jobs.artifactUrl(5, '/out dir//report #1.txt')).toBe(
      `${PROJECT_URL}/jobs/5/artifacts/out%20dir/report%20%231.txt`
    );
  });

  it('should link to the job page', () => {
    const jobs = new JobsService(
      createTestClient(new MockFetch(), { config: createTestConfig({ repoSlug: 'group/sub/proj' }) })
    );

    expect(jobs.jobUrl(42)).toBe('https://gitlab.example.com/group/sub/proj/-/jobs/42');
    expect(jobs.traceUrl(42)).toBe(
      'https://gitlab.example.com/api/v4/projects/group%2fsub%2fproj/jobs/42/trace'
    );
  });
});
