import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({}, {});

    expect(config).toMatchObject({
      apiUrl: 'https://api.github.com',
      searchQuery: 'stars:>1000 sort:stars-desc',
      repositoryLimit: 50,
      minPullRequests: 100,
      repositoryPageSize: 10,
      pullRequestsPerRepository: 50,
      repositoryConcurrency: 10,
      pullRequestConcurrency: 5,
      timeoutMs: 30_000,
      maxRetries: 5,
      retryDelayMs: 10_000,
      minDurationHours: 1,
      minReviews: 1,
      checkpointEvery: 10,
      checkpointRetain: null,
      sampleSize: 100,
      dataDir: 'data',
      resultsDir: 'results',
    });
    expect(config.token).toBeUndefined();
  });

  it('prefers flags over the environment', () => {
    const config = loadConfig(
      { 'repo-limit': '3', token: 'flag-token' },
      { REPO_LIMIT: '7', MIN_PULL_REQUESTS: '20', GITHUB_TOKEN: 'test-secret' },
    );

    expect(config.repositoryLimit).toBe(3);
    expect(config.minPullRequests).toBe(20);
    expect(config.token).toBe('flag-token');
  });

  it('falls back to GITHUB_ACCESS_TOKEN and ignores blank values', () => {
    expect(loadConfig({}, { GITHUB_TOKEN: '  ', GITHUB_ACCESS_TOKEN: 'test-secret' }).token).toBe('test-secret');
  });

  it('clamps page sizes to what the API accepts', () => {
    const config = loadConfig({ 'repo-page-size': '500', 'pr-page-size': '0' }, {});

    expect(config.repositoryPageSize).toBe(100);
    expect(config.pullRequestPageSize).toBe(1);
  });

  it('normalizes the API base URL', () => {
    expect(loadConfig({ 'api-url': 'https://github.example.com/api/graphql' }, {}).apiUrl).toBe(
      'https://github.example.com/api',
    );
    expect(loadConfig({}, { GITHUB_API_URL: 'https://github.example.com/api/' }).apiUrl).toBe(
      'https://github.example.com/api',
    );
  });

  it('reads the checkpoint retention when given', () => {
    expect(loadConfig({ 'checkpoint-retain': '3' }, {}).checkpointRetain).toBe(3);
  });

  it('rejects values that do not validate', () => {
    expect(() => loadConfig({ 'repo-limit': 'many' }, {})).toThrow(ZodError);
    expect(() => loadConfig({ 'pr-concurrency': '0' }, {})).toThrow(ZodError);
    expect(() => loadConfig({ 'api-url': 'not a url' }, {})).toThrow(ZodError);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}, {}))).toBe(true);
  });
});
