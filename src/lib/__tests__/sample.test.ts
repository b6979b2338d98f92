import { describe, it, expect } from 'vitest';
import { generateSampleDataset } from '../sample.js';

describe('generateSampleDataset', () => {
  it('spreads pull requests over one repository per five', () => {
    const { repositories, pullRequests } = generateSampleDataset({ count: 10, random: () => 0.5 });

    expect(repositories.map((r) => [r.owner, r.name, r.pullRequests?.totalCount])).toEqual([
      ['sample-owner-0', 'sample-repo-0', 1],
      ['sample-owner-1', 'sample-repo-1', 1],
    ]);
    expect(pullRequests).toHaveLength(10);
    expect(pullRequests.map((pr) => pr.repository.name).slice(0, 3)).toEqual([
      'sample-repo-0',
      'sample-repo-1',
      'sample-repo-0',
    ]);
  });

  it('keeps at least one repository for tiny samples', () => {
    expect(generateSampleDataset({ count: 3, random: () => 0.5 }).repositories).toHaveLength(1);
  });

  it('draws a merged pull request from the configured ranges', () => {
    const [first] = generateSampleDataset({ count: 10, random: () => 0.5 }).pullRequests;

    expect(first).toEqual({
      number: 1,
      state: 'MERGED',
      title: 'Sample PR 1',
      bodyText: 'A'.repeat(550),
      createdAt: '2023-07-15T12:00:00.000Z',
      mergedAt: '2023-07-20T13:00:00.000Z',
      closedAt: '2023-07-20T13:00:00.000Z',
      changedFiles: 11,
      additions: 255,
      deletions: 103,
      reviews: { totalCount: 13 },
      comments: { totalCount: 39 },
      participants: { totalCount: 11 },
      repository: { owner: 'sample-owner-0', name: 'sample-repo-0' },
      durationHours: 121,
    });
  });

  it('draws closed pull requests larger and with shorter descriptions', () => {
    const [first] = generateSampleDataset({ count: 5, random: () => 0.1 }).pullRequests;

    expect(first?.state).toBe('CLOSED');
    expect(first?.mergedAt).toBeNull();
    expect(first?.closedAt).not.toBeNull();
    expect(first?.changedFiles).toBe(14);
    expect(first?.bodyText).toHaveLength(30);
  });
});
