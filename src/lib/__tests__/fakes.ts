import { vi } from 'vitest';
import type { GitHubApi } from '../api.js';
import type { PullRequestDetails, PullRequestNode, Repository } from '../types.js';

// ── In-process stand-ins for the GitHub API ─────────────────────────────────

/** A typed API whose unstubbed methods fail the test when called. */
export function fakeApi(overrides: Partial<GitHubApi> = {}): GitHubApi {
  const unexpected = (name: string) => async (): Promise<never> => {
    throw new Error(`${name} was not expected`);
  };
  return {
    searchRepositories: unexpected('searchRepositories'),
    fetchPullRequestCount: unexpected('fetchPullRequestCount'),
    fetchPullRequestPage: unexpected('fetchPullRequestPage'),
    fetchReviewCount: unexpected('fetchReviewCount'),
    fetchPullRequestDetails: unexpected('fetchPullRequestDetails'),
    fetchCommentCount: unexpected('fetchCommentCount'),
    fetchParticipantCount: unexpected('fetchParticipantCount'),
    ...overrides,
  };
}

export function repository(owner: string, name: string): Repository {
  return {
    owner,
    name,
    url: `https://github.test/${owner}/${name}`,
    description: null,
    stargazerCount: 1000,
    forkCount: 10,
    createdAt: '2020-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
    primaryLanguage: 'TypeScript',
    license: 'MIT License',
  };
}

/** Serves `pages` in order; page `i` is requested with cursor `cursor-i` (the first with `null`). */
export function searchPages(pages: Repository[][]) {
  return vi.fn(async ({ cursor }: { query: string; first: number; cursor: string | null }) => {
    const index = cursor === null ? 0 : Number(cursor.replace('cursor-', ''));
    const repositories = pages[index];
    if (!repositories) return null;
    return {
      repositories,
      nodeCount: repositories.length,
      pageInfo: { endCursor: `cursor-${index + 1}`, hasNextPage: index + 1 < pages.length },
    };
  });
}

export function pullRequestNode(
  number: number,
  times: { createdAt: string; mergedAt?: string | null; closedAt?: string | null },
): PullRequestNode {
  const mergedAt = times.mergedAt ?? null;
  return {
    number,
    state: mergedAt ? 'MERGED' : 'CLOSED',
    createdAt: times.createdAt,
    mergedAt,
    closedAt: times.closedAt ?? mergedAt,
  };
}

export function details(title = 'Improve parser'): PullRequestDetails {
  return { title, bodyText: 'Fixes the tokenizer.', changedFiles: 3, additions: 40, deletions: 12 };
}

export const sleepNoop = () => vi.fn(async (_ms: number) => {});
