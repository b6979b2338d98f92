import type { GitHubApi } from './api.js';
import type { Repository } from './types.js';

export interface PaginateOptions {
  searchQuery: string;
  pageSize: number;
  /** Upper bound on candidates yielded across all pages. */
  maxCandidates: number;
  /** Resume after this opaque cursor. */
  cursor?: string | null;
}

export interface CandidatePage {
  repositories: Repository[];
  endCursor: string | null;
  hasNextPage: boolean;
}

export function repositoryKey(repository: { owner: string; name: string }): string {
  return `${repository.owner}/${repository.name}`;
}

/**
 * Lazily walk the repository search, one page per `next()`.
 *
 * Repositories already yielded are dropped, so a candidate appears at most
 * once. The walk ends on the last page, on an empty page, once
 * `maxCandidates` were yielded, or when a page cannot be fetched.
 */
export async function* paginateRepositories(
  api: GitHubApi,
  options: PaginateOptions,
): AsyncGenerator<CandidatePage, void, undefined> {
  const seen = new Set<string>();
  let cursor = options.cursor ?? null;
  let yielded = 0;

  while (yielded < options.maxCandidates) {
    const first = Math.min(options.pageSize, options.maxCandidates - yielded);
    const page = await api.searchRepositories({ query: options.searchQuery, first, cursor });
    if (!page) {
      console.warn('Repository search page could not be fetched; stopping pagination.');
      return;
    }

    const repositories: Repository[] = [];
    for (const repository of page.repositories) {
      const key = repositoryKey(repository);
      if (seen.has(key) || yielded + repositories.length >= options.maxCandidates) continue;
      seen.add(key);
      repositories.push(repository);
    }

    yielded += repositories.length;
    const { endCursor, hasNextPage } = page.pageInfo;
    // Nodes without an identity are dropped upstream; only a page with no nodes at all is the end.
    if (page.nodeCount === 0) return;
    yield { repositories, endCursor, hasNextPage };

    if (!hasNextPage || !endCursor) return;
    cursor = endCursor;
  }
}

/** Flatten {@link paginateRepositories} into a stream of candidates. */
export async function* candidates(pages: AsyncIterable<CandidatePage>): AsyncGenerator<Repository, void, undefined> {
  for await (const page of pages) {
    yield* page.repositories;
  }
}
