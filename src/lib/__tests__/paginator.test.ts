import { describe, it, expect, vi, beforeEach } from 'vitest';
import { candidates, paginateRepositories, repositoryKey, type CandidatePage } from '../paginator.js';
import type { Repository } from '../types.js';
import { fakeApi, repository, searchPages } from './fakes.js';

async function collect(source: AsyncIterable<Repository>): Promise<string[]> {
  const keys: string[] = [];
  for await (const item of source) keys.push(repositoryKey(item));
  return keys;
}

const base = { searchQuery: 'stars:>1000', pageSize: 3, maxCandidates: 100 };

describe('paginateRepositories', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('walks every page and drops repositories already seen', async () => {
    const searchRepositories = searchPages([
      [repository('acme', 'a'), repository('acme', 'b')],
      [repository('acme', 'b'), repository('acme', 'c')],
    ]);
    const api = fakeApi({ searchRepositories });

    const keys = await collect(candidates(paginateRepositories(api, base)));

    expect(keys).toEqual(['acme/a', 'acme/b', 'acme/c']);
    expect(searchRepositories).toHaveBeenCalledTimes(2);
    expect(searchRepositories.mock.calls.map(([args]) => args.cursor)).toEqual([null, 'cursor-1']);
  });

  it('yields page metadata alongside the repositories', async () => {
    const api = fakeApi({ searchRepositories: searchPages([[repository('acme', 'a')], [repository('acme', 'b')]]) });
    const pages: CandidatePage[] = [];

    for await (const page of paginateRepositories(api, base)) pages.push(page);

    expect(pages.map((page) => [page.endCursor, page.hasNextPage])).toEqual([
      ['cursor-1', true],
      ['cursor-2', false],
    ]);
  });

  it('caps the walk at maxCandidates and narrows the last request', async () => {
    const searchRepositories = searchPages([
      [repository('acme', 'a'), repository('acme', 'b'), repository('acme', 'c')],
      [repository('acme', 'd'), repository('acme', 'e')],
    ]);
    const api = fakeApi({ searchRepositories });

    const keys = await collect(candidates(paginateRepositories(api, { ...base, maxCandidates: 4 })));

    expect(keys).toEqual(['acme/a', 'acme/b', 'acme/c', 'acme/d']);
    expect(searchRepositories.mock.calls.map(([args]) => args.first)).toEqual([3, 1]);
  });

  it('resumes from a cursor', async () => {
    const api = fakeApi({
      searchRepositories: searchPages([[repository('acme', 'a')], [repository('acme', 'b')]]),
    });

    const keys = await collect(candidates(paginateRepositories(api, { ...base, cursor: 'cursor-1' })));

    expect(keys).toEqual(['acme/b']);
  });

  it('stops when a page cannot be fetched', async () => {
    const searchRepositories = vi
      .fn<GitHubSearch>()
      .mockResolvedValueOnce({
        repositories: [repository('acme', 'a')],
        nodeCount: 1,
        pageInfo: { endCursor: 'cursor-1', hasNextPage: true },
      })
      .mockResolvedValueOnce(null);
    const api = fakeApi({ searchRepositories });

    const keys = await collect(candidates(paginateRepositories(api, base)));

    expect(keys).toEqual(['acme/a']);
    expect(console.warn).toHaveBeenCalledWith('Repository search page could not be fetched; stopping pagination.');
  });

  it('stops on an empty page even if more are advertised', async () => {
    const searchRepositories = vi.fn<GitHubSearch>().mockResolvedValue({
      repositories: [],
      nodeCount: 0,
      pageInfo: { endCursor: 'cursor-1', hasNextPage: true },
    });
    const api = fakeApi({ searchRepositories });

    expect(await collect(candidates(paginateRepositories(api, base)))).toEqual([]);
    expect(searchRepositories).toHaveBeenCalledTimes(1);
  });

  it('keeps walking past a page whose nodes all lacked an identity', async () => {
    const searchRepositories = vi
      .fn<GitHubSearch>()
      .mockResolvedValueOnce({
        repositories: [],
        nodeCount: 2,
        pageInfo: { endCursor: 'cursor-1', hasNextPage: true },
      })
      .mockResolvedValueOnce({
        repositories: [repository('acme', 'ok')],
        nodeCount: 1,
        pageInfo: { endCursor: 'cursor-2', hasNextPage: false },
      });
    const api = fakeApi({ searchRepositories });

    const keys = await collect(candidates(paginateRepositories(api, base)));

    expect(keys).toEqual(['acme/ok']);
    expect(searchRepositories.mock.calls.map(([args]) => args.cursor)).toEqual([null, 'cursor-1']);
  });
});

type GitHubSearch = ReturnType<typeof fakeApi>['searchRepositories'];
