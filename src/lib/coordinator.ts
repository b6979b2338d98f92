import { aggregatePullRequests } from './aggregator.js';
import type { GitHubApi } from './api.js';
import { CheckpointedCollection } from './checkpoint.js';
import type { CollectorConfig } from './config.js';
import { describeError } from './errors.js';
import { candidates, paginateRepositories, repositoryKey } from './paginator.js';
import { pMap, raceToQuota } from './pool.js';
import type { ProgressListener, PullRequestRecord, Repository, Sleep } from './types.js';

export type SelectionConfig = Pick<
  CollectorConfig,
  'searchQuery' | 'repositoryPageSize' | 'maxCandidates' | 'repositoryConcurrency' | 'repositoryLimit' | 'minPullRequests'
>;

export interface SelectionHooks {
  onAccept?: (repository: Repository, accepted: number) => void;
  onProgress?: ProgressListener;
  /** Resume the search after this cursor. */
  cursor?: string | null;
}

/**
 * Pick up to `repositoryLimit` repositories with at least `minPullRequests`
 * closed or merged pull requests.
 *
 * Candidates stream from the search while `repositoryConcurrency` lookups run
 * at once; acceptance follows completion order. Lookups still running when
 * the limit is reached are discarded.
 */
export async function selectRepositories(
  api: GitHubApi,
  config: SelectionConfig,
  hooks: SelectionHooks = {},
): Promise<Repository[]> {
  const { onAccept, onProgress } = hooks;
  const pages = paginateRepositories(api, {
    searchQuery: config.searchQuery,
    pageSize: config.repositoryPageSize,
    maxCandidates: config.maxCandidates,
    cursor: hooks.cursor,
  });

  let processed = 0;
  let accepted = 0;

  const selected = await raceToQuota(
    candidates(pages),
    { concurrency: config.repositoryConcurrency, quota: config.repositoryLimit },
    async (repository, signal) => {
      if (signal.aborted) return null;
      const totalCount = await api.fetchPullRequestCount(repository);
      processed++;
      onProgress?.({
        phase: 'repositories',
        repository: repositoryKey(repository),
        accepted,
        processed,
        total: config.repositoryLimit,
      });
      if (totalCount === null || totalCount < config.minPullRequests) return null;
      return { ...repository, pullRequests: { totalCount } };
    },
    (repository, count) => {
      accepted = count;
      console.log(
        `Accepted ${repositoryKey(repository)} (${repository.pullRequests?.totalCount ?? 0} closed/merged PRs) [${count}/${config.repositoryLimit}]`,
      );
      onAccept?.(repository, count);
    },
  );

  console.log(`Selected ${selected.length} repositories out of ${processed} candidates checked.`);
  return selected;
}

export type AggregationConfig = Pick<
  CollectorConfig,
  | 'pullRequestConcurrency'
  | 'pullRequestsPerRepository'
  | 'pullRequestPageSize'
  | 'minDurationHours'
  | 'minReviews'
  | 'requestDelayMs'
  | 'pageDelayMs'
>;

export interface AggregationHooks {
  /** Receives every accepted record; checkpoints follow from its store. */
  collection?: CheckpointedCollection<PullRequestRecord>;
  onProgress?: ProgressListener;
  sleep?: Sleep;
}

/**
 * Aggregate pull requests for every repository, `pullRequestConcurrency`
 * repositories at a time. A repository that throws is logged and skipped;
 * records it produced before failing are kept.
 */
export async function collectPullRequests(
  api: GitHubApi,
  repositories: readonly Repository[],
  config: AggregationConfig,
  hooks: AggregationHooks = {},
): Promise<PullRequestRecord[]> {
  const collection = hooks.collection ?? new CheckpointedCollection<PullRequestRecord>(null, 0);
  const options = {
    cap: config.pullRequestsPerRepository,
    pageSize: config.pullRequestPageSize,
    minDurationHours: config.minDurationHours,
    minReviews: config.minReviews,
    requestDelayMs: config.requestDelayMs,
    pageDelayMs: config.pageDelayMs,
  };
  let processed = 0;

  await pMap(repositories, config.pullRequestConcurrency, async (repository) => {
    const key = repositoryKey(repository);
    try {
      const records = await aggregatePullRequests(api, repository, options, {
        sleep: hooks.sleep,
        onRecord: (record) => collection.append(record),
      });
      console.log(`${key}: ${records.length} pull requests collected.`);
    } catch (err) {
      console.warn(`Skipping the rest of ${key}: ${describeError(err)}`);
    } finally {
      processed++;
      hooks.onProgress?.({
        phase: 'pull-requests',
        repository: key,
        accepted: collection.size,
        processed,
        total: repositories.length,
      });
    }
  });

  await collection.flush();
  return collection.snapshot();
}
