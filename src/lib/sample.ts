import type { PullRequestRecord, PullRequestState, Repository } from './types.js';

const MS_PER_HOUR = 3_600_000;
const MAX_SAMPLE_REPOSITORIES = 20;

export interface SampleOptions {
  /** Number of pull requests to generate. */
  count: number;
  /** Uniform source in [0, 1). Defaults to `Math.random`. */
  random?: () => number;
}

export interface SampleDataset {
  repositories: Repository[];
  pullRequests: PullRequestRecord[];
}

/**
 * Build a synthetic dataset shaped like a real harvest, so the analysis can be
 * run without a token. Merged pull requests are drawn smaller, with longer
 * descriptions; review counts grow with size and interactions with reviews.
 */
export function generateSampleDataset({ count, random = Math.random }: SampleOptions): SampleDataset {
  const int = (min: number, max: number) => min + Math.floor(random() * (max - min + 1));
  const uniform = (min: number, max: number) => min + random() * (max - min);

  const repositoryCount = Math.max(1, Math.min(MAX_SAMPLE_REPOSITORIES, Math.floor(count / 5)));
  const repositories = Array.from({ length: repositoryCount }, (_, i): Repository => ({
    owner: `sample-owner-${i}`,
    name: `sample-repo-${i}`,
    url: `https://github.com/sample-owner-${i}/sample-repo-${i}`,
    description: null,
    stargazerCount: null,
    forkCount: null,
    createdAt: null,
    updatedAt: null,
    primaryLanguage: null,
    license: null,
    pullRequests: { totalCount: Math.floor(count / 10) },
  }));

  const pullRequests: PullRequestRecord[] = [];
  for (let i = 0; i < count; i++) {
    const repository = repositories[i % repositoryCount];
    if (!repository) continue;

    const state: PullRequestState = random() > 0.3 ? 'MERGED' : 'CLOSED';
    const merged = state === 'MERGED';
    const created = Date.UTC(2023, int(1, 12) - 1, int(1, 28), int(0, 23));
    const durationHours = uniform(2, 240);
    const ended = new Date(created + durationHours * MS_PER_HOUR).toISOString();

    const changedFiles = merged ? int(1, 20) : int(10, 50);
    const additions = merged ? int(10, 500) : int(200, 2000);
    const deletions = merged ? int(5, 200) : int(100, 1000);
    const bodyLength = merged ? int(100, 1000) : int(0, 300);

    const reviews = Math.max(1, Math.floor(changedFiles * uniform(0.5, 2)));
    const comments = Math.floor(reviews * uniform(1, 5));
    const participants = Math.max(1, Math.floor(reviews * uniform(0.3, 1.5)));

    pullRequests.push({
      number: i + 1,
      state,
      title: `Sample PR ${i + 1}`,
      bodyText: 'A'.repeat(bodyLength),
      createdAt: new Date(created).toISOString(),
      mergedAt: merged ? ended : null,
      closedAt: ended,
      changedFiles,
      additions,
      deletions,
      reviews: { totalCount: reviews },
      comments: { totalCount: comments },
      participants: { totalCount: participants },
      repository: { owner: repository.owner, name: repository.name },
      durationHours,
    });
  }

  return { repositories, pullRequests };
}
