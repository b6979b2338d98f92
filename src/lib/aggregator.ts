import type { GitHubApi } from './api.js';
import { sleep as realSleep } from './github.js';
import { repositoryKey } from './paginator.js';
import type { PullRequestNode, PullRequestRecord, RepositoryRef, Sleep } from './types.js';

const MS_PER_HOUR = 3_600_000;

export interface AdmissionThresholds {
  /** Records must last strictly longer than this. */
  minDurationHours: number;
  minReviews: number;
}

export interface AggregateOptions extends AdmissionThresholds {
  /** Most records accepted for one repository. */
  cap: number;
  pageSize: number;
  /** Pause before each dependent query. */
  requestDelayMs: number;
  /** Pause between pull request pages. */
  pageDelayMs: number;
}

export interface AggregateHooks {
  onRecord?: (record: PullRequestRecord) => void;
  sleep?: Sleep;
}

/**
 * Hours from creation to merge, or to close when the pull request was not
 * merged. `null` when neither timestamp is set or a timestamp does not parse.
 */
export function computeDurationHours(node: Pick<PullRequestNode, 'createdAt' | 'mergedAt' | 'closedAt'>): number | null {
  const terminal = node.mergedAt ?? node.closedAt;
  if (!terminal) return null;
  const elapsed = Date.parse(terminal) - Date.parse(node.createdAt);
  return Number.isNaN(elapsed) ? null : elapsed / MS_PER_HOUR;
}

export function isAdmitted(
  record: { durationHours: number; reviews: { totalCount: number } },
  thresholds: AdmissionThresholds,
): boolean {
  return record.durationHours > thresholds.minDurationHours && record.reviews.totalCount >= thresholds.minReviews;
}

/**
 * Walk the closed and merged pull requests of one repository and join the
 * follow-up queries into admitted records.
 *
 * Everything here is sequential. A page that cannot be fetched ends the walk
 * and the records accepted so far are returned.
 *
 * @param options Admission thresholds, per-repository cap and pacing.
 * @param hooks   `onRecord` fires for each accepted record as soon as it is built.
 */
export async function aggregatePullRequests(
  api: GitHubApi,
  repository: RepositoryRef,
  options: AggregateOptions,
  hooks: AggregateHooks = {},
): Promise<PullRequestRecord[]> {
  const pause = hooks.sleep ?? realSleep;
  const label = repositoryKey(repository);
  const accepted: PullRequestRecord[] = [];
  let cursor: string | null = null;

  while (accepted.length < options.cap) {
    const first = Math.min(options.pageSize, options.cap - accepted.length);
    const page = await api.fetchPullRequestPage(repository, { first, cursor });
    if (!page) {
      console.warn(`Stopping ${label} after ${accepted.length} pull requests: page fetch failed.`);
      break;
    }
    if (page.nodes.length === 0) break;

    for (const node of page.nodes) {
      if (accepted.length >= options.cap) break;
      const record = await buildRecord(api, repository, node, options, pause);
      if (!record) continue;
      accepted.push(record);
      hooks.onRecord?.(record);
    }

    const { endCursor, hasNextPage } = page.pageInfo;
    if (!hasNextPage || !endCursor || accepted.length >= options.cap) break;
    cursor = endCursor;
    await pause(options.pageDelayMs);
  }

  return accepted;
}

async function buildRecord(
  api: GitHubApi,
  repository: RepositoryRef,
  node: PullRequestNode,
  options: AggregateOptions,
  pause: Sleep,
): Promise<PullRequestRecord | null> {
  const durationHours = computeDurationHours(node);
  if (durationHours === null || durationHours <= options.minDurationHours) return null;

  await pause(options.requestDelayMs);
  const reviews = await api.fetchReviewCount(repository, node.number);
  if (reviews === null || reviews < options.minReviews) return null;

  await pause(options.requestDelayMs);
  const details = await api.fetchPullRequestDetails(repository, node.number);
  if (!details) return null;

  await pause(options.requestDelayMs);
  const comments = await api.fetchCommentCount(repository, node.number);

  await pause(options.requestDelayMs);
  const participants = await api.fetchParticipantCount(repository, node.number);

  return {
    ...node,
    ...details,
    reviews: { totalCount: reviews },
    comments: { totalCount: comments ?? 0 },
    participants: { totalCount: participants ?? 0 },
    repository: { owner: repository.owner, name: repository.name },
    durationHours,
  };
}
