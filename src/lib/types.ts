export type TotalCount = { totalCount: number };

export interface RepositoryRef {
  owner: string;
  name: string;
}

export interface Repository extends RepositoryRef {
  url: string | null;
  description: string | null;
  stargazerCount: number | null;
  forkCount: number | null;
  createdAt: string | null;
  updatedAt: string | null;
  primaryLanguage: string | null;
  license: string | null;
  /** Closed + merged pull requests, attached by the secondary-filter lookup. */
  pullRequests?: TotalCount;
}

export interface PageInfo {
  endCursor: string | null;
  hasNextPage: boolean;
}

export interface RepositoryPage {
  repositories: Repository[];
  /** Nodes on the page before those without an identity were dropped. */
  nodeCount: number;
  pageInfo: PageInfo;
}

export type PullRequestState = 'OPEN' | 'CLOSED' | 'MERGED';

export interface PullRequestNode {
  number: number;
  state: PullRequestState;
  createdAt: string;
  mergedAt: string | null;
  closedAt: string | null;
}

export interface PullRequestPage {
  totalCount: number;
  nodes: PullRequestNode[];
  pageInfo: PageInfo;
}

export interface PullRequestDetails {
  title: string;
  bodyText: string;
  changedFiles: number;
  additions: number;
  deletions: number;
}

export interface PullRequestRecord extends PullRequestNode, PullRequestDetails {
  reviews: TotalCount;
  comments: TotalCount;
  participants: TotalCount;
  repository: RepositoryRef;
  /** Hours between creation and merge (or close). */
  durationHours: number;
}

/** A pull request row read back from CSV, with timestamps and counters restored. */
export interface LoadedPullRequest {
  repository: RepositoryRef;
  number: number;
  state: string;
  title: string;
  bodyText: string;
  createdAt: Date | null;
  mergedAt: Date | null;
  closedAt: Date | null;
  changedFiles: number;
  additions: number;
  deletions: number;
  reviews: TotalCount;
  comments: TotalCount;
  participants: TotalCount;
  durationHours: number;
}

export interface LoadedRepository extends RepositoryRef {
  url: string | null;
  description: string | null;
  stargazerCount: number | null;
  forkCount: number | null;
  createdAt: Date | null;
  updatedAt: Date | null;
  primaryLanguage: string | null;
  license: string | null;
  pullRequests: TotalCount | null;
}

export interface CollectProgress {
  phase: 'repositories' | 'pull-requests' | 'done';
  repository?: string;
  /** Units admitted so far in this phase. */
  accepted: number;
  processed: number;
  total: number;
  message?: string;
}

export type ProgressListener = (progress: CollectProgress) => void;

export type Sleep = (ms: number) => Promise<void>;
