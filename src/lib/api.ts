import { z } from 'zod';
import { describeFailure, type QueryExecutor } from './github.js';
import {
  pullRequestCommentCountQuery,
  pullRequestDetailsQuery,
  pullRequestParticipantCountQuery,
  pullRequestReviewCountQuery,
  pullRequestsQuery,
  repositoryPullRequestCountQuery,
  searchRepositoriesQuery,
} from './queries.js';
import type {
  PullRequestDetails,
  PullRequestNode,
  PullRequestPage,
  Repository,
  RepositoryPage,
  RepositoryRef,
} from './types.js';

/**
 * Typed view over the GraphQL endpoint. Every method resolves to `null` when
 * the query failed or the payload did not have the expected shape; the reason
 * is logged once here.
 */
export interface GitHubApi {
  searchRepositories(args: { query: string; first: number; cursor: string | null }): Promise<RepositoryPage | null>;
  fetchPullRequestCount(repository: RepositoryRef): Promise<number | null>;
  fetchPullRequestPage(
    repository: RepositoryRef,
    args: { first: number; cursor: string | null },
  ): Promise<PullRequestPage | null>;
  fetchReviewCount(repository: RepositoryRef, number: number): Promise<number | null>;
  fetchPullRequestDetails(repository: RepositoryRef, number: number): Promise<PullRequestDetails | null>;
  fetchCommentCount(repository: RepositoryRef, number: number): Promise<number | null>;
  fetchParticipantCount(repository: RepositoryRef, number: number): Promise<number | null>;
}

// ── Payload schemas ──────────────────────────────────────────────────────────

const pageInfoSchema = z.object({
  endCursor: z.string().nullable(),
  hasNextPage: z.boolean(),
});

const totalCountSchema = z.object({ totalCount: z.number().int().nonnegative() });

const repositoryNodeSchema = z
  .object({
    name: z.string().min(1),
    owner: z.object({ login: z.string().min(1) }),
    url: z.string().nullish(),
    description: z.string().nullish(),
    stargazerCount: z.number().nullish(),
    forkCount: z.number().nullish(),
    createdAt: z.string().nullish(),
    updatedAt: z.string().nullish(),
    primaryLanguage: z.object({ name: z.string() }).nullish(),
    licenseInfo: z.object({ name: z.string() }).nullish(),
  })
  .transform(
    (node): Repository => ({
      owner: node.owner.login,
      name: node.name,
      url: node.url ?? null,
      description: node.description ?? null,
      stargazerCount: node.stargazerCount ?? null,
      forkCount: node.forkCount ?? null,
      createdAt: node.createdAt ?? null,
      updatedAt: node.updatedAt ?? null,
      primaryLanguage: node.primaryLanguage?.name ?? null,
      license: node.licenseInfo?.name ?? null,
    }),
  );

const searchSchema = z.object({
  search: z.object({
    nodes: z.array(z.unknown()),
    pageInfo: pageInfoSchema,
  }),
});

const pullRequestNodeSchema: z.ZodType<PullRequestNode> = z.object({
  number: z.number().int(),
  state: z.enum(['OPEN', 'CLOSED', 'MERGED']),
  createdAt: z.string(),
  mergedAt: z.string().nullable(),
  closedAt: z.string().nullable(),
});

const repositorySchema = <T extends z.ZodTypeAny>(repository: T) => z.object({ repository: repository.nullable() });

const pullRequestSchema = <T extends z.ZodTypeAny>(pullRequest: T) =>
  repositorySchema(z.object({ pullRequest: pullRequest.nullable() }));

const pullRequestCountSchema = repositorySchema(z.object({ pullRequests: totalCountSchema }));

const pullRequestPageSchema = repositorySchema(
  z.object({
    pullRequests: totalCountSchema.extend({
      pageInfo: pageInfoSchema,
      nodes: z.array(z.unknown()),
    }),
  }),
);

const detailsSchema = pullRequestSchema(
  z.object({
    title: z.string(),
    bodyText: z.string().nullable().transform((text) => text ?? ''),
    changedFiles: z.number().int(),
    additions: z.number().int(),
    deletions: z.number().int(),
  }),
);

const reviewsSchema = pullRequestSchema(z.object({ reviews: totalCountSchema }));
const commentsSchema = pullRequestSchema(z.object({ comments: totalCountSchema }));
const participantsSchema = pullRequestSchema(z.object({ participants: totalCountSchema }));

// ── Client ───────────────────────────────────────────────────────────────────

export function createGitHubApi(executor: QueryExecutor): GitHubApi {
  async function run<S extends z.ZodTypeAny>(
    label: string,
    query: string,
    variables: Record<string, unknown>,
    schema: S,
  ): Promise<z.output<S> | null> {
    const outcome = await executor.execute(query, variables);
    if (!outcome.ok) {
      console.warn(`${label} failed: ${describeFailure(outcome)}`);
      return null;
    }
    if (outcome.errors.length > 0) {
      console.warn(`${label} returned errors: ${outcome.errors.map((e) => e.message).join('; ')}`);
    }
    const parsed = schema.safeParse(outcome.data);
    if (!parsed.success) {
      console.warn(`${label} returned an unexpected payload.`);
      return null;
    }
    return parsed.data;
  }

  const prVariables = (repository: RepositoryRef, number: number) => ({
    owner: repository.owner,
    name: repository.name,
    number,
  });
  const prLabel = (repository: RepositoryRef, number: number) => `${repository.owner}/${repository.name}#${number}`;

  return {
    async searchRepositories({ query, first, cursor }) {
      const data = await run('Repository search', searchRepositoriesQuery, { searchQuery: query, first, cursor }, searchSchema);
      if (!data) return null;
      const repositories: Repository[] = [];
      for (const node of data.search.nodes) {
        // Non-repository hits and nodes without an owner carry no identity.
        const parsed = repositoryNodeSchema.safeParse(node);
        if (parsed.success) repositories.push(parsed.data);
      }
      return { repositories, nodeCount: data.search.nodes.length, pageInfo: data.search.pageInfo };
    },

    async fetchPullRequestCount(repository) {
      const label = `Pull request count for ${repository.owner}/${repository.name}`;
      const data = await run(label, repositoryPullRequestCountQuery, { ...repository }, pullRequestCountSchema);
      return data?.repository?.pullRequests.totalCount ?? null;
    },

    async fetchPullRequestPage(repository, { first, cursor }) {
      const label = `Pull requests of ${repository.owner}/${repository.name}`;
      const data = await run(label, pullRequestsQuery, { ...repository, first, cursor }, pullRequestPageSchema);
      if (!data) return null;
      if (!data.repository) {
        console.warn(`${repository.owner}/${repository.name} was not found or is not accessible.`);
        return null;
      }
      const { totalCount, pageInfo, nodes } = data.repository.pullRequests;
      const parsedNodes: PullRequestNode[] = [];
      for (const node of nodes) {
        const parsed = pullRequestNodeSchema.safeParse(node);
        if (parsed.success) parsedNodes.push(parsed.data);
      }
      return { totalCount, pageInfo, nodes: parsedNodes };
    },

    async fetchReviewCount(repository, number) {
      const data = await run(`Reviews of ${prLabel(repository, number)}`, pullRequestReviewCountQuery, prVariables(repository, number), reviewsSchema);
      return data?.repository?.pullRequest?.reviews.totalCount ?? null;
    },

    async fetchPullRequestDetails(repository, number) {
      const data = await run(`Details of ${prLabel(repository, number)}`, pullRequestDetailsQuery, prVariables(repository, number), detailsSchema);
      return data?.repository?.pullRequest ?? null;
    },

    async fetchCommentCount(repository, number) {
      const data = await run(`Comments of ${prLabel(repository, number)}`, pullRequestCommentCountQuery, prVariables(repository, number), commentsSchema);
      return data?.repository?.pullRequest?.comments.totalCount ?? null;
    },

    async fetchParticipantCount(repository, number) {
      const data = await run(
        `Participants of ${prLabel(repository, number)}`,
        pullRequestParticipantCountQuery,
        prVariables(repository, number),
        participantsSchema,
      );
      return data?.repository?.pullRequest?.participants.totalCount ?? null;
    },
  };
}
