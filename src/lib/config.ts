import { z } from 'zod';

const DEFAULT_API_URL = 'https://api.github.com';
const DEFAULT_SEARCH_QUERY = 'stars:>1000 sort:stars-desc';

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

function normalizeOptional(value: string | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

const count = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

// GitHub caps `first` at 100 for every connection.
const pageSize = (fallback: number) =>
  z.coerce
    .number()
    .int()
    .transform((value) => clamp(value, 1, 100))
    .default(fallback);

const configSchema = z.object({
  token: z.string().min(1).optional(),
  apiUrl: z
    .string()
    .url('GITHUB_API_URL must be an absolute URL.')
    .default(DEFAULT_API_URL)
    .transform((url) => url.replace(/\/graphql\/?$/, '').replace(/\/$/, '')),
  searchQuery: z.string().min(1).default(DEFAULT_SEARCH_QUERY),

  repositoryLimit: count(50),
  minPullRequests: count(100),
  repositoryPageSize: pageSize(10),
  maxCandidates: count(1000, 1),
  pullRequestsPerRepository: count(50),
  pullRequestPageSize: pageSize(10),

  repositoryConcurrency: count(10, 1),
  pullRequestConcurrency: count(5, 1),

  timeoutMs: count(30_000, 1),
  maxRetries: count(5, 1),
  retryDelayMs: count(10_000),
  maxRateLimitWaits: count(20),

  minDurationHours: z.coerce.number().min(0).default(1),
  minReviews: count(1),
  requestDelayMs: count(1_000),
  pageDelayMs: count(3_000),

  checkpointEvery: count(10),
  checkpointRetain: z.coerce.number().int().min(1).optional(),

  sampleSize: count(100, 1),

  dataDir: z.string().min(1).default('data'),
  resultsDir: z.string().min(1).default('results'),
});

type ConfigKey = keyof z.input<typeof configSchema>;

/** Flag name (without `--`) and environment variables, in priority order. */
const SOURCES: Record<ConfigKey, { flag: string; env: readonly string[] }> = {
  token: { flag: 'token', env: ['GITHUB_TOKEN', 'GITHUB_ACCESS_TOKEN'] },
  apiUrl: { flag: 'api-url', env: ['GITHUB_API_URL'] },
  searchQuery: { flag: 'search', env: ['SEARCH_QUERY'] },
  repositoryLimit: { flag: 'repo-limit', env: ['REPO_LIMIT'] },
  minPullRequests: { flag: 'min-prs', env: ['MIN_PULL_REQUESTS'] },
  repositoryPageSize: { flag: 'repo-page-size', env: ['REPO_PAGE_SIZE'] },
  maxCandidates: { flag: 'max-candidates', env: ['MAX_CANDIDATES'] },
  pullRequestsPerRepository: { flag: 'prs-per-repo', env: ['PRS_PER_REPO'] },
  pullRequestPageSize: { flag: 'pr-page-size', env: ['PR_PAGE_SIZE'] },
  repositoryConcurrency: { flag: 'repo-concurrency', env: ['REPO_CONCURRENCY'] },
  pullRequestConcurrency: { flag: 'pr-concurrency', env: ['PR_CONCURRENCY'] },
  timeoutMs: { flag: 'timeout-ms', env: ['GQL_TIMEOUT_MS'] },
  maxRetries: { flag: 'max-retries', env: ['GQL_MAX_RETRIES'] },
  retryDelayMs: { flag: 'retry-delay-ms', env: ['GQL_RETRY_DELAY_MS'] },
  maxRateLimitWaits: { flag: 'max-rate-limit-waits', env: ['GQL_MAX_RATE_LIMIT_WAITS'] },
  minDurationHours: { flag: 'min-duration-hours', env: ['MIN_DURATION_HOURS'] },
  minReviews: { flag: 'min-reviews', env: ['MIN_REVIEWS'] },
  requestDelayMs: { flag: 'request-delay-ms', env: ['REQUEST_DELAY_MS'] },
  pageDelayMs: { flag: 'page-delay-ms', env: ['PAGE_DELAY_MS'] },
  checkpointEvery: { flag: 'checkpoint-every', env: ['CHECKPOINT_EVERY'] },
  checkpointRetain: { flag: 'checkpoint-retain', env: ['CHECKPOINT_RETAIN'] },
  sampleSize: { flag: 'sample-size', env: ['SAMPLE_SIZE'] },
  dataDir: { flag: 'data-dir', env: ['DATA_DIR'] },
  resultsDir: { flag: 'results-dir', env: ['RESULTS_DIR'] },
};

export type CollectorConfig = Readonly<
  Omit<z.output<typeof configSchema>, 'checkpointRetain'> & {
    /** Number of newest checkpoints kept per prefix; `null` keeps all of them. */
    checkpointRetain: number | null;
  }
>;

/**
 * Build the run configuration once at startup.
 *
 * Command-line flags win over environment variables, which win over defaults.
 * The result is frozen and is passed explicitly to every component.
 *
 * @throws {z.ZodError} when a value does not validate.
 */
export function loadConfig(
  flags: Record<string, string | undefined> = {},
  env: Record<string, string | undefined> = process.env,
): CollectorConfig {
  const raw: Record<string, string | undefined> = {};
  for (const [key, source] of Object.entries(SOURCES)) {
    const candidates = [flags[source.flag], ...source.env.map((name) => env[name])];
    raw[key] = candidates.map(normalizeOptional).find((value) => value !== undefined);
  }

  const parsed = configSchema.parse(raw);
  return Object.freeze({ ...parsed, checkpointRetain: parsed.checkpointRetain ?? null });
}
