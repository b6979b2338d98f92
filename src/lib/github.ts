import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { z } from 'zod';
import type { CollectorConfig } from './config.js';
import { describeError, MissingCredentialError } from './errors.js';
import type { Sleep } from './types.js';

export type ExecutorConfig = Pick<
  CollectorConfig,
  'token' | 'apiUrl' | 'timeoutMs' | 'maxRetries' | 'retryDelayMs' | 'maxRateLimitWaits'
>;

export interface ExecutorDeps {
  /** Transport handed to Octokit; defaults to the global fetch. */
  fetch?: typeof fetch;
  sleep?: Sleep;
  /** Wall clock in milliseconds, used against the rate-limit reset hint. */
  now?: () => number;
}

export interface GraphQLErrorEntry {
  message: string;
  type?: string;
}

export interface QueryResponse {
  ok: true;
  /** The top-level `data` key; `null` when GitHub returned none. */
  data: unknown;
  errors: GraphQLErrorEntry[];
}

/**
 * Returned instead of throwing once a query cannot succeed.
 *
 * - `exhausted`: every attempt hit a 5xx or a network failure.
 * - `rate-limited`: more than `maxRateLimitWaits` 403 waits within one call,
 *   counted across any 5xx or network retries in between.
 * - `fatal`: any other HTTP status, or a body that is not a GraphQL response.
 */
export interface DefiniteFailure {
  ok: false;
  kind: 'exhausted' | 'rate-limited' | 'fatal';
  status: number | null;
  message: string;
  attempts: number;
}

export type QueryOutcome = QueryResponse | DefiniteFailure;

export interface QueryExecutor {
  execute(query: string, variables: Record<string, unknown>, timeoutMs?: number): Promise<QueryOutcome>;
}

const RATE_LIMIT_FLOOR_SECONDS = 60;
const RATE_LIMIT_MARGIN_SECONDS = 5;

const responseSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string(), type: z.string().optional() })).optional(),
});

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createOctokit(options: { token: string; baseUrl: string; fetch?: typeof fetch }): Octokit {
  return new Octokit({
    auth: options.token,
    baseUrl: options.baseUrl,
    userAgent: 'review-harvest/0.1',
    request: options.fetch ? { fetch: options.fetch } : {},
  });
}

/** Seconds to wait after a 403, from the `x-ratelimit-reset` epoch-seconds header. */
export function rateLimitWaitSeconds(resetHeader: string | number | undefined, nowMs: number): number {
  const reset = Number(resetHeader ?? 0);
  const resetAt = Number.isFinite(reset) ? reset : 0;
  const nowSeconds = Math.floor(nowMs / 1000);
  return Math.max(resetAt - nowSeconds + RATE_LIMIT_MARGIN_SECONDS, RATE_LIMIT_FLOOR_SECONDS);
}

/**
 * Create the single entry point for GraphQL traffic.
 *
 * Rate limits (HTTP 403) are waited out without spending an attempt; 5xx
 * responses and network failures back off exponentially from `retryDelayMs`;
 * every other status fails at once. The executor never throws for a remote
 * failure, it resolves to a {@link DefiniteFailure} so callers can skip the
 * affected entity.
 *
 * @throws {MissingCredentialError} when the config carries no token.
 */
export function createQueryExecutor(config: ExecutorConfig, deps: ExecutorDeps = {}): QueryExecutor {
  if (!config.token) throw new MissingCredentialError();

  const octokit = createOctokit({ token: config.token, baseUrl: config.apiUrl, fetch: deps.fetch });
  const pause = deps.sleep ?? sleep;
  const now = deps.now ?? Date.now;

  const backoffMs = (attempt: number) => config.retryDelayMs * 2 ** attempt;

  async function execute(
    query: string,
    variables: Record<string, unknown>,
    timeoutMs = config.timeoutMs,
  ): Promise<QueryOutcome> {
    let attempt = 0;
    let rateLimitWaits = 0;

    while (attempt < config.maxRetries) {
      let body: unknown;
      try {
        const response = await octokit.request('POST /graphql', {
          query,
          variables,
          request: { signal: AbortSignal.timeout(timeoutMs) },
        });
        body = response.data;
      } catch (err) {
        const status = err instanceof RequestError && err.response ? err.status : null;

        if (status === 403) {
          rateLimitWaits++;
          if (rateLimitWaits > config.maxRateLimitWaits) {
            return failure('rate-limited', status, `still rate limited after ${config.maxRateLimitWaits} waits`, attempt);
          }
          const reset = err instanceof RequestError ? err.response?.headers['x-ratelimit-reset'] : undefined;
          const waitSeconds = rateLimitWaitSeconds(reset, now());
          console.warn(`GitHub rate limit hit. Waiting ${waitSeconds}s before retrying.`);
          await pause(waitSeconds * 1000);
          continue;
        }

        if (status !== null && status < 500) {
          return failure('fatal', status, describeError(err), attempt + 1);
        }

        attempt++;
        const reason = status !== null ? `Server error ${status}` : `Request failed (${describeError(err)})`;
        if (attempt >= config.maxRetries) {
          console.warn(`${reason}. Giving up after ${config.maxRetries} attempts.`);
          return failure('exhausted', status, reason, attempt);
        }
        const delay = backoffMs(attempt - 1);
        console.warn(`${reason}. Retrying in ${delay}ms (attempt ${attempt + 1}/${config.maxRetries}).`);
        await pause(delay);
        continue;
      }

      const parsed = responseSchema.safeParse(body);
      if (!parsed.success) {
        return failure('fatal', 200, 'response is not a GraphQL document', attempt + 1);
      }
      return { ok: true, data: parsed.data.data ?? null, errors: parsed.data.errors ?? [] };
    }

    return failure('exhausted', null, 'no attempts left', attempt);
  }

  return { execute };
}

function failure(kind: DefiniteFailure['kind'], status: number | null, message: string, attempts: number): DefiniteFailure {
  return { ok: false, kind, status, message, attempts };
}

export function describeFailure(outcome: DefiniteFailure): string {
  const status = outcome.status !== null ? ` (HTTP ${outcome.status})` : '';
  return `${outcome.kind}${status}: ${outcome.message}`;
}

