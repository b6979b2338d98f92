import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { analyzePullRequests, summarize, type AnalysisResults, type SummaryRow } from './analysis.js';
import { createGitHubApi, type GitHubApi } from './api.js';
import { CheckpointedCollection, CheckpointStore, promoteLatestCheckpoint, type CheckpointFile } from './checkpoint.js';
import type { CollectorConfig } from './config.js';
import { collectPullRequests, selectRepositories } from './coordinator.js';
import { readCsv, writeCsv, type CsvRecord, type CsvRow } from './csv.js';
import { describeError, isNotFound } from './errors.js';
import { createQueryExecutor, type ExecutorDeps } from './github.js';
import { pullRequestToRow, repositoryToRow, rowToPullRequest } from './records.js';
import { generateSampleDataset } from './sample.js';
import type { ProgressListener, PullRequestRecord, Repository, Sleep } from './types.js';

export const REPOSITORIES_FILE = 'repositories.csv';
export const PULL_REQUESTS_FILE = 'pull_requests.csv';
export const ANALYSIS_FILE = 'analysis_results.json';
export const SUMMARY_FILE = 'summary.csv';

export type DatasetPaths = Pick<CollectorConfig, 'dataDir' | 'resultsDir'>;

export function repositoryStore(config: Pick<CollectorConfig, 'dataDir' | 'checkpointRetain'>): CheckpointStore<Repository> {
  return new CheckpointStore({
    directory: config.dataDir,
    prefix: 'repositories',
    toRow: repositoryToRow,
    retain: config.checkpointRetain,
  });
}

export function pullRequestStore(
  config: Pick<CollectorConfig, 'dataDir' | 'checkpointRetain'>,
): CheckpointStore<PullRequestRecord> {
  return new CheckpointStore({
    directory: config.dataDir,
    prefix: 'pull_requests',
    toRow: pullRequestToRow,
    retain: config.checkpointRetain,
  });
}

export interface CollectOptions {
  config: CollectorConfig;
  /** Skips executor construction; used by tests. */
  api?: GitHubApi;
  executor?: ExecutorDeps;
  onProgress?: ProgressListener;
  sleep?: Sleep;
}

export interface CollectResult {
  repositories: Repository[];
  pullRequests: PullRequestRecord[];
  repositoriesFile: string | null;
  pullRequestsFile: string | null;
}

/**
 * Run the whole harvest: select repositories, save them, aggregate their pull
 * requests and save those. Both phases checkpoint as they go; when a final
 * save fails the newest checkpoint takes its place.
 *
 * @throws {MissingCredentialError} when no `api` is given and the config has no token.
 */
export async function collectDataset(options: CollectOptions): Promise<CollectResult> {
  const { config, onProgress, sleep } = options;
  const api = options.api ?? createGitHubApi(createQueryExecutor(config, { sleep, ...options.executor }));

  // ── 1. Repositories ────────────────────────────────────────────────────────
  const repoStore = repositoryStore(config);
  const repoCollection = new CheckpointedCollection(repoStore, config.checkpointEvery);
  const repositories = await selectRepositories(api, config, {
    onAccept: (repository) => repoCollection.append(repository),
    onProgress,
  });
  await repoCollection.flush();

  if (repositories.length === 0) {
    console.warn('No repositories met the selection criteria; nothing to collect.');
    onProgress?.({ phase: 'done', accepted: 0, processed: 0, total: 0 });
    return { repositories, pullRequests: [], repositoriesFile: null, pullRequestsFile: null };
  }

  const repositoriesFile = await saveOrRecover(
    join(config.dataDir, REPOSITORIES_FILE),
    repositories.map(repositoryToRow),
    repoStore,
  );

  // ── 2. Pull requests ───────────────────────────────────────────────────────
  const prStore = pullRequestStore(config);
  const pullRequests = await collectPullRequests(api, repositories, config, {
    collection: new CheckpointedCollection(prStore, config.checkpointEvery),
    onProgress,
    sleep,
  });

  let pullRequestsFile: string | null = null;
  if (pullRequests.length === 0) {
    console.warn('No pull requests passed the admission filter.');
  } else {
    pullRequestsFile = await saveOrRecover(
      join(config.dataDir, PULL_REQUESTS_FILE),
      pullRequests.map(pullRequestToRow),
      prStore,
    );
  }

  onProgress?.({
    phase: 'done',
    accepted: pullRequests.length,
    processed: repositories.length,
    total: repositories.length,
  });
  return { repositories, pullRequests, repositoriesFile, pullRequestsFile };
}

async function saveOrRecover<T>(path: string, rows: CsvRecord[], store: CheckpointStore<T>): Promise<string | null> {
  try {
    await writeCsv(path, rows);
    console.log(`Saved ${rows.length} rows to ${path}`);
    return path;
  } catch (err) {
    console.error(`Could not save ${path}: ${describeError(err)}`);
  }

  try {
    const promoted = await promoteLatestCheckpoint(store, path);
    if (!promoted) {
      console.error(`No checkpoint available to recover ${path}.`);
      return null;
    }
    console.log(`Recovered ${path} from checkpoint ${promoted.path} (${promoted.count} rows).`);
    return path;
  } catch (err) {
    console.error(`Recovery of ${path} failed: ${describeError(err)}`);
    return null;
  }
}

// ── Analysis ─────────────────────────────────────────────────────────────────

export interface AnalyzeResult {
  results: AnalysisResults;
  summary: SummaryRow[];
  rows: number;
}

/**
 * Load the saved pull requests, compute the study correlations and write
 * `analysis_results.json` and `summary.csv` under `resultsDir`.
 *
 * Resolves to `null`, writing nothing, when `pull_requests.csv` is missing or
 * holds no rows.
 */
export async function analyzeDataset(paths: DatasetPaths): Promise<AnalyzeResult | null> {
  const source = join(paths.dataDir, PULL_REQUESTS_FILE);
  let loaded: CsvRow[];
  try {
    loaded = await readCsv(source);
  } catch (err) {
    if (!isNotFound(err)) throw err;
    console.warn(`No data found at ${source}. Run the fetch or sample command first.`);
    return null;
  }
  if (loaded.length === 0) {
    console.warn(`${source} holds no pull requests; nothing to analyze.`);
    return null;
  }

  const rows = loaded.map(rowToPullRequest);
  const results = analyzePullRequests(rows);
  const summary = summarize(results);

  await mkdir(paths.resultsDir, { recursive: true });
  await writeFile(join(paths.resultsDir, ANALYSIS_FILE), `${JSON.stringify(results, null, 2)}\n`, 'utf8');
  await writeCsv(join(paths.resultsDir, SUMMARY_FILE), summary);
  return { results, summary, rows: rows.length };
}

// ── Sample data ──────────────────────────────────────────────────────────────

export interface SampleResult {
  repositoriesFile: string;
  pullRequestsFile: string;
  pullRequests: number;
}

/** Write a synthetic `repositories.csv` and `pull_requests.csv` of `sampleSize` pull requests. */
export async function writeSampleDataset(
  config: Pick<CollectorConfig, 'dataDir' | 'sampleSize'>,
  random?: () => number,
): Promise<SampleResult> {
  const { repositories, pullRequests } = generateSampleDataset({ count: config.sampleSize, random });
  const repositoriesFile = join(config.dataDir, REPOSITORIES_FILE);
  const pullRequestsFile = join(config.dataDir, PULL_REQUESTS_FILE);

  await writeCsv(repositoriesFile, repositories.map(repositoryToRow));
  await writeCsv(pullRequestsFile, pullRequests.map(pullRequestToRow));
  console.log(`Wrote ${pullRequests.length} sample pull requests to ${pullRequestsFile}`);
  return { repositoriesFile, pullRequestsFile, pullRequests: pullRequests.length };
}

// ── Checkpoint maintenance ───────────────────────────────────────────────────

export async function listCheckpoints(
  config: Pick<CollectorConfig, 'dataDir' | 'checkpointRetain'>,
): Promise<{ repositories: CheckpointFile[]; pullRequests: CheckpointFile[] }> {
  return {
    repositories: await repositoryStore(config).list(),
    pullRequests: await pullRequestStore(config).list(),
  };
}

/** Promote the newest pull request checkpoint to `pull_requests.csv`. */
export async function recoverPullRequests(
  config: Pick<CollectorConfig, 'dataDir' | 'checkpointRetain'>,
): Promise<CheckpointFile | null> {
  return promoteLatestCheckpoint(pullRequestStore(config), join(config.dataDir, PULL_REQUESTS_FILE));
}
