#!/usr/bin/env node
/**
 * review-harvest CLI
 *
 * Usage:
 *   review-harvest [command] [options]
 *
 * Commands:
 *   fetch         Select repositories and collect their pull requests (default)
 *   analyze       Correlate the collected pull requests and write the results
 *   checkpoints   List checkpoint files in the data directory
 *   recover       Promote the newest pull request checkpoint to pull_requests.csv
 *   sample        Write a synthetic dataset to analyze without a token
 */

import 'dotenv/config';
import { ZodError } from 'zod';
import {
  analyzeDataset,
  collectDataset,
  listCheckpoints,
  recoverPullRequests,
  writeSampleDataset,
} from './lib/collector.js';
import { loadConfig, type CollectorConfig } from './lib/config.js';
import { MissingCredentialError } from './lib/errors.js';

// ── Helpers ──────────────────────────────────────────────────────────────────

function parseArgs(argv: string[]): { command: string; flags: Record<string, string> } {
  const args = argv.slice(2);
  let command = '';
  const flags: Record<string, string> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === '--help' || arg === '-h') {
      flags['help'] = 'true';
    } else if (arg.startsWith('--')) {
      const [key = '', inline] = arg.slice(2).split(/=(.*)/s, 2);
      const next = args[i + 1];
      if (inline !== undefined) {
        flags[key] = inline;
      } else if (next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = 'true';
      }
    } else if (!command) {
      command = arg;
    }
  }

  return { command, flags };
}

function printHelp(): void {
  console.log(`
review-harvest: collect GitHub pull request review data and correlate it

Usage:
  review-harvest [command] [options]

Commands:
  fetch         Select repositories, collect pull requests, save CSVs (default)
  analyze       Compute RQ01–RQ08 from data/pull_requests.csv
  checkpoints   List checkpoint files
  recover       Copy the newest pull request checkpoint to pull_requests.csv
  sample        Write synthetic repositories.csv and pull_requests.csv

Options:
  --token               GitHub token                              (env: GITHUB_TOKEN)
  --api-url             GitHub API base URL                       (env: GITHUB_API_URL)
  --search              Repository search query                   (default: "stars:>1000 sort:stars-desc")
  --repo-limit          Repositories to select                    (env: REPO_LIMIT, default: 50)
  --min-prs             Minimum closed/merged PRs per repository  (default: 100)
  --max-candidates      Search results to inspect at most         (default: 1000)
  --prs-per-repo        Pull requests kept per repository         (default: 50)
  --repo-concurrency    Parallel repository lookups               (default: 10)
  --pr-concurrency      Repositories aggregated in parallel       (default: 5)
  --timeout-ms          Per-request timeout                       (env: GQL_TIMEOUT_MS, default: 30000)
  --max-retries         Attempts per query                        (env: GQL_MAX_RETRIES, default: 5)
  --retry-delay-ms      Base backoff delay                        (env: GQL_RETRY_DELAY_MS, default: 10000)
  --min-duration-hours  Minimum review duration                   (default: 1)
  --min-reviews         Minimum review count                      (default: 1)
  --checkpoint-every    Records between checkpoints               (default: 10)
  --checkpoint-retain   Checkpoints kept per kind                 (default: all)
  --sample-size         Pull requests written by sample           (env: SAMPLE_SIZE, default: 100)
  --data-dir            CSV directory                             (env: DATA_DIR, default: data)
  --results-dir         Analysis output directory                 (env: RESULTS_DIR, default: results)
  -h, --help            Show this help message

Examples:
  # Small trial run
  review-harvest fetch --repo-limit 5 --prs-per-repo 20

  # Analyse a previous run
  review-harvest analyze

  # Try the analysis without a token
  review-harvest sample && review-harvest analyze
`.trim());
}

function logProgressLine(message: string): void {
  if (process.stdout.isTTY) process.stdout.write(`\r${message.padEnd(80)}`);
}

// ── Commands ─────────────────────────────────────────────────────────────────

async function runFetch(config: CollectorConfig): Promise<void> {
  const started = Date.now();
  const result = await collectDataset({
    config,
    onProgress(p) {
      if (p.phase === 'done') {
        logProgressLine('');
        if (process.stdout.isTTY) process.stdout.write('\n');
        return;
      }
      logProgressLine(`[${p.phase}] ${p.processed}/${p.total} processed, ${p.accepted} accepted ${p.repository ?? ''}`);
    },
  });

  const minutes = ((Date.now() - started) / 60_000).toFixed(1);
  console.log(
    `Done in ${minutes} min: ${result.repositories.length} repositories, ${result.pullRequests.length} pull requests.`,
  );
  if (result.repositoriesFile) console.log(`Repositories: ${result.repositoriesFile}`);
  if (result.pullRequestsFile) console.log(`Pull requests: ${result.pullRequestsFile}`);
}

async function runAnalyze(config: CollectorConfig): Promise<void> {
  const analysis = await analyzeDataset(config);
  if (!analysis) return;
  const { summary, rows } = analysis;
  console.log(`Analysed ${rows} pull requests. Results written to ${config.resultsDir}/`);
  console.table(summary);
}

async function runCheckpoints(config: CollectorConfig): Promise<void> {
  const { repositories, pullRequests } = await listCheckpoints(config);
  if (repositories.length === 0 && pullRequests.length === 0) {
    console.log(`No checkpoints in ${config.dataDir}/`);
    return;
  }
  for (const file of [...repositories, ...pullRequests]) {
    console.log(`${String(file.count).padStart(6)}  ${file.path}`);
  }
}

async function runRecover(config: CollectorConfig): Promise<void> {
  const promoted = await recoverPullRequests(config);
  if (!promoted) {
    console.warn(`No pull request checkpoint found in ${config.dataDir}/`);
    return;
  }
  console.log(`Recovered ${promoted.count} pull requests from ${promoted.path}.`);
}

async function runSample(config: CollectorConfig): Promise<void> {
  const { repositoriesFile, pullRequestsFile } = await writeSampleDataset(config);
  console.log(`Repositories: ${repositoriesFile}`);
  console.log(`Pull requests: ${pullRequestsFile}`);
}

// ── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const { command, flags } = parseArgs(process.argv);

  if (flags['help']) {
    printHelp();
    return;
  }

  let config: CollectorConfig;
  try {
    config = loadConfig(flags);
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    for (const issue of err.issues) {
      console.error(`Error: invalid ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exitCode = 1;
    return;
  }

  switch (command || 'fetch') {
    case 'fetch':
      await runFetch(config);
      break;
    case 'analyze':
      await runAnalyze(config);
      break;
    case 'checkpoints':
      await runCheckpoints(config);
      break;
    case 'recover':
      await runRecover(config);
      break;
    case 'sample':
      await runSample(config);
      break;
    default:
      console.error(`Error: unknown command "${command}".`);
      console.error('Run review-harvest --help for usage information.');
      process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  if (err instanceof MissingCredentialError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
