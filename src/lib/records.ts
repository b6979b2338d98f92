import { computeDurationHours } from './aggregator.js';
import type { CsvRecord, CsvRow } from './csv.js';
import { isRecord, parseNested } from './nested.js';
import type {
  LoadedPullRequest,
  LoadedRepository,
  PullRequestRecord,
  Repository,
  RepositoryRef,
  TotalCount,
} from './types.js';

// ── Writing ─────────────────────────────────────────────────────────────────

export function repositoryToRow(repository: Repository): CsvRecord {
  return {
    owner: repository.owner,
    name: repository.name,
    url: repository.url,
    description: repository.description,
    stargazerCount: repository.stargazerCount,
    forkCount: repository.forkCount,
    createdAt: repository.createdAt,
    updatedAt: repository.updatedAt,
    primaryLanguage: repository.primaryLanguage,
    license: repository.license,
    pullRequests: { totalCount: repository.pullRequests?.totalCount ?? null },
  };
}

export function pullRequestToRow(record: PullRequestRecord): CsvRecord {
  return {
    number: record.number,
    state: record.state,
    title: record.title,
    bodyText: record.bodyText,
    createdAt: record.createdAt,
    mergedAt: record.mergedAt,
    closedAt: record.closedAt,
    changedFiles: record.changedFiles,
    additions: record.additions,
    deletions: record.deletions,
    reviews: record.reviews,
    comments: record.comments,
    participants: record.participants,
    repository: { owner: record.repository.owner, name: record.repository.name },
    duration_hours: record.durationHours,
  };
}

// ── Reading ─────────────────────────────────────────────────────────────────

function cell(row: CsvRow, column: string): string | undefined {
  const value = row[column];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string' || value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function toDate(value: string | undefined): Date | null {
  if (value === undefined) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time);
}

/** The nested column either flattened (`<name>.<key>`) or embedded as text under `<name>`. */
function nestedField(row: CsvRow, name: string, key: string): unknown {
  const flat = cell(row, `${name}.${key}`);
  if (flat !== undefined) return flat;
  const embedded = cell(row, name);
  if (embedded === undefined) return undefined;
  const value = parseNested(embedded);
  return isRecord(value) ? value[key] : undefined;
}

function counter(row: CsvRow, name: string): TotalCount {
  return { totalCount: toNumber(nestedField(row, name, 'totalCount')) ?? 0 };
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function repositoryRef(row: CsvRow): RepositoryRef {
  return {
    owner: text(nestedField(row, 'repository', 'owner')),
    name: text(nestedField(row, 'repository', 'name')),
  };
}

/**
 * Restore a pull request from a CSV row. Counters may be flattened,
 * JSON-embedded or written in the literal dialect; absent counters read as 0.
 */
export function rowToPullRequest(row: CsvRow): LoadedPullRequest {
  const createdAt = cell(row, 'createdAt');
  const mergedAt = cell(row, 'mergedAt');
  const closedAt = cell(row, 'closedAt');
  const storedDuration = toNumber(cell(row, 'duration_hours') ?? cell(row, 'durationHours'));
  const derivedDuration = createdAt
    ? computeDurationHours({ createdAt, mergedAt: mergedAt ?? null, closedAt: closedAt ?? null })
    : null;

  return {
    repository: repositoryRef(row),
    number: toNumber(cell(row, 'number')) ?? 0,
    state: cell(row, 'state') ?? '',
    title: cell(row, 'title') ?? '',
    bodyText: row.bodyText ?? '',
    createdAt: toDate(createdAt),
    mergedAt: toDate(mergedAt),
    closedAt: toDate(closedAt),
    changedFiles: toNumber(cell(row, 'changedFiles')) ?? 0,
    additions: toNumber(cell(row, 'additions')) ?? 0,
    deletions: toNumber(cell(row, 'deletions')) ?? 0,
    reviews: counter(row, 'reviews'),
    comments: counter(row, 'comments'),
    participants: counter(row, 'participants'),
    durationHours: storedDuration ?? derivedDuration ?? 0,
  };
}

export function rowToRepository(row: CsvRow): LoadedRepository {
  const owner = cell(row, 'owner');
  const parsedOwner = owner === undefined ? undefined : parseNested(owner);
  const pullRequests = toNumber(nestedField(row, 'pullRequests', 'totalCount'));

  return {
    owner: isRecord(parsedOwner) ? text(parsedOwner.login) : (owner ?? ''),
    name: cell(row, 'name') ?? '',
    url: cell(row, 'url') ?? null,
    description: cell(row, 'description') ?? null,
    stargazerCount: toNumber(cell(row, 'stargazerCount')),
    forkCount: toNumber(cell(row, 'forkCount')),
    createdAt: toDate(cell(row, 'createdAt')),
    updatedAt: toDate(cell(row, 'updatedAt')),
    primaryLanguage: cell(row, 'primaryLanguage') ?? null,
    license: cell(row, 'license') ?? null,
    pullRequests: pullRequests === null ? null : { totalCount: pullRequests },
  };
}
