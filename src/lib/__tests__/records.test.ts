import { describe, it, expect } from 'vitest';
import { decodeCsv, encodeCsv } from '../csv.js';
import { pullRequestToRow, repositoryToRow, rowToPullRequest, rowToRepository } from '../records.js';
import type { PullRequestRecord } from '../types.js';
import { repository } from './fakes.js';

const record: PullRequestRecord = {
  number: 42,
  state: 'MERGED',
  title: 'Speed up the tokenizer',
  bodyText: 'Line one, with a comma\nline "two"',
  createdAt: '2024-03-01T10:00:00Z',
  mergedAt: '2024-03-01T12:00:00Z',
  closedAt: '2024-03-01T12:00:00Z',
  changedFiles: 4,
  additions: 120,
  deletions: 30,
  reviews: { totalCount: 2 },
  comments: { totalCount: 5 },
  participants: { totalCount: 3 },
  repository: { owner: 'acme', name: 'widgets' },
  durationHours: 2,
};

const expectedLoaded = {
  repository: { owner: 'acme', name: 'widgets' },
  number: 42,
  state: 'MERGED',
  title: 'Speed up the tokenizer',
  bodyText: 'Line one, with a comma\nline "two"',
  createdAt: new Date('2024-03-01T10:00:00Z'),
  mergedAt: new Date('2024-03-01T12:00:00Z'),
  closedAt: new Date('2024-03-01T12:00:00Z'),
  changedFiles: 4,
  additions: 120,
  deletions: 30,
  reviews: { totalCount: 2 },
  comments: { totalCount: 5 },
  participants: { totalCount: 3 },
  durationHours: 2,
};

describe('pull request rows', () => {
  it('uses a fixed column order with dotted counters', () => {
    const [header] = encodeCsv([pullRequestToRow(record)]).split('\n');

    expect(header).toBe(
      'number,state,title,bodyText,createdAt,mergedAt,closedAt,changedFiles,additions,deletions,' +
        'reviews.totalCount,comments.totalCount,participants.totalCount,repository.owner,repository.name,duration_hours',
    );
  });

  it('loads flattened counters back', () => {
    const [row] = decodeCsv(encodeCsv([pullRequestToRow(record)]));

    expect(row && rowToPullRequest(row)).toEqual(expectedLoaded);
  });

  it('loads JSON-embedded counters back', () => {
    const [row] = decodeCsv(encodeCsv([pullRequestToRow(record)], { nested: 'embed' }));

    expect(row?.reviews).toBe('{"totalCount":2}');
    expect(row && rowToPullRequest(row)).toEqual(expectedLoaded);
  });

  it('loads counters written in the literal dialect', () => {
    const text = [
      'number,state,title,bodyText,createdAt,mergedAt,closedAt,changedFiles,additions,deletions,reviews,comments,participants,repository,duration_hours',
      `7,CLOSED,Old row,,2023-05-01T08:00:00Z,,2023-05-01T20:00:00Z,1,2,3,{'totalCount': 4},{'totalCount': 6},"{'totalCount': 2}","{'owner': 'acme', 'name': 'widgets'}",12.0`,
    ].join('\n');
    const [row] = decodeCsv(text);

    expect(row && rowToPullRequest(row)).toEqual({
      repository: { owner: 'acme', name: 'widgets' },
      number: 7,
      state: 'CLOSED',
      title: 'Old row',
      bodyText: '',
      createdAt: new Date('2023-05-01T08:00:00Z'),
      mergedAt: null,
      closedAt: new Date('2023-05-01T20:00:00Z'),
      changedFiles: 1,
      additions: 2,
      deletions: 3,
      reviews: { totalCount: 4 },
      comments: { totalCount: 6 },
      participants: { totalCount: 2 },
      durationHours: 12,
    });
  });

  it('defaults absent counters to zero and derives a missing duration', () => {
    const loaded = rowToPullRequest({
      number: '1',
      createdAt: '2024-01-01T00:00:00Z',
      mergedAt: '2024-01-01T03:00:00Z',
    });

    expect(loaded.reviews).toEqual({ totalCount: 0 });
    expect(loaded.comments).toEqual({ totalCount: 0 });
    expect(loaded.durationHours).toBe(3);
    expect(loaded.repository).toEqual({ owner: '', name: '' });
  });
});

describe('repository rows', () => {
  it('writes the pull request total as a dotted column even when absent', () => {
    const text = encodeCsv([repositoryToRow({ ...repository('acme', 'widgets'), pullRequests: { totalCount: 150 } }), repositoryToRow(repository('acme', 'gears'))]);

    expect(text.split('\n')).toEqual([
      'owner,name,url,description,stargazerCount,forkCount,createdAt,updatedAt,primaryLanguage,license,pullRequests.totalCount',
      'acme,widgets,https://github.test/acme/widgets,,1000,10,2020-01-01T00:00:00Z,2024-01-01T00:00:00Z,TypeScript,MIT License,150',
      'acme,gears,https://github.test/acme/gears,,1000,10,2020-01-01T00:00:00Z,2024-01-01T00:00:00Z,TypeScript,MIT License,',
      '',
    ]);
  });

  it('reads rows with an embedded owner object and missing values', () => {
    const loaded = rowToRepository({
      owner: "{'login': 'acme'}",
      name: 'widgets',
      stargazerCount: '',
      createdAt: '2020-01-01T00:00:00Z',
      pullRequests: '{"totalCount": 150}',
    });

    expect(loaded).toEqual({
      owner: 'acme',
      name: 'widgets',
      url: null,
      description: null,
      stargazerCount: null,
      forkCount: null,
      createdAt: new Date('2020-01-01T00:00:00Z'),
      updatedAt: null,
      primaryLanguage: null,
      license: null,
      pullRequests: { totalCount: 150 },
    });
  });

  it('reads the pull request total as null when it was never looked up', () => {
    const [row] = decodeCsv(encodeCsv([repositoryToRow(repository('acme', 'gears'))]));

    expect(row && rowToRepository(row).pullRequests).toBeNull();
  });
});
