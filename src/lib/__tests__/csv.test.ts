import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { decodeCsv, encodeCsv, flattenRow, parseCsv, readCsv, writeCsv } from '../csv.js';
import { EmptyRecordSetError } from '../errors.js';

describe('flattenRow', () => {
  it('turns nested objects into dotted columns', () => {
    expect(flattenRow({ id: 1, repository: { owner: 'acme', name: 'widgets' }, reviews: { totalCount: 3 } })).toEqual({
      id: 1,
      'repository.owner': 'acme',
      'repository.name': 'widgets',
      'reviews.totalCount': 3,
    });
  });

  it('embeds nested objects as JSON text on request', () => {
    expect(flattenRow({ id: 1, reviews: { totalCount: 3 } }, 'embed')).toEqual({ id: 1, reviews: '{"totalCount":3}' });
  });
});

describe('encodeCsv', () => {
  it('derives the header from the first record', () => {
    const text = encodeCsv([
      { id: 1, title: 'Add cache', reviews: { totalCount: 3 } },
      { id: 2, title: 'Fix bug', reviews: { totalCount: 1 } },
    ]);

    expect(text).toBe('id,title,reviews.totalCount\n1,Add cache,3\n2,Fix bug,1\n');
  });

  it('quotes cells holding commas, quotes or newlines and leaves nulls empty', () => {
    const text = encodeCsv([{ a: 'x, y', b: 'say "hi"', c: 'two\nlines', d: null }]);

    expect(text).toBe('a,b,c,d\n"x, y","say ""hi""","two\nlines",\n');
  });

  it('writes embedded JSON as a quoted cell', () => {
    expect(encodeCsv([{ id: 1, reviews: { totalCount: 3 } }], { nested: 'embed' })).toBe(
      'id,reviews\n1,"{""totalCount"":3}"\n',
    );
  });

  it('refuses an empty record set', () => {
    expect(() => encodeCsv([])).toThrow(EmptyRecordSetError);
  });
});

describe('decodeCsv', () => {
  it('parses quoted commas, doubled quotes and embedded newlines', () => {
    expect(decodeCsv('a,b,c\n"x, y","say ""hi""","two\nlines"\n')).toEqual([
      { a: 'x, y', b: 'say "hi"', c: 'two\nlines' },
    ]);
  });

  it('handles CRLF, a byte order mark, blank lines and short rows', () => {
    expect(decodeCsv('\uFEFFid,name\r\n1,one\r\n\r\n2\r\n')).toEqual([
      { id: '1', name: 'one' },
      { id: '2', name: '' },
    ]);
  });

  it('returns no rows for empty text', () => {
    expect(decodeCsv('')).toEqual([]);
    expect(parseCsv('')).toEqual([]);
  });

  it('keeps a final line without a newline', () => {
    expect(parseCsv('a,b\n1,2')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });
});

describe('writeCsv / readCsv', () => {
  it('creates the directory and reads the rows back', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'csv-'));
    try {
      const path = join(dir, 'nested', 'out.csv');
      await writeCsv(path, [{ id: 7, body: 'line one\nline "two"', reviews: { totalCount: 2 } }]);

      expect(await readFile(path, 'utf8')).toBe('id,body,reviews.totalCount\n7,"line one\nline ""two""",2\n');
      expect(await readCsv(path)).toEqual([{ id: '7', body: 'line one\nline "two"', 'reviews.totalCount': '2' }]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
