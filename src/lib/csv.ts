import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { EmptyRecordSetError } from './errors.js';

export type CsvScalar = string | number | boolean | null | undefined;
export type CsvValue = CsvScalar | CsvObject;
export interface CsvObject {
  [key: string]: CsvValue;
}

/** A record about to be written. Nested objects become dotted columns or embedded JSON. */
export type CsvRecord = Record<string, CsvValue>;
/** A record as read back: every cell is text. */
export type CsvRow = Record<string, string>;

export type NestedMode = 'flatten' | 'embed';

export interface EncodeOptions {
  /** `flatten` (default) writes `reviews.totalCount`; `embed` writes `{"totalCount":3}`. */
  nested?: NestedMode;
}

const NEEDS_QUOTES = /[",\r\n]/;

function isObject(value: CsvValue): value is CsvObject {
  return typeof value === 'object' && value !== null;
}

export function flattenRow(record: CsvRecord, nested: NestedMode = 'flatten', prefix = ''): Record<string, CsvScalar> {
  const flat: Record<string, CsvScalar> = {};
  for (const [key, value] of Object.entries(record)) {
    const column = prefix + key;
    if (!isObject(value)) {
      flat[column] = value;
    } else if (nested === 'embed') {
      flat[column] = JSON.stringify(value);
    } else {
      Object.assign(flat, flattenRow(value, nested, `${column}.`));
    }
  }
  return flat;
}

export function formatCell(value: CsvScalar): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return NEEDS_QUOTES.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

/**
 * Serialise records to CSV text. The header comes from the first record;
 * later records fill missing columns with empty cells.
 *
 * @throws {EmptyRecordSetError} when `records` is empty.
 */
export function encodeCsv(records: readonly CsvRecord[], options: EncodeOptions & { target?: string } = {}): string {
  const [head, ...rest] = records;
  if (!head) throw new EmptyRecordSetError(options.target ?? 'CSV');

  const nested = options.nested ?? 'flatten';
  const first = flattenRow(head, nested);
  const header = Object.keys(first);
  const lines = [header.map(formatCell).join(',')];
  for (const flat of [first, ...rest.map((record) => flattenRow(record, nested))]) {
    lines.push(header.map((column) => formatCell(flat[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export async function writeCsv(path: string, records: readonly CsvRecord[], options: EncodeOptions = {}): Promise<void> {
  const text = encodeCsv(records, { ...options, target: path });
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, 'utf8');
}

/** Split CSV text into cells. Quoted fields may hold commas, doubled quotes and newlines. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let insideQuotes = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text.charAt(index);

    if (insideQuotes) {
      if (char !== '"') {
        field += char;
      } else if (text.charAt(index + 1) === '"') {
        field += '"';
        index += 1;
      } else {
        insideQuotes = false;
      }
      continue;
    }

    if (char === '"') {
      insideQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text.charAt(index + 1) === '\n') index += 1;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

export function decodeCsv(text: string): CsvRow[] {
  const rows = parseCsv(text.replace(/^\uFEFF/, '')).filter((cells) => !(cells.length === 1 && cells[0] === ''));
  const [header, ...body] = rows;
  if (!header) return [];

  return body.map((cells) => {
    const record: CsvRow = {};
    header.forEach((column, index) => {
      record[column] = cells[index] ?? '';
    });
    return record;
  });
}

export async function readCsv(path: string): Promise<CsvRow[]> {
  return decodeCsv(await readFile(path, 'utf8'));
}
