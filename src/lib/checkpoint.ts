import { copyFile, mkdir, readdir, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { readCsv, writeCsv, type CsvRecord, type CsvRow, type NestedMode } from './csv.js';
import { describeError, isNotFound } from './errors.js';

export interface CheckpointStoreOptions<T> {
  directory: string;
  /** Files are named `<prefix>_temp_<count>.csv`. */
  prefix: string;
  toRow: (record: T) => CsvRecord;
  /** Keep only the newest N checkpoints; `null` or absent keeps all. */
  retain?: number | null;
  nested?: NestedMode;
}

export interface CheckpointFile {
  path: string;
  count: number;
}

/**
 * Periodic full snapshots of an accumulating record list. Each checkpoint
 * holds every record collected so far, so the newest one supersedes the rest.
 */
export class CheckpointStore<T> {
  constructor(private readonly options: CheckpointStoreOptions<T>) {}

  fileFor(count: number): string {
    return join(this.options.directory, `${this.options.prefix}_temp_${count}.csv`);
  }

  /**
   * Write a snapshot. Failures are logged and reported as `null`; a lost
   * checkpoint never stops collection.
   */
  async save(records: readonly T[]): Promise<string | null> {
    if (records.length === 0) return null;
    const path = this.fileFor(records.length);
    try {
      await writeCsv(path, records.map(this.options.toRow), { nested: this.options.nested });
      console.log(`Checkpoint saved: ${path}`);
      await this.prune();
      return path;
    } catch (err) {
      console.warn(`Checkpoint ${path} was not saved: ${describeError(err)}`);
      return null;
    }
  }

  /** Checkpoints on disk for this prefix, oldest (smallest count) first. */
  async list(): Promise<CheckpointFile[]> {
    let names: string[];
    try {
      names = await readdir(this.options.directory);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const head = `${this.options.prefix}_temp_`;
    const files: CheckpointFile[] = [];
    for (const name of names) {
      if (!name.startsWith(head) || !name.endsWith('.csv')) continue;
      const digits = name.slice(head.length, -'.csv'.length);
      if (!/^\d+$/.test(digits)) continue;
      files.push({ path: join(this.options.directory, name), count: Number(digits) });
    }
    return files.sort((a, b) => a.count - b.count);
  }

  async latest(): Promise<CheckpointFile | null> {
    return (await this.list()).at(-1) ?? null;
  }

  async loadLatest(): Promise<{ file: CheckpointFile; rows: CsvRow[] } | null> {
    const file = await this.latest();
    if (!file) return null;
    return { file, rows: await readCsv(file.path) };
  }

  private async prune(): Promise<void> {
    const { retain } = this.options;
    if (retain === null || retain === undefined) return;
    const files = await this.list();
    for (const stale of files.slice(0, Math.max(files.length - retain, 0))) {
      await rm(stale.path, { force: true });
    }
  }
}

/** Copy the newest checkpoint over `target`. Resolves to the promoted file, or `null` when none exists. */
export async function promoteLatestCheckpoint<T>(store: CheckpointStore<T>, target: string): Promise<CheckpointFile | null> {
  const latest = await store.latest();
  if (!latest) return null;
  await mkdir(dirname(target), { recursive: true });
  await copyFile(latest.path, target);
  return latest;
}

/**
 * Append-only record list that hands a snapshot to its store every `every`
 * items. Appends are synchronous; writes run one after another in order.
 */
export class CheckpointedCollection<T> {
  private readonly items: T[] = [];
  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: CheckpointStore<T> | null,
    private readonly every: number,
  ) {}

  get size(): number {
    return this.items.length;
  }

  append(item: T): void {
    this.items.push(item);
    const { store } = this;
    if (!store || this.every <= 0 || this.items.length % this.every !== 0) return;
    const snapshot = [...this.items];
    this.pending = this.pending.then(() => store.save(snapshot));
  }

  snapshot(): T[] {
    return [...this.items];
  }

  /** Wait for queued checkpoint writes. */
  async flush(): Promise<void> {
    await this.pending;
  }
}
