import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { emptyTables, TablesSchema, type RecordStore, type Tables } from '@/lib/store/records';

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Record store backed by a single JSON document. Every unit of work re-reads
 * the file, and commits replace it through a temp file and rename. Units of
 * work run one at a time in the order they were requested.
 */
export class FileRecordStore implements RecordStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(readonly path: string) {}

  read<T>(fn: (tables: Readonly<Tables>) => T): Promise<T> {
    return this.enqueue(async () => fn(await this.load()));
  }

  transact<T>(fn: (tables: Tables) => T): Promise<T> {
    return this.enqueue(async () => {
      const tables = await this.load();
      const result = fn(tables);
      await this.commit(tables);
      return result;
    });
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(work, work);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<Tables> {
    let data: string;
    try {
      data = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return emptyTables();
      throw err;
    }
    return TablesSchema.parse(JSON.parse(data));
  }

  private async commit(tables: Tables): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${randomUUID()}.tmp`;
    await writeFile(tmp, JSON.stringify(tables, null, 2), 'utf8');
    await rename(tmp, this.path);
  }
}

const openStores = new Map<string, FileRecordStore>();

/** The process-wide store for a data file, so every caller shares one queue. */
export function fileRecordStore(path: string): FileRecordStore {
  const key = resolve(path);
  let store = openStores.get(key);
  if (!store) {
    store = new FileRecordStore(key);
    openStores.set(key, store);
  }
  return store;
}
