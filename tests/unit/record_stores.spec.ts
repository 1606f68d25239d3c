import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTutorContext } from '@/lib/context';
import { FileRecordStore, fileRecordStore } from '@/lib/store/file';
import { MemoryRecordStore } from '@/lib/store/memory';
import { ProgressStore } from '@/lib/store/progress-store';
import { deserializeChapterSet, emptyTables, nextId, serializeChapterSet } from '@/lib/store/records';
import { ScriptedGenerator } from '../fakes';

describe('record helpers', () => {
  it('hands out increasing ids per table', () => {
    const tables = emptyTables();
    expect(nextId(tables, 'books')).toBe(1);
    expect(nextId(tables, 'books')).toBe(2);
    expect(nextId(tables, 'concepts')).toBe(1);
  });

  it('deserializes chapter sets leniently', () => {
    expect(deserializeChapterSet(serializeChapterSet([3, 1]))).toEqual([3, 1]);
    expect(deserializeChapterSet('[2,2,5]')).toEqual([2, 5]);
    expect(deserializeChapterSet('')).toEqual([]);
    expect(deserializeChapterSet('{"a":1}')).toEqual([]);
    expect(deserializeChapterSet('["x"]')).toEqual([]);
    expect(deserializeChapterSet('[1,"2",3.5,4]')).toEqual([1, 4]);
  });
});

describe('MemoryRecordStore', () => {
  it('discards the working copy when a unit of work throws', async () => {
    const records = new MemoryRecordStore();
    await expect(
      records.transact((tables) => {
        tables.books.push({ id: 1, title: 'T', filePath: 'p', createdAt: 'now', updatedAt: 'now' });
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(records.snapshot().books).toEqual([]);
  });

  it('does not let readers mutate stored rows', async () => {
    const store = new ProgressStore(new MemoryRecordStore());
    const book = await store.createBook('T', 'p');
    const read = await store.getBook(book.id);
    if (read) read.title = 'changed';
    expect((await store.getBook(book.id))?.title).toBe('T');
  });
});

describe('FileRecordStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tutor-store-'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('reads an absent file as empty tables', async () => {
    const records = new FileRecordStore(join(dir, 'missing.json'));
    expect(await records.read((tables) => tables.books.length)).toBe(0);
  });

  it('persists across instances', async () => {
    const path = join(dir, 'data', 'tutor.json');
    const first = new ProgressStore(new FileRecordStore(path));
    const book = await first.createBook('Chemistry', '/tmp/chem.pdf');
    await first.createChapter({ bookId: book.id, chapterNumber: 1, title: 'Chapter 1', content: 'Atoms' });

    const second = new ProgressStore(new FileRecordStore(path));
    const chapters = await second.getChaptersByBook(book.id);
    expect(chapters.map((c) => c.content)).toEqual(['Atoms']);

    const raw = JSON.parse(await readFile(path, 'utf8'));
    expect(raw.sequences).toEqual({ books: 1, chapters: 1 });
  });

  it('runs interleaved units of work without losing writes', async () => {
    const store = new ProgressStore(new FileRecordStore(join(dir, 'tutor.json')));
    const book = await store.createBook('Math', '/tmp/math.pdf');
    const chapter = await store.createChapter({ bookId: book.id, chapterNumber: 1, title: 'Chapter 1', content: '' });
    await Promise.all(
      Array.from({ length: 10 }, (_, i) => store.createConcept(chapter.id, { name: `C${i}`, explanation: '' }))
    );
    const concepts = await store.getConceptsByChapter(chapter.id);
    expect(concepts.map((c) => c.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it('keeps the file unchanged when a unit of work fails', async () => {
    const path = join(dir, 'tutor.json');
    const store = new ProgressStore(new FileRecordStore(path));
    await store.createBook('Math', '/tmp/math.pdf');
    const before = await readFile(path, 'utf8');
    await expect(store.createSummary(99, 'x')).rejects.toThrow('Chapter 99 does not exist');
    expect(await readFile(path, 'utf8')).toBe(before);
    await expect(store.listBooks()).resolves.toHaveLength(1);
  });

  it('shares one queue per data file across contexts', async () => {
    vi.stubEnv('TUTOR_DATA_DIR', dir);
    const setup = createTutorContext({ generator: new ScriptedGenerator({}) });
    const book = await setup.store.createBook('Math', '/tmp/math.pdf');
    const chapter = await setup.store.createChapter({ bookId: book.id, chapterNumber: 1, title: 'Chapter 1', content: '' });

    const first = createTutorContext({ generator: new ScriptedGenerator({}) });
    const second = createTutorContext({ generator: new ScriptedGenerator({}) });
    await Promise.all([
      first.store.createConcept(chapter.id, { name: 'A', explanation: '' }),
      second.store.createConcept(chapter.id, { name: 'B', explanation: '' })
    ]);

    const path = join(dir, 'tutor.json');
    expect(fileRecordStore(path)).toBe(fileRecordStore(join(dir, '.', 'tutor.json')));
    const reread = new ProgressStore(new FileRecordStore(path));
    const concepts = await reread.getConceptsByChapter(chapter.id);
    expect(concepts.map((c) => `${c.id}:${c.name}`)).toEqual(['1:A', '2:B']);
  });

  it('gives every commit its own temp file', async () => {
    const path = join(dir, 'tutor.json');
    const a = new ProgressStore(new FileRecordStore(path));
    const b = new ProgressStore(new FileRecordStore(path));
    const results = await Promise.allSettled([a.createBook('A', '/tmp/a.pdf'), b.createBook('B', '/tmp/b.pdf')]);
    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'fulfilled']);
  });

  it('rejects a document with the wrong shape', async () => {
    const path = join(dir, 'tutor.json');
    await writeFile(path, JSON.stringify({ books: [{ id: 'one' }] }), 'utf8');
    await expect(new FileRecordStore(path).read((tables) => tables.books)).rejects.toThrow();
  });
});
