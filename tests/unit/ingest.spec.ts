import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ExtractionError } from '@/lib/errors';
import { saveChapters } from '@/lib/ingest/export';
import { bookTitleFromFileName, ingestBook } from '@/lib/ingest/ingest';
import { extractPageTexts } from '@/lib/ingest/pdf';
import { MemoryRecordStore } from '@/lib/store/memory';
import { ProgressStore } from '@/lib/store/progress-store';

const pdf = vi.hoisted(() => ({
  open: vi.fn(),
  getText: vi.fn(),
  destroy: vi.fn(async () => undefined)
}));

vi.mock('pdf-parse', () => ({
  PDFParse: class {
    constructor() {
      pdf.open();
    }
    getText = pdf.getText;
    destroy = pdf.destroy;
  }
}));

describe('extractPageTexts', () => {
  beforeEach(() => {
    pdf.open.mockReset();
    pdf.getText.mockReset();
    pdf.destroy.mockClear();
  });

  it('returns page texts in page order', async () => {
    pdf.getText.mockResolvedValue({
      text: '',
      pages: [
        { num: 2, text: 'second' },
        { num: 1, text: 'first' }
      ]
    });
    await expect(extractPageTexts(new Uint8Array([1, 2, 3]))).resolves.toEqual(['first', 'second']);
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it('wraps parser failures', async () => {
    pdf.getText.mockRejectedValue(new Error('bad xref'));
    const result = extractPageTexts(new Uint8Array());
    await expect(result).rejects.toBeInstanceOf(ExtractionError);
    await expect(result).rejects.toThrow('Could not extract text from PDF: bad xref');
    expect(pdf.destroy).toHaveBeenCalledTimes(1);
  });

  it('wraps a parser that cannot be created', async () => {
    pdf.open.mockImplementation(() => {
      throw new Error('not a PDF');
    });
    await expect(extractPageTexts(new Uint8Array())).rejects.toThrow('Could not extract text from PDF: not a PDF');
    expect(pdf.destroy).not.toHaveBeenCalled();
  });
});

describe('ingestBook', () => {
  it('stores the book and one chapter per segment', async () => {
    const store = new ProgressStore(new MemoryRecordStore());
    const { book, chapters } = await ingestBook(store, {
      fileName: 'Biology Basics.pdf',
      filePath: '/uploads/Biology_Basics.pdf',
      pages: async () => ['Preface', 'Chapter 1\nCells', 'CHAPTER II\nGenes']
    });
    expect(book.title).toBe('Biology Basics');
    expect(book.filePath).toBe('/uploads/Biology_Basics.pdf');
    expect(chapters.map((c) => [c.title, c.chapterNumber])).toEqual([
      ['Chapter 1', 1],
      ['Chapter II', 2]
    ]);
    expect((await store.getChaptersByBook(book.id)).map((c) => c.content)).toEqual([
      'Chapter 1\nCells\n\nPage 2:\n',
      'CHAPTER II\nGenes'
    ]);
  });

  it('uses explicit ranges', async () => {
    const store = new ProgressStore(new MemoryRecordStore());
    const { chapters } = await ingestBook(store, {
      fileName: 'notes.pdf',
      filePath: '/uploads/notes.pdf',
      pages: async () => ['a', 'b', 'c'],
      segment: { customRanges: { 'Chapter 3': [0, 1], Appendix: [2, 2] } }
    });
    expect(chapters.map((c) => [c.title, c.chapterNumber, c.content])).toEqual([
      ['Chapter 3', 3, 'a\nb'],
      ['Appendix', 1, 'c']
    ]);
  });

  it('writes nothing when extraction fails', async () => {
    const store = new ProgressStore(new MemoryRecordStore());
    await expect(
      ingestBook(store, {
        fileName: 'broken.pdf',
        filePath: '/uploads/broken.pdf',
        pages: async () => {
          throw new ExtractionError('unreadable');
        }
      })
    ).rejects.toBeInstanceOf(ExtractionError);
    expect(await store.listBooks()).toEqual([]);
  });

  it('derives the title from the file name', () => {
    expect(bookTitleFromFileName('/books/Algebra.PDF')).toBe('Algebra');
    expect(bookTitleFromFileName('draft.pdf.bak')).toBe('draft.pdf.bak');
  });
});

describe('saveChapters', () => {
  let dir = '';

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('writes the chapter map and one text file per chapter', async () => {
    dir = await mkdtemp(join(tmpdir(), 'tutor-export-'));
    const chapters = new Map([
      ['Chapter 1', 'One'],
      ['Chapter 2: Review!', 'Two']
    ]);
    const jsonPath = await saveChapters(chapters, 'Physics', dir);
    expect(jsonPath).toBe(join(dir, 'Physics_chapters.json'));
    expect(JSON.parse(await readFile(jsonPath, 'utf8'))).toEqual({ 'Chapter 1': 'One', 'Chapter 2: Review!': 'Two' });
    expect(await readFile(join(dir, 'Physics', 'Chapter_1.txt'), 'utf8')).toBe('One');
    expect(await readFile(join(dir, 'Physics', 'Chapter_2_Review.txt'), 'utf8')).toBe('Two');
  });
});
