import { basename } from 'node:path';
import type { PageTextSource } from '@/lib/ingest/pdf';
import { chapterNumberFromLabel, segmentPages, type SegmentOptions } from '@/lib/ingest/segmenter';
import type { ProgressStore } from '@/lib/store/progress-store';
import type { Book, Chapter } from '@/types/textbook';

export type IngestRequest = {
  fileName: string;
  filePath: string;
  pages: PageTextSource;
  segment?: SegmentOptions;
};

export type IngestResult = {
  book: Book;
  chapters: Chapter[];
  segments: Map<string, string>;
};

export function bookTitleFromFileName(fileName: string): string {
  return basename(fileName).replace(/\.pdf$/i, '');
}

/**
 * Extracts and segments the document, then stores the book with one chapter
 * per segment. Nothing is written when extraction fails.
 */
export async function ingestBook(store: ProgressStore, request: IngestRequest): Promise<IngestResult> {
  const pages = await request.pages();
  const segments = segmentPages(pages, request.segment);

  const book = await store.createBook(bookTitleFromFileName(request.fileName), request.filePath);
  const chapters: Chapter[] = [];
  for (const [label, text] of segments) {
    chapters.push(
      await store.createChapter({
        bookId: book.id,
        chapterNumber: chapterNumberFromLabel(label),
        title: label,
        content: text
      })
    );
  }
  console.info(`[Ingest] stored "${book.title}" with ${chapters.length} chapters`);
  return { book, chapters, segments };
}
