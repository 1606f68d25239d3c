import { IntegrityError } from '@/lib/errors';
import {
  deserializeChapterSet,
  nextId,
  serializeChapterSet,
  serializeWorksheetContent,
  toBook,
  toChapter,
  toConcept,
  toSummary,
  toUserProgress,
  toWorksheet,
  type RecordStore,
  type Tables
} from '@/lib/store/records';
import type {
  Book,
  Chapter,
  Concept,
  ConceptDraft,
  Summary,
  UserProgress,
  Worksheet,
  WorksheetContent
} from '@/types/textbook';

export type NewChapter = {
  bookId: number;
  chapterNumber: number;
  title: string;
  content: string;
};

const now = () => new Date().toISOString();

function requireBook(tables: Tables, bookId: number) {
  const book = tables.books.find((b) => b.id === bookId);
  if (!book) throw new IntegrityError(`Book ${bookId} does not exist`);
  return book;
}

function requireChapter(tables: Tables, chapterId: number) {
  const chapter = tables.chapters.find((c) => c.id === chapterId);
  if (!chapter) throw new IntegrityError(`Chapter ${chapterId} does not exist`);
  return chapter;
}

function dropChapterRows(tables: Tables, chapterIds: Set<number>) {
  tables.summaries = tables.summaries.filter((s) => !chapterIds.has(s.chapterId));
  tables.concepts = tables.concepts.filter((c) => !chapterIds.has(c.chapterId));
  tables.worksheets = tables.worksheets.filter((w) => !chapterIds.has(w.chapterId));
  tables.chapters = tables.chapters.filter((c) => !chapterIds.has(c.id));
}

/**
 * Referentially consistent access to books, chapters, summaries, concepts,
 * worksheets and per-book progress. Each method is a single unit of work on
 * the underlying record store.
 */
export class ProgressStore {
  constructor(private readonly records: RecordStore) {}

  async createBook(title: string, filePath: string): Promise<Book> {
    const book = await this.records.transact((tables) => {
      const ts = now();
      const row = { id: nextId(tables, 'books'), title, filePath, createdAt: ts, updatedAt: ts };
      tables.books.push(row);
      return toBook(row);
    });
    console.info(`[ProgressStore] created book ${book.id}: ${title}`);
    return book;
  }

  getBook(bookId: number): Promise<Book | null> {
    return this.records.read((tables) => {
      const row = tables.books.find((b) => b.id === bookId);
      return row ? toBook(row) : null;
    });
  }

  listBooks(): Promise<Book[]> {
    return this.records.read((tables) => tables.books.map(toBook));
  }

  async deleteBook(bookId: number): Promise<boolean> {
    const deleted = await this.records.transact((tables) => {
      if (!tables.books.some((b) => b.id === bookId)) return false;
      const chapterIds = new Set(tables.chapters.filter((c) => c.bookId === bookId).map((c) => c.id));
      dropChapterRows(tables, chapterIds);
      tables.userProgress = tables.userProgress.filter((p) => p.bookId !== bookId);
      tables.books = tables.books.filter((b) => b.id !== bookId);
      return true;
    });
    if (deleted) console.info(`[ProgressStore] deleted book ${bookId}`);
    return deleted;
  }

  async createChapter(input: NewChapter): Promise<Chapter> {
    const chapter = await this.records.transact((tables) => {
      requireBook(tables, input.bookId);
      const ts = now();
      const row = {
        id: nextId(tables, 'chapters'),
        bookId: input.bookId,
        chapterNumber: input.chapterNumber,
        title: input.title,
        content: input.content,
        isProcessed: false,
        createdAt: ts,
        updatedAt: ts
      };
      tables.chapters.push(row);
      return toChapter(row);
    });
    console.info(`[ProgressStore] created chapter ${chapter.id}: ${chapter.title}`);
    return chapter;
  }

  getChapter(chapterId: number): Promise<Chapter | null> {
    return this.records.read((tables) => {
      const row = tables.chapters.find((c) => c.id === chapterId);
      return row ? toChapter(row) : null;
    });
  }

  getChaptersByBook(bookId: number): Promise<Chapter[]> {
    return this.records.read((tables) =>
      tables.chapters
        .filter((c) => c.bookId === bookId)
        .sort((a, b) => a.chapterNumber - b.chapterNumber || a.id - b.id)
        .map(toChapter)
    );
  }

  markChapterProcessed(chapterId: number): Promise<Chapter | null> {
    return this.records.transact((tables) => {
      const row = tables.chapters.find((c) => c.id === chapterId);
      if (!row) return null;
      row.isProcessed = true;
      row.updatedAt = now();
      return toChapter(row);
    });
  }

  async deleteChapter(chapterId: number): Promise<boolean> {
    return this.records.transact((tables) => {
      const chapter = tables.chapters.find((c) => c.id === chapterId);
      if (!chapter) return false;
      dropChapterRows(tables, new Set([chapterId]));
      const progress = tables.userProgress.find((p) => p.bookId === chapter.bookId);
      if (progress) {
        const completed = deserializeChapterSet(progress.completedChapters);
        progress.completedChapters = serializeChapterSet(completed.filter((id) => id !== chapterId));
        if (progress.lastChapterId === chapterId) progress.lastChapterId = null;
        progress.updatedAt = now();
      }
      return true;
    });
  }

  async createSummary(chapterId: number, content: string): Promise<Summary> {
    const summary = await this.records.transact((tables) => {
      requireChapter(tables, chapterId);
      if (tables.summaries.some((s) => s.chapterId === chapterId)) {
        throw new IntegrityError(`Chapter ${chapterId} already has a summary`);
      }
      const ts = now();
      const row = { id: nextId(tables, 'summaries'), chapterId, content, createdAt: ts, updatedAt: ts };
      tables.summaries.push(row);
      return toSummary(row);
    });
    console.info(`[ProgressStore] created summary for chapter ${chapterId}`);
    return summary;
  }

  getSummary(chapterId: number): Promise<Summary | null> {
    return this.records.read((tables) => {
      const row = tables.summaries.find((s) => s.chapterId === chapterId);
      return row ? toSummary(row) : null;
    });
  }

  async createConcept(chapterId: number, draft: ConceptDraft): Promise<Concept> {
    const concept = await this.records.transact((tables) => {
      requireChapter(tables, chapterId);
      const ts = now();
      const row = {
        id: nextId(tables, 'concepts'),
        chapterId,
        name: draft.name,
        explanation: draft.explanation,
        example: draft.example ?? null,
        analogy: draft.analogy ?? null,
        isUnderstood: false,
        createdAt: ts,
        updatedAt: ts
      };
      tables.concepts.push(row);
      return toConcept(row);
    });
    console.info(`[ProgressStore] created concept ${concept.id}: ${concept.name}`);
    return concept;
  }

  getConcept(conceptId: number): Promise<Concept | null> {
    return this.records.read((tables) => {
      const row = tables.concepts.find((c) => c.id === conceptId);
      return row ? toConcept(row) : null;
    });
  }

  getConceptsByChapter(chapterId: number): Promise<Concept[]> {
    return this.records.read((tables) =>
      tables.concepts
        .filter((c) => c.chapterId === chapterId)
        .sort((a, b) => a.id - b.id)
        .map(toConcept)
    );
  }

  async markConceptUnderstood(conceptId: number, understood: boolean): Promise<Concept | null> {
    const concept = await this.records.transact((tables) => {
      const row = tables.concepts.find((c) => c.id === conceptId);
      if (!row) return null;
      row.isUnderstood = understood;
      row.updatedAt = now();
      return toConcept(row);
    });
    if (concept) {
      console.info(`[ProgressStore] marked concept ${conceptId} as ${understood ? 'understood' : 'not understood'}`);
    }
    return concept;
  }

  /** Stores the chapter's worksheet, replacing the existing one in place. */
  async saveWorksheet(
    chapterId: number,
    content: WorksheetContent,
    files: { filePath?: string; answerKeyPath?: string } = {}
  ): Promise<Worksheet> {
    return this.records.transact((tables) => {
      requireChapter(tables, chapterId);
      const ts = now();
      const columns = {
        ...serializeWorksheetContent(content),
        filePath: files.filePath ?? null,
        answerKeyPath: files.answerKeyPath ?? null
      };
      const existing = tables.worksheets.find((w) => w.chapterId === chapterId);
      if (existing) {
        Object.assign(existing, columns, { updatedAt: ts });
        console.info(`[ProgressStore] replaced worksheet for chapter ${chapterId}`);
        return toWorksheet(existing);
      }
      const row = { id: nextId(tables, 'worksheets'), chapterId, ...columns, createdAt: ts, updatedAt: ts };
      tables.worksheets.push(row);
      console.info(`[ProgressStore] created worksheet for chapter ${chapterId}`);
      return toWorksheet(row);
    });
  }

  getWorksheet(chapterId: number): Promise<Worksheet | null> {
    return this.records.read((tables) => {
      const row = tables.worksheets.find((w) => w.chapterId === chapterId);
      return row ? toWorksheet(row) : null;
    });
  }

  /**
   * Records a visit. The first call for a book only creates the record; later
   * calls with a chapter id move `lastChapterId` and add the chapter to the
   * completed set if it is not already there.
   */
  async updateProgress(bookId: number, chapterId?: number): Promise<UserProgress> {
    const progress = await this.records.transact((tables) => {
      requireBook(tables, bookId);
      if (chapterId !== undefined) {
        const chapter = requireChapter(tables, chapterId);
        if (chapter.bookId !== bookId) {
          throw new IntegrityError(`Chapter ${chapterId} does not belong to book ${bookId}`);
        }
      }

      const ts = now();
      const row = tables.userProgress.find((p) => p.bookId === bookId);
      if (!row) {
        const created = {
          id: nextId(tables, 'userProgress'),
          bookId,
          lastChapterId: chapterId ?? null,
          completedChapters: serializeChapterSet([]),
          createdAt: ts,
          updatedAt: ts
        };
        tables.userProgress.push(created);
        return toUserProgress(created);
      }

      if (chapterId !== undefined) {
        row.lastChapterId = chapterId;
        const completed = deserializeChapterSet(row.completedChapters);
        if (!completed.includes(chapterId)) {
          completed.push(chapterId);
        }
        row.completedChapters = serializeChapterSet(completed);
      }
      row.updatedAt = ts;
      return toUserProgress(row);
    });
    console.info(`[ProgressStore] updated progress for book ${bookId}`);
    return progress;
  }

  getUserProgress(bookId: number): Promise<UserProgress | null> {
    return this.records.read((tables) => {
      const row = tables.userProgress.find((p) => p.bookId === bookId);
      return row ? toUserProgress(row) : null;
    });
  }

  async resetChapterProgress(chapterId: number): Promise<void> {
    await this.records.transact((tables) => {
      const ts = now();
      for (const concept of tables.concepts) {
        if (concept.chapterId !== chapterId) continue;
        concept.isUnderstood = false;
        concept.updatedAt = ts;
      }

      const chapter = tables.chapters.find((c) => c.id === chapterId);
      if (!chapter) return;
      const progress = tables.userProgress.find((p) => p.bookId === chapter.bookId);
      if (!progress) return;
      const completed = deserializeChapterSet(progress.completedChapters);
      if (!completed.includes(chapterId)) return;
      progress.completedChapters = serializeChapterSet(completed.filter((id) => id !== chapterId));
      progress.updatedAt = ts;
    });
    console.info(`[ProgressStore] reset progress for chapter ${chapterId}`);
  }
}
