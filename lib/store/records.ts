import { z } from 'zod';
import type {
  Book,
  Chapter,
  Concept,
  Summary,
  UserProgress,
  Worksheet,
  WorksheetContent
} from '@/types/textbook';
import { WorksheetContentSchema, emptyWorksheetContent } from '@/lib/tutor/worksheet-schema';

const Timestamps = {
  createdAt: z.string(),
  updatedAt: z.string()
};

export const BookRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  filePath: z.string(),
  ...Timestamps
});

export const ChapterRowSchema = z.object({
  id: z.number().int(),
  bookId: z.number().int(),
  chapterNumber: z.number().int(),
  title: z.string(),
  content: z.string(),
  isProcessed: z.boolean().default(false),
  ...Timestamps
});

export const SummaryRowSchema = z.object({
  id: z.number().int(),
  chapterId: z.number().int(),
  content: z.string(),
  ...Timestamps
});

export const ConceptRowSchema = z.object({
  id: z.number().int(),
  chapterId: z.number().int(),
  name: z.string(),
  explanation: z.string(),
  example: z.string().nullable(),
  analogy: z.string().nullable(),
  isUnderstood: z.boolean().default(false),
  ...Timestamps
});

// Question sets are kept as serialized JSON text, one column per set.
export const WorksheetRowSchema = z.object({
  id: z.number().int(),
  chapterId: z.number().int(),
  mcqs: z.string().nullable(),
  oneLiners: z.string().nullable(),
  briefQa: z.string().nullable(),
  matchColumns: z.string().nullable(),
  filePath: z.string().nullable(),
  answerKeyPath: z.string().nullable(),
  ...Timestamps
});

export const UserProgressRowSchema = z.object({
  id: z.number().int(),
  bookId: z.number().int(),
  lastChapterId: z.number().int().nullable(),
  completedChapters: z.string(),
  ...Timestamps
});

export type BookRow = z.infer<typeof BookRowSchema>;
export type ChapterRow = z.infer<typeof ChapterRowSchema>;
export type SummaryRow = z.infer<typeof SummaryRowSchema>;
export type ConceptRow = z.infer<typeof ConceptRowSchema>;
export type WorksheetRow = z.infer<typeof WorksheetRowSchema>;
export type UserProgressRow = z.infer<typeof UserProgressRowSchema>;

export const TABLE_NAMES = ['books', 'chapters', 'summaries', 'concepts', 'worksheets', 'userProgress'] as const;
export type TableName = (typeof TABLE_NAMES)[number];

export const TablesSchema = z.object({
  sequences: z.record(z.number().int()).default({}),
  books: z.array(BookRowSchema).default([]),
  chapters: z.array(ChapterRowSchema).default([]),
  summaries: z.array(SummaryRowSchema).default([]),
  concepts: z.array(ConceptRowSchema).default([]),
  worksheets: z.array(WorksheetRowSchema).default([]),
  userProgress: z.array(UserProgressRowSchema).default([])
});

export type Tables = z.infer<typeof TablesSchema>;

/**
 * Key-indexed record store. `read` sees a snapshot; `transact` runs the
 * mutation against a working copy and commits it only if `fn` returns
 * normally. Each call is one unit of work.
 */
export interface RecordStore {
  read<T>(fn: (tables: Readonly<Tables>) => T): Promise<T>;
  transact<T>(fn: (tables: Tables) => T): Promise<T>;
}

export function emptyTables(): Tables {
  return TablesSchema.parse({});
}

export function nextId(tables: Tables, table: TableName): number {
  const id = (tables.sequences[table] ?? 0) + 1;
  tables.sequences[table] = id;
  return id;
}

function parseJsonText(text: string | null): unknown {
  if (text === null) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function serializeChapterSet(ids: number[]): string {
  return JSON.stringify(ids);
}

// Unreadable text, or anything that is not a list of integers, reads as an empty set.
export function deserializeChapterSet(text: string): number[] {
  const parsed = z.array(z.unknown()).safeParse(parseJsonText(text));
  if (!parsed.success) return [];
  return [...new Set(parsed.data.filter((id): id is number => Number.isInteger(id)))];
}

export function serializeWorksheetContent(content: WorksheetContent) {
  return {
    mcqs: JSON.stringify(content.mcqs),
    oneLiners: JSON.stringify(content.oneLiners),
    briefQa: JSON.stringify(content.briefQa),
    matchColumns: JSON.stringify(content.matchColumns)
  };
}

export function deserializeWorksheetContent(row: WorksheetRow): WorksheetContent {
  const fallback = emptyWorksheetContent();
  const parts = WorksheetContentSchema.shape;
  const mcqs = parts.mcqs.safeParse(parseJsonText(row.mcqs));
  const oneLiners = parts.oneLiners.safeParse(parseJsonText(row.oneLiners));
  const briefQa = parts.briefQa.safeParse(parseJsonText(row.briefQa));
  const matchColumns = parts.matchColumns.safeParse(parseJsonText(row.matchColumns));
  return {
    mcqs: mcqs.success ? mcqs.data : fallback.mcqs,
    oneLiners: oneLiners.success ? oneLiners.data : fallback.oneLiners,
    briefQa: briefQa.success ? briefQa.data : fallback.briefQa,
    matchColumns: matchColumns.success ? matchColumns.data : fallback.matchColumns
  };
}

export function toBook(row: BookRow): Book {
  return { ...row };
}

export function toChapter(row: ChapterRow): Chapter {
  return { ...row };
}

export function toSummary(row: SummaryRow): Summary {
  return { ...row };
}

export function toConcept(row: ConceptRow): Concept {
  return {
    id: row.id,
    chapterId: row.chapterId,
    name: row.name,
    explanation: row.explanation,
    example: row.example ?? undefined,
    analogy: row.analogy ?? undefined,
    isUnderstood: row.isUnderstood,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  };
}

export function toWorksheet(row: WorksheetRow): Worksheet {
  return {
    id: row.id,
    chapterId: row.chapterId,
    content: deserializeWorksheetContent(row),
    filePath: row.filePath ?? undefined,
    answerKeyPath: row.answerKeyPath ?? undefined,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  };
}

export function toUserProgress(row: UserProgressRow): UserProgress {
  return {
    id: row.id,
    bookId: row.bookId,
    lastChapterId: row.lastChapterId ?? undefined,
    completedChapters: deserializeChapterSet(row.completedChapters),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  };
}
