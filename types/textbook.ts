export type Book = {
  id: number;
  title: string;
  filePath: string;
  createdAt: string;
  updatedAt: string;
};

export type Chapter = {
  id: number;
  bookId: number;
  chapterNumber: number;
  title: string;
  content: string;
  isProcessed: boolean;
  createdAt: string;
  updatedAt: string;
};

export type Summary = {
  id: number;
  chapterId: number;
  content: string;
  createdAt: string;
  updatedAt: string;
};

export type ConceptDraft = {
  name: string;
  explanation: string;
  example?: string;
  analogy?: string;
};

export type Concept = ConceptDraft & {
  id: number;
  chapterId: number;
  isUnderstood: boolean;
  createdAt: string;
  updatedAt: string;
};

export type QuestionDifficulty = 'easy' | 'medium' | 'hard';

export type MultipleChoiceQuestion = {
  question: string;
  options: string[];
  answer: string;
  difficulty?: QuestionDifficulty;
};

export type ShortQuestion = {
  question: string;
  answer: string;
  difficulty?: QuestionDifficulty;
};

export type MatchColumns = {
  column1: string[];
  column2: string[];
  matches: Record<string, string>;
};

export type WorksheetContent = {
  mcqs: MultipleChoiceQuestion[];
  oneLiners: ShortQuestion[];
  briefQa: ShortQuestion[];
  matchColumns: MatchColumns;
};

export type Worksheet = {
  id: number;
  chapterId: number;
  content: WorksheetContent;
  filePath?: string;
  answerKeyPath?: string;
  createdAt: string;
  updatedAt: string;
};

export type UserProgress = {
  id: number;
  bookId: number;
  lastChapterId?: number;
  completedChapters: number[];
  createdAt: string;
  updatedAt: string;
};

export type ChapterRanges = Record<string, [number, number]> | Map<string, [number, number]>;

export type SessionConcept = {
  id: number;
  name: string;
  explanation: string;
  example?: string;
  analogy?: string;
  isUnderstood: boolean;
};

export type SessionView = {
  chapter: { id: number; title: string; number: number };
  summary: string;
  concepts: SessionConcept[];
};

export type ConceptUnderstandingResult =
  | { id: number; name: string; isUnderstood: true }
  | { id: number; name: string; isUnderstood: false; simplerExplanation: string };

export type ChapterProgress = {
  totalConcepts: number;
  understoodConcepts: number;
  progressPercentage: number;
  concepts: { id: number; name: string; isUnderstood: boolean }[];
};

export type ChapterProgressEntry = {
  chapterId: number;
  chapterTitle: string;
  chapterNumber: number;
  progressPercentage: number;
  isCompleted: boolean;
};

export type BookProgress = {
  bookId: number;
  overallProgress: number;
  totalChapters: number;
  completedChapters: number;
  chapterProgress: ChapterProgressEntry[];
};

export type WorksheetFiles = {
  worksheetPath: string;
  answerKeyPath: string;
};
