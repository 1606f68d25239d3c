import type { BookProgress, Chapter, ChapterProgress, Concept } from '@/types/textbook';

export function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

export function chapterStats(concepts: readonly Concept[]): ChapterProgress {
  const understoodConcepts = concepts.filter((c) => c.isUnderstood).length;
  return {
    totalConcepts: concepts.length,
    understoodConcepts,
    progressPercentage: percentage(understoodConcepts, concepts.length),
    concepts: concepts.map((c) => ({ id: c.id, name: c.name, isUnderstood: c.isUnderstood }))
  };
}

export type ChapterWithConcepts = {
  chapter: Chapter;
  concepts: readonly Concept[];
};

/**
 * Rolls chapter stats up to the book. `overallProgress` weighs every concept
 * equally; completion is read from the completed set, not from understanding.
 */
export function bookStats(
  bookId: number,
  chapters: readonly ChapterWithConcepts[],
  completedChapterIds: readonly number[]
): BookProgress {
  const completed = new Set(completedChapterIds);
  let total = 0;
  let understood = 0;

  const chapterProgress = chapters.map(({ chapter, concepts }) => {
    const stats = chapterStats(concepts);
    total += stats.totalConcepts;
    understood += stats.understoodConcepts;
    return {
      chapterId: chapter.id,
      chapterTitle: chapter.title,
      chapterNumber: chapter.chapterNumber,
      progressPercentage: stats.progressPercentage,
      isCompleted: completed.has(chapter.id)
    };
  });

  return {
    bookId,
    overallProgress: percentage(understood, total),
    totalChapters: chapters.length,
    completedChapters: completed.size,
    chapterProgress
  };
}
