import { describe, expect, it } from 'vitest';
import { bookStats, chapterStats, percentage } from '@/lib/tutor/progress';
import type { Chapter, Concept } from '@/types/textbook';

const ts = '2024-01-01T00:00:00.000Z';

function chapter(id: number, chapterNumber: number): Chapter {
  return { id, bookId: 1, chapterNumber, title: `Chapter ${chapterNumber}`, content: '', isProcessed: true, createdAt: ts, updatedAt: ts };
}

function concept(id: number, chapterId: number, isUnderstood: boolean): Concept {
  return { id, chapterId, name: `C${id}`, explanation: '', isUnderstood, createdAt: ts, updatedAt: ts };
}

describe('percentage', () => {
  it('is zero for an empty total', () => {
    expect(percentage(0, 0)).toBe(0);
    expect(percentage(1, 4)).toBe(25);
  });
});

describe('chapterStats', () => {
  it('counts understood concepts', () => {
    expect(chapterStats([concept(1, 1, true), concept(2, 1, false), concept(3, 1, true), concept(4, 1, false)])).toEqual({
      totalConcepts: 4,
      understoodConcepts: 2,
      progressPercentage: 50,
      concepts: [
        { id: 1, name: 'C1', isUnderstood: true },
        { id: 2, name: 'C2', isUnderstood: false },
        { id: 3, name: 'C3', isUnderstood: true },
        { id: 4, name: 'C4', isUnderstood: false }
      ]
    });
  });
});

describe('bookStats', () => {
  it('weighs every concept equally and reads completion from the set', () => {
    const stats = bookStats(
      1,
      [
        { chapter: chapter(10, 1), concepts: [concept(1, 10, true)] },
        { chapter: chapter(11, 2), concepts: [concept(2, 11, false), concept(3, 11, false), concept(4, 11, true)] }
      ],
      [11]
    );
    expect(stats.overallProgress).toBe(50);
    expect(stats.totalChapters).toBe(2);
    expect(stats.completedChapters).toBe(1);
    expect(stats.chapterProgress.map((c) => [c.chapterId, c.progressPercentage, c.isCompleted])).toEqual([
      [10, 100, false],
      [11, (1 / 3) * 100, true]
    ]);
  });
});
