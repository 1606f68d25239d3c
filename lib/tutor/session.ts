import type { TutorContext } from '@/lib/context';
import { NotFoundError } from '@/lib/errors';
import { bookStats, chapterStats, type ChapterWithConcepts } from '@/lib/tutor/progress';
import type {
  BookProgress,
  ChapterProgress,
  ConceptUnderstandingResult,
  SessionView,
  Worksheet
} from '@/types/textbook';

/**
 * Drives a learner through a chapter. A chapter is summarized the first time
 * it is opened; whether a summary exists is the only signal for that, so a
 * chapter whose concept extraction came back empty stays without concepts.
 */
export class LearningSessionController {
  constructor(private readonly ctx: TutorContext) {}

  async startSession(chapterId: number): Promise<SessionView> {
    const { store, summarizer } = this.ctx;
    const chapter = await store.getChapter(chapterId);
    if (!chapter) throw new NotFoundError('Chapter', chapterId);

    let summary = await store.getSummary(chapterId);
    if (!summary) {
      console.info(`[Session] generating summary for chapter ${chapterId}`);
      const text = await summarizer.summarizeChapter(chapter.content);
      summary = await store.createSummary(chapterId, text);
      const drafts = await summarizer.extractConcepts(text);
      for (const draft of drafts) {
        await store.createConcept(chapterId, draft);
      }
      await store.markChapterProcessed(chapterId);
    }

    const concepts = await store.getConceptsByChapter(chapterId);
    await store.updateProgress(chapter.bookId, chapterId);

    return {
      chapter: { id: chapter.id, title: chapter.title, number: chapter.chapterNumber },
      summary: summary.content,
      concepts: concepts.map((c) => ({
        id: c.id,
        name: c.name,
        explanation: c.explanation,
        example: c.example,
        analogy: c.analogy,
        isUnderstood: c.isUnderstood
      }))
    };
  }

  /** Records understanding; a "no" leaves the flag alone and returns a simpler explanation. */
  async processConceptUnderstanding(conceptId: number, understood: boolean): Promise<ConceptUnderstandingResult> {
    const { store, summarizer } = this.ctx;
    const concept = await store.getConcept(conceptId);
    if (!concept) throw new NotFoundError('Concept', conceptId);

    if (understood) {
      await store.markConceptUnderstood(conceptId, true);
      return { id: concept.id, name: concept.name, isUnderstood: true };
    }

    const simplerExplanation = await summarizer.explainSimpler(concept);
    return { id: concept.id, name: concept.name, isUnderstood: false, simplerExplanation };
  }

  async getChapterProgress(chapterId: number): Promise<ChapterProgress> {
    const concepts = await this.ctx.store.getConceptsByChapter(chapterId);
    return chapterStats(concepts);
  }

  async getBookProgress(bookId: number): Promise<BookProgress> {
    const { store } = this.ctx;
    const chapters = await store.getChaptersByBook(bookId);
    const withConcepts: ChapterWithConcepts[] = [];
    for (const chapter of chapters) {
      withConcepts.push({ chapter, concepts: await store.getConceptsByChapter(chapter.id) });
    }
    const progress = await store.getUserProgress(bookId);
    return bookStats(bookId, withConcepts, progress?.completedChapters ?? []);
  }

  async resetChapterProgress(chapterId: number): Promise<{ message: string }> {
    await this.ctx.store.resetChapterProgress(chapterId);
    return { message: `Progress for chapter ${chapterId} has been reset` };
  }

  /** Generates, renders and stores the chapter's worksheet, replacing any earlier one. */
  async generateWorksheet(chapterId: number, outputDir: string): Promise<Worksheet> {
    const { store, worksheets, renderer } = this.ctx;
    const chapter = await store.getChapter(chapterId);
    if (!chapter) throw new NotFoundError('Chapter', chapterId);
    const summary = await store.getSummary(chapterId);
    if (!summary) throw new NotFoundError('Summary for chapter', chapterId);

    const concepts = await store.getConceptsByChapter(chapterId);
    const content = await worksheets.generateWorksheetContent(summary.content, concepts);
    const files = await renderer.render(content, chapter.title, outputDir);
    return store.saveWorksheet(chapterId, content, {
      filePath: files.worksheetPath,
      answerKeyPath: files.answerKeyPath
    });
  }
}
