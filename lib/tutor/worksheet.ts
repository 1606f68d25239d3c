import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { loadTutorSettings, type TutorSettings } from '@/config/tutor';
import { errorMessage } from '@/lib/errors';
import { sanitizeFilename } from '@/lib/filenames';
import type { TextGenerator } from '@/lib/generator';
import { parseJsonPayloadOr } from '@/lib/json-payload';
import { loadPrompt } from '@/lib/prompts';
import { WorksheetPayloadSchema, emptyWorksheetContent } from '@/lib/tutor/worksheet-schema';
import type { ConceptDraft, WorksheetContent, WorksheetFiles } from '@/types/textbook';

export function worksheetSource(summary: string, concepts: readonly ConceptDraft[]): string {
  const conceptBlocks = concepts.map((c) =>
    [
      `Concept: ${c.name}`,
      `Explanation: ${c.explanation}`,
      `Example: ${c.example ?? ''}`,
      `Analogy: ${c.analogy ?? ''}`
    ].join('\n')
  );
  return `${summary}\n\nKEY CONCEPTS:\n${conceptBlocks.join('\n\n')}`;
}

export class WorksheetGenerator {
  private readonly settings: TutorSettings;

  constructor(
    private readonly generator: TextGenerator,
    settings?: TutorSettings
  ) {
    this.settings = settings ?? loadTutorSettings();
  }

  /** Question sets for a chapter; the empty structure when generation or parsing fails. */
  async generateWorksheetContent(summary: string, concepts: readonly ConceptDraft[]): Promise<WorksheetContent> {
    let raw: string;
    try {
      raw = await this.generator.generate({
        system: loadPrompt('worksheet.system.md'),
        user: `Chapter summary and concepts:\n${worksheetSource(summary, concepts)}`,
        agent: 'Worksheet',
        temperature: this.settings.temps.worksheet,
        maxOutputTokens: this.settings.maxOutputTokens.worksheet
      });
    } catch (err) {
      console.warn('[Worksheet] generation failed', { message: errorMessage(err) });
      return emptyWorksheetContent();
    }
    return parseJsonPayloadOr(raw, 'object', WorksheetPayloadSchema, emptyWorksheetContent, 'Worksheet');
  }
}

export interface WorksheetRenderer {
  render(content: WorksheetContent, chapterTitle: string, outputDir: string): Promise<WorksheetFiles>;
}

const optionLetter = (i: number) => String.fromCharCode(65 + i);

export function renderWorksheetMarkdown(content: WorksheetContent, chapterTitle: string): string {
  const lines = [`# Practice Worksheet: ${chapterTitle}`, ''];

  lines.push('## Section 1: Multiple Choice Questions', '');
  content.mcqs.forEach((mcq, i) => {
    lines.push(`${i + 1}. ${mcq.question}`);
    mcq.options.forEach((option, j) => lines.push(`    ${optionLetter(j)}) ${option}`));
    lines.push('');
  });

  lines.push('## Section 2: One-Word or One-Liner Questions', '');
  content.oneLiners.forEach((q, i) => lines.push(`${i + 1}. ${q.question}`));
  lines.push('');

  lines.push('## Section 3: Brief Questions and Answers', '');
  content.briefQa.forEach((q, i) => lines.push(`${i + 1}. ${q.question}`, ''));

  lines.push('## Section 4: Match the Columns', '');
  const { column1, column2 } = content.matchColumns;
  const rows = Math.min(column1.length, column2.length);
  if (rows > 0) {
    lines.push('| Column A | Column B |', '| --- | --- |');
    for (let i = 0; i < rows; i++) {
      lines.push(`| ${i + 1}. ${column1[i]} | ${optionLetter(i)}. ${column2[i]} |`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function renderAnswerKeyMarkdown(content: WorksheetContent, chapterTitle: string): string {
  const lines = [`# Answer Key: ${chapterTitle}`, ''];

  lines.push('## Section 1: Multiple Choice Questions', '');
  content.mcqs.forEach((q, i) => lines.push(`${i + 1}. ${q.question} - Answer: ${q.answer}`));
  lines.push('');

  lines.push('## Section 2: One-Word or One-Liner Questions', '');
  content.oneLiners.forEach((q, i) => lines.push(`${i + 1}. ${q.question} - Answer: ${q.answer}`));
  lines.push('');

  lines.push('## Section 3: Brief Questions and Answers', '');
  content.briefQa.forEach((q, i) => lines.push(`${i + 1}. ${q.question}`, `Answer: ${q.answer}`, ''));

  lines.push('## Section 4: Match the Columns', '');
  Object.entries(content.matchColumns.matches).forEach(([item, match], i) => {
    lines.push(`${i + 1}. ${item} → ${match}`);
  });
  lines.push('');

  return lines.join('\n');
}

export class MarkdownWorksheetRenderer implements WorksheetRenderer {
  async render(content: WorksheetContent, chapterTitle: string, outputDir: string): Promise<WorksheetFiles> {
    const safe = sanitizeFilename(chapterTitle);
    await mkdir(outputDir, { recursive: true });
    const worksheetPath = join(outputDir, `${safe}_worksheet.md`);
    const answerKeyPath = join(outputDir, `${safe}_answer_key.md`);
    await writeFile(worksheetPath, renderWorksheetMarkdown(content, chapterTitle), 'utf8');
    await writeFile(answerKeyPath, renderAnswerKeyMarkdown(content, chapterTitle), 'utf8');
    console.info(`[Worksheet] wrote ${worksheetPath} and ${answerKeyPath}`);
    return { worksheetPath, answerKeyPath };
  }
}
