import { z } from 'zod';
import { loadTutorSettings, type TutorSettings } from '@/config/tutor';
import { errorMessage } from '@/lib/errors';
import type { TextGenerator } from '@/lib/generator';
import { parseJsonPayloadOr } from '@/lib/json-payload';
import { loadPrompt } from '@/lib/prompts';
import type { ConceptDraft } from '@/types/textbook';

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

export const ConceptDraftSchema = z.object({
  name: z.string().trim().min(1),
  explanation: z.string().default(''),
  example: optionalText,
  analogy: optionalText
});

// Keeps the well-formed entries of the array and drops the rest.
export const ConceptListSchema = z.array(z.unknown()).transform((items) =>
  items.flatMap((item): ConceptDraft[] => {
    const parsed = ConceptDraftSchema.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  })
);

const SECTION = /^##[ \t]+(.+)$/gm;

function markdownField(section: string, label: string): string | undefined {
  const escaped = label.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
  const match = section.match(new RegExp(String.raw`\*\*${escaped}\*\*:\s*([\s\S]*?)(?=\n\s*[-*]?\s*\*\*|\n\n|$)`));
  const value = match?.[1]?.trim();
  return value ? value : undefined;
}

/**
 * Reads concepts written as Markdown sections:
 *
 *   ## Name
 *   - **Explanation**: ...
 *   - **Example/Application**: ...
 *   - **Analogy**: ...
 */
export function conceptsFromMarkdown(markdown: string): ConceptDraft[] {
  const headings = [...markdown.matchAll(SECTION)];
  return headings.map((heading, i) => {
    const bodyStart = (heading.index ?? 0) + heading[0].length;
    const bodyEnd = headings[i + 1]?.index ?? markdown.length;
    const body = markdown.slice(bodyStart, bodyEnd);
    return {
      name: heading[1].trim(),
      explanation: markdownField(body, 'Explanation') ?? '',
      example: markdownField(body, 'Example/Application'),
      analogy: markdownField(body, 'Analogy')
    };
  });
}

const SEPARATORS = ['\n\n', '\n', ' '];

/**
 * Splits text into chunks of at most `size` characters, each starting
 * `overlap` characters before the previous one ended. Cuts prefer paragraph,
 * then line, then word boundaries in the second half of the window.
 */
export function splitIntoChunks(text: string, size: number, overlap: number): string[] {
  if (size <= overlap) {
    throw new Error('chunk size must exceed overlap');
  }
  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    if (end < text.length) {
      const window = text.slice(start, end);
      for (const sep of SEPARATORS) {
        const cut = window.lastIndexOf(sep);
        if (cut > size / 2) {
          end = start + cut + sep.length;
          break;
        }
      }
    }
    const chunk = text.slice(start, end).trim();
    if (chunk) chunks.push(chunk);
    if (end >= text.length) break;
    start = Math.max(end - overlap, start + 1);
  }
  return chunks;
}

export class ChapterSummarizer {
  private readonly settings: TutorSettings;

  constructor(
    private readonly generator: TextGenerator,
    settings?: TutorSettings
  ) {
    this.settings = settings ?? loadTutorSettings();
  }

  async summarizeChapter(chapterText: string): Promise<string> {
    if (chapterText.length > this.settings.longChapterChars) {
      return this.summarizeLongChapter(chapterText);
    }
    console.info('[Summarizer] summarizing chapter');
    return this.generator.generate({
      system: loadPrompt('chapter-summary.system.md'),
      user: `Chapter text:\n${chapterText}`,
      agent: 'ChapterSummary',
      temperature: this.settings.temps.summary,
      maxOutputTokens: this.settings.maxOutputTokens.summary
    });
  }

  private async summarizeLongChapter(chapterText: string): Promise<string> {
    const chunks = splitIntoChunks(chapterText, this.settings.chunkChars, this.settings.chunkOverlap);
    console.info(`[Summarizer] long chapter split into ${chunks.length} chunks`);

    const partials: string[] = [];
    for (const [i, chunk] of chunks.entries()) {
      console.info(`[Summarizer] chunk ${i + 1}/${chunks.length}`);
      partials.push(
        await this.generator.generate({
          system: loadPrompt('chunk-summary.system.md'),
          user: `Text section:\n${chunk}`,
          agent: 'ChunkSummary',
          temperature: this.settings.temps.summary,
          maxOutputTokens: this.settings.maxOutputTokens.summary
        })
      );
    }

    return this.generator.generate({
      system: loadPrompt('summary-synthesis.system.md'),
      user: `Partial summaries:\n${partials.join('\n\n')}`,
      agent: 'SummarySynthesis',
      temperature: this.settings.temps.summary,
      maxOutputTokens: this.settings.maxOutputTokens.summary
    });
  }

  /**
   * Concept records from a summary. Output without a JSON array is read as
   * Markdown sections; `[]` when the generator fails or nothing can be read.
   */
  async extractConcepts(summaryText: string): Promise<ConceptDraft[]> {
    let raw: string;
    try {
      raw = await this.generator.generate({
        system: loadPrompt('concept-extraction.system.md'),
        user: `Summary text:\n${summaryText}`,
        agent: 'ConceptExtraction',
        temperature: this.settings.temps.concepts
      });
    } catch (err) {
      console.warn('[Summarizer] concept extraction failed', { message: errorMessage(err) });
      return [];
    }
    const concepts = parseJsonPayloadOr(raw, 'array', ConceptListSchema, () => conceptsFromMarkdown(raw), 'ConceptExtraction');
    console.info(`[Summarizer] extracted ${concepts.length} concepts`);
    return concepts;
  }

  /** A fresh, beginner-level restatement; `''` when the generator fails. */
  async explainSimpler(concept: ConceptDraft): Promise<string> {
    const user = [
      `Concept: ${concept.name}`,
      `Original explanation: ${concept.explanation}`,
      concept.example ? `Example: ${concept.example}` : null,
      concept.analogy ? `Analogy: ${concept.analogy}` : null
    ]
      .filter((line): line is string => line !== null)
      .join('\n');
    try {
      const text = await this.generator.generate({
        system: loadPrompt('simpler-explanation.system.md'),
        user,
        agent: 'SimplerExplanation',
        temperature: this.settings.temps.simpler
      });
      return text.trim();
    } catch (err) {
      console.warn(`[Summarizer] simpler explanation failed for ${concept.name}`, { message: errorMessage(err) });
      return '';
    }
  }
}
