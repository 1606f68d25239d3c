import { z } from 'zod';
import type { WorksheetContent } from '@/types/textbook';

const DifficultySchema = z.enum(['easy', 'medium', 'hard']).optional().catch(undefined);

export const MultipleChoiceSchema = z.object({
  question: z.string().min(1),
  options: z.array(z.string()),
  answer: z.string(),
  difficulty: DifficultySchema
});

export const ShortQuestionSchema = z.object({
  question: z.string().min(1),
  answer: z.string(),
  difficulty: DifficultySchema
});

export const MatchColumnsSchema = z.object({
  column1: z.array(z.string()).default([]),
  column2: z.array(z.string()).default([]),
  matches: z.record(z.string()).default({})
});

export const WorksheetContentSchema = z.object({
  mcqs: z.array(MultipleChoiceSchema),
  oneLiners: z.array(ShortQuestionSchema),
  briefQa: z.array(ShortQuestionSchema),
  matchColumns: MatchColumnsSchema
});

// Keeps the entries that fit `item` and drops the rest.
function validEntries<T extends z.ZodTypeAny>(item: T) {
  return z.array(z.unknown()).transform((entries) =>
    entries.flatMap((entry): z.output<T>[] => {
      const parsed = item.safeParse(entry);
      return parsed.success ? [parsed.data] : [];
    })
  );
}

// Shape requested from the generator; keys follow the prompt's JSON example.
export const WorksheetPayloadSchema = z
  .object({
    mcqs: validEntries(MultipleChoiceSchema).default([]),
    one_liners: validEntries(ShortQuestionSchema).default([]),
    brief_qa: validEntries(ShortQuestionSchema).default([]),
    match_columns: MatchColumnsSchema.default({}).catch({ column1: [], column2: [], matches: {} })
  })
  .transform(
    (payload): WorksheetContent => ({
      mcqs: payload.mcqs,
      oneLiners: payload.one_liners,
      briefQa: payload.brief_qa,
      matchColumns: payload.match_columns
    })
  );

export function emptyWorksheetContent(): WorksheetContent {
  return {
    mcqs: [],
    oneLiners: [],
    briefQa: [],
    matchColumns: { column1: [], column2: [], matches: {} }
  };
}
