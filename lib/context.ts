import { loadTutorSettings } from '@/config/tutor';
import { OpenAITextGenerator, type TextGenerator } from '@/lib/generator';
import { fileRecordStore } from '@/lib/store/file';
import { ProgressStore } from '@/lib/store/progress-store';
import type { RecordStore } from '@/lib/store/records';
import { ChapterSummarizer } from '@/lib/tutor/summarizer';
import { MarkdownWorksheetRenderer, WorksheetGenerator, type WorksheetRenderer } from '@/lib/tutor/worksheet';

export type TutorContext = {
  store: ProgressStore;
  summarizer: ChapterSummarizer;
  worksheets: WorksheetGenerator;
  renderer: WorksheetRenderer;
};

export type TutorContextOverrides = {
  records?: RecordStore;
  generator?: TextGenerator;
  renderer?: WorksheetRenderer;
};

/** Builds the collaborators for one request or CLI run. */
export function createTutorContext(overrides: TutorContextOverrides = {}): TutorContext {
  const settings = loadTutorSettings();
  const generator = overrides.generator ?? new OpenAITextGenerator(settings.model);
  return {
    store: new ProgressStore(overrides.records ?? fileRecordStore(settings.dataFile)),
    summarizer: new ChapterSummarizer(generator, settings),
    worksheets: new WorksheetGenerator(generator, settings),
    renderer: overrides.renderer ?? new MarkdownWorksheetRenderer()
  };
}
