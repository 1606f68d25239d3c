#!/usr/bin/env tsx
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadTutorSettings } from '@/config/tutor';
import { createTutorContext } from '@/lib/context';
import { saveChapters } from '@/lib/ingest/export';
import { bookTitleFromFileName, ingestBook } from '@/lib/ingest/ingest';
import { pdfPageSource } from '@/lib/ingest/pdf';
import type { ChapterRanges } from '@/types/textbook';

function parseRanges(raw: string): ChapterRanges {
  const parsed: unknown = JSON.parse(raw);
  const ranges: Record<string, [number, number]> = {};
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('--ranges must be a JSON object of label → [start, end]');
  }
  for (const [label, value] of Object.entries(parsed)) {
    if (!Array.isArray(value) || value.length !== 2 || !value.every(Number.isInteger)) {
      throw new Error(`--ranges entry for ${label} must be [start, end]`);
    }
    ranges[label] = [Number(value[0]), Number(value[1])];
  }
  return ranges;
}

async function main() {
  const args = process.argv.slice(2);
  const file = args.find((arg) => !arg.startsWith('--'));
  if (!file) {
    console.error('Usage: npm run ingest -- <book.pdf> [--pattern=<regex>] [--ranges=<json>] [--export]');
    process.exit(1);
  }

  const settings = loadTutorSettings();
  const patternArg = args.find((arg) => arg.startsWith('--pattern='));
  const rangesArg = args.find((arg) => arg.startsWith('--ranges='));
  const exportChapters = args.includes('--export');

  const filePath = resolve(file);
  const data = new Uint8Array(await readFile(filePath));
  const { book, chapters, segments } = await ingestBook(createTutorContext().store, {
    fileName: filePath,
    filePath,
    pages: pdfPageSource(data),
    segment: {
      pattern: patternArg ? patternArg.slice('--pattern='.length) : settings.chapterPattern,
      customRanges: rangesArg ? parseRanges(rangesArg.slice('--ranges='.length)) : undefined
    }
  });

  console.error(`Stored book ${book.id} "${book.title}" with ${chapters.length} chapters`);
  for (const chapter of chapters) {
    console.log(`${chapter.id}\t${chapter.chapterNumber}\t${chapter.title}`);
  }

  if (exportChapters) {
    const jsonPath = await saveChapters(segments, bookTitleFromFileName(filePath), settings.outputDir);
    console.error(`Chapters saved to ${jsonPath}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
