import { join } from 'node:path';

function numberFromEnv(name: string, fallback: number): number {
  const parsed = Number(process.env[name] ?? 'NaN');
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const DEFAULT_CHAPTER_PATTERN = String.raw`(?:Chapter|CHAPTER)\s+(\d+|[IVXLCDM]+)`;

export type TutorSettings = {
  model: string;
  dataFile: string;
  uploadDir: string;
  outputDir: string;
  chapterPattern: string;
  longChapterChars: number;
  chunkChars: number;
  chunkOverlap: number;
  maxUploadBytes: number;
  temps: {
    summary: number;
    concepts: number;
    simpler: number;
    worksheet: number;
  };
  maxOutputTokens: {
    summary: number;
    worksheet: number;
  };
};

// Read on every call so tests and route handlers see the current environment.
export function loadTutorSettings(): TutorSettings {
  const dataDir = process.env.TUTOR_DATA_DIR || join(process.cwd(), 'data');
  return {
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    dataFile: join(dataDir, 'tutor.json'),
    uploadDir: join(dataDir, 'uploads'),
    outputDir: process.env.TUTOR_OUTPUT_DIR || join(process.cwd(), 'output'),
    chapterPattern: process.env.TUTOR_CHAPTER_PATTERN || DEFAULT_CHAPTER_PATTERN,
    longChapterChars: numberFromEnv('TUTOR_LONG_CHAPTER_CHARS', 10_000),
    chunkChars: numberFromEnv('TUTOR_CHUNK_CHARS', 8_000),
    chunkOverlap: numberFromEnv('TUTOR_CHUNK_OVERLAP', 200),
    maxUploadBytes: numberFromEnv('TUTOR_MAX_UPLOAD_BYTES', 50 * 1024 * 1024),
    temps: {
      summary: 0.2,
      concepts: 0.2,
      simpler: 0.2,
      worksheet: 0.3
    },
    maxOutputTokens: {
      summary: 4096,
      worksheet: 8192
    }
  };
}
