import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { loadTutorSettings } from '@/config/tutor';
import { errorResponse, jsonError } from '@/lib/api/respond';
import { createTutorContext } from '@/lib/context';
import { sanitizeFilename } from '@/lib/filenames';
import { bookTitleFromFileName, ingestBook } from '@/lib/ingest/ingest';
import { pdfPageSource } from '@/lib/ingest/pdf';

export const runtime = 'nodejs';

const RangesSchema = z.record(z.tuple([z.number().int(), z.number().int()]));

function parseRanges(raw: FormDataEntryValue | null): z.infer<typeof RangesSchema> | undefined | null {
  if (raw === null || raw === '') return undefined;
  if (typeof raw !== 'string') return null;
  try {
    const parsed = RangesSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function parsePattern(raw: FormDataEntryValue | null): string | undefined | null {
  if (raw === null || raw === '') return undefined;
  if (typeof raw !== 'string') return null;
  try {
    new RegExp(raw, 'g');
    return raw;
  } catch {
    return null;
  }
}

export async function GET() {
  try {
    const books = await createTutorContext().store.listBooks();
    return Response.json({ books });
  } catch (error) {
    return errorResponse('books', error);
  }
}

export async function POST(req: Request) {
  const form = await req.formData().catch(() => null);
  if (!form) return jsonError('Expected multipart form data', 400);

  const file = form.get('file');
  if (file === null || typeof file === 'string') return jsonError('Missing file', 400);

  const settings = loadTutorSettings();
  if (file.size > settings.maxUploadBytes) {
    return jsonError(`File exceeds ${settings.maxUploadBytes} bytes`, 413);
  }

  const customRanges = parseRanges(form.get('ranges'));
  if (customRanges === null) return jsonError('Bad ranges', 400);
  const pattern = parsePattern(form.get('pattern'));
  if (pattern === null) return jsonError('Bad pattern', 400);

  try {
    const data = new Uint8Array(await file.arrayBuffer());
    await mkdir(settings.uploadDir, { recursive: true });
    const filePath = join(settings.uploadDir, `${sanitizeFilename(bookTitleFromFileName(file.name))}.pdf`);
    await writeFile(filePath, data);

    const { book, chapters } = await ingestBook(createTutorContext().store, {
      fileName: file.name,
      filePath,
      pages: pdfPageSource(data),
      segment: { pattern: pattern ?? settings.chapterPattern, customRanges }
    });
    return Response.json(
      { book, chapters: chapters.map(({ id, chapterNumber, title }) => ({ id, chapterNumber, title })) },
      { status: 201 }
    );
  } catch (error) {
    return errorResponse('books', error);
  }
}
