import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { sanitizeFilename } from '@/lib/filenames';

/**
 * Writes `<book>_chapters.json` (label → text) into `outputDir` and one
 * `<label>.txt` per chapter into `outputDir/<book>/`. Returns the JSON path.
 */
export async function saveChapters(chapters: Map<string, string>, bookName: string, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const jsonPath = join(outputDir, `${bookName}_chapters.json`);
  await writeFile(jsonPath, JSON.stringify(Object.fromEntries(chapters), null, 2), 'utf8');

  const chaptersDir = join(outputDir, bookName);
  await mkdir(chaptersDir, { recursive: true });
  for (const [label, text] of chapters) {
    await writeFile(join(chaptersDir, `${sanitizeFilename(label)}.txt`), text, 'utf8');
  }
  console.info(`[Export] saved ${chapters.size} chapters to ${jsonPath}`);
  return jsonPath;
}
