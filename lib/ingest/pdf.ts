import type { PDFParse as PdfParser } from 'pdf-parse';
import { ExtractionError, errorMessage } from '@/lib/errors';

/** Ordered page texts, index 0 first. */
export type PageTextSource = () => Promise<string[]>;

export async function extractPageTexts(data: Uint8Array): Promise<string[]> {
  let parser: PdfParser | undefined;
  try {
    const { PDFParse } = await import('pdf-parse');
    parser = new PDFParse({ data });
    const result = await parser.getText();
    const pages = [...result.pages].sort((a, b) => a.num - b.num).map((page) => page.text);
    console.info(`[PDF] extracted ${pages.length} pages`);
    return pages;
  } catch (err) {
    throw new ExtractionError(`Could not extract text from PDF: ${errorMessage(err)}`, err);
  } finally {
    await parser?.destroy();
  }
}

export function pdfPageSource(data: Uint8Array): PageTextSource {
  return () => extractPageTexts(data);
}
