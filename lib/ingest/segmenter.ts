import { DEFAULT_CHAPTER_PATTERN } from '@/config/tutor';
import type { ChapterRanges } from '@/types/textbook';

export type SegmentOptions = {
  pattern?: string | RegExp;
  customRanges?: ChapterRanges;
};

const PAGE_MARKER = /\[PAGE_(\d+)\]\n/g;

const ROMAN_VALUES: Record<string, number> = { I: 1, V: 5, X: 10, L: 50, C: 100, D: 500, M: 1000 };

export function pageMarker(index: number): string {
  return `[PAGE_${index}]`;
}

export function buildPagedText(pages: string[]): string {
  return pages.map((text, i) => `${pageMarker(i)}\n${text}`).join('\n');
}

export function rewritePageMarkers(text: string): string {
  return text.replace(PAGE_MARKER, (_, n: string) => `\nPage ${n}:\n`);
}

function toGlobal(pattern: string | RegExp): RegExp {
  if (typeof pattern === 'string') return new RegExp(pattern, 'g');
  return pattern.flags.includes('g') ? new RegExp(pattern.source, pattern.flags) : new RegExp(pattern.source, `${pattern.flags}g`);
}

function rangeEntries(ranges: ChapterRanges): [string, [number, number]][] {
  return ranges instanceof Map ? [...ranges.entries()] : Object.entries(ranges);
}

function hasRanges(ranges: ChapterRanges | undefined): ranges is ChapterRanges {
  if (!ranges) return false;
  return ranges instanceof Map ? ranges.size > 0 : Object.keys(ranges).length > 0;
}

export function segmentByRanges(pages: string[], ranges: ChapterRanges): Map<string, string> {
  const chapters = new Map<string, string>();
  for (const [label, [start, end]] of rangeEntries(ranges)) {
    const valid = Number.isInteger(start) && Number.isInteger(end) && start >= 0 && end < pages.length && start <= end;
    if (!valid) {
      console.warn(`[Segmenter] invalid page range for ${label}: (${start}, ${end})`);
      continue;
    }
    chapters.set(label, pages.slice(start, end + 1).join('\n'));
  }
  return chapters;
}

/**
 * Splits ordered page texts into chapters.
 *
 * With `customRanges`, each label takes the inclusive page range it names and
 * bad ranges are skipped. Otherwise the heading pattern is matched against the
 * page-marked text; each heading opens a chapter that runs to the next heading.
 * Repeated labels overwrite earlier entries, so a table of contents that repeats
 * a heading yields the later occurrence's text under that label.
 */
export function segmentPages(pages: string[], options: SegmentOptions = {}): Map<string, string> {
  if (hasRanges(options.customRanges)) {
    console.info('[Segmenter] using custom chapter ranges');
    return segmentByRanges(pages, options.customRanges);
  }

  const pattern = toGlobal(options.pattern ?? DEFAULT_CHAPTER_PATTERN);
  const fullText = buildPagedText(pages);
  const matches = [...fullText.matchAll(pattern)];

  if (!matches.length) {
    console.warn('[Segmenter] no chapter headings matched; treating the document as one chapter');
    return new Map([['Chapter 1', pages.join('\n')]]);
  }

  const chapters = new Map<string, string>();
  matches.forEach((match, i) => {
    const start = match.index ?? 0;
    const next = matches[i + 1];
    const end = next ? next.index ?? fullText.length : fullText.length;
    const id = match[1] ?? match[0];
    chapters.set(`Chapter ${id}`, rewritePageMarkers(fullText.slice(start, end)));
  });

  console.info(`[Segmenter] extracted ${chapters.size} chapters from ${matches.length} headings`);
  return chapters;
}

export function romanToInt(value: string): number | null {
  const upper = value.toUpperCase();
  if (!/^[IVXLCDM]+$/.test(upper)) return null;
  let total = 0;
  for (let i = 0; i < upper.length; i += 1) {
    const current = ROMAN_VALUES[upper[i]];
    const next = i + 1 < upper.length ? ROMAN_VALUES[upper[i + 1]] : 0;
    total += current < next ? -current : current;
  }
  return total;
}

export function chapterNumberFromLabel(label: string, fallback = 1): number {
  const m = label.match(/^\s*chapter\s+(\S+)\s*$/i);
  if (!m) return fallback;
  const token = m[1];
  if (/^\d+$/.test(token)) return Number(token);
  return romanToInt(token) ?? fallback;
}
