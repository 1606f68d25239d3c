import { describe, it, expect, vi } from 'vitest';
import {
  buildPagedText,
  chapterNumberFromLabel,
  rewritePageMarkers,
  romanToInt,
  segmentPages
} from '@/lib/ingest/segmenter';

describe('segmentPages', () => {
  it('splits at headings and rewrites page markers', () => {
    const pages = ['Chapter 1\nIntro text.', 'More chapter 1 text.', 'Chapter 2\nDetails.'];
    const chapters = segmentPages(pages);
    expect([...chapters.keys()]).toEqual(['Chapter 1', 'Chapter 2']);
    expect(chapters.get('Chapter 1')).toBe('Chapter 1\nIntro text.\n\nPage 1:\nMore chapter 1 text.\n\nPage 2:\n');
    expect(chapters.get('Chapter 2')).toBe('Chapter 2\nDetails.');
  });

  it('returns the whole document as Chapter 1 when no heading matches', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const chapters = segmentPages(['Preface', 'Acknowledgements']);
    expect([...chapters.entries()]).toEqual([['Chapter 1', 'Preface\nAcknowledgements']]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('drops text before the first heading', () => {
    const chapters = segmentPages(['Preface', 'Chapter 1\nA']);
    expect([...chapters.entries()]).toEqual([['Chapter 1', 'Chapter 1\nA']]);
  });

  it('keeps the later text when a label repeats', () => {
    const chapters = segmentPages(['Chapter 1\nA', 'Chapter 1\nB']);
    expect(chapters.size).toBe(1);
    expect(chapters.get('Chapter 1')).toBe('Chapter 1\nB');
  });

  it('covers the text from the first heading to the end without gaps', () => {
    const pages = ['Front', 'Chapter 1\nA', 'B', 'Chapter 2\nC', 'Chapter 3\nD'];
    const full = buildPagedText(pages);
    const first = full.indexOf('Chapter 1');
    const chapters = segmentPages(pages);
    expect([...chapters.values()].join('')).toBe(rewritePageMarkers(full.slice(first)));
  });

  it('reads Roman numeral headings', () => {
    const chapters = segmentPages(['CHAPTER IV\nFour', 'CHAPTER V\nFive']);
    expect([...chapters.keys()]).toEqual(['Chapter IV', 'Chapter V']);
  });

  it('accepts a custom pattern', () => {
    const chapters = segmentPages(['Unit 1\nx', 'Unit 2\ny'], { pattern: 'Unit (\\d+)' });
    expect([...chapters.keys()]).toEqual(['Chapter 1', 'Chapter 2']);
    expect(chapters.get('Chapter 2')).toBe('Unit 2\ny');
  });

  it('labels with the whole match when the pattern has no group', () => {
    const chapters = segmentPages(['Lesson 3\nx'], { pattern: /Lesson \d+/ });
    expect([...chapters.keys()]).toEqual(['Chapter Lesson 3']);
  });

  it('uses explicit ranges and skips invalid ones', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const chapters = segmentPages(['p0', 'p1', 'p2', 'p3'], {
      customRanges: {
        'Part A': [0, 1],
        'Part B': [2, 3],
        Overflow: [3, 9],
        Negative: [-1, 0],
        Backwards: [2, 1]
      }
    });
    expect([...chapters.entries()]).toEqual([
      ['Part A', 'p0\np1'],
      ['Part B', 'p2\np3']
    ]);
    expect(warn).toHaveBeenCalledTimes(3);
    warn.mockRestore();
  });

  it('falls back to heading detection when the range map is empty', () => {
    const chapters = segmentPages(['Chapter 7\nx'], { customRanges: new Map() });
    expect([...chapters.keys()]).toEqual(['Chapter 7']);
  });
});

describe('chapterNumberFromLabel', () => {
  it('reads digits and Roman numerals', () => {
    expect(chapterNumberFromLabel('Chapter 12')).toBe(12);
    expect(chapterNumberFromLabel('Chapter IV')).toBe(4);
    expect(chapterNumberFromLabel('Chapter XLII')).toBe(42);
  });

  it('falls back to 1 for other labels', () => {
    expect(chapterNumberFromLabel('Part A')).toBe(1);
    expect(chapterNumberFromLabel('Chapter X1')).toBe(1);
    expect(chapterNumberFromLabel('Chapter Lesson 3')).toBe(1);
  });

  it('rejects non-Roman text', () => {
    expect(romanToInt('IX')).toBe(9);
    expect(romanToInt('Intro')).toBeNull();
  });
});
