import type { ChapterNode } from '@toc-outline/model';

const CHAPTER_HEADING_PATTERN = /^제\s*(\d+)\s*장(?:\s+(.*))?$/;

/**
 * Printed chapter heading, e.g. "제1장 적용기준".
 * A chapter without a title is rendered as its marker alone ("제1장").
 */
export function formatChapterHeading(number: string, title: string): string {
  const marker = `제${number}장`;
  return title ? `${marker} ${title}` : marker;
}

export function chapterHeadingOf(chapter: ChapterNode): string {
  return formatChapterHeading(chapter.number, chapter.title);
}

/**
 * Splits a printed chapter heading back into number and title
 *
 * @returns null when the text does not start with a chapter marker
 */
export function parseChapterHeading(
  heading: string,
): { number: string; title: string } | null {
  const match = CHAPTER_HEADING_PATTERN.exec(heading.trim());
  if (!match) {
    return null;
  }

  return {
    number: match[1],
    title: (match[2] ?? '').trim(),
  };
}
