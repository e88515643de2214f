/**
 * Configuration constants for outline parsing
 */
export const OUTLINE_PARSER = {
  /**
   * Minimum length of a dot-leader run between a title and its page number.
   * Shorter runs are treated as ordinary punctuation.
   */
  FILLER_MIN_RUN: 3,

  /**
   * Characters that make up a dot leader
   */
  FILLER_CHARACTERS: '.· ',

  /**
   * Chapter marker alone on its line, e.g. "제1장", "제 12 장".
   * Group 1 captures the chapter number.
   */
  CHAPTER_MARKER_PATTERN: /^제\s*(\d+)\s*장$/,

  /**
   * Bare printed page number
   */
  BARE_PAGE_NUMBER_PATTERN: /^\d+$/,
} as const;

/**
 * Contents heading keywords. Matching ignores whitespace and case,
 * so "목 차" and "목  차" both match "목차".
 */
export const TOC_KEYWORDS = [
  '목차',
  '차례',
  'Contents',
  'Table of Contents',
] as const;

/**
 * Extractor dump format
 *
 * ```
 * === 3페이지 ===
 * 1줄: 목  차
 * 2줄: 3
 * ----
 * ```
 */
export const PAGE_DUMP = {
  PAGE_HEADER_PATTERN: /^===\s*(\d+)\s*페이지\s*===$/,
  LINE_PATTERN: /^(\d+)줄:\s?(.*)$/,
} as const;
