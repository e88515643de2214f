import type { ChapterNode } from './outline-node';

/**
 * Validated page range of one chapter in the paginated source
 *
 * Always satisfies `startPage <= endPage <= totalPages`.
 *
 * @interface ChapterRange
 */
export interface ChapterRange {
  chapter: ChapterNode;

  /**
   * First page (inclusive)
   * @type {number}
   */
  startPage: number;

  /**
   * Last page (inclusive)
   * @type {number}
   */
  endPage: number;
}
