import type { PageNumber } from './line';

interface OutlineNodeBase {
  /**
   * Entry title without number or dot leader (may be empty for malformed input)
   */
  title: string;

  /**
   * Printed target page number parsed from the entry,
   * not the source page the entry appears on
   */
  page: number;

  /**
   * Hierarchy depth: 0 for chapters and other entries,
   * dash count of the number for items ("1-1" → 1, "1-1-1" → 2)
   */
  level: number;

  /**
   * Child entries in document order
   */
  children: OutlineNode[];
}

/**
 * Chapter entry introduced by a chapter marker line (e.g. "제1장")
 */
export interface ChapterNode extends OutlineNodeBase {
  type: 'chapter';

  /**
   * Chapter number as printed ("1", "12")
   */
  number: string;
}

/**
 * Dash-numbered section/clause entry (e.g. "1-1", "2-3-1")
 */
export interface ItemNode extends OutlineNodeBase {
  type: 'item';

  /**
   * Dash-delimited number as printed
   */
  number: string;
}

/**
 * Titled entry without a number (appendix, reference material, ...)
 */
export interface OtherNode extends OutlineNodeBase {
  type: 'other';
}

/**
 * Node of the recovered outline
 */
export type OutlineNode = ChapterNode | ItemNode | OtherNode;

export type OutlineNodeType = OutlineNode['type'];

/**
 * Outline roots per TOC source page, in ascending page order.
 * Pages without any recognized entry are absent.
 */
export type PageForest = Map<PageNumber, OutlineNode[]>;
