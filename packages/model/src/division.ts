import type { ChapterNode } from './outline-node';

/**
 * Canonical division order; span computation depends on it
 */
export const DIVISION_NAMES = [
  'common',
  'civil',
  'architecture',
  'mechanical',
  'maintenance',
] as const;

export type DivisionName = (typeof DIVISION_NAMES)[number];

/**
 * Printed labels of the divisions
 */
export const DIVISION_LABELS: Record<DivisionName, string> = {
  common: '공통부문',
  civil: '토목부문',
  architecture: '건축부문',
  mechanical: '기계설비부문',
  maintenance: '유지관리부문',
};

/**
 * Page span and chapters of one division
 *
 * Both pages stay null when no chapter was classified into the division.
 *
 * @interface DivisionSpan
 */
export interface DivisionSpan {
  name: DivisionName;

  label: string;

  /**
   * Target page of the first chapter assigned to the division
   * @type {number | null}
   */
  startPage: number | null;

  /**
   * Last page before the next populated division, or the document's last known page
   * @type {number | null}
   */
  endPage: number | null;

  /**
   * Chapters assigned to the division, in input order
   * @type {ChapterNode[]}
   */
  chapters: ChapterNode[];
}

/**
 * Known chapter of a division
 */
export interface DivisionChapterEntry {
  number: string;
  title: string;
}

/**
 * Static lookup table of every division's known chapters
 */
export type DivisionTable = Record<DivisionName, DivisionChapterEntry[]>;
