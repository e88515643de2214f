import type { ChapterRange } from './chapter-range';
import type { DivisionName, DivisionSpan } from './division';
import type { PageNumber } from './line';
import type {
  DivisionIssue,
  OutlineTreeIssue,
  RangeDiagnostic,
  UnclassifiedChapterIssue,
} from './outline-issue';
import type { ChapterNode, PageForest } from './outline-node';

/**
 * Ranges resolved for an ordered chapter list
 */
export interface ChapterRangeResolution {
  ranges: ChapterRange[];
  diagnostics: RangeDiagnostic[];
}

/**
 * Chapters of every division with their division spans
 */
export interface DivisionClassification {
  /**
   * All five divisions in canonical order
   */
  divisions: Map<DivisionName, DivisionSpan>;

  /**
   * Chapters whose heading is not in the division table
   */
  unclassified: UnclassifiedChapterIssue[];

  /**
   * Divisions without any classified chapter
   */
  missing: DivisionName[];

  issues: DivisionIssue[];
}

/**
 * Outline forest with the anomalies found while building it
 */
export interface OutlineTreeBuildResult {
  forest: PageForest;
  issues: OutlineTreeIssue[];
}

/**
 * Complete output of one outline processing run
 *
 * @interface OutlineProcessResult
 */
export interface OutlineProcessResult {
  /**
   * TOC page numbers, sorted and unique
   */
  tocPages: PageNumber[];

  forest: PageForest;

  treeIssues: OutlineTreeIssue[];

  /**
   * Chapter nodes in page order, then line order
   */
  chapters: ChapterNode[];

  divisions: DivisionClassification;

  /**
   * Ranges over the whole chapter list
   */
  chapterRanges: ChapterRangeResolution;

  /**
   * Ranges resolved separately for each populated division's chapters,
   * bounded by the division's end page
   */
  divisionRanges: Map<DivisionName, ChapterRangeResolution>;

  totalPages: number;
}
