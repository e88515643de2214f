import type { DivisionName } from './division';
import type { PageNumber } from './line';
import type { ChapterNode, OutlineNode } from './outline-node';

/**
 * Content-level anomaly reported alongside normal results
 *
 * Issues never stop the pipeline; the caller decides whether to log,
 * fail the run, or continue with partial output.
 */
interface OutlineIssueBase {
  /**
   * Issue code (T001, D001, R001, ...)
   */
  code: string;

  /**
   * Human-readable message
   */
  message: string;
}

/**
 * T001: the same number appears twice among the children of one parent
 */
export interface DuplicateSiblingIssue extends OutlineIssueBase {
  code: 'T001';

  /**
   * TOC source page the duplicate was found on
   */
  sourcePage: PageNumber;

  parent: OutlineNode;

  /**
   * The later of the two siblings (kept in the tree, not merged)
   */
  node: OutlineNode;
}

export type OutlineTreeIssue = DuplicateSiblingIssue;

/**
 * D001: chapter heading not present in the division table
 */
export interface UnclassifiedChapterIssue extends OutlineIssueBase {
  code: 'D001';
  chapter: ChapterNode;
}

/**
 * D002: next populated division starts before this one,
 * end page clamped to the start page
 */
export interface DivisionOrderIssue extends OutlineIssueBase {
  code: 'D002';
  division: DivisionName;
}

export type DivisionIssue = UnclassifiedChapterIssue | DivisionOrderIssue;

/**
 * Range diagnostic codes
 * - R001: start page exceeds the last page (rejected)
 * - R002: end page exceeds the last page (clamped, kept)
 * - R003: start page after end page, next chapter is out of order (rejected)
 * - R004: start page below 1 (rejected)
 */
export type RangeIssueCode = 'R001' | 'R002' | 'R003' | 'R004';

export interface RangeDiagnostic extends OutlineIssueBase {
  code: RangeIssueCode;

  chapter: ChapterNode;

  /**
   * Whether the chapter was left out of the resolved ranges
   */
  rejected: boolean;

  /**
   * Following chapter whose start page produced the conflict (R003 only)
   */
  nextChapter?: ChapterNode;
}

export type OutlineIssue = OutlineTreeIssue | DivisionIssue | RangeDiagnostic;
