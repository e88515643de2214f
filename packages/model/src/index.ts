export type { Line, PageNumber } from './line';
export type {
  ChapterNode,
  ItemNode,
  OtherNode,
  OutlineNode,
  OutlineNodeType,
  PageForest,
} from './outline-node';
export { DIVISION_LABELS, DIVISION_NAMES } from './division';
export type {
  DivisionChapterEntry,
  DivisionName,
  DivisionSpan,
  DivisionTable,
} from './division';
export type { ChapterRange } from './chapter-range';
export type {
  DivisionIssue,
  DivisionOrderIssue,
  DuplicateSiblingIssue,
  OutlineIssue,
  OutlineTreeIssue,
  RangeDiagnostic,
  RangeIssueCode,
  UnclassifiedChapterIssue,
} from './outline-issue';
export type {
  SerializedOutlineNode,
  TocTreeDocument,
} from './toc-tree-document';
export type {
  ChapterRangeResolution,
  DivisionClassification,
  OutlineProcessResult,
  OutlineTreeBuildResult,
} from './outline-process-result';
