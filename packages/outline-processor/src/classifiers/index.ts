export { DivisionClassifier } from './division-classifier';
export type { DivisionClassifierOptions } from './division-classifier';
export { LineClassifier } from './line-classifier';
export type {
  ChapterMarkerClassification,
  ChapterTitleMatch,
  HierarchicalItemClassification,
  LineClassification,
  LineClassifierOptions,
  OtherEntryClassification,
} from './line-classifier';
