/**
 * @toc-outline/outline-processor
 *
 * Recovers the outline of a printed table of contents from page-segmented
 * extracted text.
 *
 * ## Key Features
 *
 * - TOC page detection from contents headings
 * - Line classification (chapter marker, numbered item, other entry)
 * - Outline forest per TOC page
 * - Division classification with page spans
 * - Chapter page range resolution with diagnostics
 * - Extractor dump parsing and TOC tree interchange JSON
 *
 * @packageDocumentation
 */

export { OutlineProcessor } from './outline-processor';
export type {
  OutlineProcessorOptions,
  OutlineProcessRunOptions,
} from './outline-processor';
export { OutlineTreeBuilder } from './builders';
export { DivisionClassifier, LineClassifier } from './classifiers';
export type {
  ChapterMarkerClassification,
  ChapterTitleMatch,
  DivisionClassifierOptions,
  HierarchicalItemClassification,
  LineClassification,
  LineClassifierOptions,
  OtherEntryClassification,
} from './classifiers';
export { OUTLINE_PARSER, PAGE_DUMP, TOC_KEYWORDS } from './config/constants';
export { TocPageDetector } from './detectors';
export type { TocPageDetectorOptions } from './detectors';
export { OutlineContractError, UnorderedLinesError } from './errors';
export type { ContractIssue } from './errors';
export { PageDumpParser } from './parsers';
export type { PageDump } from './parsers';
export { ChapterRangeResolver } from './resolvers';
export {
  SerializedOutlineNodeSchema,
  TocTreeDocumentSchema,
  TocTreeFormatError,
  TocTreeSerializer,
} from './serializers';
export type { ParsedTocTree, TocTreeSerializeOptions } from './serializers';
export {
  TextCleaner,
  chapterHeadingOf,
  collectChapters,
  countNodes,
  formatChapterHeading,
  parseChapterHeading,
  walkOutline,
} from './utils';
export {
  DivisionTableSchema,
  InputContractValidator,
  LineSchema,
  LinesSchema,
  PageNumberSchema,
} from './validators';
