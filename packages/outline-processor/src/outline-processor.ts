import type { LoggerMethods } from '@toc-outline/logger';
import type {
  ChapterRangeResolution,
  DivisionClassification,
  DivisionName,
  Line,
  OutlineProcessResult,
} from '@toc-outline/model';

import type {
  DivisionClassifierOptions,
  LineClassifierOptions,
} from './classifiers';
import type { TocPageDetectorOptions } from './detectors';

import { DIVISION_NAMES } from '@toc-outline/model';

import { OutlineTreeBuilder } from './builders';
import { DivisionClassifier, LineClassifier } from './classifiers';
import { TocPageDetector } from './detectors';
import { PageDumpParser } from './parsers';
import { ChapterRangeResolver } from './resolvers';
import { collectChapters } from './utils';
import { InputContractValidator } from './validators';

/**
 * OutlineProcessor Options
 */
export interface OutlineProcessorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Line classification rules (filler threshold, chapter marker pattern)
   */
  classifier?: LineClassifierOptions;

  /**
   * Contents heading keywords
   */
  detector?: TocPageDetectorOptions;

  /**
   * Division lookup table
   */
  divisions?: DivisionClassifierOptions;
}

/**
 * Page counts of one processing run
 */
export interface OutlineProcessRunOptions {
  /**
   * Page count of the paginated source document (required)
   */
  totalPages: number;

  /**
   * End page of the last populated division (default: totalPages)
   */
  lastKnownPage?: number;
}

/**
 * OutlineProcessor
 *
 * Runs the outline pipeline over an extracted line stream.
 *
 * ## Process
 *
 * 1. Detect TOC pages
 * 2. Build the outline forest of the TOC pages
 * 3. Collect chapters in page order, then line order
 * 4. Classify chapters into divisions and compute division spans
 * 5. Resolve chapter page ranges over the whole document
 * 6. Resolve chapter page ranges within each populated division
 *
 * Content anomalies are returned as issues and diagnostics; only caller
 * contract violations throw.
 *
 * @example
 * ```typescript
 * import { getLogger } from '@toc-outline/logger';
 * import { OutlineProcessor } from '@toc-outline/outline-processor';
 *
 * const processor = new OutlineProcessor({ logger: getLogger() });
 * const result = processor.processDump(dumpText, { totalPages: 612 });
 *
 * for (const { chapter, startPage, endPage } of result.chapterRanges.ranges) {
 *   console.log(chapter.title, startPage, endPage);
 * }
 * ```
 */
export class OutlineProcessor {
  private readonly logger: LoggerMethods;
  private readonly detector: TocPageDetector;
  private readonly builder: OutlineTreeBuilder;
  private readonly divisionClassifier: DivisionClassifier;
  private readonly rangeResolver: ChapterRangeResolver;
  private readonly dumpParser: PageDumpParser;

  constructor(options: OutlineProcessorOptions) {
    this.logger = options.logger;
    this.detector = new TocPageDetector(this.logger, options.detector);
    this.builder = new OutlineTreeBuilder(
      this.logger,
      new LineClassifier(options.classifier),
    );
    this.divisionClassifier = new DivisionClassifier(
      this.logger,
      options.divisions,
    );
    this.rangeResolver = new ChapterRangeResolver(this.logger);
    this.dumpParser = new PageDumpParser(this.logger);
  }

  /**
   * Process a page-ordered line stream
   *
   * @throws {OutlineContractError} When page counts or lines violate the call contract
   */
  process(
    lines: readonly Line[],
    options: OutlineProcessRunOptions,
  ): OutlineProcessResult {
    const totalPages = InputContractValidator.validatePageCount(
      options.totalPages,
      'totalPages',
    );
    const lastKnownPage = InputContractValidator.validatePageCount(
      options.lastKnownPage ?? totalPages,
      'lastKnownPage',
    );
    InputContractValidator.validateLines(lines);

    this.logger.info('[OutlineProcessor] Starting outline processing...');
    const startTime = Date.now();

    const tocPages = this.detector.detect(lines);
    const { forest, issues: treeIssues } = this.builder.build(tocPages, lines);
    const chapters = collectChapters(forest);
    this.logger.info(
      `[OutlineProcessor] Collected ${chapters.length} chapter(s) from ${forest.size} page(s)`,
    );

    const divisions = this.divisionClassifier.classify(chapters, lastKnownPage);
    const chapterRanges = this.rangeResolver.resolve(chapters, totalPages);
    const divisionRanges = this.resolveDivisionRanges(divisions, totalPages);

    this.logger.info(
      `[OutlineProcessor] Outline processing took ${Date.now() - startTime}ms`,
    );
    this.logSummary(divisions, chapterRanges, treeIssues.length);

    return {
      tocPages,
      forest,
      treeIssues,
      chapters,
      divisions,
      chapterRanges,
      divisionRanges,
      totalPages,
    };
  }

  /**
   * Parse an extractor dump, then process its lines
   *
   * @throws {OutlineContractError} When page counts violate the call contract
   */
  processDump(
    content: string,
    options: OutlineProcessRunOptions,
  ): OutlineProcessResult {
    const { lines } = this.dumpParser.parse(content);
    return this.process(lines, options);
  }

  private resolveDivisionRanges(
    divisions: DivisionClassification,
    totalPages: number,
  ): Map<DivisionName, ChapterRangeResolution> {
    const result = new Map<DivisionName, ChapterRangeResolution>();

    for (const name of DIVISION_NAMES) {
      const span = divisions.divisions.get(name);
      if (span === undefined || span.endPage === null) {
        continue;
      }

      this.logger.debug(
        `[OutlineProcessor] Resolving ${span.label} chapters up to page ${span.endPage}`,
      );
      result.set(
        name,
        this.rangeResolver.resolve(
          span.chapters,
          Math.min(span.endPage, totalPages),
        ),
      );
    }

    return result;
  }

  private logSummary(
    divisions: DivisionClassification,
    chapterRanges: ChapterRangeResolution,
    treeIssueCount: number,
  ): void {
    const found = DIVISION_NAMES.length - divisions.missing.length;
    this.logger.info(
      `[OutlineProcessor] Divisions: ${found} found, ${divisions.missing.length} missing, ${divisions.unclassified.length} unclassified chapter(s)`,
    );
    this.logger.info(
      `[OutlineProcessor] Chapter ranges: ${chapterRanges.ranges.length} resolved, ${chapterRanges.diagnostics.length} diagnostic(s), ${treeIssueCount} tree issue(s)`,
    );
  }
}
