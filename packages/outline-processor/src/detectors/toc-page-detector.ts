import type { LoggerMethods } from '@toc-outline/logger';
import type { Line, PageNumber } from '@toc-outline/model';

import { uniq } from 'es-toolkit';

import { OUTLINE_PARSER, TOC_KEYWORDS } from '../config/constants';
import { TextCleaner } from '../utils';
import { InputContractValidator } from '../validators';

/**
 * TocPageDetector options
 */
export interface TocPageDetectorOptions {
  /**
   * Custom contents heading keywords to add (optional)
   */
  additionalKeywords?: string[];
}

/**
 * TocPageDetector
 *
 * Finds outline pages by a contents heading paired with the printed page
 * number on the adjacent line of the same page:
 * - Pattern A: heading, then bare page number
 * - Pattern B: bare page number, then heading
 *
 * The paired number is the TOC page. Pages outside the result are body
 * content and are never tree-parsed.
 */
export class TocPageDetector {
  private readonly keywords: Set<string>;

  constructor(
    private readonly logger: LoggerMethods,
    options?: TocPageDetectorOptions,
  ) {
    this.keywords = new Set(
      [...TOC_KEYWORDS, ...(options?.additionalKeywords ?? [])].map(
        (keyword) => TextCleaner.compact(keyword),
      ),
    );
  }

  /**
   * Detect TOC pages
   *
   * @returns Sorted unique TOC page numbers (empty when no heading is found)
   * @throws {OutlineContractError} When lines are malformed or not page-ordered
   */
  detect(lines: readonly Line[]): PageNumber[] {
    InputContractValidator.validateLines(lines);
    this.logger.info(
      `[TocPageDetector] Scanning ${lines.length} lines for contents headings...`,
    );

    const found: PageNumber[] = [];

    for (let i = 0; i < lines.length - 1; i++) {
      const current = lines[i];
      const next = lines[i + 1];
      if (current.page !== next.page) {
        continue;
      }

      if (this.isHeading(current.text)) {
        const pageNo = this.parseBarePageNumber(next.text);
        if (pageNo !== null) {
          this.logger.debug(
            `[TocPageDetector] Heading on source page ${current.page} line ${current.lineNumber}, printed page ${pageNo} below`,
          );
          found.push(pageNo);
        }
        continue;
      }

      if (this.isHeading(next.text)) {
        const pageNo = this.parseBarePageNumber(current.text);
        if (pageNo !== null) {
          this.logger.debug(
            `[TocPageDetector] Heading on source page ${next.page} line ${next.lineNumber}, printed page ${pageNo} above`,
          );
          found.push(pageNo);
        }
      }
    }

    const tocPages = uniq(found).sort((a, b) => a - b);

    if (tocPages.length === 0) {
      this.logger.warn('[TocPageDetector] No TOC pages found');
    } else {
      this.logger.info(
        `[TocPageDetector] Found ${tocPages.length} TOC page(s): ${tocPages.join(', ')}`,
      );
    }

    return tocPages;
  }

  /**
   * Check if a line is exactly a contents heading, spacing ignored
   */
  private isHeading(text: string): boolean {
    return this.keywords.has(TextCleaner.compact(text));
  }

  private parseBarePageNumber(text: string): PageNumber | null {
    const trimmed = TextCleaner.normalizeLine(text);
    if (!OUTLINE_PARSER.BARE_PAGE_NUMBER_PATTERN.test(trimmed)) {
      return null;
    }

    const pageNo = Number.parseInt(trimmed, 10);
    return pageNo >= 1 ? pageNo : null;
  }
}
