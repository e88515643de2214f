import type { LoggerMethods } from '@toc-outline/logger';
import type { Line, PageNumber } from '@toc-outline/model';

import { PAGE_DUMP } from '../config/constants';

/**
 * Lines and pages read from an extractor dump
 */
export interface PageDump {
  /**
   * Page-ordered lines
   */
  lines: Line[];

  /**
   * Pages with a header, ascending
   */
  pages: PageNumber[];
}

/**
 * PageDumpParser
 *
 * Reads the text dump written by the extractor:
 *
 * ```
 * === 3페이지 ===
 * 1줄: 목  차
 * 2줄: 3
 * ----
 * ```
 *
 * Separators, blank lines and text outside a page or not in the "K줄:" form
 * (such as a trailing metadata section) are skipped. A page header that does
 * not increase, and a line number that does not increase within its page,
 * are skipped with a warning so the result stays page-ordered.
 */
export class PageDumpParser {
  constructor(private readonly logger: LoggerMethods) {}

  parse(content: string): PageDump {
    const lines: Line[] = [];
    const pages: PageNumber[] = [];

    let currentPage: PageNumber | null = null;
    let lastLineNumber = 0;

    for (const raw of content.split(/\r?\n/)) {
      const headerMatch = PAGE_DUMP.PAGE_HEADER_PATTERN.exec(raw.trim());
      if (headerMatch) {
        const pageNo = Number.parseInt(headerMatch[1], 10);
        const lastPage = pages.at(-1);

        if (pageNo < 1 || (lastPage !== undefined && pageNo <= lastPage)) {
          this.logger.warn(
            lastPage === undefined
              ? `[PageDumpParser] Skipping page ${pageNo}: pages start at 1`
              : `[PageDumpParser] Skipping page ${pageNo}: follows page ${lastPage}`,
          );
          currentPage = null;
          continue;
        }

        pages.push(pageNo);
        currentPage = pageNo;
        lastLineNumber = 0;
        continue;
      }

      if (currentPage === null) {
        continue;
      }

      const lineMatch = PAGE_DUMP.LINE_PATTERN.exec(raw);
      if (!lineMatch) {
        continue;
      }

      const lineNumber = Number.parseInt(lineMatch[1], 10);
      if (lineNumber <= lastLineNumber) {
        this.logger.warn(
          `[PageDumpParser] Skipping line ${lineNumber} on page ${currentPage}: follows line ${lastLineNumber}`,
        );
        continue;
      }

      lines.push({ page: currentPage, lineNumber, text: lineMatch[2] });
      lastLineNumber = lineNumber;
    }

    this.logger.info(
      `[PageDumpParser] Parsed ${lines.length} line(s) on ${pages.length} page(s)`,
    );

    return { lines, pages };
  }
}
