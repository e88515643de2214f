import type { LoggerMethods } from '@toc-outline/logger';
import type {
  ChapterNode,
  ChapterRange,
  ChapterRangeResolution,
  RangeDiagnostic,
} from '@toc-outline/model';

import { chapterHeadingOf } from '../utils';
import { InputContractValidator } from '../validators';

/**
 * ChapterRangeResolver
 *
 * Pairs each chapter with a page range ending one page before the next
 * chapter starts; the last chapter ends at the document's last page.
 *
 * Each chapter is validated on its own:
 * - R004: start page below 1, rejected
 * - R001: start page beyond the last page, rejected
 * - R002: end page beyond the last page, clamped and kept
 * - R003: start page after end page (next chapter out of order), rejected
 */
export class ChapterRangeResolver {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Resolve chapter page ranges
   *
   * @param chapters - Chapters in document order
   * @param totalPages - Last page a range may reach: the page count of the
   * paginated source, or a division's end page
   * @throws {OutlineContractError} When totalPages is missing or invalid
   */
  resolve(
    chapters: readonly ChapterNode[],
    totalPages: number,
  ): ChapterRangeResolution {
    const total = InputContractValidator.validatePageCount(
      totalPages,
      'totalPages',
    );
    this.logger.info(
      `[ChapterRangeResolver] Resolving ranges for ${chapters.length} chapter(s) over ${total} page(s)...`,
    );

    const ranges: ChapterRange[] = [];
    const diagnostics: RangeDiagnostic[] = [];
    const report = (diagnostic: RangeDiagnostic): void => {
      this.logger.warn(
        `[ChapterRangeResolver] ${diagnostic.code}: ${diagnostic.message}`,
      );
      diagnostics.push(diagnostic);
    };

    chapters.forEach((chapter, index) => {
      const next = chapters[index + 1];
      const heading = chapterHeadingOf(chapter);
      const startPage = chapter.page;

      if (startPage < 1) {
        report({
          code: 'R004',
          message: `${heading} starts at page ${startPage}, before page 1`,
          chapter,
          rejected: true,
        });
        return;
      }

      if (startPage > total) {
        report({
          code: 'R001',
          message: `${heading} starts at page ${startPage}, beyond last page ${total}`,
          chapter,
          rejected: true,
        });
        return;
      }

      let endPage = next === undefined ? total : next.page - 1;

      if (endPage > total) {
        report({
          code: 'R002',
          message: `${heading} ends at page ${endPage}, clamped to last page ${total}`,
          chapter,
          rejected: false,
        });
        endPage = total;
      }

      if (next !== undefined && startPage > endPage) {
        report({
          code: 'R003',
          message: `${heading} starts at page ${startPage} but next chapter ${chapterHeadingOf(next)} starts at page ${next.page}`,
          chapter,
          rejected: true,
          nextChapter: next,
        });
        return;
      }

      ranges.push({ chapter, startPage, endPage });
    });

    const rejected = diagnostics.filter((d) => d.rejected).length;
    this.logger.info(
      `[ChapterRangeResolver] Resolved ${ranges.length} range(s), ${rejected} chapter(s) rejected`,
    );

    return { ranges, diagnostics };
  }
}
