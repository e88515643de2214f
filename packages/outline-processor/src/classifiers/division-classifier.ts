import type { LoggerMethods } from '@toc-outline/logger';
import type {
  ChapterNode,
  DivisionClassification,
  DivisionIssue,
  DivisionName,
  DivisionSpan,
  DivisionTable,
  UnclassifiedChapterIssue,
} from '@toc-outline/model';

import { DIVISION_LABELS, DIVISION_NAMES } from '@toc-outline/model';

import { OutlineContractError } from '../errors';
import { TextCleaner, chapterHeadingOf, formatChapterHeading } from '../utils';
import { InputContractValidator } from '../validators';
import defaultDivisionTable from './division-chapters.json';

/**
 * DivisionClassifier options
 */
export interface DivisionClassifierOptions {
  /**
   * Known chapters per division (default: bundled division-chapters.json)
   */
  table?: DivisionTable;
}

/**
 * DivisionClassifier
 *
 * Assigns each chapter to one of the five divisions by exact lookup of its
 * number and title in a static table, then derives the division page spans.
 * Chapters missing from the table are reported (D001), never defaulted.
 */
export class DivisionClassifier {
  private readonly lookup: Map<string, DivisionName>;

  constructor(
    private readonly logger: LoggerMethods,
    options?: DivisionClassifierOptions,
  ) {
    const table = InputContractValidator.validateDivisionTable(
      options?.table ?? defaultDivisionTable,
    );
    this.lookup = this.buildLookup(table);
  }

  /**
   * Classify chapters into divisions
   *
   * @param chapters - Chapter nodes in page order, then line order
   * @param lastKnownPage - End page of the last populated division
   * @throws {OutlineContractError} When lastKnownPage is missing or invalid
   */
  classify(
    chapters: readonly ChapterNode[],
    lastKnownPage: number,
  ): DivisionClassification {
    const lastPage = InputContractValidator.validatePageCount(
      lastKnownPage,
      'lastKnownPage',
    );
    this.logger.info(
      `[DivisionClassifier] Classifying ${chapters.length} chapter(s)...`,
    );

    const divisions = new Map<DivisionName, DivisionSpan>(
      DIVISION_NAMES.map((name) => [
        name,
        {
          name,
          label: DIVISION_LABELS[name],
          startPage: null,
          endPage: null,
          chapters: [],
        },
      ]),
    );
    const unclassified: UnclassifiedChapterIssue[] = [];

    for (const chapter of chapters) {
      const name = this.lookup.get(this.keyOf(chapter.number, chapter.title));
      const span = name === undefined ? undefined : divisions.get(name);

      if (span === undefined) {
        const heading = chapterHeadingOf(chapter);
        this.logger.warn(
          `[DivisionClassifier] Unclassified chapter: ${heading} (page ${chapter.page})`,
        );
        unclassified.push({
          code: 'D001',
          message: `Chapter "${heading}" is not in the division table`,
          chapter,
        });
        continue;
      }

      span.chapters.push(chapter);
      if (span.startPage === null) {
        span.startPage = chapter.page;
      }
      this.logger.debug(
        `[DivisionClassifier] ${chapterHeadingOf(chapter)} → ${span.label}`,
      );
    }

    const issues: DivisionIssue[] = [
      ...unclassified,
      ...this.resolveSpanEnds(divisions, lastPage),
    ];
    const missing = DIVISION_NAMES.filter(
      (name) => divisions.get(name)?.startPage === null,
    );

    const found = DIVISION_NAMES.filter((name) => !missing.includes(name));
    this.logger.info(
      `[DivisionClassifier] Found divisions: ${found.map((name) => DIVISION_LABELS[name]).join(', ') || 'none'}`,
    );
    if (missing.length > 0) {
      this.logger.warn(
        `[DivisionClassifier] Missing divisions: ${missing.map((name) => DIVISION_LABELS[name]).join(', ')}`,
      );
    }

    return { divisions, unclassified, missing, issues };
  }

  /**
   * Single backward pass in canonical order. A division ends one page before
   * the next populated division starts; the last one ends at lastPage.
   */
  private resolveSpanEnds(
    divisions: Map<DivisionName, DivisionSpan>,
    lastPage: number,
  ): DivisionIssue[] {
    const issues: DivisionIssue[] = [];
    let nextStart: number | null = null;

    for (const name of [...DIVISION_NAMES].reverse()) {
      const span = divisions.get(name);
      if (span === undefined || span.startPage === null) {
        continue;
      }

      let endPage = nextStart === null ? lastPage : nextStart - 1;
      if (endPage < span.startPage) {
        const message = `${span.label} ends at page ${endPage} before its start page ${span.startPage}; end clamped to start`;
        this.logger.warn(`[DivisionClassifier] ${message}`);
        issues.push({ code: 'D002', message, division: name });
        endPage = span.startPage;
      }

      span.endPage = endPage;
      nextStart = span.startPage;
    }

    return issues.reverse();
  }

  private buildLookup(table: DivisionTable): Map<string, DivisionName> {
    const lookup = new Map<string, DivisionName>();

    for (const name of DIVISION_NAMES) {
      for (const entry of table[name]) {
        const key = this.keyOf(entry.number, entry.title);
        const existing = lookup.get(key);
        if (existing !== undefined) {
          throw new OutlineContractError('Duplicate division table entry', [
            {
              path: `table.${name}`,
              message: `${formatChapterHeading(entry.number, entry.title)} is already listed under ${existing}`,
            },
          ]);
        }
        lookup.set(key, name);
      }
    }

    return lookup;
  }

  /**
   * Lookup key; title spacing is ignored ("측 량" equals "측량")
   */
  private keyOf(number: string, title: string): string {
    return `${number}:${TextCleaner.compact(title)}`;
  }
}
