import type { DivisionTable, Line } from '@toc-outline/model';

import type { ContractIssue } from '../errors';

import { z } from 'zod';

import { OutlineContractError, UnorderedLinesError } from '../errors';

/**
 * Physical or printed page number
 */
export const PageNumberSchema = z.number().int().min(1);

/**
 * Zod schema for one extracted line
 */
export const LineSchema = z.object({
  page: PageNumberSchema.describe('Source page of the line'),
  lineNumber: z.number().int().min(1).describe('1-based line number in page'),
  text: z.string().describe('Line text without line-number prefix'),
});

export const LinesSchema = z.array(LineSchema);

const DivisionChapterEntrySchema = z.object({
  number: z.string().regex(/^\d+$/, 'Chapter number must be numeric'),
  title: z.string().min(1),
});

/**
 * Zod schema for the division lookup table
 */
export const DivisionTableSchema = z.object({
  common: z.array(DivisionChapterEntrySchema),
  civil: z.array(DivisionChapterEntrySchema),
  architecture: z.array(DivisionChapterEntrySchema),
  mechanical: z.array(DivisionChapterEntrySchema),
  maintenance: z.array(DivisionChapterEntrySchema),
});

/**
 * InputContractValidator
 *
 * Checks caller contracts at the public entry points. Violations throw
 * OutlineContractError; document content is never validated here.
 */
export class InputContractValidator {
  /**
   * Validate shape and page order of the line stream
   *
   * @throws {OutlineContractError} When a line is malformed
   * @throws {UnorderedLinesError} When lines are not page-ordered
   */
  static validateLines(lines: readonly Line[]): void {
    const result = LinesSchema.safeParse(lines);
    if (!result.success) {
      throw new OutlineContractError(
        'Invalid lines',
        InputContractValidator.toContractIssues('lines', result.error),
      );
    }

    const orderIssues: ContractIssue[] = [];
    for (let i = 1; i < lines.length; i++) {
      const prev = lines[i - 1];
      const current = lines[i];

      if (current.page < prev.page) {
        orderIssues.push({
          path: `lines[${i}]`,
          message: `Page ${current.page} follows page ${prev.page}`,
        });
      } else if (
        current.page === prev.page &&
        current.lineNumber <= prev.lineNumber
      ) {
        orderIssues.push({
          path: `lines[${i}]`,
          message: `Line ${current.lineNumber} follows line ${prev.lineNumber} on page ${current.page}`,
        });
      }
    }

    if (orderIssues.length > 0) {
      throw new UnorderedLinesError(orderIssues);
    }
  }

  /**
   * Validate a required page count (total pages, last known page)
   *
   * @throws {OutlineContractError} When the value is missing or not a positive integer
   */
  static validatePageCount(value: unknown, name: string): number {
    if (value === undefined || value === null) {
      throw new OutlineContractError(`${name} is required`, [
        { path: name, message: 'Required' },
      ]);
    }

    const result = PageNumberSchema.safeParse(value);
    if (!result.success) {
      throw new OutlineContractError(
        `${name} must be a positive integer`,
        InputContractValidator.toContractIssues(name, result.error),
      );
    }

    return result.data;
  }

  /**
   * Validate a set of TOC page numbers
   *
   * @throws {OutlineContractError} When a page number is not a positive integer
   */
  static validateTocPages(tocPages: Iterable<number>): void {
    const result = z.array(PageNumberSchema).safeParse([...tocPages]);
    if (!result.success) {
      throw new OutlineContractError(
        'Invalid TOC pages',
        InputContractValidator.toContractIssues('tocPages', result.error),
      );
    }
  }

  /**
   * Validate a division lookup table
   *
   * @throws {OutlineContractError} When a division is absent or an entry is malformed
   */
  static validateDivisionTable(table: unknown): DivisionTable {
    const result = DivisionTableSchema.safeParse(table);
    if (!result.success) {
      throw new OutlineContractError(
        'Invalid division table',
        InputContractValidator.toContractIssues('table', result.error),
      );
    }

    return result.data;
  }

  /**
   * Convert zod issues to contract issues rooted at the given argument name
   */
  static toContractIssues(
    root: string,
    error: z.ZodError,
  ): ContractIssue[] {
    return error.issues.map((issue) => ({
      path: InputContractValidator.formatPath(root, issue.path),
      message: issue.message,
    }));
  }

  private static formatPath(
    root: string,
    segments: ReadonlyArray<string | number>,
  ): string {
    return segments.reduce<string>(
      (path, segment) =>
        typeof segment === 'number'
          ? `${path}[${segment}]`
          : `${path}.${segment}`,
      root,
    );
  }
}
