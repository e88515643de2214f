import type { Line } from '@toc-outline/model';

import { describe, expect, test } from 'vitest';

import { OutlineContractError, UnorderedLinesError } from '../errors';
import { InputContractValidator } from './input-contract-validator';

const line = (page: number, lineNumber: number, text = ''): Line => ({
  page,
  lineNumber,
  text,
});

describe('InputContractValidator', () => {
  describe('validateLines', () => {
    test('accepts page-ordered lines', () => {
      const lines = [line(1, 1), line(1, 2), line(2, 1), line(4, 3)];

      expect(() => InputContractValidator.validateLines(lines)).not.toThrow();
    });

    test('accepts an empty stream', () => {
      expect(() => InputContractValidator.validateLines([])).not.toThrow();
    });

    test('rejects a malformed line with the offending path', () => {
      const lines = [
        line(1, 1),
        { page: 'two', lineNumber: 1, text: 'x' },
      ] as unknown as Line[];

      try {
        InputContractValidator.validateLines(lines);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(OutlineContractError);
        expect(error).not.toBeInstanceOf(UnorderedLinesError);
        const contractError = error as OutlineContractError;
        expect(contractError.message).toBe('Invalid lines');
        expect(contractError.issues[0].path).toBe('lines[1].page');
      }
    });

    test('rejects a missing text field', () => {
      const lines = [{ page: 1, lineNumber: 1 }] as unknown as Line[];

      try {
        InputContractValidator.validateLines(lines);
        expect.unreachable();
      } catch (error) {
        const contractError = error as OutlineContractError;
        expect(contractError.issues).toEqual([
          { path: 'lines[0].text', message: 'Required' },
        ]);
      }
    });

    test('rejects a decreasing page', () => {
      const lines = [line(3, 1), line(2, 1)];

      try {
        InputContractValidator.validateLines(lines);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(UnorderedLinesError);
        expect((error as UnorderedLinesError).issues).toEqual([
          { path: 'lines[1]', message: 'Page 2 follows page 3' },
        ]);
      }
    });

    test('rejects non-increasing line numbers within a page', () => {
      const lines = [line(1, 2), line(1, 2)];

      try {
        InputContractValidator.validateLines(lines);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(UnorderedLinesError);
        expect((error as UnorderedLinesError).issues[0].message).toBe(
          'Line 2 follows line 2 on page 1',
        );
      }
    });
  });

  describe('validatePageCount', () => {
    test('returns a valid page count', () => {
      expect(InputContractValidator.validatePageCount(47, 'totalPages')).toBe(
        47,
      );
    });

    test('throws when the value is missing', () => {
      expect(() =>
        InputContractValidator.validatePageCount(undefined, 'totalPages'),
      ).toThrow('totalPages is required');
    });

    test('throws for zero', () => {
      expect(() =>
        InputContractValidator.validatePageCount(0, 'lastKnownPage'),
      ).toThrow('lastKnownPage must be a positive integer');
    });

    test('throws for a fractional value', () => {
      expect(() =>
        InputContractValidator.validatePageCount(4.5, 'totalPages'),
      ).toThrow(OutlineContractError);
    });
  });

  describe('validateTocPages', () => {
    test('accepts positive integers', () => {
      expect(() =>
        InputContractValidator.validateTocPages(new Set([3, 4])),
      ).not.toThrow();
    });

    test('rejects a negative page', () => {
      try {
        InputContractValidator.validateTocPages([3, -1]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(OutlineContractError);
        expect((error as OutlineContractError).issues[0].path).toBe(
          'tocPages[1]',
        );
      }
    });
  });

  describe('validateDivisionTable', () => {
    const emptyTable = {
      common: [],
      civil: [],
      architecture: [],
      mechanical: [],
      maintenance: [],
    };

    test('returns a valid table', () => {
      const table = {
        ...emptyTable,
        civil: [{ number: '2', title: '하천공사' }],
      };

      expect(InputContractValidator.validateDivisionTable(table)).toEqual(
        table,
      );
    });

    test('rejects a table without every division', () => {
      try {
        InputContractValidator.validateDivisionTable({ common: [] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(OutlineContractError);
        expect((error as OutlineContractError).message).toBe(
          'Invalid division table',
        );
        expect(
          (error as OutlineContractError).issues.map((issue) => issue.path),
        ).toEqual([
          'table.civil',
          'table.architecture',
          'table.mechanical',
          'table.maintenance',
        ]);
      }
    });

    test('rejects a non-numeric chapter number', () => {
      try {
        InputContractValidator.validateDivisionTable({
          ...emptyTable,
          mechanical: [{ number: 'A', title: '배관공사' }],
        });
        expect.unreachable();
      } catch (error) {
        expect((error as OutlineContractError).issues).toEqual([
          {
            path: 'table.mechanical[0].number',
            message: 'Chapter number must be numeric',
          },
        ]);
      }
    });
  });
});
