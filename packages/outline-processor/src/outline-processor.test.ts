import type { LoggerMethods } from '@toc-outline/logger';
import type { Line } from '@toc-outline/model';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { OutlineContractError, UnorderedLinesError } from './errors';
import { OutlineProcessor } from './outline-processor';

const dump = [
  '=== 3페이지 ===',
  '1줄: 목  차',
  '2줄: 3',
  '3줄: 제1장',
  '4줄: 적용기준 ······ 3',
  '5줄: 1-1 일반사항 ······ 3',
  '6줄: 제2장',
  '7줄: 가설공사 ······ 10',
  '----',
  '',
  '=== 4페이지 ===',
  '1줄: 4',
  '2줄: 목  차',
  '3줄: 제1장',
  '4줄: 도로포장공사 ······ 25',
  '5줄: 제99장',
  '6줄: 미분류 ······ 30',
  '----',
  '',
  '=== 10페이지 ===',
  '1줄: 제2장',
  '2줄: 가설공사 ······ 10',
  '----',
].join('\n');

describe('OutlineProcessor', () => {
  let mockLogger: LoggerMethods;
  let processor: OutlineProcessor;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    processor = new OutlineProcessor({ logger: mockLogger });
  });

  describe('processDump', () => {
    test('runs every stage over the TOC pages', () => {
      const result = processor.processDump(dump, { totalPages: 47 });

      expect(result.tocPages).toEqual([3, 4]);
      expect([...result.forest.keys()]).toEqual([3, 4]);
      expect(result.treeIssues).toEqual([]);
      expect(
        result.chapters.map((chapter) => [chapter.number, chapter.title]),
      ).toEqual([
        ['1', '적용기준'],
        ['2', '가설공사'],
        ['1', '도로포장공사'],
        ['99', '미분류'],
      ]);
      expect(result.chapters[0].children).toHaveLength(1);
      expect(result.totalPages).toBe(47);
    });

    test('classifies chapters into divisions', () => {
      const { divisions, chapters } = processor.processDump(dump, {
        totalPages: 47,
      });

      expect(divisions.divisions.get('common')).toMatchObject({
        startPage: 3,
        endPage: 24,
        chapters: [chapters[0], chapters[1]],
      });
      expect(divisions.divisions.get('civil')).toMatchObject({
        startPage: 25,
        endPage: 47,
        chapters: [chapters[2]],
      });
      expect(divisions.missing).toEqual([
        'architecture',
        'mechanical',
        'maintenance',
      ]);
      expect(divisions.unclassified.map((issue) => issue.chapter)).toEqual([
        chapters[3],
      ]);
    });

    test('resolves ranges over the whole chapter list', () => {
      const { chapterRanges } = processor.processDump(dump, {
        totalPages: 47,
      });

      expect(
        chapterRanges.ranges.map((range) => [range.startPage, range.endPage]),
      ).toEqual([
        [3, 9],
        [10, 24],
        [25, 29],
        [30, 47],
      ]);
      expect(chapterRanges.diagnostics).toEqual([]);
    });

    test('resolves ranges within each populated division', () => {
      const { divisionRanges } = processor.processDump(dump, {
        totalPages: 47,
        lastKnownPage: 40,
      });

      expect([...divisionRanges.keys()]).toEqual(['common', 'civil']);
      expect(
        divisionRanges
          .get('common')
          ?.ranges.map((range) => [range.startPage, range.endPage]),
      ).toEqual([
        [3, 9],
        [10, 24],
      ]);
      expect(
        divisionRanges
          .get('civil')
          ?.ranges.map((range) => [range.startPage, range.endPage]),
      ).toEqual([[25, 40]]);
    });

    test('reports chapters past their division end against that page', () => {
      const lines: Line[] = [
        { page: 3, lineNumber: 1, text: '목차' },
        { page: 3, lineNumber: 2, text: '3' },
        { page: 3, lineNumber: 3, text: '제1장' },
        { page: 3, lineNumber: 4, text: '적용기준 ······ 3' },
        { page: 3, lineNumber: 5, text: '제2장' },
        { page: 3, lineNumber: 6, text: '가설공사 ······ 30' },
        { page: 3, lineNumber: 7, text: '제1장' },
        { page: 3, lineNumber: 8, text: '도로포장공사 ······ 25' },
      ];

      const { divisionRanges } = processor.process(lines, { totalPages: 47 });

      expect(
        divisionRanges.get('common')?.diagnostics.map((d) => d.message),
      ).toEqual([
        '제1장 적용기준 ends at page 29, clamped to last page 24',
        '제2장 가설공사 starts at page 30, beyond last page 24',
      ]);
    });

    test('logs a summary', () => {
      processor.processDump(dump, { totalPages: 47 });

      expect(mockLogger.info).toHaveBeenCalledWith(
        '[OutlineProcessor] Divisions: 2 found, 3 missing, 1 unclassified chapter(s)',
      );
      expect(mockLogger.info).toHaveBeenLastCalledWith(
        '[OutlineProcessor] Chapter ranges: 4 resolved, 0 diagnostic(s), 0 tree issue(s)',
      );
    });

    test('throws when totalPages is missing', () => {
      const missing: unknown = undefined;

      expect(() =>
        processor.processDump(dump, { totalPages: missing as number }),
      ).toThrow('totalPages is required');
    });
  });

  describe('process', () => {
    test('returns empty results when no contents heading exists', () => {
      const lines: Line[] = [
        { page: 1, lineNumber: 1, text: '제1장' },
        { page: 1, lineNumber: 2, text: '적용기준 ······ 3' },
      ];

      const result = processor.process(lines, { totalPages: 10 });

      expect(result.tocPages).toEqual([]);
      expect(result.forest.size).toBe(0);
      expect(result.chapters).toEqual([]);
      expect(result.divisions.missing).toHaveLength(5);
      expect(result.chapterRanges).toEqual({ ranges: [], diagnostics: [] });
      expect(result.divisionRanges.size).toBe(0);
    });

    test('throws for unordered lines', () => {
      const lines: Line[] = [
        { page: 2, lineNumber: 1, text: '목차' },
        { page: 1, lineNumber: 1, text: '1' },
      ];

      expect(() => processor.process(lines, { totalPages: 10 })).toThrow(
        UnorderedLinesError,
      );
    });

    test('throws for an invalid lastKnownPage', () => {
      expect(() =>
        processor.process([], { totalPages: 10, lastKnownPage: -1 }),
      ).toThrow('lastKnownPage must be a positive integer');
    });
  });

  describe('options', () => {
    test('passes detector keywords through', () => {
      const custom = new OutlineProcessor({
        logger: mockLogger,
        detector: { additionalKeywords: ['INDEX'] },
      });
      const lines: Line[] = [
        { page: 2, lineNumber: 1, text: 'Index' },
        { page: 2, lineNumber: 2, text: '2' },
        { page: 2, lineNumber: 3, text: '제1장' },
        { page: 2, lineNumber: 4, text: '적용기준 ······ 3' },
      ];

      const result = custom.process(lines, { totalPages: 10 });

      expect(result.tocPages).toEqual([2]);
      expect(result.divisions.divisions.get('common')?.startPage).toBe(3);
    });

    test('passes classifier options through', () => {
      expect(
        () =>
          new OutlineProcessor({
            logger: mockLogger,
            classifier: { fillerMinRun: 0 },
          }),
      ).toThrow(OutlineContractError);
    });

    test('passes the division table through', () => {
      const custom = new OutlineProcessor({
        logger: mockLogger,
        divisions: {
          table: {
            common: [],
            civil: [],
            architecture: [],
            mechanical: [],
            maintenance: [{ number: '99', title: '미분류' }],
          },
        },
      });

      const { divisions } = custom.processDump(dump, { totalPages: 47 });

      expect(divisions.divisions.get('maintenance')).toMatchObject({
        startPage: 30,
        endPage: 47,
      });
      expect(divisions.unclassified).toHaveLength(3);
    });
  });
});
