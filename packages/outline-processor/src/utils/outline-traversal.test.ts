import type { OutlineNode, PageForest } from '@toc-outline/model';

import { describe, expect, test } from 'vitest';

import {
  collectChapters,
  countNodes,
  walkOutline,
} from './outline-traversal';

const item = (
  number: string,
  page: number,
  children: OutlineNode[] = [],
): OutlineNode => ({
  type: 'item',
  number,
  title: `항목 ${number}`,
  page,
  level: number.split('-').length - 1,
  children,
});

const chapter = (
  number: string,
  title: string,
  page: number,
  children: OutlineNode[] = [],
): OutlineNode => ({
  type: 'chapter',
  number,
  title,
  page,
  level: 0,
  children,
});

describe('walkOutline', () => {
  test('visits nodes depth-first with their parents', () => {
    const roots = [
      chapter('1', '적용기준', 3, [item('1-1', 3, [item('1-1-1', 4)])]),
      chapter('2', '가설공사', 10),
    ];
    const visited: string[] = [];

    walkOutline(roots, (node, parent) => {
      const name = node.type === 'other' ? node.title : node.number;
      const parentName =
        parent && parent.type !== 'other' ? parent.number : 'root';
      visited.push(`${parentName}>${name}`);
    });

    expect(visited).toEqual(['root>1', '1>1-1', '1-1>1-1-1', 'root>2']);
  });
});

describe('countNodes', () => {
  test('counts nodes on every page including children', () => {
    const forest: PageForest = new Map([
      [3, [chapter('1', '적용기준', 3, [item('1-1', 3), item('1-2', 5)])]],
      [4, [chapter('2', '가설공사', 10)]],
    ]);

    expect(countNodes(forest)).toBe(4);
  });

  test('returns 0 for an empty forest', () => {
    expect(countNodes(new Map())).toBe(0);
  });
});

describe('collectChapters', () => {
  test('returns root chapters in page order then line order', () => {
    const forest: PageForest = new Map([
      [5, [chapter('3', '토공사', 20)]],
      [
        4,
        [
          chapter('1', '적용기준', 3),
          {
            type: 'other',
            title: '참고자료',
            page: 8,
            level: 0,
            children: [],
          },
          chapter('2', '가설공사', 10),
        ],
      ],
    ]);

    const chapters = collectChapters(forest);

    expect(chapters.map((c) => c.number)).toEqual(['1', '2', '3']);
  });
});
