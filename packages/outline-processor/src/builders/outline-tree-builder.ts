import type { LoggerMethods } from '@toc-outline/logger';
import type {
  ChapterNode,
  ItemNode,
  Line,
  OtherNode,
  OutlineNode,
  OutlineTreeBuildResult,
  OutlineTreeIssue,
  PageForest,
  PageNumber,
} from '@toc-outline/model';

import { groupBy, uniq } from 'es-toolkit';

import { LineClassifier } from '../classifiers';
import { chapterHeadingOf, countNodes } from '../utils';
import { InputContractValidator } from '../validators';

/**
 * OutlineTreeBuilder
 *
 * Builds the outline forest of each TOC page with an explicit stack of open
 * nodes, lowest level at the bottom:
 * - chapter: clears the stack, becomes a root and the only open node
 * - item of level L: pops nodes of level >= L, attaches under the new top
 *   (or as a root when the stack is empty) and is pushed
 * - other entry: becomes a root, stack untouched
 *
 * Pages are independent. A page without any recognized entry is left out
 * of the forest.
 */
export class OutlineTreeBuilder {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly classifier: LineClassifier = new LineClassifier(),
  ) {}

  /**
   * Build the page forest
   *
   * @param tocPages - Pages to parse; every other page is body content
   * @param lines - Page-ordered line stream
   * @throws {OutlineContractError} When lines or TOC pages are malformed
   */
  build(
    tocPages: Iterable<PageNumber>,
    lines: readonly Line[],
  ): OutlineTreeBuildResult {
    InputContractValidator.validateTocPages(tocPages);
    InputContractValidator.validateLines(lines);

    const pages = uniq([...tocPages]).sort((a, b) => a - b);
    this.logger.info(
      `[OutlineTreeBuilder] Building outline from ${pages.length} TOC page(s)...`,
    );

    const linesByPage = groupBy(lines, (line) => line.page);
    const forest: PageForest = new Map();
    const issues: OutlineTreeIssue[] = [];

    for (const page of pages) {
      const roots = this.buildPage(page, linesByPage[page] ?? [], issues);
      if (roots.length === 0) {
        this.logger.debug(
          `[OutlineTreeBuilder] Page ${page}: no outline entries`,
        );
        continue;
      }

      this.logger.debug(
        `[OutlineTreeBuilder] Page ${page}: ${roots.length} root node(s)`,
      );
      forest.set(page, roots);
    }

    this.logger.info(
      `[OutlineTreeBuilder] Built ${forest.size} page(s) with ${countNodes(forest)} node(s)`,
    );

    return { forest, issues };
  }

  private buildPage(
    page: PageNumber,
    pageLines: readonly Line[],
    issues: OutlineTreeIssue[],
  ): OutlineNode[] {
    const roots: OutlineNode[] = [];
    const stack: OutlineNode[] = [];

    let i = 0;
    while (i < pageLines.length) {
      const line = pageLines[i];
      const nextText =
        i + 1 < pageLines.length ? pageLines[i + 1].text : undefined;
      const classification = this.classifier.classify(line.text, nextText);

      if (classification === null) {
        i++;
        continue;
      }

      switch (classification.kind) {
        case 'chapter-marker': {
          const { titleLine } = classification;
          const chapter: ChapterNode = {
            type: 'chapter',
            number: classification.chapterNumber,
            title: titleLine?.title ?? '',
            page: titleLine?.targetPage ?? line.page,
            level: 0,
            children: [],
          };
          if (titleLine === null) {
            this.logger.debug(
              `[OutlineTreeBuilder] Chapter ${chapter.number} on page ${page} line ${line.lineNumber} has no title line`,
            );
          }

          stack.length = 0;
          roots.push(chapter);
          stack.push(chapter);
          i += titleLine === null ? 1 : 2;
          break;
        }

        case 'hierarchical-item': {
          const item: ItemNode = {
            type: 'item',
            number: classification.number,
            title: classification.title,
            page: classification.targetPage,
            level: classification.level,
            children: [],
          };

          while (
            stack.length > 0 &&
            stack[stack.length - 1].level >= item.level
          ) {
            stack.pop();
          }

          const parent = stack.at(-1);
          if (parent === undefined) {
            roots.push(item);
          } else {
            this.checkDuplicate(page, parent, item, issues);
            parent.children.push(item);
          }
          stack.push(item);
          i++;
          break;
        }

        case 'other-entry': {
          const other: OtherNode = {
            type: 'other',
            title: classification.title,
            page: classification.targetPage,
            level: 0,
            children: [],
          };
          roots.push(other);
          i++;
          break;
        }
      }
    }

    return roots;
  }

  /**
   * T001 when the parent already has a child with the same number.
   * The later node is kept.
   */
  private checkDuplicate(
    page: PageNumber,
    parent: OutlineNode,
    item: ItemNode,
    issues: OutlineTreeIssue[],
  ): void {
    const duplicate = parent.children.some(
      (child) => child.type === 'item' && child.number === item.number,
    );
    if (!duplicate) {
      return;
    }

    const message = `Duplicate number ${item.number} under ${this.describe(parent)} on page ${page}`;
    this.logger.warn(`[OutlineTreeBuilder] ${message}`);
    issues.push({
      code: 'T001',
      message,
      sourcePage: page,
      parent,
      node: item,
    });
  }

  private describe(node: OutlineNode): string {
    switch (node.type) {
      case 'chapter':
        return chapterHeadingOf(node);
      case 'item':
        return node.title ? `${node.number} ${node.title}` : node.number;
      case 'other':
        return node.title;
    }
  }
}
