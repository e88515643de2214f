import type {
  ChapterNode,
  OutlineNode,
  PageForest,
} from '@toc-outline/model';

/**
 * Visits every node depth-first in document order
 */
export function walkOutline(
  nodes: readonly OutlineNode[],
  visit: (node: OutlineNode, parent: OutlineNode | null) => void,
  parent: OutlineNode | null = null,
): void {
  for (const node of nodes) {
    visit(node, parent);
    walkOutline(node.children, visit, node);
  }
}

/**
 * Counts nodes of all pages, children included
 */
export function countNodes(forest: PageForest): number {
  let total = 0;
  for (const roots of forest.values()) {
    walkOutline(roots, () => {
      total++;
    });
  }
  return total;
}

/**
 * Chapter nodes in page order, then line order within the page
 */
export function collectChapters(forest: PageForest): ChapterNode[] {
  const pages = [...forest.keys()].sort((a, b) => a - b);
  const chapters: ChapterNode[] = [];

  for (const page of pages) {
    for (const node of forest.get(page) ?? []) {
      if (node.type === 'chapter') {
        chapters.push(node);
      }
    }
  }

  return chapters;
}
