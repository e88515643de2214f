import type { LoggerMethods } from '@toc-outline/logger';
import type {
  OutlineNode,
  PageForest,
  SerializedOutlineNode,
  TocTreeDocument,
} from '@toc-outline/model';

import type { ContractIssue } from '../errors';

import { z } from 'zod';

import { chapterHeadingOf, countNodes, parseChapterHeading } from '../utils';
import { InputContractValidator, PageNumberSchema } from '../validators';
import { TocTreeFormatError } from './toc-tree-format-error';

/**
 * Zod schema for a serialized outline node (recursive)
 */
export const SerializedOutlineNodeSchema: z.ZodType<SerializedOutlineNode> =
  z.lazy(() =>
    z.object({
      type: z.enum(['chapter', 'item', 'other']),
      title: z.string(),
      page: z.number().int(),
      level: z.number().int().min(0),
      number: z.string().optional(),
      children: z.array(SerializedOutlineNodeSchema),
    }),
  );

/**
 * Zod schema for the persisted TOC tree document
 */
export const TocTreeDocumentSchema = z.object({
  metadata: z.object({
    source_name: z.string(),
    generated_at: z.string().datetime({ offset: true }),
    total_pages: PageNumberSchema,
  }),
  toc_tree: z.record(
    z.string().regex(/^\d+$/, 'Page key must be numeric'),
    z.array(SerializedOutlineNodeSchema),
  ),
  statistics: z.object({
    total_nodes: z.number().int().min(0),
  }),
});

/**
 * Options for serializing a page forest
 */
export interface TocTreeSerializeOptions {
  /**
   * Name of the source document (e.g. its file name)
   */
  sourceName: string;

  /**
   * Page count of the paginated source document
   */
  totalPages: number;

  /**
   * Generation time (default: now)
   */
  generatedAt?: Date;
}

/**
 * Parsed document and the forest rebuilt from it
 */
export interface ParsedTocTree {
  document: TocTreeDocument;
  forest: PageForest;
}

/**
 * TocTreeSerializer
 *
 * Converts a page forest to the persisted interchange document and back.
 * Chapter nodes carry no `number` field in the document, so their title is
 * written as the printed heading ("제1장 적용기준") and split again on parse.
 */
export class TocTreeSerializer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Build the interchange document for a forest
   *
   * @throws {OutlineContractError} When totalPages is missing or invalid
   */
  serialize(
    forest: PageForest,
    options: TocTreeSerializeOptions,
  ): TocTreeDocument {
    const totalPages = InputContractValidator.validatePageCount(
      options.totalPages,
      'totalPages',
    );

    const tocTree: Record<string, SerializedOutlineNode[]> = {};
    const pages = [...forest.keys()].sort((a, b) => a - b);
    for (const page of pages) {
      tocTree[String(page)] = (forest.get(page) ?? []).map((node) =>
        this.serializeNode(node),
      );
    }

    const document: TocTreeDocument = {
      metadata: {
        source_name: options.sourceName,
        generated_at: (options.generatedAt ?? new Date()).toISOString(),
        total_pages: totalPages,
      },
      toc_tree: tocTree,
      statistics: {
        total_nodes: countNodes(forest),
      },
    };

    this.logger.debug(
      `[TocTreeSerializer] Serialized ${pages.length} page(s), ${document.statistics.total_nodes} node(s)`,
    );

    return document;
  }

  /**
   * Render a document as JSON with 2-space indentation
   */
  toJson(document: TocTreeDocument): string {
    return JSON.stringify(document, null, 2);
  }

  /**
   * Parse and validate a persisted document, then rebuild its forest
   *
   * @throws {TocTreeFormatError} When the input is not JSON or not a valid document
   */
  parse(json: string): ParsedTocTree {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw TocTreeFormatError.fromError('Invalid JSON', error);
    }

    const result = TocTreeDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw new TocTreeFormatError(
        'Invalid TOC tree document',
        InputContractValidator.toContractIssues('document', result.error),
      );
    }

    const document = result.data;
    const issues: ContractIssue[] = [];
    const entries = Object.entries(document.toc_tree)
      .map(([key, nodes]) => ({ page: Number.parseInt(key, 10), key, nodes }))
      .sort((a, b) => a.page - b.page);

    const forest: PageForest = new Map();
    for (const { page, key, nodes } of entries) {
      forest.set(
        page,
        nodes.map((node, index) =>
          this.deserializeNode(
            node,
            `document.toc_tree.${key}[${index}]`,
            null,
            issues,
          ),
        ),
      );
    }

    const totalNodes = countNodes(forest);
    if (totalNodes !== document.statistics.total_nodes) {
      issues.push({
        path: 'document.statistics.total_nodes',
        message: `Expected ${totalNodes}, got ${document.statistics.total_nodes}`,
      });
    }

    if (issues.length > 0) {
      throw new TocTreeFormatError('Invalid TOC tree document', issues);
    }

    this.logger.debug(
      `[TocTreeSerializer] Parsed ${forest.size} page(s), ${totalNodes} node(s)`,
    );

    return { document, forest };
  }

  private serializeNode(node: OutlineNode): SerializedOutlineNode {
    const children = node.children.map((child) => this.serializeNode(child));

    switch (node.type) {
      case 'chapter':
        return {
          type: 'chapter',
          title: chapterHeadingOf(node),
          page: node.page,
          level: node.level,
          children,
        };
      case 'item':
        return {
          type: 'item',
          title: node.title,
          page: node.page,
          level: node.level,
          number: node.number,
          children,
        };
      case 'other':
        return {
          type: 'other',
          title: node.title,
          page: node.page,
          level: node.level,
          children,
        };
    }
  }

  /**
   * Rebuild a node. Levels must be 0 for chapters and other entries, the
   * dash count of the number for items, and above the parent's level.
   */
  private deserializeNode(
    node: SerializedOutlineNode,
    path: string,
    parentLevel: number | null,
    issues: ContractIssue[],
  ): OutlineNode {
    if (parentLevel !== null && node.level <= parentLevel) {
      issues.push({
        path: `${path}.level`,
        message: `Level ${node.level} must be above parent level ${parentLevel}`,
      });
    }

    const children = node.children.map((child, index) =>
      this.deserializeNode(
        child,
        `${path}.children[${index}]`,
        node.level,
        issues,
      ),
    );
    const base = {
      page: node.page,
      level: node.level,
      children,
    };

    if (node.type !== 'item' && node.level !== 0) {
      issues.push({
        path: `${path}.level`,
        message: `Level of ${node.type} nodes must be 0, got ${node.level}`,
      });
    }

    switch (node.type) {
      case 'chapter': {
        const heading = parseChapterHeading(node.title);
        if (heading === null) {
          issues.push({
            path: `${path}.title`,
            message: 'Chapter title must start with a chapter marker',
          });
        }
        return {
          ...base,
          type: 'chapter',
          number: heading?.number ?? '',
          title: heading?.title ?? node.title,
        };
      }
      case 'item':
        if (node.number === undefined) {
          issues.push({
            path: `${path}.number`,
            message: 'Required for item nodes',
          });
        } else {
          const dashCount = node.number.split('-').length - 1;
          if (node.level !== dashCount) {
            issues.push({
              path: `${path}.level`,
              message: `Level of item ${node.number} must be ${dashCount}, got ${node.level}`,
            });
          }
        }
        return {
          ...base,
          type: 'item',
          number: node.number ?? '',
          title: node.title,
        };
      case 'other':
        return { ...base, type: 'other', title: node.title };
    }
  }
}
