import type { OutlineNodeType } from './outline-node';

/**
 * Serialized outline node of the persisted interchange document
 *
 * `number` is present only for item nodes.
 */
export interface SerializedOutlineNode {
  type: OutlineNodeType;
  title: string;
  page: number;
  level: number;
  number?: string;
  children: SerializedOutlineNode[];
}

/**
 * Persisted interchange document consumed by the page splitter
 * and report renderer. Field names are stable.
 *
 * @interface TocTreeDocument
 */
export interface TocTreeDocument {
  metadata: {
    source_name: string;

    /**
     * ISO-8601 timestamp
     */
    generated_at: string;

    /**
     * Page count of the paginated source document
     */
    total_pages: number;
  };

  /**
   * Serialized roots keyed by TOC source page number
   */
  toc_tree: Record<string, SerializedOutlineNode[]>;

  statistics: {
    total_nodes: number;
  };
}
