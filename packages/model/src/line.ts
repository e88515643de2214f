/**
 * Physical page number in the extracted dump (1-based)
 */
export type PageNumber = number;

/**
 * One line of extracted text
 *
 * Produced by the external text extractor, one per non-empty line of a page.
 * Lines are never mutated by the outline pipeline.
 *
 * @interface Line
 */
export interface Line {
  /**
   * Source page the line was extracted from
   * @type {PageNumber}
   */
  readonly page: PageNumber;

  /**
   * Line number within the page (1-based)
   * @type {number}
   */
  readonly lineNumber: number;

  /**
   * Line text without the extractor's line-number prefix
   * @type {string}
   */
  readonly text: string;
}
