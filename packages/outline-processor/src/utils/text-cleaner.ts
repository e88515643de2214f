/**
 * TextCleaner - Text normalization for extracted TOC lines
 *
 * - Title normalization (Unicode NFC, whitespace collapsing)
 * - Line normalization that keeps dot-leader runs intact
 * - Whitespace/case-insensitive compaction for keyword matching
 */
export class TextCleaner {
  /**
   * Special whitespace emitted by extractors: tab, no-break space,
   * typographic spaces, zero-width space, ideographic space
   */
  private static readonly SPECIAL_WHITESPACE = /[\t\u00A0\u2000-\u200B\u3000]/g;

  /**
   * Normalizes a title
   * - Converts special whitespace and line breaks to a single space
   * - Collapses consecutive spaces
   * - Trims leading and trailing spaces
   */
  static normalize(text: string): string {
    if (!text) return '';

    return text
      .normalize('NFC')
      .replace(TextCleaner.SPECIAL_WHITESPACE, ' ')
      .replace(/[\r\n]+/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Normalizes a whole line before classification.
   * Unlike normalize(), runs of spaces are preserved because they can be
   * part of a dot leader.
   */
  static normalizeLine(text: string): string {
    if (!text) return '';

    return text
      .normalize('NFC')
      .replace(TextCleaner.SPECIAL_WHITESPACE, ' ')
      .replace(/[\r\n]+/g, ' ')
      .trim();
  }

  /**
   * Removes all whitespace and lowercases, so that "목  차", "목 차"
   * and "목차" compare equal
   */
  static compact(text: string): string {
    if (!text) return '';

    return text.normalize('NFC').replace(/\s+/g, '').toLowerCase();
  }
}
