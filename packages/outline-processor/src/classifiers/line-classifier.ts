import { escapeRegExp } from 'es-toolkit';

import { OUTLINE_PARSER } from '../config/constants';
import { OutlineContractError } from '../errors';
import { TextCleaner } from '../utils';

/**
 * Title and target page read from the line after a chapter marker
 */
export interface ChapterTitleMatch {
  title: string;
  targetPage: number;
}

/**
 * Chapter keyword with a number and nothing else ("제1장").
 * `titleLine` holds the lookahead result for the following line;
 * null means the title is missing and the marker stands alone.
 */
export interface ChapterMarkerClassification {
  kind: 'chapter-marker';
  chapterNumber: string;
  titleLine: ChapterTitleMatch | null;
}

/**
 * Dash-numbered entry ("1-1 일반사항 ······ 3")
 */
export interface HierarchicalItemClassification {
  kind: 'hierarchical-item';
  number: string;
  title: string;
  targetPage: number;

  /**
   * Dash count of the number
   */
  level: number;
}

/**
 * Unnumbered titled entry ("참고자료 ······ 512")
 */
export interface OtherEntryClassification {
  kind: 'other-entry';
  title: string;
  targetPage: number;
}

export type LineClassification =
  | ChapterMarkerClassification
  | HierarchicalItemClassification
  | OtherEntryClassification;

/**
 * LineClassifier options
 */
export interface LineClassifierOptions {
  /**
   * Minimum dot-leader length between title and page number (default: 3)
   */
  fillerMinRun?: number;

  /**
   * Chapter marker pattern; group 1 must capture the chapter number
   * (default: "제N장")
   */
  chapterMarkerPattern?: RegExp;
}

/**
 * LineClassifier
 *
 * Classifies one TOC line by ordered rules, first match wins:
 * 1. Chapter marker (with lookahead for the chapter title on the next line)
 * 2. Hierarchical item
 * 3. Other titled entry
 *
 * Lines matching none of the rules are noise and yield null.
 * Content never makes the classifier throw.
 */
export class LineClassifier {
  private readonly fillerCharacters: string;
  private readonly chapterMarkerPattern: RegExp;
  private readonly chapterTitlePattern: RegExp;
  private readonly itemPattern: RegExp;
  private readonly otherPattern: RegExp;

  constructor(options?: LineClassifierOptions) {
    const fillerMinRun = options?.fillerMinRun ?? OUTLINE_PARSER.FILLER_MIN_RUN;
    if (!Number.isInteger(fillerMinRun) || fillerMinRun < 1) {
      throw new OutlineContractError(
        'fillerMinRun must be a positive integer',
        [{ path: 'fillerMinRun', message: `Got ${fillerMinRun}` }],
      );
    }

    const markerPattern =
      options?.chapterMarkerPattern ?? OUTLINE_PARSER.CHAPTER_MARKER_PATTERN;
    this.chapterMarkerPattern = new RegExp(
      markerPattern.source,
      markerPattern.flags.replace(/[gy]/g, ''),
    );

    this.fillerCharacters = OUTLINE_PARSER.FILLER_CHARACTERS;
    const filler = `[${escapeRegExp(this.fillerCharacters)}]{${fillerMinRun},}`;

    this.chapterTitlePattern = new RegExp(`^(.+?)${filler}(\\d+)$`);
    this.itemPattern = new RegExp(`^(\\d+(?:-\\d+)+)\\s*(.*?)${filler}(\\d+)$`);
    this.otherPattern = new RegExp(`^(?!\\d)(.+?)${filler}(\\d+)$`);
  }

  /**
   * Classify a line
   *
   * @param text - Line text
   * @param nextText - Following line on the same page, used only after a chapter marker
   * @returns Classification, or null for noise
   */
  classify(text: string, nextText?: string): LineClassification | null {
    const line = TextCleaner.normalizeLine(text);
    if (!line) {
      return null;
    }

    const markerMatch = this.chapterMarkerPattern.exec(line);
    if (markerMatch && markerMatch[1] !== undefined) {
      return {
        kind: 'chapter-marker',
        chapterNumber: markerMatch[1],
        titleLine:
          nextText === undefined ? null : this.matchChapterTitle(nextText),
      };
    }

    const itemMatch = this.itemPattern.exec(line);
    if (itemMatch) {
      const number = itemMatch[1];
      return {
        kind: 'hierarchical-item',
        number,
        title: this.cleanTitle(itemMatch[2]),
        targetPage: Number.parseInt(itemMatch[3], 10),
        level: number.split('-').length - 1,
      };
    }

    const otherMatch = this.otherPattern.exec(line);
    if (otherMatch) {
      const title = this.cleanTitle(otherMatch[1]);
      if (title) {
        return {
          kind: 'other-entry',
          title,
          targetPage: Number.parseInt(otherMatch[2], 10),
        };
      }
    }

    return null;
  }

  /**
   * Chapter title lookahead: "title, dot leader, page number"
   */
  private matchChapterTitle(text: string): ChapterTitleMatch | null {
    const line = TextCleaner.normalizeLine(text);

    // A numbered entry or another marker right after the marker is not its title
    if (this.itemPattern.test(line) || this.chapterMarkerPattern.test(line)) {
      return null;
    }

    const match = this.chapterTitlePattern.exec(line);
    if (!match) {
      return null;
    }

    const title = this.cleanTitle(match[1]);
    if (!title) {
      return null;
    }

    return { title, targetPage: Number.parseInt(match[2], 10) };
  }

  /**
   * Strip leader characters left at either end and collapse spaces
   */
  private cleanTitle(raw: string): string {
    const fillerClass = `[${escapeRegExp(this.fillerCharacters)}]+`;
    return TextCleaner.normalize(
      raw.replace(new RegExp(`^${fillerClass}|${fillerClass}$`, 'g'), ''),
    );
  }
}
