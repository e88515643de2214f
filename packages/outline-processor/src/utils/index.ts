export { TextCleaner } from './text-cleaner';
export {
  chapterHeadingOf,
  formatChapterHeading,
  parseChapterHeading,
} from './chapter-heading';
export {
  collectChapters,
  countNodes,
  walkOutline,
} from './outline-traversal';
