export { ChapterRangeResolver } from './chapter-range-resolver';
