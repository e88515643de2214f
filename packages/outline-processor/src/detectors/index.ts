export { TocPageDetector } from './toc-page-detector';
export type { TocPageDetectorOptions } from './toc-page-detector';
