export { PageDumpParser } from './page-dump-parser';
export type { PageDump } from './page-dump-parser';
