export {
  SerializedOutlineNodeSchema,
  TocTreeDocumentSchema,
  TocTreeSerializer,
} from './toc-tree-serializer';
export type {
  ParsedTocTree,
  TocTreeSerializeOptions,
} from './toc-tree-serializer';
export { TocTreeFormatError } from './toc-tree-format-error';
