export { OutlineTreeBuilder } from './outline-tree-builder';
