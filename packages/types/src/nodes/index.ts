export {
  CharNode,
  AnnoNode,
  ShapeNode,
  ContainerNode,
  DEFAULT_SKIP_KINDS,
  isContainer,
  isFigureOnlyPage,
  hasBBox,
  page,
  textBox,
  textLine,
  figure,
  char,
  anno,
  shape,
} from './layout-node.js';

export type { BBox, ContainerKind, ShapeKind, NodeKind, LayoutNode } from './layout-node.js';

export { describeNode, formatNodeTree } from './format.js';
