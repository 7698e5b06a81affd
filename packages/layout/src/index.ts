// Glyph model
export { glyphFromChar, isBoldFont } from './glyph.js';
export type { Glyph } from './glyph.js';
export { TextBlock } from './text-block.js';
export { Line, adjacentGlyph, bisectRight } from './line.js';
export type { LineInfo, BlockMergePredicate } from './line.js';
export { LinesGroup } from './lines-group.js';

// Relayout
export {
  relayout,
  groupLines,
  compatibleLines,
  leftMargin,
} from './relayout.js';
export type { RelayoutOptions, LineMergePredicate } from './relayout.js';
