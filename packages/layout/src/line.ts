import type { Glyph } from './glyph.js';
import { TextBlock } from './text-block.js';

export interface LineInfo {
  y0: number;
  fontName: string;
  fontSize: number;
}

export type BlockMergePredicate = (block: TextBlock, glyph: Glyph) => boolean;

/**
 * Default block merge: the glyph starts less than its own width away from
 * the block's right edge.
 */
export const adjacentGlyph: BlockMergePredicate = (block, glyph) =>
  Math.abs(glyph.x0 - block.x1) < glyph.width;

/**
 * Left to right; ties broken on x1, text, then y0 so that the order never
 * depends on the tree's internal order.
 */
function compareGlyphs(a: Glyph, b: Glyph): number {
  if (a.x0 !== b.x0) return a.x0 - b.x0;
  if (a.x1 !== b.x1) return a.x1 - b.x1;
  if (a.text !== b.text) return a.text < b.text ? -1 : 1;
  return a.y0 - b.y0;
}

/**
 * Index of the first element strictly greater than `value`.
 */
export function bisectRight(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const current = sorted[mid];
    if (current !== undefined && value < current) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}

/**
 * Blocks sharing one baseline and font. Blocks are kept in right-edge order
 * alongside `rightEdges`, so a glyph finds the block it may extend by
 * binary search.
 */
export class Line {
  private readonly ordered: TextBlock[] = [];
  private readonly rightEdges: number[] = [];

  constructor(readonly info: LineInfo) {}

  static fromGlyphs(info: LineInfo, glyphs: readonly Glyph[], canMerge: BlockMergePredicate = adjacentGlyph): Line {
    const line = new Line(info);
    const sorted = [...glyphs].sort(compareGlyphs);
    for (const glyph of sorted) {
      line.append(glyph, canMerge);
    }
    return line;
  }

  get y0(): number {
    return this.info.y0;
  }

  get fontName(): string {
    return this.info.fontName;
  }

  get fontSize(): number {
    return this.info.fontSize;
  }

  /** Blocks ordered by x0 */
  get blocks(): TextBlock[] {
    return [...this.ordered].sort((a, b) => a.x0 - b.x0);
  }

  get x0(): number {
    return Math.min(...this.ordered.map((block) => block.x0));
  }

  get x1(): number {
    return Math.max(...this.ordered.map((block) => block.x1));
  }

  get text(): string {
    return this.blocks
      .map((block) => block.text)
      .filter((text) => text !== '')
      .join(' ');
  }

  append(glyph: Glyph, canMerge: BlockMergePredicate = adjacentGlyph): void {
    const index = bisectRight(this.rightEdges, glyph.x1);
    const candidate = this.ordered[index - 1];

    if (candidate !== undefined && canMerge(candidate, glyph)) {
      candidate.append(glyph);
      this.rightEdges[index - 1] = candidate.x1;
      return;
    }

    this.insert(index, TextBlock.fromGlyph(glyph));
  }

  /** Add an already built block, e.g. a blank column placeholder. */
  addBlock(block: TextBlock): void {
    this.insert(bisectRight(this.rightEdges, block.x1), block);
  }

  private insert(index: number, block: TextBlock): void {
    this.ordered.splice(index, 0, block);
    this.rightEdges.splice(index, 0, block.x1);
  }

  toString(): string {
    return `[${this.fontSize}: ${this.blocks.map((block) => block.toString()).join(', ')}]`;
  }
}
