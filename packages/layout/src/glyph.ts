import type { CharNode } from '@glyphscrape/types';
import { RELAYOUT_DEFAULTS } from '@glyphscrape/types';

/**
 * A positioned character retained for relayout.
 */
export interface Glyph {
  readonly text: string;
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
  readonly width: number;
  readonly fontName: string;
  readonly fontSize: number;
  /** The decoder put a word-break annotation right before this glyph */
  readonly spaceBefore: boolean;
}

/**
 * Build a glyph from a decoded character. Pictograms such as `€` often come
 * out with a zero width; they get `fontSize × zeroWidthRatio` instead so that
 * their neighbours still merge with them.
 */
export function glyphFromChar(
  node: CharNode,
  spaceBefore: boolean,
  zeroWidthRatio: number = RELAYOUT_DEFAULTS.ZERO_WIDTH_RATIO
): Glyph {
  const measured = node.x1 - node.x0;
  const width = measured === 0 ? node.fontSize * zeroWidthRatio : measured;

  return {
    text: node.text,
    x0: node.x0,
    y0: node.y0,
    x1: measured === 0 ? node.x0 + width : node.x1,
    y1: node.y1,
    width,
    fontName: node.fontName,
    fontSize: node.fontSize,
    spaceBefore,
  };
}

export function isBoldFont(fontName: string): boolean {
  return fontName.toLowerCase().includes('bold');
}
