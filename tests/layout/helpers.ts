import { anno, char, textLine } from '@glyphscrape/types';
import type { CharNode, ContainerNode } from '@glyphscrape/types';
import type { Glyph, LinesGroup } from '@glyphscrape/layout';

export function glyph(
  text: string,
  x0: number,
  x1: number,
  options: { y0?: number; fontSize?: number; fontName?: string; spaceBefore?: boolean } = {}
): Glyph {
  const y0 = options.y0 ?? 100;
  const fontSize = options.fontSize ?? 10;
  return {
    text,
    x0,
    y0,
    x1,
    y1: y0 + fontSize,
    width: x1 - x0,
    fontName: options.fontName ?? 'helvetica',
    fontSize,
    spaceBefore: options.spaceBefore ?? false,
  };
}

export function groupTexts(groups: readonly LinesGroup[]): string[][][] {
  return groups.map((group) => group.lines.map((line) => line.blocks.map((block) => block.text)));
}

export function charAt(
  text: string,
  x0: number,
  x1: number,
  y0: number,
  options: { fontSize?: number; fontName?: string } = {}
): CharNode {
  const fontSize = options.fontSize ?? 10;
  return char({ text, x0, x1, y0, y1: y0 + fontSize, fontName: options.fontName ?? 'Helvetica', fontSize });
}

export function lineOf(chars: readonly CharNode[]): ContainerNode {
  const first = chars[0];
  const last = chars[chars.length - 1];
  if (first === undefined || last === undefined) {
    throw new Error('A text line needs characters');
  }
  return textLine({ x0: first.x0, y0: first.y0, x1: last.x1, y1: first.y1 }, [...chars, anno('\n')]);
}

export const PAGE_BOX = { x0: 0, y0: 0, x1: 595, y1: 842 };
