import { LayoutAssertionError } from '@glyphscrape/types';
import type { Glyph } from './glyph.js';

/**
 * A run of glyphs merged left to right.
 * x0 never moves once the block exists; x1 only grows.
 */
export class TextBlock {
  private textValue: string;
  private right: number;
  private latestX0: number;

  constructor(text: string, readonly x0: number, x1: number) {
    if (x1 < x0) {
      throw new LayoutAssertionError(`Block ${JSON.stringify(text)} ends (${x1}) before it starts (${x0})`);
    }
    this.textValue = text;
    this.right = x1;
    this.latestX0 = x0;
  }

  static fromGlyph(glyph: Glyph): TextBlock {
    return new TextBlock(glyph.text, glyph.x0, glyph.x1);
  }

  /** Empty block keeping a column position in an aligned line. */
  static blank(x0: number, x1: number): TextBlock {
    return new TextBlock('', x0, x1);
  }

  get text(): string {
    return this.textValue;
  }

  get x1(): number {
    return this.right;
  }

  /** Left edge of the latest appended glyph */
  get lastX0(): number {
    return this.latestX0;
  }

  append(glyph: Glyph): void {
    if (glyph.x0 < this.x0 || glyph.x1 < this.right) {
      throw new LayoutAssertionError(
        `Glyph ${JSON.stringify(glyph.text)} (${glyph.x0}, ${glyph.x1}) lies before block ` +
          `${JSON.stringify(this.textValue)} (${this.x0}, ${this.right})`
      );
    }
    this.textValue += glyph.spaceBefore ? ` ${glyph.text}` : glyph.text;
    this.right = glyph.x1;
    this.latestX0 = glyph.x0;
  }

  toString(): string {
    return `<${JSON.stringify(this.textValue)} (${this.x0}, ${this.right})>`;
  }
}
