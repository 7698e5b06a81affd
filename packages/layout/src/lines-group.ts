import type { Line } from './line.js';

/**
 * Lines forming one column or paragraph, top to bottom.
 */
export class LinesGroup {
  readonly lines: Line[] = [];

  push(line: Line): void {
    this.lines.push(line);
  }

  get lastLine(): Line | undefined {
    return this.lines[this.lines.length - 1];
  }

  /** y0 of the topmost line */
  get top(): number {
    return this.lines[0]?.y0 ?? Number.NEGATIVE_INFINITY;
  }

  get texts(): string[] {
    return this.lines.map((line) => line.text);
  }

  toString(): string {
    return this.lines.map((line) => line.toString()).join('\n');
  }
}
