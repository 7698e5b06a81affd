/**
 * Table extraction: text lines are collected by page coordinates while a
 * table is being read, then regrouped into rows once the page is done.
 * Decoders emit table cells in no particular order, so nothing can be
 * decided before the end of the page.
 */
import { LayoutAssertionError, TableTuningSchema } from '@glyphscrape/types';
import type { CharNode, ContainerNode, TableTuning, TableTuningInput } from '@glyphscrape/types';
import { StepProcessor, type Processor, type StepOutcome } from './processors.js';
import { isEndOfPage } from './traversal.js';
import type { Reply, Step, StepSource, StepState } from './traversal.js';

export interface TableCell {
  readonly x0: number;
  readonly x1: number;
  text: string;
}

function compareCells(a: TableCell, b: TableCell): number {
  return a.x0 !== b.x0 ? a.x0 - b.x0 : a.x1 - b.x1;
}

/**
 * Text fragments of one row, keyed by their rounded (x0, x1) position.
 */
export class TableRow {
  private readonly cellsByKey = new Map<string, TableCell>();

  static of(cells: ReadonlyArray<readonly [x0: number, x1: number, text: string]>): TableRow {
    const row = new TableRow();
    for (const [x0, x1, text] of cells) {
      row.set(x0, x1, text);
    }
    return row;
  }

  get size(): number {
    return this.cellsByKey.size;
  }

  set(x0: number, x1: number, text: string): void {
    this.cellsByKey.set(`${x0}:${x1}`, { x0, x1, text });
  }

  get(x0: number, x1: number): string | undefined {
    return this.cellsByKey.get(`${x0}:${x1}`)?.text;
  }

  /** Cells ordered by x0, then x1 */
  cells(): TableCell[] {
    return [...this.cellsByKey.values()].sort(compareCells);
  }

  /** Leftmost cell */
  first(): TableCell | undefined {
    return this.cells()[0];
  }

  /** Copy the other row's cells over this one's, replacing same positions. */
  update(other: TableRow): void {
    for (const cell of other.cells()) {
      this.set(cell.x0, cell.x1, cell.text);
    }
  }

  clone(): TableRow {
    const copy = new TableRow();
    copy.update(this);
    return copy;
  }

  texts(): string[] {
    return this.cells().map((cell) => cell.text);
  }
}

/** Rows indexed by the y0 of their text line */
export type TableData = Map<number, TableRow>;

export interface TableLine {
  y: number;
  row: TableRow;
}

/**
 * Called at the end of each page where collection started. Receives the
 * state that was current before the end of the page and returns the next
 * state, or undefined to leave it alone.
 */
export type CollectEndCallback<S, D> = (state: S, data: D, tableData: TableData) => S | undefined;

export interface TableDataOptions<S, D> {
  /** States in which `triggerText` is looked for */
  triggerStates: readonly S[];
  /** Lowercased text a node starts with to open collection */
  triggerText: string;
  onCollectEnd: CollectEndCallback<S, D>;
  /** Cells whose text starts with one of these are not stored */
  skipPrefixes?: readonly string[];
  tuning?: TableTuningInput;
}

interface Part {
  x0: number;
  x1: number;
  text: string;
}

/**
 * Split a text line into cells at wide spaces and store them at the line's
 * y0 in `tableData`.
 */
export function saveTextLine(
  tableData: TableData,
  line: ContainerNode,
  tuning: TableTuning,
  skipPrefixes: readonly string[] = []
): void {
  const parts: Part[] = [];
  let last: CharNode | null = null;

  for (const [index, child] of line.children.entries()) {
    switch (child.kind) {
      case 'char': {
        const current = parts[parts.length - 1];
        if (current === undefined) {
          parts.push({ x0: child.x0, x1: child.x1, text: child.lowerText });
        } else {
          current.x1 = child.x1;
          current.text += child.lowerText;
        }
        last = child;
        break;
      }
      case 'anno': {
        if (child.text === '\n') break;
        if (child.text !== ' ') {
          throw new LayoutAssertionError(`Unexpected annotation ${JSON.stringify(child.text)} in text line`);
        }
        const following = line.children.slice(index + 1).find((node): node is CharNode => node.kind === 'char');
        if (last === null || following === undefined) break;
        // too much room between two words: they belong to different cells,
        // the new one keyed on the x0 of its first glyph
        if (following.x1 - last.x1 > tuning.cellGap) {
          parts.push({ x0: following.x0, x1: following.x0, text: '' });
        } else {
          const current = parts[parts.length - 1];
          if (current !== undefined) current.text += ' ';
        }
        break;
      }
      default:
        throw new LayoutAssertionError(`Unexpected ${child.kind} node in text line`);
    }
  }

  let row = tableData.get(line.y0);
  for (const part of parts) {
    if (skipPrefixes.some((prefix) => part.text.startsWith(prefix))) continue;
    if (row === undefined) {
      row = new TableRow();
      tableData.set(line.y0, row);
    }
    row.set(Math.round(part.x0), Math.round(part.x1), part.text);
  }
}

class TableDataProcessor<S, D> extends StepProcessor<S, D> {
  private tableData: TableData | null = null;
  private lastState: S | undefined;
  private readonly tuning: TableTuning;

  constructor(
    upstream: StepSource<S>,
    data: D,
    private readonly options: TableDataOptions<S, D>
  ) {
    super(upstream, data);
    this.tuning = TableTuningSchema.parse(options.tuning ?? {});
  }

  protected onStep(step: Step<S>): StepOutcome<S> {
    return { kind: 'forward', step };
  }

  protected override onReply(step: Step<S>, reply: Reply<S>): Reply<S> {
    if (step.node === null) {
      return this.endOfPage(reply);
    }

    const state: S = reply.state !== undefined && !isEndOfPage(reply.state) ? reply.state : step.state;
    this.lastState = state;

    // consumed by a downstream processor
    if (reply.recurse === false) return reply;

    if (
      this.tableData === null &&
      this.options.triggerStates.includes(state) &&
      step.node.lowerText.startsWith(this.options.triggerText)
    ) {
      this.tableData = new Map();
    }

    if (this.tableData !== null && step.node.kind === 'text-line') {
      saveTextLine(this.tableData, step.node, this.tuning, this.options.skipPrefixes);
    }

    return reply;
  }

  private endOfPage(reply: Reply<S>): Reply<S> {
    const tableData = this.tableData;
    const previous = this.lastState;
    if (tableData === null || previous === undefined) return reply;

    this.tableData = null;
    const next: StepState<S> | undefined = this.options.onCollectEnd(previous, this.data, tableData) ?? reply.state;
    return { ...reply, state: next };
  }
}

/**
 * Processor collecting every text line not consumed downstream, from the
 * one starting with `triggerText` (while in one of `triggerStates`) to the
 * end of the page, then handing the result to `onCollectEnd`. Collection may
 * start again on the next page.
 */
export function tableDataProcessor<S, D>(options: TableDataOptions<S, D>): Processor<S, D> {
  return (upstream, data) => new TableDataProcessor(upstream, data, options);
}

/**
 * Rows from top to bottom, rows closer than `rowThreshold` being merged.
 * Usually the first transform applied to collected table data.
 */
export function regroupLines(tableData: TableData, tuning?: TableTuningInput): TableLine[] {
  const { rowThreshold } = TableTuningSchema.parse(tuning ?? {});
  const lines: TableLine[] = [];
  let stacked: TableLine | null = null;

  const rows = [...tableData.entries()].sort(([a], [b]) => b - a);
  for (const [y, row] of rows) {
    if (stacked === null) {
      stacked = { y, row: row.clone() };
    } else if (stacked.y - y > rowThreshold) {
      lines.push(stacked);
      stacked = { y, row: row.clone() };
    } else {
      stacked.row.update(row);
    }
  }
  if (stacked !== null) lines.push(stacked);

  return lines;
}

export interface WrappedHeadersOptions {
  /** Texts never folded into the previous row */
  skipTokens?: ReadonlySet<string>;
  tuning?: TableTuningInput;
}

/**
 * Fold single-cell rows that continue the first column of the row above,
 * as produced by labels wrapped on several lines. The first cell of the
 * receiving row is updated in place.
 */
export function regroupWrappedHeaders(lines: readonly TableLine[], options: WrappedHeadersOptions = {}): TableLine[] {
  const { wrapThreshold } = TableTuningSchema.parse(options.tuning ?? {});
  const skipTokens = options.skipTokens ?? new Set<string>();
  const result: TableLine[] = [];
  let stacked: TableLine | null = null;

  for (const line of lines) {
    if (stacked === null) {
      stacked = line;
      continue;
    }

    const only = line.row.size === 1 ? line.row.first() : undefined;
    const target = stacked.row.first();
    if (
      only !== undefined &&
      target !== undefined &&
      !skipTokens.has(only.text) &&
      only.x0 === target.x0 &&
      stacked.y - line.y < wrapThreshold
    ) {
      target.text += ` ${only.text}`;
      continue;
    }

    result.push(stacked);
    stacked = line;
  }
  if (stacked !== null) result.push(stacked);

  return result;
}

/** Cell texts of each row, left to right. */
export function tableColumns(lines: readonly TableLine[]): string[][] {
  return lines.map((line) => line.row.texts());
}
