/**
 * Rebuild reading order from a page's characters: glyphs are merged into
 * blocks, blocks sharing a baseline and a compatible font into lines, and
 * lines into column groups.
 */
import {
  DEFAULT_SKIP_KINDS,
  LayoutAssertionError,
  RelayoutTuningSchema,
  consoleLogger,
  isFigureOnlyPage,
} from '@glyphscrape/types';
import type {
  AnnoNode,
  CharNode,
  LayoutNode,
  Logger,
  NodeKind,
  RelayoutTuning,
  RelayoutTuningInput,
} from '@glyphscrape/types';
import { glyphFromChar, isBoldFont, type Glyph } from './glyph.js';
import { Line, adjacentGlyph, type BlockMergePredicate, type LineInfo } from './line.js';
import { LinesGroup } from './lines-group.js';
import { TextBlock } from './text-block.js';

export type LineMergePredicate = (previous: LineInfo, next: LineInfo) => boolean;

export interface RelayoutOptions {
  /** Glyphs rejected here are ignored, e.g. everything left of a margin */
  include?: (glyph: Glyph) => boolean;
  skipKinds?: ReadonlySet<NodeKind>;
  canMergeBlock?: BlockMergePredicate;
  canMergeLines?: LineMergePredicate;
  /** Bucket texts dropped before lines are merged and grouped */
  skipTexts?: ReadonlySet<string>;
  tuning?: RelayoutTuningInput;
  logger?: Logger;
}

interface Bucket {
  info: LineInfo;
  glyphs: Glyph[];
}

/**
 * Inclusion predicate dropping glyphs starting left of `minX`.
 */
export function leftMargin(minX: number): (glyph: Glyph) => boolean {
  return (glyph) => glyph.x0 >= minX;
}

/**
 * Default line merge: font sizes within `fontSizeTolerance` of the larger
 * one (more when only one of the fonts is bold), and baselines closer than
 * the size difference, floored at `minVerticalTolerance`.
 */
export function compatibleLines(tuning: RelayoutTuning): LineMergePredicate {
  return (previous, next) => {
    const sizeDiff = Math.abs(previous.fontSize - next.fontSize);
    let allowedSizeDiff = Math.max(previous.fontSize, next.fontSize) * tuning.fontSizeTolerance;
    if (isBoldFont(previous.fontName) !== isBoldFont(next.fontName)) {
      allowedSizeDiff *= tuning.boldToleranceFactor;
    }
    if (sizeDiff >= allowedSizeDiff) {
      return false;
    }
    return Math.abs(previous.y0 - next.y0) < Math.max(sizeDiff, tuning.minVerticalTolerance);
  };
}

function collectLeaves(node: LayoutNode, skipKinds: ReadonlySet<NodeKind>, out: Array<CharNode | AnnoNode>): void {
  if (skipKinds.has(node.kind)) return;

  switch (node.kind) {
    case 'page':
    case 'text-box':
    case 'text-line':
    case 'figure':
      for (const child of node.children) {
        collectLeaves(child, skipKinds, out);
      }
      return;
    case 'char':
    case 'anno':
      out.push(node);
      return;
    case 'image':
    case 'curve':
    case 'line':
    case 'rect':
      throw new LayoutAssertionError(`Unexpected ${node.kind} node while collecting text`);
    default: {
      const unknown: never = node;
      throw new LayoutAssertionError(`Unknown node ${String(unknown)}`);
    }
  }
}

/**
 * Walk the tree and bucket retained glyphs by (y0, font name, font size).
 */
function bucketGlyphs(root: LayoutNode, options: RelayoutOptions, tuning: RelayoutTuning): Bucket[] {
  const leaves: Array<CharNode | AnnoNode> = [];
  collectLeaves(root, options.skipKinds ?? DEFAULT_SKIP_KINDS, leaves);

  const buckets = new Map<string, Bucket>();
  let afterAnno = false;

  for (const leaf of leaves) {
    if (leaf.kind === 'anno') {
      afterAnno = true;
      continue;
    }

    const glyph = glyphFromChar(leaf, afterAnno, tuning.zeroWidthRatio);
    afterAnno = false;
    if (options.include !== undefined && !options.include(glyph)) {
      continue;
    }

    const fontName = glyph.fontName.toLowerCase();
    const key = `${glyph.y0}|${fontName}|${glyph.fontSize}`;
    let bucket = buckets.get(key);
    if (bucket === undefined) {
      bucket = { info: { y0: glyph.y0, fontName, fontSize: glyph.fontSize }, glyphs: [] };
      buckets.set(key, bucket);
    }
    bucket.glyphs.push(glyph);
  }

  // Top of the page first; ties broken on font so that the order never
  // depends on the tree's internal order.
  return [...buckets.values()].sort((a, b) => {
    if (a.info.y0 !== b.info.y0) return b.info.y0 - a.info.y0;
    if (a.info.fontName !== b.info.fontName) return a.info.fontName < b.info.fontName ? 1 : -1;
    return b.info.fontSize - a.info.fontSize;
  });
}

/**
 * Merge buckets into lines, top to bottom. A bucket compatible with the
 * previously accepted one joins its line, which is rebuilt from the glyphs
 * of both.
 */
function buildLines(
  buckets: Bucket[],
  canMergeBlock: BlockMergePredicate,
  canMergeLines: LineMergePredicate,
  skipTexts: ReadonlySet<string> | undefined
): Line[] {
  const lines: Line[] = [];
  let accepted: Bucket | null = null;

  for (const bucket of buckets) {
    if (skipTexts !== undefined && skipTexts.has(Line.fromGlyphs(bucket.info, bucket.glyphs, canMergeBlock).text)) {
      continue;
    }

    if (accepted !== null && canMergeLines(accepted.info, bucket.info)) {
      accepted.glyphs.push(...bucket.glyphs);
      lines[lines.length - 1] = Line.fromGlyphs(accepted.info, accepted.glyphs, canMergeBlock);
      continue;
    }

    accepted = { info: bucket.info, glyphs: [...bucket.glyphs] };
    lines.push(Line.fromGlyphs(accepted.info, accepted.glyphs, canMergeBlock));
  }

  return lines;
}

function sameX(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance;
}

function overlaps(a: Line, b: Line): boolean {
  return a.x0 < b.x1 && b.x0 < a.x1;
}

/**
 * Cluster lines into column groups, top to bottom.
 */
export function groupLines(lines: readonly Line[], tuning: RelayoutTuning): LinesGroup[] {
  const groups: LinesGroup[] = [];
  const byLeadingX: Array<{ x0: number; group: LinesGroup }> = [];
  let previousGroup: LinesGroup | null = null;
  let previousLine: Line | null = null;

  for (const line of lines) {
    const lead = line.blocks[0];
    if (lead === undefined) continue;

    const above = previousGroup?.lastLine;
    if (
      previousGroup !== null &&
      above !== undefined &&
      above.y0 - line.y0 <= tuning.groupGapFactor * line.fontSize
    ) {
      const aboveBlocks = above.blocks;
      const column = aboveBlocks.findIndex((block) => sameX(block.x0, lead.x0, tuning.alignTolerance));
      if (column >= 0) {
        for (const block of aboveBlocks.slice(0, column)) {
          line.addBlock(TextBlock.blank(block.x0, block.x1));
        }
        previousGroup.push(line);
        previousLine = line;
        continue;
      }
    }

    const entry = byLeadingX.find((candidate) => sameX(candidate.x0, lead.x0, tuning.alignTolerance));
    let group = entry?.group;
    const last = group?.lastLine;
    const interrupted =
      previousLine !== null && previousGroup !== group && overlaps(previousLine, line);

    if (
      group === undefined ||
      last === undefined ||
      last.y0 - line.y0 > tuning.groupGapFactor * line.fontSize ||
      interrupted
    ) {
      group = new LinesGroup();
      groups.push(group);
      if (entry !== undefined) {
        entry.group = group;
      } else {
        byLeadingX.push({ x0: lead.x0, group });
      }
    }

    group.push(line);
    previousGroup = group;
    previousLine = line;
  }

  return groups.sort((a, b) => b.top - a.top);
}

/**
 * Reconstruct lines and column groups from the characters under `root`,
 * usually a page. Groups come ordered by their top y, descending.
 */
export function relayout(root: LayoutNode, options: RelayoutOptions = {}): LinesGroup[] {
  const logger = options.logger ?? consoleLogger;
  const tuning = RelayoutTuningSchema.parse(options.tuning ?? {});

  if (isFigureOnlyPage(root)) {
    logger.warn('Skip figure only page, is it a scanned document?');
    return [];
  }

  const buckets = bucketGlyphs(root, options, tuning);
  const lines = buildLines(
    buckets,
    options.canMergeBlock ?? adjacentGlyph,
    options.canMergeLines ?? compatibleLines(tuning),
    options.skipTexts
  );
  logger.debug(`relayout: ${buckets.length} buckets merged into ${lines.length} lines`);

  return groupLines(lines, tuning);
}
