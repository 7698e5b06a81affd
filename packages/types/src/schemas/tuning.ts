import { z } from 'zod';
import { RELAYOUT_DEFAULTS, TABLE_DEFAULTS } from '../utils/constants.js';

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();

export const RelayoutTuningSchema = z.object({
  /** Allowed font size difference between merged lines, as a ratio of the larger size */
  fontSizeTolerance: positive.default(RELAYOUT_DEFAULTS.FONT_SIZE_TOLERANCE),
  /** Applied to fontSizeTolerance when exactly one of the two fonts is bold */
  boldToleranceFactor: positive.default(RELAYOUT_DEFAULTS.BOLD_TOLERANCE_FACTOR),
  /** Floor of the allowed vertical offset between merged lines */
  minVerticalTolerance: positive.default(RELAYOUT_DEFAULTS.MIN_VERTICAL_TOLERANCE),
  /** A vertical gap above groupGapFactor × font size opens a new group */
  groupGapFactor: positive.default(RELAYOUT_DEFAULTS.GROUP_GAP_FACTOR),
  alignTolerance: nonNegative.default(RELAYOUT_DEFAULTS.ALIGN_TOLERANCE),
  /** Width given to zero-width glyphs, as a ratio of their font size */
  zeroWidthRatio: positive.default(RELAYOUT_DEFAULTS.ZERO_WIDTH_RATIO),
});
export type RelayoutTuning = z.infer<typeof RelayoutTuningSchema>;
export type RelayoutTuningInput = z.input<typeof RelayoutTuningSchema>;

export const TableTuningSchema = z.object({
  /** Horizontal distance splitting a text line into two cells */
  cellGap: positive.default(TABLE_DEFAULTS.CELL_GAP),
  /** Rows closer than this are regrouped into one */
  rowThreshold: nonNegative.default(TABLE_DEFAULTS.ROW_THRESHOLD),
  /** Maximum vertical gap for a wrapped header continuation */
  wrapThreshold: positive.default(TABLE_DEFAULTS.WRAP_THRESHOLD),
});
export type TableTuning = z.infer<typeof TableTuningSchema>;
export type TableTuningInput = z.input<typeof TableTuningSchema>;
