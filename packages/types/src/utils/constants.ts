// Empirically tuned thresholds, overridable through the tuning schemas.

export const RELAYOUT_DEFAULTS = {
  FONT_SIZE_TOLERANCE: 0.15,
  BOLD_TOLERANCE_FACTOR: 1.5,
  MIN_VERTICAL_TOLERANCE: 1,
  GROUP_GAP_FACTOR: 2,
  ALIGN_TOLERANCE: 0.5,
  ZERO_WIDTH_RATIO: 0.1,
} as const;

export const TABLE_DEFAULTS = {
  CELL_GAP: 10,
  ROW_THRESHOLD: 5,
  WRAP_THRESHOLD: 16,
} as const;
