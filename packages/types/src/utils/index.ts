export { RELAYOUT_DEFAULTS, TABLE_DEFAULTS } from './constants.js';
export { parseDmyDate, parsePeriod, compareDates } from './date.js';
export {
  parseFrenchNumber,
  parseAmount,
  parseAmountUnit,
  parsePercent,
  parseNumberUnit,
  roundTo,
} from './money.js';
export { lastWord, colonRight } from './text.js';
