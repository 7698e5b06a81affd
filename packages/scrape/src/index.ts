// Traversal protocol
export { traverse, isEndOfPage, formatState, END_OF_PAGE } from './traversal.js';
export type {
  EndOfPage,
  StepState,
  NodeStep,
  EndOfPageStep,
  Step,
  Reply,
  StepResult,
  StepSource,
} from './traversal.js';

// Processor chain
export {
  StepProcessor,
  simpleProcessor,
  skipKindsProcessor,
  baseRecursionProcessor,
  debugProcessor,
  baseProcessors,
  buildChain,
  BASE_SKIP_KINDS,
} from './processors.js';
export type { Processor, StepOutcome, Decision, DecisionFn } from './processors.js';

// Table data collection
export {
  TableRow,
  tableDataProcessor,
  saveTextLine,
  regroupLines,
  regroupWrappedHeaders,
  tableColumns,
} from './table-data.js';
export type {
  TableCell,
  TableData,
  TableLine,
  TableDataOptions,
  CollectEndCallback,
  WrappedHeadersOptions,
} from './table-data.js';

// Drivers
export { scrapePage, scrapeDocument } from './scrape.js';
export type { ScrapeOptions, DocumentScrapeOptions } from './scrape.js';
