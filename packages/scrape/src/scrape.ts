import { consoleLogger, isFigureOnlyPage } from '@glyphscrape/types';
import type { ContainerNode, Logger } from '@glyphscrape/types';
import { buildChain, type Processor } from './processors.js';
import { traverse } from './traversal.js';

export interface ScrapeOptions {
  logger?: Logger;
}

/**
 * Run `page` through the processors chain and return the resulting state.
 *
 * The chain is drained by replying `recurse: true` and echoing the state to
 * every step; the processors decide the rest. Scraped data ends up in
 * `data`, shared by all processors.
 */
export function scrapePage<S, D>(
  page: ContainerNode,
  processors: ReadonlyArray<Processor<S, D>>,
  data: D,
  state: S,
  options: ScrapeOptions = {}
): S {
  const logger = options.logger ?? consoleLogger;

  if (isFigureOnlyPage(page)) {
    logger.warn('Skip figure only page, is it a scanned document?');
    return state;
  }

  const chain = buildChain(traverse(page, state, logger), processors, data);
  let result = chain.next();
  while (!result.done) {
    result = chain.next({ recurse: true, state: result.step.state });
  }
  return result.state;
}

export interface DocumentScrapeOptions extends ScrapeOptions {
  /**
   * Called when a page fails. The page is then skipped, keeping the state it
   * started with. Without it the error propagates.
   */
  onPageError?: (error: Error, pageIndex: number) => void;
}

/**
 * Scrape pages in order, each page starting from the state the previous one
 * ended with.
 */
export function scrapeDocument<S, D>(
  pages: Iterable<ContainerNode>,
  processors: ReadonlyArray<Processor<S, D>>,
  data: D,
  initialState: S,
  options: DocumentScrapeOptions = {}
): S {
  let state = initialState;
  let pageIndex = 0;

  for (const page of pages) {
    try {
      state = scrapePage(page, processors, data, state, options);
    } catch (error) {
      if (options.onPageError === undefined) {
        throw error;
      }
      options.onPageError(error instanceof Error ? error : new Error(String(error)), pageIndex);
    }
    pageIndex++;
  }

  return state;
}
