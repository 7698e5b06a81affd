/**
 * Raised when the node tree holds something the scraper has no model for,
 * or when a geometric invariant breaks. Processing of the current page stops.
 */
export class LayoutAssertionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutAssertionError';
  }
}

export type ConversionFailure = 'not-numeric' | 'wrong-shape';

export class ConversionError extends Error {
  constructor(
    readonly reason: ConversionFailure,
    readonly input: string,
    message?: string
  ) {
    super(message ?? `Unable to convert ${JSON.stringify(input)}: ${reason}`);
    this.name = 'ConversionError';
  }
}
