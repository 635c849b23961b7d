/**
 * Raised when interval records cannot be read or converted to integers.
 * `row` is the 1-based data row (the header is not counted).
 */
export class IntervalSourceError extends Error {
  readonly row?: number;
  readonly column?: string;

  constructor(
    message: string,
    details: { row?: number; column?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: details.cause });
    this.name = 'IntervalSourceError';
    this.row = details.row;
    this.column = details.column;
  }
}
