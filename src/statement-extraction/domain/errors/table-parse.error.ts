/**
 * Raised by table adapters when a converted table cannot be read.
 * The table scorer treats it as a missing candidate.
 */
export class TableParseError extends Error {
  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(message);
    this.name = 'TableParseError';
    Object.setPrototypeOf(this, TableParseError.prototype);
  }
}
