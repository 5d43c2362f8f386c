/**
 * Raised for malformed batch input. Always fatal to the whole request and
 * mapped to HTTP 400 by the routes; per-item problems never use this.
 */
export class BatchValidationError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = 'BatchValidationError';
    this.details = details;
  }
}
