/**
 * The report could not be turned into JSON. No report can be produced
 * after this, so the CLI treats it as fatal.
 */
export class ReportSerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReportSerializationError';
  }
}
