/**
 * ExtractionError
 *
 * Fatal error raised when a PDF yields no usable text or the Poppler tools
 * are missing or fail.
 */
export class ExtractionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExtractionError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ExtractionError from unknown error with context
   */
  static fromError(context: string, error: unknown): ExtractionError {
    return new ExtractionError(
      `${context}: ${ExtractionError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
