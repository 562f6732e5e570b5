/**
 * PublishError
 *
 * Raised when the publication metadata is invalid or the output files
 * cannot be written.
 */
export class PublishError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PublishError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create PublishError from unknown error with context
   */
  static fromError(context: string, error: unknown): PublishError {
    return new PublishError(
      `${context}: ${PublishError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
