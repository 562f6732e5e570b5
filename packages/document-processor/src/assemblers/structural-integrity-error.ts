/**
 * StructuralIntegrityError
 *
 * Fatal error raised when the block structure cannot be trusted: a
 * placeholder without a matching asset, a reference to a missing asset, or
 * a translated document whose structure differs from its source.
 */
export class StructuralIntegrityError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StructuralIntegrityError';
  }

  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  static fromError(context: string, error: unknown): StructuralIntegrityError {
    return new StructuralIntegrityError(
      `${context}: ${StructuralIntegrityError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
