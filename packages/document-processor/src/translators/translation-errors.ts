/**
 * TranslationIntegrityError
 *
 * A backend answer lost, duplicated or reordered the math placeholders of
 * its unit. Unit-local: the unit is retried once, then kept in the source
 * language.
 */
export class TranslationIntegrityError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TranslationIntegrityError';
  }

  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  static fromError(context: string, error: unknown): TranslationIntegrityError {
    return new TranslationIntegrityError(
      `${context}: ${TranslationIntegrityError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * BackendError
 *
 * Any failure of a translation backend (transport, provider, schema).
 * Retried with backoff, then recorded as a failed unit.
 */
export class BackendError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BackendError';
  }

  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  static fromError(context: string, error: unknown): BackendError {
    return new BackendError(
      `${context}: ${BackendError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * GlossaryError
 *
 * A glossary file is missing, is not JSON or does not match the glossary
 * schema.
 */
export class GlossaryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GlossaryError';
  }

  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  static fromError(context: string, error: unknown): GlossaryError {
    return new GlossaryError(
      `${context}: ${GlossaryError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
