import { describe, expect, test } from 'vitest';

import { ExtractionError } from './extraction-error';

describe('ExtractionError', () => {
  test('sets name and message', () => {
    const error = new ExtractionError('PDF contains no selectable text');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ExtractionError');
    expect(error.message).toBe('PDF contains no selectable text');
  });

  test('fromError prefixes the context and keeps the cause', () => {
    const cause = new Error('spawn pdfinfo ENOENT');

    const error = ExtractionError.fromError('pdfinfo failed', cause);

    expect(error.message).toBe('pdfinfo failed: spawn pdfinfo ENOENT');
    expect(error.cause).toBe(cause);
  });

  test('fromError stringifies non-Error values', () => {
    expect(ExtractionError.fromError('pdftotext failed', 'exit 3').message).toBe(
      'pdftotext failed: exit 3',
    );
  });
});
