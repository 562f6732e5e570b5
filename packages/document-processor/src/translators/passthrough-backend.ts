import type {
  TranslationBackend,
  TranslationContext,
} from './translation-backend';

/**
 * Backend that returns every unit unchanged, leaving only the glossary to
 * translate terms. Used when no model is configured.
 */
export class PassthroughBackend implements TranslationBackend {
  readonly name = 'passthrough';

  async translate(
    unitText: string,
    _targetLanguage?: string,
    _context?: TranslationContext,
  ): Promise<string> {
    return unitText;
  }
}
