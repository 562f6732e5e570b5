import type { GlossaryEntry } from '@tgdoc/model';

/**
 * What a backend may know about the unit it translates
 */
export interface TranslationContext {
  sourceLanguage: string;

  /**
   * Type of the block the unit belongs to
   */
  blockType: 'heading' | 'paragraph';

  /**
   * Glossary entries whose source term occurs in the unit
   */
  glossaryHints: readonly GlossaryEntry[];

  /**
   * Aborted when the request times out or the run is aborted
   */
  abortSignal?: AbortSignal;
}

/**
 * Translation service behind the GlossaryTranslator
 *
 * One unit in, one unit out. The unit contains `⟦Mn⟧` math placeholders
 * that must come back unchanged and in the same order.
 */
export interface TranslationBackend {
  /**
   * Short name for logs (e.g. 'llm', 'passthrough')
   */
  readonly name: string;

  /**
   * @throws {BackendError} On any failure
   */
  translate(
    unitText: string,
    targetLanguage: string,
    context: TranslationContext,
  ): Promise<string>;
}
