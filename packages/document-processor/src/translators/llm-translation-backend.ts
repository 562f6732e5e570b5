import type { LoggerMethods } from '@tgdoc/logger';
import type { GlossaryEntry } from '@tgdoc/model';
import type { LanguageModel } from 'ai';

import { z } from 'zod';

import type { BaseLLMComponentOptions } from '../core/base-llm-component';
import { TextLLMComponent } from '../core/text-llm-component';
import type {
  TranslationBackend,
  TranslationContext,
} from './translation-backend';
import { BackendError } from './translation-errors';

const TranslationSchema = z.object({
  translation: z
    .string()
    .describe('The translated text with every ⟦Mn⟧ placeholder kept'),
});

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  zh: 'Chinese',
  'zh-CN': 'Simplified Chinese',
  'zh-TW': 'Traditional Chinese',
  ja: 'Japanese',
  ko: 'Korean',
  fr: 'French',
  de: 'German',
  es: 'Spanish',
};

function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}

/**
 * LLMTranslationBackend - Translates units with a language model
 *
 * Structured output `{ translation }` through LLMCaller, so provider
 * detection, fallback model and token usage tracking come from the shared
 * LLM stack. Any failure is reported as a BackendError.
 */
export class LLMTranslationBackend
  extends TextLLMComponent
  implements TranslationBackend
{
  readonly name = 'llm';

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: BaseLLMComponentOptions,
  ) {
    super(logger, model, 'LLMTranslationBackend', options);
  }

  async translate(
    unitText: string,
    targetLanguage: string,
    context: TranslationContext,
  ): Promise<string> {
    try {
      const { output } = await this.callTextLLM(
        TranslationSchema,
        this.buildSystemPrompt(context.sourceLanguage, targetLanguage),
        this.buildUserPrompt(
          unitText,
          context.blockType,
          this.formatHints(context.glossaryHints),
        ),
        'translation',
        context.abortSignal ?? this.abortSignal,
      );
      return output.translation;
    } catch (error) {
      throw BackendError.fromError('Translation request failed', error);
    }
  }

  protected buildSystemPrompt(
    sourceLanguage: string,
    targetLanguage: string,
  ): string {
    return `You translate OECD chemical test guidelines from ${languageName(sourceLanguage)} into ${languageName(targetLanguage)}.

Rules:
- Translate the whole text faithfully in a formal, technical register.
- Tokens of the form ⟦M1⟧, ⟦M2⟧ stand for formulas. Copy every token exactly, once each, in the same order. Never translate, renumber or drop them.
- Keep section numbers, reference numbers such as (12), and abbreviations such as OECD, GLP or UVA as written.
- Use the given glossary translations for the listed terms.
- Return only the translation, without notes or explanations.`;
  }

  protected buildUserPrompt(
    unitText: string,
    blockType: string,
    hints: string,
  ): string {
    const glossary = hints ? `\nGlossary:\n${hints}\n` : '';
    return `Block type: ${blockType}
${glossary}
Text:
${unitText}`;
  }

  private formatHints(entries: readonly GlossaryEntry[]): string {
    return entries
      .map((entry) => `- ${entry.sourceTerm} → ${entry.targetTerm}`)
      .join('\n');
  }
}
