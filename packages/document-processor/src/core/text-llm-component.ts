import type { ExtendedTokenUsage } from '@tgdoc/shared';
import type { z } from 'zod';

import { LLMCaller } from '@tgdoc/shared';

import { BaseLLMComponent } from './base-llm-component';

export type { BaseLLMComponentOptions } from './base-llm-component';

/**
 * Abstract base class for text-only LLM components
 *
 * Adds `callTextLLM`, a structured-output call through `LLMCaller` whose
 * usage is tracked automatically.
 */
export abstract class TextLLMComponent extends BaseLLMComponent {
  /**
   * @param phase - Phase name for usage tracking (e.g. 'translation')
   * @param abortSignal - Signal for this call only, instead of the component's
   */
  protected async callTextLLM<TOutput>(
    schema: z.ZodType<TOutput>,
    systemPrompt: string,
    userPrompt: string,
    phase: string,
    abortSignal: AbortSignal | undefined = this.abortSignal,
  ): Promise<{ output: TOutput; usage: ExtendedTokenUsage }> {
    const result = await LLMCaller.call({
      schema,
      systemPrompt,
      userPrompt,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      abortSignal,
      component: this.componentName,
      phase,
    });

    this.trackUsage(result.usage);

    if (result.usedFallback) {
      this.log('warn', `${phase} answered by fallback model`);
    }

    return { output: result.output, usage: result.usage };
  }
}
