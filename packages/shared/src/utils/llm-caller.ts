import type { z } from 'zod';

import {
  type LanguageModel,
  NoObjectGeneratedError,
  Output,
  generateText,
  hasToolCall,
  tool,
} from 'ai';

import { detectProvider, extractModelName } from './provider-detector';

/**
 * Configuration for LLM API call with retry and fallback support
 */
export interface LLMCallConfig<TOutput> {
  /**
   * Zod schema for response validation
   */
  schema: z.ZodType<TOutput>;

  systemPrompt: string;
  userPrompt: string;

  /**
   * Primary model for the call
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once the primary model exhausts maxRetries
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum transport retry count per model, handed to the AI SDK
   */
  maxRetries: number;

  /**
   * Temperature for generation (0-1)
   */
  temperature?: number;

  abortSignal?: AbortSignal;

  /**
   * Component name for usage tracking (e.g. 'LLMTranslationBackend')
   */
  component: string;

  /**
   * Phase name for usage tracking (e.g. 'translation')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface ResponseUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

interface GeneratedOutput<TOutput> {
  output: TOutput;
  usage?: ResponseUsage;
}

interface PromptParams {
  system: string;
  prompt: string;
  temperature?: number;
  maxRetries: number;
  abortSignal?: AbortSignal;
}

/**
 * LLMCaller - Centralized LLM API caller with retry and fallback support
 *
 * Wraps AI SDK's generateText:
 * 1. Try primary model (the SDK retries transport errors up to maxRetries)
 * 2. If it fails and a fallbackModel is provided, try the fallback model
 * 3. Return usage data with model type indicator
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   schema: z.object({ translation: z.string() }),
 *   systemPrompt: 'Translate the text into Simplified Chinese.',
 *   userPrompt: 'The test chemical is applied in triplicate.',
 *   primaryModel: openai('gpt-5-mini'),
 *   fallbackModel: anthropic('claude-sonnet-4-5'),
 *   maxRetries: 3,
 *   component: 'LLMTranslationBackend',
 *   phase: 'translation',
 * });
 *
 * result.output.translation; // parsed result
 * result.usedFallback;       // whether the fallback model answered
 * ```
 */
export class LLMCaller {
  /**
   * Maximum number of retries when structured output generation fails.
   * Total attempts = MAX_STRUCTURED_OUTPUT_RETRIES + 1.
   *
   * Applied to both:
   * - `Output.object()` path: retries on NoObjectGeneratedError (schema mismatch)
   * - Tool call path: retries when the model does not produce a tool call
   */
  private static readonly MAX_STRUCTURED_OUTPUT_RETRIES = 3;

  private static buildUsage(
    tracking: Pick<LLMCallConfig<unknown>, 'component' | 'phase'>,
    modelName: string,
    response: { usage?: ResponseUsage },
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: tracking.component,
      phase: tracking.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: response.usage?.inputTokens ?? 0,
      outputTokens: response.usage?.outputTokens ?? 0,
      totalTokens: response.usage?.totalTokens ?? 0,
    };
  }

  /**
   * Generate structured output via forced tool call.
   *
   * Used for providers (Together AI, unknown) that do not reliably support
   * `Output.object()`. Forces the model to call a tool whose inputSchema is
   * the target schema, then validates the tool input against it.
   *
   * @throws NoObjectGeneratedError when no attempt produces a tool call
   */
  private static async generateViaToolCall<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    promptParams: PromptParams,
  ): Promise<GeneratedOutput<TOutput>> {
    const submitTool = tool({
      description: 'Submit the structured result',
      inputSchema: schema,
    });

    let attempt = 0;
    for (;;) {
      const result = await generateText({
        ...promptParams,
        model,
        tools: { submitResult: submitTool },
        toolChoice: { type: 'tool', toolName: 'submitResult' },
        stopWhen: hasToolCall('submitResult'),
      });

      const toolCall = result.toolCalls.at(0);
      if (toolCall) {
        return { output: schema.parse(toolCall.input), usage: result.usage };
      }

      if (attempt >= this.MAX_STRUCTURED_OUTPUT_RETRIES) {
        throw new NoObjectGeneratedError({
          message: 'Model did not produce a tool call for structured output',
          text: result.text,
          response: result.response,
          usage: result.usage,
          finishReason: result.finishReason,
        });
      }
      attempt++;
    }
  }

  /**
   * Generate structured output with provider-aware strategy.
   *
   * - OpenAI / Anthropic / Google: `Output.object()` with schema retry
   * - Together AI / unknown: forced tool call pattern
   */
  private static async generateStructuredOutput<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    promptParams: PromptParams,
  ): Promise<GeneratedOutput<TOutput>> {
    const providerType = detectProvider(model);

    if (providerType === 'togetherai' || providerType === 'unknown') {
      return this.generateViaToolCall(model, schema, promptParams);
    }

    let lastError: unknown;

    for (
      let attempt = 0;
      attempt <= this.MAX_STRUCTURED_OUTPUT_RETRIES;
      attempt++
    ) {
      try {
        const result = await generateText({
          ...promptParams,
          model,
          output: Output.object({ schema }),
        });
        return { output: result.output, usage: result.usage };
      } catch (error) {
        if (NoObjectGeneratedError.isInstance(error)) {
          lastError = error;
          continue;
        }
        throw error;
      }
    }

    throw lastError;
  }

  /**
   * Call LLM with retry and fallback support
   *
   * The fallback model is skipped when the call was aborted.
   *
   * @throws the primary model's error when there is no fallback model, or
   * the fallback model's error when both fail
   */
  static async call<TOutput>(
    config: LLMCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    const promptParams: PromptParams = {
      system: config.systemPrompt,
      prompt: config.userPrompt,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    };

    try {
      const response = await this.generateStructuredOutput(
        config.primaryModel,
        config.schema,
        promptParams,
      );

      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          extractModelName(config.primaryModel),
          response,
          false,
        ),
        usedFallback: false,
      };
    } catch (primaryError) {
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw primaryError;
      }

      const response = await this.generateStructuredOutput(
        config.fallbackModel,
        config.schema,
        promptParams,
      );

      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          extractModelName(config.fallbackModel),
          response,
          true,
        ),
        usedFallback: true,
      };
    }
  }
}
