import type { LoggerMethods } from '@tgdoc/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@tgdoc/shared';
import type { LanguageModel } from 'ai';

import { LLM_TRANSLATION } from '../config/constants';

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Maximum retry count for LLM API (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0)
   */
  temperature?: number;

  abortSignal?: AbortSignal;

  /**
   * Model tried after the primary model gives up
   */
  fallbackModel?: LanguageModel;

  /**
   * Collects token usage of every call when provided
   */
  aggregator?: LLMTokenUsageAggregator;
}

/**
 * Abstract base class for LLM-based components
 *
 * Holds the model configuration, prefixes log lines with the component name
 * and forwards token usage to the optional aggregator.
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly model: LanguageModel;
  protected readonly fallbackModel?: LanguageModel;
  protected readonly maxRetries: number;
  protected readonly temperature: number;
  protected readonly componentName: string;
  protected readonly aggregator?: LLMTokenUsageAggregator;
  protected readonly abortSignal?: AbortSignal;

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options: BaseLLMComponentOptions = {},
  ) {
    this.logger = logger;
    this.model = model;
    this.componentName = componentName;
    this.maxRetries = options.maxRetries ?? LLM_TRANSLATION.MAX_RETRIES;
    this.temperature = options.temperature ?? LLM_TRANSLATION.TEMPERATURE;
    this.fallbackModel = options.fallbackModel;
    this.aggregator = options.aggregator;
    this.abortSignal = options.abortSignal;
  }

  /**
   * Log a message with the `[componentName]` prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    this.logger[level](`[${this.componentName}] ${message}`, ...args);
  }

  protected trackUsage(usage: ExtendedTokenUsage): void {
    this.aggregator?.track(usage);
  }

  /**
   * Usage record for calls that were skipped (e.g. empty input)
   */
  protected createEmptyUsage(phase: string): ExtendedTokenUsage {
    return {
      component: this.componentName,
      phase,
      model: 'primary',
      modelName: 'none',
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
    };
  }

  protected abstract buildSystemPrompt(...args: string[]): string;

  protected abstract buildUserPrompt(...args: string[]): string;
}
