/**
 * Token usage reported for the LLM calls of one run
 *
 * Broken down by component (e.g. 'LLMTranslationBackend'), then by phase
 * (e.g. 'translation'), then by primary or fallback model.
 */
export interface TokenUsageReport {
  /**
   * Components in the order they first reported usage
   */
  components: ComponentUsageReport[];

  /**
   * Grand total across all components
   */
  total: TokenUsageSummary;
}

export interface ComponentUsageReport {
  component: string;
  phases: PhaseUsageReport[];
  total: TokenUsageSummary;
}

/**
 * Usage of one phase. `primary` and `fallback` are present only for the
 * models that actually answered.
 */
export interface PhaseUsageReport {
  phase: string;
  primary?: ModelUsageDetail;
  fallback?: ModelUsageDetail;
  total: TokenUsageSummary;
}

export interface ModelUsageDetail {
  /**
   * Model identifier, e.g. 'gpt-5-mini'
   */
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}
