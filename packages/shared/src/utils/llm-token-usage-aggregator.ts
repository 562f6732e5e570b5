import type { LoggerMethods } from '@tgdoc/logger';
import type {
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@tgdoc/model';

import type { ExtendedTokenUsage } from './llm-caller';

function emptySummary(): TokenUsageSummary {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addTo(target: TokenUsageSummary, usage: TokenUsageSummary): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

function formatTokens(usage: TokenUsageSummary): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

interface ComponentAggregate {
  phases: Map<string, PhaseUsageReport>;
  total: TokenUsageSummary;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all LLM calls
 *
 * Collects usage by component, phase and model (primary vs fallback) during
 * a run and logs one summary at the end.
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 * aggregator.track(result.usage);
 * aggregator.logSummary(logger);
 * // [DocumentProcessor] Token usage summary:
 * // LLMTranslationBackend:
 * //   - translation (primary: gpt-5-mini): 1500 input, 300 output, 1800 total
 * // Grand total: 1500 input, 300 output, 1800 total
 * ```
 */
export class LLMTokenUsageAggregator {
  private readonly usage = new Map<string, ComponentAggregate>();

  track(usage: ExtendedTokenUsage): void {
    let component = this.usage.get(usage.component);
    if (!component) {
      component = { phases: new Map(), total: emptySummary() };
      this.usage.set(usage.component, component);
    }

    let phase = component.phases.get(usage.phase);
    if (!phase) {
      phase = { phase: usage.phase, total: emptySummary() };
      component.phases.set(usage.phase, phase);
    }

    const detail: ModelUsageDetail = phase[usage.model] ?? {
      modelName: usage.modelName,
      ...emptySummary(),
    };
    addTo(detail, usage);
    phase[usage.model] = detail;

    addTo(phase.total, usage);
    addTo(component.total, usage);
  }

  getTotalUsage(): TokenUsageSummary {
    const total = emptySummary();
    for (const component of this.usage.values()) {
      addTo(total, component.total);
    }
    return total;
  }

  /**
   * Snapshot of the collected usage. The report is a copy; tracking more
   * usage afterwards does not change it.
   */
  getReport(): TokenUsageReport {
    return {
      components: [...this.usage].map(([name, component]) => ({
        component: name,
        phases: [...component.phases.values()].map((phase) => ({
          phase: phase.phase,
          ...(phase.primary && { primary: { ...phase.primary } }),
          ...(phase.fallback && { fallback: { ...phase.fallback } }),
          total: { ...phase.total },
        })),
        total: { ...component.total },
      })),
      total: this.getTotalUsage(),
    };
  }

  /**
   * Log usage grouped by component with phase and model breakdown.
   * Call this once at the end of document processing.
   */
  logSummary(logger: LoggerMethods): void {
    if (this.usage.size === 0) {
      logger.info('[DocumentProcessor] No token usage to report');
      return;
    }

    logger.info('[DocumentProcessor] Token usage summary:');

    for (const [name, component] of this.usage) {
      logger.info(`${name}:`);
      for (const phase of component.phases.values()) {
        if (phase.primary) {
          logger.info(
            `  - ${phase.phase} (primary: ${phase.primary.modelName}): ${formatTokens(phase.primary)}`,
          );
        }
        if (phase.fallback) {
          logger.info(
            `  - ${phase.phase} (fallback: ${phase.fallback.modelName}): ${formatTokens(phase.fallback)}`,
          );
        }
      }
      logger.info(`  ${name} total: ${formatTokens(component.total)}`);
    }

    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }

  reset(): void {
    this.usage.clear();
  }
}
