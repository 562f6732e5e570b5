import type { LoggerMethods } from '@tgdoc/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { LLMTokenUsageAggregator } from './llm-token-usage-aggregator';

function usage(
  overrides: Partial<Parameters<LLMTokenUsageAggregator['track']>[0]> = {},
) {
  return {
    component: 'LLMTranslationBackend',
    phase: 'translation',
    model: 'primary' as const,
    modelName: 'gpt-5-mini',
    inputTokens: 100,
    outputTokens: 20,
    totalTokens: 120,
    ...overrides,
  };
}

describe('LLMTokenUsageAggregator', () => {
  let aggregator: LLMTokenUsageAggregator;
  let logger: LoggerMethods;

  beforeEach(() => {
    aggregator = new LLMTokenUsageAggregator();
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  test('sums usage per phase and model', () => {
    aggregator.track(usage());
    aggregator.track(usage({ inputTokens: 50, outputTokens: 10, totalTokens: 60 }));
    aggregator.track(
      usage({
        model: 'fallback',
        modelName: 'claude-sonnet-4-5',
        inputTokens: 30,
        outputTokens: 5,
        totalTokens: 35,
      }),
    );

    expect(aggregator.getReport()).toEqual({
      components: [
        {
          component: 'LLMTranslationBackend',
          phases: [
            {
              phase: 'translation',
              primary: {
                modelName: 'gpt-5-mini',
                inputTokens: 150,
                outputTokens: 30,
                totalTokens: 180,
              },
              fallback: {
                modelName: 'claude-sonnet-4-5',
                inputTokens: 30,
                outputTokens: 5,
                totalTokens: 35,
              },
              total: { inputTokens: 180, outputTokens: 35, totalTokens: 215 },
            },
          ],
          total: { inputTokens: 180, outputTokens: 35, totalTokens: 215 },
        },
      ],
      total: { inputTokens: 180, outputTokens: 35, totalTokens: 215 },
    });
  });

  test('keeps components in first-seen order', () => {
    aggregator.track(usage({ component: 'B' }));
    aggregator.track(usage({ component: 'A' }));

    expect(aggregator.getReport().components.map((c) => c.component)).toEqual([
      'B',
      'A',
    ]);
  });

  test('omits the fallback entry when only the primary model answered', () => {
    aggregator.track(usage());

    const phase = aggregator.getReport().components[0].phases[0];
    expect(phase.fallback).toBeUndefined();
  });

  test('returns a report that later tracking does not mutate', () => {
    aggregator.track(usage());
    const report = aggregator.getReport();

    aggregator.track(usage());

    expect(report.total.totalTokens).toBe(120);
    expect(aggregator.getTotalUsage().totalTokens).toBe(240);
  });

  test('logs a summary with grand total', () => {
    aggregator.track(usage());

    aggregator.logSummary(logger);

    expect(logger.info).toHaveBeenCalledWith(
      '[DocumentProcessor] Token usage summary:',
    );
    expect(logger.info).toHaveBeenCalledWith(
      '  - translation (primary: gpt-5-mini): 100 input, 20 output, 120 total',
    );
    expect(logger.info).toHaveBeenCalledWith(
      'Grand total: 100 input, 20 output, 120 total',
    );
  });

  test('logs a notice when nothing was tracked', () => {
    aggregator.logSummary(logger);

    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(
      '[DocumentProcessor] No token usage to report',
    );
  });

  test('reset clears collected usage', () => {
    aggregator.track(usage());
    aggregator.reset();

    expect(aggregator.getTotalUsage()).toEqual({
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
    });
  });
});
