import type { LanguageModel } from 'ai';

import { NoObjectGeneratedError, generateText } from 'ai';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';

import { LLMCaller } from './llm-caller';
import { detectProvider } from './provider-detector';

vi.mock('ai', () => ({
  generateText: vi.fn(),
  Output: {
    object: vi.fn((config: { schema: unknown }) => config),
  },
  tool: vi.fn(
    (config: { description: string; inputSchema: unknown }) => config,
  ),
  hasToolCall: vi.fn((name: string) => `stopWhen:${name}`),
  NoObjectGeneratedError: class MockNoObjectGeneratedError extends Error {
    text: string;
    constructor(opts: { message: string; text: string }) {
      super(opts.message);
      this.name = 'NoObjectGeneratedError';
      this.text = opts.text;
    }
    static isInstance(error: unknown): boolean {
      return error instanceof MockNoObjectGeneratedError;
    }
  },
}));

vi.mock('./provider-detector', async (importOriginal) => ({
  ...(await importOriginal<typeof import('./provider-detector')>()),
  detectProvider: vi.fn().mockReturnValue('openai'),
}));

const schema = z.object({ translation: z.string() });

function objectResult(
  output: unknown,
  usage = { inputTokens: 100, outputTokens: 50, totalTokens: 150 },
) {
  return { output, usage } as any;
}

function toolCallResult(input: unknown) {
  return {
    toolCalls: [{ input }],
    text: '',
    response: { id: '', modelId: '', timestamp: new Date() },
    usage: { inputTokens: 20, outputTokens: 10, totalTokens: 30 },
    finishReason: 'tool-calls',
  } as any;
}

function emptyToolCallResult() {
  return {
    toolCalls: [],
    text: 'raw model output',
    response: { id: '', modelId: '', timestamp: new Date() },
    usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
    finishReason: 'stop',
  } as any;
}

describe('LLMCaller', () => {
  const primaryModel = {
    provider: 'openai.chat',
    modelId: 'gpt-5-mini',
  } as unknown as LanguageModel;
  const fallbackModel = {
    provider: 'anthropic.messages',
    modelId: 'claude-sonnet-4-5',
  } as unknown as LanguageModel;

  const baseConfig = {
    schema,
    systemPrompt: 'Translate into Simplified Chinese.',
    userPrompt: 'Cells are incubated.',
    primaryModel,
    maxRetries: 2,
    component: 'LLMTranslationBackend',
    phase: 'translation',
  };

  beforeEach(() => {
    vi.mocked(detectProvider).mockReturnValue('openai');
  });

  test('returns the primary model output with usage', async () => {
    vi.mocked(generateText).mockResolvedValueOnce(
      objectResult({ translation: '细胞被孵育。' }),
    );

    const result = await LLMCaller.call(baseConfig);

    expect(result).toEqual({
      output: { translation: '细胞被孵育。' },
      usage: {
        component: 'LLMTranslationBackend',
        phase: 'translation',
        model: 'primary',
        modelName: 'gpt-5-mini',
        inputTokens: 100,
        outputTokens: 50,
        totalTokens: 150,
      },
      usedFallback: false,
    });
  });

  test('passes prompt parameters and structured output to generateText', async () => {
    vi.mocked(generateText).mockResolvedValueOnce(
      objectResult({ translation: 'x' }),
    );

    await LLMCaller.call({ ...baseConfig, temperature: 0 });

    const callArgs = vi.mocked(generateText).mock.calls[0][0] as any;
    expect(callArgs.model).toBe(primaryModel);
    expect(callArgs.system).toBe('Translate into Simplified Chinese.');
    expect(callArgs.prompt).toBe('Cells are incubated.');
    expect(callArgs.temperature).toBe(0);
    expect(callArgs.maxRetries).toBe(2);
    expect(callArgs.output).toEqual({ schema });
    expect(callArgs.tools).toBeUndefined();
  });

  test('defaults missing usage fields to zero', async () => {
    vi.mocked(generateText).mockResolvedValueOnce({
      output: { translation: 'x' },
      usage: { inputTokens: 7 },
    } as any);

    const result = await LLMCaller.call(baseConfig);

    expect(result.usage.inputTokens).toBe(7);
    expect(result.usage.outputTokens).toBe(0);
    expect(result.usage.totalTokens).toBe(0);
  });

  test('throws the primary error when no fallback model is configured', async () => {
    vi.mocked(generateText).mockRejectedValueOnce(new Error('rate limited'));

    await expect(LLMCaller.call(baseConfig)).rejects.toThrow('rate limited');
  });

  test('uses the fallback model when the primary model fails', async () => {
    vi.mocked(generateText)
      .mockRejectedValueOnce(new Error('primary down'))
      .mockResolvedValueOnce(objectResult({ translation: 'fallback' }));

    const result = await LLMCaller.call({ ...baseConfig, fallbackModel });

    expect(result.output).toEqual({ translation: 'fallback' });
    expect(result.usedFallback).toBe(true);
    expect(result.usage.model).toBe('fallback');
    expect(result.usage.modelName).toBe('claude-sonnet-4-5');
  });

  test('throws the fallback error when both models fail', async () => {
    vi.mocked(generateText)
      .mockRejectedValueOnce(new Error('primary down'))
      .mockRejectedValueOnce(new Error('fallback down'));

    await expect(
      LLMCaller.call({ ...baseConfig, fallbackModel }),
    ).rejects.toThrow('fallback down');
  });

  test('skips the fallback model when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    vi.mocked(generateText).mockRejectedValueOnce(new Error('aborted'));

    await expect(
      LLMCaller.call({
        ...baseConfig,
        fallbackModel,
        abortSignal: controller.signal,
      }),
    ).rejects.toThrow('aborted');
    expect(generateText).toHaveBeenCalledTimes(1);
  });

  test('retries when structured output does not match the schema', async () => {
    vi.mocked(generateText)
      .mockRejectedValueOnce(
        new NoObjectGeneratedError({ message: 'bad json', text: '{' } as any),
      )
      .mockResolvedValueOnce(objectResult({ translation: 'ok' }));

    const result = await LLMCaller.call(baseConfig);

    expect(result.output).toEqual({ translation: 'ok' });
    expect(generateText).toHaveBeenCalledTimes(2);
  });

  test('gives up after the structured output retries are exhausted', async () => {
    vi.mocked(generateText).mockRejectedValue(
      new NoObjectGeneratedError({ message: 'bad json', text: '{' } as any),
    );

    await expect(LLMCaller.call(baseConfig)).rejects.toThrow('bad json');
    expect(generateText).toHaveBeenCalledTimes(4);
  });

  describe('tool call strategy', () => {
    test('uses a forced tool call for unknown providers', async () => {
      vi.mocked(detectProvider).mockReturnValue('unknown');
      vi.mocked(generateText).mockResolvedValueOnce(
        toolCallResult({ translation: '工具' }),
      );

      const result = await LLMCaller.call(baseConfig);

      const callArgs = vi.mocked(generateText).mock.calls[0][0] as any;
      expect(callArgs.toolChoice).toEqual({
        type: 'tool',
        toolName: 'submitResult',
      });
      expect(callArgs.stopWhen).toBe('stopWhen:submitResult');
      expect(callArgs.output).toBeUndefined();
      expect(result.output).toEqual({ translation: '工具' });
      expect(result.usage.totalTokens).toBe(30);
    });

    test('validates the tool input against the schema', async () => {
      vi.mocked(detectProvider).mockReturnValue('togetherai');
      vi.mocked(generateText).mockResolvedValueOnce(
        toolCallResult({ translation: 42 }),
      );

      await expect(LLMCaller.call(baseConfig)).rejects.toThrow();
    });

    test('throws NoObjectGeneratedError when no tool call is produced', async () => {
      vi.mocked(detectProvider).mockReturnValue('togetherai');
      vi.mocked(generateText).mockResolvedValue(emptyToolCallResult());

      await expect(LLMCaller.call(baseConfig)).rejects.toThrow(
        'Model did not produce a tool call for structured output',
      );
      expect(generateText).toHaveBeenCalledTimes(4);
    });
  });
});
