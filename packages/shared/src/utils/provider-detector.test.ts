import type { LanguageModel } from 'ai';

import { describe, expect, test } from 'vitest';

import { detectProvider, extractModelName } from './provider-detector';

function fakeModel(provider: string, modelId = 'test-model'): LanguageModel {
  return { provider, modelId } as unknown as LanguageModel;
}

describe('detectProvider', () => {
  test.each([
    ['openai.chat', 'openai'],
    ['openai.responses', 'openai'],
    ['google.generative-ai', 'google'],
    ['anthropic.messages', 'anthropic'],
    ['togetherai.chat', 'togetherai'],
    ['ollama.chat', 'unknown'],
  ])('maps provider %s to %s', (provider, expected) => {
    expect(detectProvider(fakeModel(provider))).toBe(expected);
  });

  test('returns unknown for an empty provider field', () => {
    expect(detectProvider(fakeModel(''))).toBe('unknown');
  });

  test('reads the provider prefix of a gateway model id', () => {
    expect(detectProvider('anthropic/claude-sonnet-4.5')).toBe('anthropic');
    expect(detectProvider('openai/gpt-5-mini')).toBe('openai');
    expect(detectProvider('mistral/mistral-large')).toBe('unknown');
  });
});

describe('extractModelName', () => {
  test('returns the model id of a model instance', () => {
    expect(extractModelName(fakeModel('openai.chat', 'gpt-5-mini'))).toBe(
      'gpt-5-mini',
    );
  });

  test('returns a gateway model id unchanged', () => {
    expect(extractModelName('google/gemini-2.5-flash')).toBe(
      'google/gemini-2.5-flash',
    );
  });
});
