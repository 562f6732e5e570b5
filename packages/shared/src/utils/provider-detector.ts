import type { LanguageModel } from 'ai';

export type ProviderType =
  | 'openai'
  | 'google'
  | 'anthropic'
  | 'togetherai'
  | 'unknown';

/**
 * Detect the provider type from a LanguageModel.
 *
 * Model instances expose a `provider` field (e.g. 'openai.chat'). Gateway
 * model ids given as strings carry the provider as the segment before the
 * first slash (e.g. 'anthropic/claude-sonnet-4.5').
 */
export function detectProvider(model: LanguageModel): ProviderType {
  const providerId =
    typeof model === 'string' ? model.split('/')[0] : model.provider;
  if (!providerId) return 'unknown';

  if (providerId.includes('openai')) return 'openai';
  if (providerId.includes('google')) return 'google';
  if (providerId.includes('anthropic')) return 'anthropic';
  if (providerId.includes('together')) return 'togetherai';

  return 'unknown';
}

/**
 * Human-readable model identifier for logs and usage reports
 */
export function extractModelName(model: LanguageModel): string {
  return typeof model === 'string' ? model : model.modelId;
}
