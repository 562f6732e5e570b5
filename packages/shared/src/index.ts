export { ConcurrentPool } from './utils/concurrent-pool';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallConfig,
  type LLMCallResult,
} from './utils/llm-caller';
export { LLMTokenUsageAggregator } from './utils/llm-token-usage-aggregator';
export {
  detectProvider,
  extractModelName,
  type ProviderType,
} from './utils/provider-detector';
