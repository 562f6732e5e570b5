export { GlossaryApplier } from './glossary-applier';
export {
  DEFAULT_GLOSSARY_PATH,
  GlossaryFileSchema,
  loadGlossary,
  parseGlossary,
} from './glossary-loader';
export type { GlossaryFile } from './glossary-loader';
export {
  GlossaryTranslator,
  assertStructurePreserved,
} from './glossary-translator';
export type {
  GlossaryTranslatorOptions,
  TranslationResult,
} from './glossary-translator';
export { LLMTranslationBackend } from './llm-translation-backend';
export { PassthroughBackend } from './passthrough-backend';
export type {
  TranslationBackend,
  TranslationContext,
} from './translation-backend';
export {
  BackendError,
  GlossaryError,
  TranslationIntegrityError,
} from './translation-errors';
export { segmentText } from './translation-segmenter';
