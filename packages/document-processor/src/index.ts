/**
 * @tgdoc/document-processor
 *
 * Turns extracted guideline pages into a canonical document, translates it
 * under a glossary and renders both versions as Quarto markdown.
 *
 * ## Key Features
 *
 * - Inline formula and unit normalization to LaTeX
 * - Heading classification with explainable score breakdowns
 * - Document assembly with figure/table reference validation
 * - Glossary-constrained translation with math placeholder checks
 * - QMD rendering with per-language figure/table labels
 *
 * @packageDocumentation
 */

export { DocumentProcessor } from './document-processor';
export type {
  DocumentProcessorInput,
  DocumentProcessorOptions,
  DocumentProcessResult,
} from './document-processor';
export { BaseLLMComponent, TextLLMComponent } from './core';
export type { BaseLLMComponentOptions } from './core';
export {
  DEFAULT_EQUATION_TEMPLATES,
  FormulaNormalizer,
} from './normalizers';
export type { EquationTemplate } from './normalizers';
export { HeadingClassifier, SECTION_VOCABULARY } from './classifiers';
export type {
  Classification,
  ClassificationContext,
  HeadingClassifierOptions,
  HeadingDecision,
  PageClassification,
  ScoreBreakdown,
  ScoreSignal,
  SignalName,
} from './classifiers';
export {
  DocumentAssembler,
  StructuralIntegrityError,
  validateReferences,
} from './assemblers';
export type { AssemblyResult } from './assemblers';
export {
  BackendError,
  DEFAULT_GLOSSARY_PATH,
  GlossaryApplier,
  GlossaryError,
  GlossaryFileSchema,
  GlossaryTranslator,
  LLMTranslationBackend,
  PassthroughBackend,
  TranslationIntegrityError,
  assertStructurePreserved,
  loadGlossary,
  parseGlossary,
  segmentText,
} from './translators';
export type {
  GlossaryFile,
  GlossaryTranslatorOptions,
  TranslationBackend,
  TranslationContext,
  TranslationResult,
} from './translators';
export { IMAGES_DIR, QmdRenderer, assetFileName } from './converters';
