import type { LoggerMethods } from '@tgdoc/logger';
import type {
  AssemblyReport,
  DocumentFrontmatter,
  GlossaryEntry,
  GuidelineDocument,
  Page,
  TokenUsageReport,
  TranslationReport,
  VisualAsset,
} from '@tgdoc/model';
import type { LanguageModel } from 'ai';

import { LLMTokenUsageAggregator } from '@tgdoc/shared';

import type { HeadingClassifierOptions } from './classifiers/heading-classifier';
import type { EquationTemplate } from './normalizers/formula-normalizer';
import type { TranslationBackend } from './translators/translation-backend';

import { DocumentAssembler } from './assemblers/document-assembler';
import { HeadingClassifier } from './classifiers/heading-classifier';
import { QmdRenderer } from './converters';
import { FormulaNormalizer } from './normalizers/formula-normalizer';
import { GlossaryTranslator } from './translators/glossary-translator';
import { LLMTranslationBackend } from './translators/llm-translation-backend';
import { PassthroughBackend } from './translators/passthrough-backend';

/**
 * DocumentProcessor Options
 */
export interface DocumentProcessorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Model used for translation. Without one, only glossary terms are
   * replaced and the prose stays in the source language.
   */
  model?: LanguageModel;

  /**
   * Model tried when the translation model fails
   */
  fallbackModel?: LanguageModel;

  /**
   * Language of the input document (default: 'en')
   */
  sourceLanguage?: string;

  /**
   * Language to translate into (default: 'zh-CN')
   */
  targetLanguage?: string;

  /**
   * Maximum in-flight translation requests (default: 4)
   */
  concurrency?: number;

  /**
   * Maximum retry count of the LLM API (default: 3)
   */
  maxRetries?: number;

  /**
   * Maximum characters per translation unit (default: 1800)
   */
  maxUnitLength?: number;

  /**
   * Time one translation request may take in milliseconds (default: 120000)
   */
  unitTimeoutMs?: number;

  headingClassifier?: HeadingClassifierOptions;

  /**
   * Whole-line equations rewritten as display math
   */
  equationTemplates?: readonly EquationTemplate[];

  /**
   * Abort signal for cancellation support.
   * When aborted, processing stops at the next checkpoint between stages.
   */
  abortSignal?: AbortSignal;

  /**
   * Callback fired after translation with the cumulative token usage report
   */
  onTokenUsage?: (report: TokenUsageReport) => void;
}

export interface DocumentProcessorInput {
  pages: readonly Page[];

  /**
   * Kept figures and table screenshots with their final ordinals
   */
  assets: readonly VisualAsset[];
  frontmatter: DocumentFrontmatter;
  glossary: readonly GlossaryEntry[];
}

export interface DocumentProcessResult {
  source: GuidelineDocument;
  translated: GuidelineDocument;
  sourceQmd: string;
  translatedQmd: string;
  ambiguousLineCount: number;
  assembly: AssemblyReport;
  translation: TranslationReport;
  usage: TokenUsageReport;
}

/**
 * DocumentProcessor
 *
 * Turns extracted pages and kept visual assets into a source document and
 * its translation, both rendered as Quarto markdown.
 *
 * ## Conversion Process
 *
 * 1. Formula normalization per page
 * 2. Heading classification (two passes across page boundaries)
 * 3. Document assembly and figure/table reference validation
 * 4. Glossary-constrained translation
 * 5. QMD rendering of both documents
 *
 * @example
 * ```typescript
 * import { openai } from '@ai-sdk/openai';
 * import { DocumentProcessor, loadGlossary } from '@tgdoc/document-processor';
 * import { createConsoleLogger } from '@tgdoc/logger';
 *
 * const processor = new DocumentProcessor({
 *   logger: createConsoleLogger(),
 *   model: openai('gpt-5-mini'),
 *   targetLanguage: 'zh-CN',
 * });
 *
 * const result = await processor.process({
 *   pages,
 *   assets,
 *   frontmatter: { title: 'OECD Test Guideline No. 432' },
 *   glossary: (await loadGlossary()).entries,
 * });
 * ```
 */
export class DocumentProcessor {
  private readonly logger: LoggerMethods;
  private readonly model?: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly sourceLanguage: string;
  private readonly targetLanguage: string;
  private readonly concurrency?: number;
  private readonly maxRetries?: number;
  private readonly maxUnitLength?: number;
  private readonly unitTimeoutMs?: number;
  private readonly abortSignal?: AbortSignal;
  private readonly onTokenUsage?: (report: TokenUsageReport) => void;
  private readonly normalizer: FormulaNormalizer;
  private readonly classifier: HeadingClassifier;
  private readonly assembler: DocumentAssembler;
  private readonly usageAggregator = new LLMTokenUsageAggregator();

  constructor(options: DocumentProcessorOptions) {
    this.logger = options.logger;
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.sourceLanguage = options.sourceLanguage ?? 'en';
    this.targetLanguage = options.targetLanguage ?? 'zh-CN';
    this.concurrency = options.concurrency;
    this.maxRetries = options.maxRetries;
    this.maxUnitLength = options.maxUnitLength;
    this.unitTimeoutMs = options.unitTimeoutMs;
    this.abortSignal = options.abortSignal;
    this.onTokenUsage = options.onTokenUsage;
    this.normalizer = new FormulaNormalizer(options.equationTemplates);
    this.classifier = new HeadingClassifier(
      this.logger,
      options.headingClassifier,
    );
    this.assembler = new DocumentAssembler(this.logger);
  }

  /**
   * Check if abort has been requested and throw error if so
   *
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(): void {
    if (this.abortSignal?.aborted) {
      const error = new Error('Document processing was aborted');
      error.name = 'AbortError';
      throw error;
    }
  }

  /**
   * @throws {StructuralIntegrityError} When a placeholder or a figure/table
   * reference has no matching asset
   */
  async process(input: DocumentProcessorInput): Promise<DocumentProcessResult> {
    this.logger.info(
      `[DocumentProcessor] Processing ${input.pages.length} pages (${this.sourceLanguage} → ${this.targetLanguage})`,
    );

    this.usageAggregator.reset();
    this.checkAborted();

    const normalizedTexts = this.timed('Formula normalization', () =>
      input.pages.map((page) => this.normalizer.normalize(page.rawText)),
    );
    this.checkAborted();

    const classification = this.timed('Heading classification', () =>
      this.classifier.classifyPages(normalizedTexts),
    );
    this.checkAborted();

    const { document: source, report: assembly } = this.timed(
      'Document assembly',
      () =>
        this.assembler.assemble(
          input.pages,
          normalizedTexts,
          classification.headings,
          input.assets,
          input.frontmatter,
        ),
    );
    this.checkAborted();

    const startTimeTranslation = Date.now();
    const translator = new GlossaryTranslator(this.logger, {
      sourceLanguage: this.sourceLanguage,
      targetLanguage: this.targetLanguage,
      concurrency: this.concurrency,
      maxUnitLength: this.maxUnitLength,
      unitTimeoutMs: this.unitTimeoutMs,
      abortSignal: this.abortSignal,
    });
    const { document: translated, report: translation } =
      await translator.translate(source, input.glossary, this.createBackend());
    this.logger.info(
      `[DocumentProcessor] Translation took ${Date.now() - startTimeTranslation}ms`,
    );
    this.onTokenUsage?.(this.usageAggregator.getReport());
    this.checkAborted();

    const sourceQmd = QmdRenderer.render(source, this.sourceLanguage);
    const translatedQmd = QmdRenderer.render(translated, this.targetLanguage);

    this.usageAggregator.logSummary(this.logger);
    this.logger.info('[DocumentProcessor] Document processing completed');

    return {
      source,
      translated,
      sourceQmd,
      translatedQmd,
      ambiguousLineCount: classification.ambiguousCount,
      assembly,
      translation,
      usage: this.usageAggregator.getReport(),
    };
  }

  private createBackend(): TranslationBackend {
    if (!this.model) {
      this.logger.info(
        '[DocumentProcessor] No translation model configured, applying glossary terms only',
      );
      return new PassthroughBackend();
    }

    return new LLMTranslationBackend(this.logger, this.model, {
      maxRetries: this.maxRetries,
      fallbackModel: this.fallbackModel,
      aggregator: this.usageAggregator,
      abortSignal: this.abortSignal,
    });
  }

  private timed<T>(stage: string, run: () => T): T {
    const startTime = Date.now();
    const result = run();
    this.logger.info(
      `[DocumentProcessor] ${stage} took ${Date.now() - startTime}ms`,
    );
    return result;
  }
}
