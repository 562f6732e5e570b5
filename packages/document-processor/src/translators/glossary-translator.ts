import type { LoggerMethods } from '@tgdoc/logger';
import type {
  Block,
  FailedUnit,
  GlossaryEntry,
  GuidelineDocument,
  TranslationReport,
  UnitFailureReason,
} from '@tgdoc/model';

import { ConcurrentPool } from '@tgdoc/shared';
import {
  TimeoutError,
  delay,
  groupBy,
  isEqual,
  withTimeout,
} from 'es-toolkit';

import { StructuralIntegrityError } from '../assemblers/structural-integrity-error';
import { GLOSSARY_TRANSLATOR } from '../config/constants';
import { GlossaryApplier } from './glossary-applier';
import { maskMath, placeholderSequence, restoreMath } from './math-placeholders';
import type {
  TranslationBackend,
  TranslationContext,
} from './translation-backend';
import { BackendError, TranslationIntegrityError } from './translation-errors';
import { segmentText } from './translation-segmenter';

export interface GlossaryTranslatorOptions {
  /**
   * Language of the source document (default: 'en')
   */
  sourceLanguage?: string;

  /**
   * Language to translate into (default: 'zh-CN')
   */
  targetLanguage?: string;

  /**
   * Maximum in-flight backend requests (default: 4)
   */
  concurrency?: number;

  /**
   * Maximum characters per unit (default: 1800)
   */
  maxUnitLength?: number;

  /**
   * Retries after a BackendError (default: 2)
   */
  backendRetries?: number;

  /**
   * First backoff delay in ms, doubled per retry (default: 500)
   */
  backoffBaseMs?: number;

  /**
   * Longest backoff delay in ms (default: 4000)
   */
  backoffMaxMs?: number;

  /**
   * Time one backend request may take in ms; a timeout is a BackendError
   * and is retried like one (default: 120000)
   */
  unitTimeoutMs?: number;

  abortSignal?: AbortSignal;
}

export interface TranslationResult {
  document: GuidelineDocument;
  report: TranslationReport;
}

interface UnitJob {
  blockIndex: number;
  unitIndex: number;
  text: string;
  blockType: 'heading' | 'paragraph';
}

type UnitOutcome =
  | { ok: true; text: string }
  | { ok: false; failure: FailedUnit };

const LETTER = /\p{L}/u;
const UNSPACED_LANGUAGE = /^(?:zh|ja)(?:-|$)/i;

/**
 * GlossaryTranslator - Translates headings and paragraphs unit by unit
 *
 * Each unit has its math masked as `⟦Mn⟧` before it is sent, is checked for
 * the same placeholder sequence on return, gets its math restored and
 * finally has the glossary applied. Failures stay local to their unit: the
 * unit keeps its source text, the block is flagged `untranslated` and the
 * report lists the unit. Figure/table references, page breaks and
 * reference entries are copied unchanged.
 */
export class GlossaryTranslator {
  private readonly logger: LoggerMethods;
  private readonly sourceLanguage: string;
  private readonly targetLanguage: string;
  private readonly concurrency: number;
  private readonly maxUnitLength: number;
  private readonly backendRetries: number;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;
  private readonly unitTimeoutMs: number;
  private readonly abortSignal?: AbortSignal;

  constructor(logger: LoggerMethods, options: GlossaryTranslatorOptions = {}) {
    this.logger = logger;
    this.sourceLanguage = options.sourceLanguage ?? 'en';
    this.targetLanguage = options.targetLanguage ?? 'zh-CN';
    this.concurrency = options.concurrency ?? GLOSSARY_TRANSLATOR.CONCURRENCY;
    this.maxUnitLength =
      options.maxUnitLength ?? GLOSSARY_TRANSLATOR.MAX_UNIT_LENGTH;
    this.backendRetries =
      options.backendRetries ?? GLOSSARY_TRANSLATOR.BACKEND_RETRIES;
    this.backoffBaseMs =
      options.backoffBaseMs ?? GLOSSARY_TRANSLATOR.BACKOFF_BASE_MS;
    this.backoffMaxMs = options.backoffMaxMs ?? GLOSSARY_TRANSLATOR.BACKOFF_MAX_MS;
    this.unitTimeoutMs =
      options.unitTimeoutMs ?? GLOSSARY_TRANSLATOR.UNIT_TIMEOUT_MS;
    this.abortSignal = options.abortSignal;
  }

  /**
   * Translate a document. The input document is never modified.
   *
   * @throws {StructuralIntegrityError} If the result's structure differs
   * from the source (never expected)
   */
  async translate(
    document: GuidelineDocument,
    glossary: readonly GlossaryEntry[],
    backend: TranslationBackend,
  ): Promise<TranslationResult> {
    const applier = new GlossaryApplier(glossary);
    const jobs = this.buildJobs(document.blocks);

    this.logger.info(
      `[GlossaryTranslator] Translating ${jobs.length} units into ${this.targetLanguage} (backend: ${backend.name}, concurrency: ${this.concurrency})`,
    );

    const outcomes = await ConcurrentPool.run(
      jobs,
      this.concurrency,
      (job) => this.translateUnit(job, applier, backend),
      undefined,
      this.abortSignal,
    );

    const unitsByBlock = groupBy(
      jobs.map((job, jobIdx) => ({ job, outcome: outcomes[jobIdx] })),
      (unit) => unit.job.blockIndex,
    );
    const unspaced = UNSPACED_LANGUAGE.test(this.targetLanguage);

    const blocks = document.blocks.map((block, blockIndex): Block => {
      const units = unitsByBlock[blockIndex];
      if (
        (block.type !== 'heading' && block.type !== 'paragraph') ||
        units === undefined
      ) {
        return Object.freeze({ ...block });
      }

      const text = units.reduce((joined, { job, outcome }, unitIdx) => {
        const unitText = outcome.ok ? outcome.text : job.text;
        if (unitIdx === 0) return unitText;
        // Source-language text kept by a failed unit still needs a space
        const spaced =
          !unspaced || !outcome.ok || !units[unitIdx - 1].outcome.ok;
        return `${joined}${spaced ? ' ' : ''}${unitText}`;
      }, '');
      const untranslated = units.some(({ outcome }) => !outcome.ok);

      return Object.freeze({
        ...block,
        text,
        ...(untranslated ? { untranslated: true } : {}),
      });
    });

    const translated: GuidelineDocument = Object.freeze({
      frontmatter: Object.freeze({ ...document.frontmatter }),
      blocks: Object.freeze(blocks),
    });
    assertStructurePreserved(document, translated);

    const failedUnits = outcomes.flatMap((outcome) =>
      outcome.ok ? [] : [outcome.failure],
    );
    const report: TranslationReport = {
      targetLanguage: this.targetLanguage,
      totalUnits: jobs.length,
      translatedUnits: jobs.length - failedUnits.length,
      failedUnits,
    };

    this.logger.info(
      `[GlossaryTranslator] Translated ${report.translatedUnits}/${report.totalUnits} units (${failedUnits.length} failed)`,
    );

    return { document: translated, report };
  }

  private buildJobs(blocks: readonly Block[]): UnitJob[] {
    return blocks.flatMap((block, blockIndex) => {
      if (block.type !== 'heading' && block.type !== 'paragraph') return [];
      return segmentText(block.text, this.maxUnitLength).map(
        (text, unitIndex) => ({
          blockIndex,
          unitIndex,
          text,
          blockType: block.type,
        }),
      );
    });
  }

  private async translateUnit(
    job: UnitJob,
    applier: GlossaryApplier,
    backend: TranslationBackend,
  ): Promise<UnitOutcome> {
    const { masked, spans } = maskMath(job.text);

    // Display math and bare numbers have nothing to translate
    if (!LETTER.test(masked.replace(/⟦M\d+⟧/g, ''))) {
      return { ok: true, text: job.text };
    }

    const expected = placeholderSequence(masked);
    const context: TranslationContext = {
      sourceLanguage: this.sourceLanguage,
      blockType: job.blockType,
      glossaryHints: applier.findTerms(masked),
    };

    let received: string[] = [];
    try {
      for (
        let attempt = 0;
        attempt <= GLOSSARY_TRANSLATOR.INTEGRITY_RETRIES;
        attempt++
      ) {
        const output = await this.requestWithRetry(backend, masked, context);
        received = placeholderSequence(output);
        if (isEqual(received, expected)) {
          return { ok: true, text: applier.apply(restoreMath(output, spans)) };
        }
        this.logger.warn(
          `[GlossaryTranslator] Block ${job.blockIndex} unit ${job.unitIndex} returned mismatched math placeholders (attempt ${attempt + 1})`,
        );
      }
    } catch (error) {
      if (error instanceof BackendError) {
        return this.fail(job, 'backend', error);
      }
      throw error;
    }

    return this.fail(
      job,
      'integrity',
      new TranslationIntegrityError(
        `Expected placeholders [${expected.join(', ')}], received [${received.join(', ')}]`,
      ),
    );
  }

  /**
   * Call the backend, retrying BackendErrors with exponential backoff
   */
  private async requestWithRetry(
    backend: TranslationBackend,
    unitText: string,
    context: TranslationContext,
  ): Promise<string> {
    for (let retry = 0; ; retry++) {
      this.checkAborted();
      try {
        return await this.requestWithTimeout(backend, unitText, context);
      } catch (error) {
        if (!(error instanceof BackendError) || retry >= this.backendRetries) {
          throw error;
        }
        const wait = Math.min(this.backoffBaseMs * 2 ** retry, this.backoffMaxMs);
        this.logger.warn(
          `[GlossaryTranslator] ${error.message}; retry ${retry + 1}/${this.backendRetries} in ${wait}ms`,
        );
        await delay(wait, { signal: this.abortSignal });
      }
    }
  }

  private async requestWithTimeout(
    backend: TranslationBackend,
    unitText: string,
    context: TranslationContext,
  ): Promise<string> {
    const controller = new AbortController();
    const abortSignal = this.abortSignal
      ? AbortSignal.any([this.abortSignal, controller.signal])
      : controller.signal;

    try {
      return await withTimeout(
        () =>
          backend.translate(unitText, this.targetLanguage, {
            ...context,
            abortSignal,
          }),
        this.unitTimeoutMs,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        controller.abort(error);
        throw new BackendError(
          `Translation request timed out after ${this.unitTimeoutMs}ms`,
          { cause: error },
        );
      }
      throw error;
    }
  }

  private fail(
    job: UnitJob,
    reason: UnitFailureReason,
    error: Error,
  ): UnitOutcome {
    this.logger.warn(
      `[GlossaryTranslator] Block ${job.blockIndex} unit ${job.unitIndex} kept its source text (${reason}): ${error.message}`,
    );
    return {
      ok: false,
      failure: {
        blockIndex: job.blockIndex,
        unitIndex: job.unitIndex,
        reason,
        message: error.message,
      },
    };
  }

  private checkAborted(): void {
    if (this.abortSignal?.aborted) {
      const error = new Error('Translation was aborted');
      error.name = 'AbortError';
      throw error;
    }
  }
}

/**
 * Check that `translated` has the same block count, block types, heading
 * levels, page indexes, reference numbers and figure/table ordinals as
 * `source`.
 *
 * @throws {StructuralIntegrityError} On the first difference
 */
export function assertStructurePreserved(
  source: GuidelineDocument,
  translated: GuidelineDocument,
): void {
  if (source.blocks.length !== translated.blocks.length) {
    throw new StructuralIntegrityError(
      `Block count changed from ${source.blocks.length} to ${translated.blocks.length}`,
    );
  }

  source.blocks.forEach((block, blockIndex) => {
    const other = translated.blocks[blockIndex];
    if (structureKey(block) !== structureKey(other)) {
      throw new StructuralIntegrityError(
        `Block ${blockIndex} changed from ${structureKey(block)} to ${structureKey(other)}`,
      );
    }
  });
}

function structureKey(block: Block): string {
  switch (block.type) {
    case 'heading':
      return `heading:${block.level}`;
    case 'figure-ref':
    case 'table-ref':
      return `${block.type}:${block.ordinal}`;
    case 'page-break':
      return `page-break:${block.pageIndex}`;
    case 'reference-entry':
      return `reference-entry:${block.index}`;
    case 'paragraph':
      return 'paragraph';
  }
}
