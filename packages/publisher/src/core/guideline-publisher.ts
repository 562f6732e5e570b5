import type { LoggerMethods } from '@tgdoc/logger';
import type {
  ProcessingSummary,
  TokenUsageReport,
  VisualAsset,
} from '@tgdoc/model';
import type {
  TableDetectorOptions,
  VisualAssetFilterOptions,
} from '@tgdoc/pdf-parser';
import type { LanguageModel } from 'ai';

import {
  DEFAULT_GLOSSARY_PATH,
  DocumentProcessor,
  IMAGES_DIR,
  assetFileName,
  loadGlossary,
} from '@tgdoc/document-processor';
import { PDFParser } from '@tgdoc/pdf-parser';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { PublishError } from '../errors/publish-error';
import {
  fileStem,
  parseMetadata,
  resolveFrontmatter,
} from '../metadata/publication-metadata';

export interface GuidelinePublisherOptions {
  logger: LoggerMethods;

  /**
   * Translation model. Without one, the target document only has glossary
   * terms replaced.
   */
  model?: LanguageModel;
  fallbackModel?: LanguageModel;

  /**
   * Language of the PDF (default: 'en')
   */
  sourceLanguage?: string;

  /**
   * Language of the second document (default: 'zh-CN')
   */
  targetLanguage?: string;

  /**
   * Glossary JSON file (default: the bundled English → Chinese glossary)
   */
  glossaryPath?: string;

  /**
   * Parallel page rasterization and in-flight translation requests
   */
  concurrency?: number;

  /**
   * Timeout per external tool invocation in milliseconds
   */
  timeout?: number;

  tableDetection?: TableDetectorOptions;
  assetFilter?: Omit<VisualAssetFilterOptions, 'concurrency'>;
  abortSignal?: AbortSignal;

  /**
   * Callback fired with the cumulative token usage after translation
   */
  onTokenUsage?: (report: TokenUsageReport) => void;
}

export interface PublishRequest {
  pdfPath: string;
  outputDir: string;

  /**
   * Title, subtitle, docNumber, date, publicationDate, keywords. Validated;
   * missing fields get defaults derived from the file name.
   */
  metadata?: unknown;
}

export interface PublishResult {
  sourceQmdPath: string;
  translatedQmdPath: string;
  imagePaths: string[];
  summary: ProcessingSummary;
}

/**
 * GuidelinePublisher - PDF in, bilingual Quarto publication out
 *
 * Validates the metadata, loads the glossary, parses the PDF, processes and
 * translates the document and only then writes the output directory:
 *
 * - `images/figure_<n>.png`, `images/table_<n>.png`
 * - `<stem>_<sourceLanguage>.qmd`
 * - `<stem>_<targetLanguage>.qmd`
 *
 * A fatal error in any stage leaves the output directory untouched.
 *
 * @example
 * ```typescript
 * const publisher = new GuidelinePublisher({
 *   logger: createConsoleLogger(),
 *   model: openai('gpt-5-mini'),
 * });
 * publisher.init();
 *
 * const { summary } = await publisher.publish({
 *   pdfPath: 'OECD_TG_432.pdf',
 *   outputDir: 'out/tg432',
 *   metadata: { subtitle: 'In Vitro 3T3 NRU Phototoxicity Test' },
 * });
 * ```
 */
export class GuidelinePublisher {
  private readonly logger: LoggerMethods;
  private readonly sourceLanguage: string;
  private readonly targetLanguage: string;
  private readonly glossaryPath: string;
  private readonly abortSignal?: AbortSignal;
  private readonly parser: PDFParser;
  private readonly processor: DocumentProcessor;

  constructor(options: GuidelinePublisherOptions) {
    this.logger = options.logger;
    this.sourceLanguage = options.sourceLanguage ?? 'en';
    this.targetLanguage = options.targetLanguage ?? 'zh-CN';
    this.glossaryPath = options.glossaryPath ?? DEFAULT_GLOSSARY_PATH;
    this.abortSignal = options.abortSignal;

    this.parser = new PDFParser({
      logger: options.logger,
      concurrency: options.concurrency,
      timeout: options.timeout,
      tableDetection: options.tableDetection,
      assetFilter: options.assetFilter,
    });
    this.processor = new DocumentProcessor({
      logger: options.logger,
      model: options.model,
      fallbackModel: options.fallbackModel,
      sourceLanguage: this.sourceLanguage,
      targetLanguage: this.targetLanguage,
      concurrency: options.concurrency,
      abortSignal: options.abortSignal,
      onTokenUsage: options.onTokenUsage,
    });
  }

  /**
   * Verify that the external PDF tools are installed
   *
   * @throws {ExtractionError} Naming the missing tool
   */
  init(): void {
    this.parser.init();
  }

  /**
   * @throws {PublishError} When the metadata is invalid or an output file
   * cannot be written
   * @throws {ExtractionError} When the PDF cannot be parsed
   * @throws {StructuralIntegrityError} When figures or tables cannot be
   * matched to their references
   */
  async publish(request: PublishRequest): Promise<PublishResult> {
    const { pdfPath, outputDir } = request;
    this.logger.info(`[GuidelinePublisher] Publishing ${pdfPath}`);

    const frontmatter = resolveFrontmatter(
      pdfPath,
      parseMetadata(request.metadata),
    );

    const glossary = await loadGlossary(this.glossaryPath);
    if (glossary.targetLanguage !== this.targetLanguage) {
      this.logger.warn(
        `[GuidelinePublisher] Glossary targets ${glossary.targetLanguage}, translating into ${this.targetLanguage}`,
      );
    }

    const parsed = await this.parser.parse(pdfPath, {
      abortSignal: this.abortSignal,
    });
    const result = await this.processor.process({
      pages: parsed.pages,
      assets: parsed.assets,
      frontmatter,
      glossary: glossary.entries,
    });

    const stem = fileStem(pdfPath);
    const sourceQmdPath = join(outputDir, `${stem}_${this.sourceLanguage}.qmd`);
    const translatedQmdPath = join(
      outputDir,
      `${stem}_${this.targetLanguage}.qmd`,
    );

    await this.ensureDirectory(join(outputDir, IMAGES_DIR));
    const imagePaths = await this.writeImages(outputDir, parsed.assets);
    await this.writeText(sourceQmdPath, result.sourceQmd);
    await this.writeText(translatedQmdPath, result.translatedQmd);

    const summary: ProcessingSummary = {
      pageCount: parsed.pages.length,
      figureCount: countKind(parsed.assets, 'figure'),
      tableCount: countKind(parsed.assets, 'table'),
      droppedAssets: parsed.dropped,
      ambiguousLineCount: result.ambiguousLineCount,
      assembly: result.assembly,
      translation: result.translation,
      usage: result.usage,
    };
    this.logSummary(summary);

    return { sourceQmdPath, translatedQmdPath, imagePaths, summary };
  }

  private async writeImages(
    outputDir: string,
    assets: readonly VisualAsset[],
  ): Promise<string[]> {
    const paths: string[] = [];
    for (const asset of assets) {
      const path = join(
        outputDir,
        IMAGES_DIR,
        assetFileName(asset.kind, asset.ordinal),
      );
      await writeFile(path, asset.image).catch((error: unknown) => {
        throw PublishError.fromError(`Cannot write ${path}`, error);
      });
      paths.push(path);
    }
    return paths;
  }

  private async writeText(path: string, content: string): Promise<void> {
    await writeFile(path, content, 'utf-8').catch((error: unknown) => {
      throw PublishError.fromError(`Cannot write ${path}`, error);
    });
  }

  private async ensureDirectory(path: string): Promise<void> {
    await mkdir(path, { recursive: true }).catch((error: unknown) => {
      throw PublishError.fromError(`Cannot create ${path}`, error);
    });
  }

  private logSummary(summary: ProcessingSummary): void {
    const { translation } = summary;
    this.logger.info(
      `[GuidelinePublisher] ${summary.pageCount} pages, ${summary.figureCount} figures, ${summary.tableCount} tables (${summary.droppedAssets.length} images dropped)`,
    );
    this.logger.info(
      `[GuidelinePublisher] ${summary.ambiguousLineCount} ambiguous heading candidates, ${summary.assembly.warnings.length} assembly warnings`,
    );
    this.logger.info(
      `[GuidelinePublisher] ${translation.translatedUnits}/${translation.totalUnits} units translated into ${translation.targetLanguage}, ${summary.usage.total.totalTokens} tokens`,
    );
  }
}

function countKind(
  assets: readonly VisualAsset[],
  kind: VisualAsset['kind'],
): number {
  return assets.filter((asset) => asset.kind === kind).length;
}
