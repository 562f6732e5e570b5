import type { LoggerMethods } from '@tgdoc/logger';
import type { DroppedAsset, Page, VisualAsset } from '@tgdoc/model';

import { ConcurrentPool } from '@tgdoc/shared';
import { execSync } from 'node:child_process';
import { readFile } from 'node:fs/promises';

import { VISUAL_ASSET_FILTER } from '../config/constants';
import { ExtractionError } from '../errors/extraction-error';
import {
  type AssetCandidate,
  VisualAssetFilter,
  type VisualAssetFilterOptions,
} from '../filters/visual-asset-filter';
import { PageRasterizer } from '../processors/page-rasterizer';
import { PopplerPageExtractor } from '../processors/poppler-page-extractor';
import {
  TableDetector,
  type TableDetectorOptions,
} from '../processors/table-detector';

type Options = {
  logger: LoggerMethods;

  /**
   * Number of pages rasterized in parallel (default: 4)
   */
  concurrency?: number;

  /**
   * Timeout per external tool invocation in milliseconds
   */
  timeout?: number;

  tableDetection?: TableDetectorOptions;
  assetFilter?: Omit<VisualAssetFilterOptions, 'concurrency'>;
};

export interface ParsePdfOptions {
  /**
   * Abort signal checked between stages
   */
  abortSignal?: AbortSignal;
}

/**
 * Everything the document pipeline needs from a PDF
 */
export interface ParsedPdf {
  pages: Page[];

  /**
   * Kept figures and table screenshots with final ordinals
   */
  assets: VisualAsset[];
  dropped: DroppedAsset[];
}

const REQUIRED_TOOLS = [
  { command: 'pdfinfo', hint: 'brew install poppler' },
  { command: 'pdftotext', hint: 'brew install poppler' },
  { command: 'pdfimages', hint: 'brew install poppler' },
  { command: 'magick', hint: 'brew install imagemagick' },
  { command: 'gs', hint: 'brew install ghostscript' },
] as const;

/**
 * PDFParser - Turns a native-text PDF into pages and visual assets
 *
 * ## System Requirements
 * - Poppler utils (`pdfinfo`, `pdftotext`, `pdfimages`)
 * - ImageMagick (`magick`) with Ghostscript for table screenshots
 *
 * ## Parsing Process
 * 1. Extract page text and table regions (PopplerPageExtractor)
 * 2. Collect candidate images per page: embedded images and table crops
 *    (PageRasterizer, pages in parallel)
 * 3. Filter candidates and assign ordinals (VisualAssetFilter)
 * 4. Remove intermediate files
 */
export class PDFParser {
  private readonly logger: LoggerMethods;
  private readonly concurrency: number;
  private readonly timeout?: number;
  private readonly extractor: PopplerPageExtractor;
  private readonly filter: VisualAssetFilter;

  constructor(options: Options) {
    const { logger, concurrency = VISUAL_ASSET_FILTER.CONCURRENCY } = options;

    this.logger = logger;
    this.concurrency = concurrency;
    this.timeout = options.timeout;
    this.extractor = new PopplerPageExtractor(logger, {
      tableDetector: new TableDetector(options.tableDetection),
      timeoutMs: options.timeout,
    });
    this.filter = new VisualAssetFilter(logger, {
      ...options.assetFilter,
      concurrency,
    });
  }

  /**
   * Verify that the external tools are installed.
   *
   * @throws ExtractionError naming the missing tool
   */
  init(): void {
    this.logger.info('[PDFParser] Checking external tools...');

    for (const { command, hint } of REQUIRED_TOOLS) {
      try {
        execSync(`which ${command}`, { stdio: 'ignore' });
      } catch (error) {
        throw new ExtractionError(
          `${command} is not installed. Please install it using: ${hint}`,
          { cause: error },
        );
      }
    }
  }

  /**
   * Parse a PDF file.
   *
   * @param pdfPath - Path of the source PDF
   */
  async parse(
    pdfPath: string,
    options: ParsePdfOptions = {},
  ): Promise<ParsedPdf> {
    const { abortSignal } = options;

    const startTime = Date.now();
    const pdfBytes = await readFile(pdfPath).catch((error: unknown) => {
      throw ExtractionError.fromError(`Cannot read ${pdfPath}`, error);
    });
    const pages = await this.extractor.extractPages(pdfBytes);
    this.logger.info(
      `[PDFParser] Text extraction took ${Date.now() - startTime}ms`,
    );

    this.checkAborted(abortSignal);

    const rasterizer = new PageRasterizer(this.logger, pdfPath, {
      timeoutMs: this.timeout,
    });

    try {
      const perPage = await ConcurrentPool.run(
        pages,
        this.concurrency,
        (page) => this.collectCandidates(rasterizer, page),
        undefined,
        abortSignal,
      );

      this.checkAborted(abortSignal);

      const { assets, dropped } = await this.filter.admit(perPage.flat());
      return { pages, assets, dropped };
    } finally {
      await rasterizer.dispose();
    }
  }

  private async collectCandidates(
    rasterizer: PageRasterizer,
    page: Page,
  ): Promise<AssetCandidate[]> {
    const candidates: AssetCandidate[] = [];

    const imageCount = await rasterizer.countImages(page.index);
    for (let index = 0; index < imageCount; index++) {
      candidates.push({
        page: page.index,
        origin: 'embedded-image',
        index,
        image: await rasterizer.renderImage(page.index, index),
      });
    }

    for (const region of page.tableRegions) {
      candidates.push({
        page: page.index,
        origin: 'table-region',
        index: region.ordinal,
        image: await rasterizer.crop(page.index, region.boundingBox),
      });
    }

    return candidates;
  }

  /**
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(abortSignal?: AbortSignal): void {
    if (abortSignal?.aborted) {
      const error = new Error('PDF parsing was aborted');
      error.name = 'AbortError';
      throw error;
    }
  }
}
