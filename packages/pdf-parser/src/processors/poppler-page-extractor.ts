import type { LoggerMethods } from '@tgdoc/logger';
import type { BoundingBox, Page, TableRegion } from '@tgdoc/model';

import { spawnAsync } from '@tgdoc/shared';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { PageLayout } from '../types/page-layout';

import { COVER_PAGE_INDEX, PAGE_EXTRACTION } from '../config/constants';
import { ExtractionError } from '../errors/extraction-error';
import { lineText, parseBboxLayout } from './bbox-layout-parser';
import { TableDetector } from './table-detector';

export interface PopplerPageExtractorOptions {
  /**
   * Table detector used for every page (default: TableDetector with defaults)
   */
  tableDetector?: TableDetector;

  /**
   * Timeout per Poppler invocation in milliseconds (default: 120000)
   */
  timeoutMs?: number;
}

function containsCenter(region: BoundingBox, box: BoundingBox): boolean {
  const x = (box[0] + box[2]) / 2;
  const y = (box[1] + box[3]) / 2;
  return x >= region[0] && x <= region[2] && y >= region[1] && y <= region[3];
}

/**
 * Extracts page text and table regions with Poppler.
 *
 * The PDF is written to a temporary directory, `pdfinfo` provides the page
 * count and `pdftotext -bbox-layout` the word geometry. Lines inside a
 * detected table region are replaced by one `[TABLE]` line.
 *
 * ## System Requirements
 * - Poppler utils (`brew install poppler` / `apt-get install poppler-utils`)
 */
export class PopplerPageExtractor {
  private readonly tableDetector: TableDetector;
  private readonly timeoutMs: number;

  constructor(
    private readonly logger: LoggerMethods,
    options: PopplerPageExtractorOptions = {},
  ) {
    this.tableDetector = options.tableDetector ?? new TableDetector();
    this.timeoutMs = options.timeoutMs ?? PAGE_EXTRACTION.COMMAND_TIMEOUT_MS;
  }

  /**
   * Extract all pages of a PDF.
   *
   * @param pdfBytes - Raw PDF content
   * @returns Pages in document order
   * @throws ExtractionError when Poppler fails or no page has selectable text
   */
  async extractPages(pdfBytes: Uint8Array): Promise<Page[]> {
    const workDir = await mkdtemp(join(tmpdir(), 'tgdoc-extract-'));

    try {
      const pdfPath = join(workDir, 'source.pdf');
      await writeFile(pdfPath, pdfBytes);

      const pageCount = await this.getPageCount(pdfPath);
      this.logger.info(
        `[PopplerPageExtractor] Extracting layout of ${pageCount} pages...`,
      );

      const layouts = await this.extractLayouts(pdfPath);
      if (layouts.length !== pageCount) {
        this.logger.warn(
          `[PopplerPageExtractor] pdfinfo reported ${pageCount} pages but pdftotext returned ${layouts.length}`,
        );
      }

      const pages = layouts.map((layout) => this.buildPage(layout));
      const tableCount = pages.reduce(
        (sum, page) => sum + page.tableRegions.length,
        0,
      );

      if (pages.every((page) => page.rawText.trim().length === 0)) {
        throw new ExtractionError('PDF contains no selectable text');
      }

      this.logger.info(
        `[PopplerPageExtractor] Extracted ${pages.length} pages with ${tableCount} table regions`,
      );

      return pages;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  /**
   * Detect table regions of a page layout.
   */
  detectTables(layout: PageLayout): TableRegion[] {
    return this.tableDetector.detect(layout);
  }

  /**
   * Get total page count of a PDF using pdfinfo.
   *
   * @throws ExtractionError when pdfinfo is missing, fails or reports no pages
   */
  async getPageCount(pdfPath: string): Promise<number> {
    const result = await this.run('pdfinfo', [pdfPath]);
    const match = result.match(/^Pages:\s+(\d+)/m);
    const pageCount = match ? parseInt(match[1], 10) : 0;

    if (pageCount === 0) {
      throw new ExtractionError('pdfinfo reported no pages');
    }
    return pageCount;
  }

  /**
   * Word geometry of every page via `pdftotext -bbox-layout`.
   */
  async extractLayouts(pdfPath: string): Promise<PageLayout[]> {
    const xhtml = await this.run('pdftotext', [
      '-bbox-layout',
      '-enc',
      'UTF-8',
      pdfPath,
      '-',
    ]);
    return parseBboxLayout(xhtml);
  }

  /**
   * Build a page from its layout. Flow blocks are separated by two blank
   * lines so that each block starts a new paragraph.
   *
   * Table regions on the cover page are still reported, but their lines stay
   * in the text: the cover page publishes no screenshots, so a `[TABLE]`
   * line there would have no asset.
   */
  buildPage(layout: PageLayout): Page {
    const tableRegions = this.detectTables(layout);
    const placeholders =
      layout.pageIndex === COVER_PAGE_INDEX ? [] : tableRegions;
    const placed = new Set<number>();
    const blocks: string[] = [];

    for (const block of layout.blocks) {
      const lines: string[] = [];
      for (const line of block.lines) {
        const region = placeholders.find((r) =>
          containsCenter(r.boundingBox, line.box),
        );
        if (!region) {
          lines.push(lineText(line));
        } else if (!placed.has(region.ordinal)) {
          placed.add(region.ordinal);
          lines.push(PAGE_EXTRACTION.TABLE_PLACEHOLDER);
        }
      }
      if (lines.length > 0) blocks.push(lines.join('\n'));
    }

    return {
      index: layout.pageIndex,
      rawText: blocks.join('\n\n\n'),
      tableRegions,
    };
  }

  private async run(command: string, args: string[]): Promise<string> {
    const result = await spawnAsync(command, args, {
      timeout: this.timeoutMs,
    }).catch((error: unknown) => {
      throw ExtractionError.fromError(`${command} could not be started`, error);
    });

    if (result.code !== 0) {
      throw new ExtractionError(
        `${command} failed: ${result.stderr.trim() || `exit code ${result.code}`}`,
      );
    }
    return result.stdout;
  }
}
