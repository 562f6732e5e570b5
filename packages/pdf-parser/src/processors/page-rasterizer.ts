import type { LoggerMethods } from '@tgdoc/logger';
import type { BoundingBox } from '@tgdoc/model';

import { spawnAsync } from '@tgdoc/shared';
import { mkdir, mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { PAGE_RASTERIZER } from '../config/constants';

/** Options for page rasterization */
export interface PageRasterizerOptions {
  /** DPI for table screenshots (default: 300) */
  density?: number;
  /** Margin in points around a crop box (default: 4) */
  cropMargin?: number;
  /** Timeout per tool invocation in milliseconds (default: 120000) */
  timeoutMs?: number;
}

/**
 * Produces raster images from a PDF: table screenshots cropped with
 * ImageMagick and embedded images extracted with `pdfimages`.
 *
 * Intermediate files live in one temporary directory that `dispose()`
 * removes. Extracted images are cached per page.
 *
 * ## System Requirements
 * - ImageMagick (`brew install imagemagick`)
 * - Ghostscript (`brew install ghostscript`)
 * - Poppler utils (`brew install poppler`)
 */
export class PageRasterizer {
  private readonly density: number;
  private readonly cropMargin: number;
  private readonly timeoutMs: number;
  private workDir?: Promise<string>;
  private cropCount = 0;
  private readonly imageFiles = new Map<number, Promise<string[]>>();

  constructor(
    private readonly logger: LoggerMethods,
    private readonly pdfPath: string,
    options: PageRasterizerOptions = {},
  ) {
    this.density = options.density ?? PAGE_RASTERIZER.DENSITY;
    this.cropMargin = options.cropMargin ?? PAGE_RASTERIZER.CROP_MARGIN_PT;
    this.timeoutMs = options.timeoutMs ?? PAGE_RASTERIZER.COMMAND_TIMEOUT_MS;
  }

  /**
   * Render a region of a page to PNG.
   *
   * @param pageIndex - 1-based page index
   * @param boundingBox - Region in PDF points
   */
  async crop(pageIndex: number, boundingBox: BoundingBox): Promise<Buffer> {
    const workDir = await this.ensureWorkDir();
    const outputPath = join(workDir, `crop_${++this.cropCount}.png`);

    await this.run('magick', [
      '-density',
      this.density.toString(),
      `${this.pdfPath}[${pageIndex - 1}]`,
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      '-crop',
      this.cropGeometry(boundingBox),
      '+repage',
      outputPath,
    ]);

    return readFile(outputPath);
  }

  /**
   * ImageMagick crop geometry (`WxH+X+Y`) in pixels at the configured density
   */
  cropGeometry(boundingBox: BoundingBox): string {
    const toPixels = (points: number): number =>
      (points * this.density) / PAGE_RASTERIZER.POINTS_PER_INCH;
    const [x0, top, x1, bottom] = boundingBox;

    const x = Math.floor(toPixels(Math.max(0, x0 - this.cropMargin)));
    const y = Math.floor(toPixels(Math.max(0, top - this.cropMargin)));
    const width = Math.ceil(toPixels(x1 + this.cropMargin)) - x;
    const height = Math.ceil(toPixels(bottom + this.cropMargin)) - y;

    return `${width}x${height}+${x}+${y}`;
  }

  /**
   * Number of embedded images on a page.
   */
  async countImages(pageIndex: number): Promise<number> {
    return (await this.extractPageImages(pageIndex)).length;
  }

  /**
   * PNG bytes of an embedded image.
   *
   * @param pageIndex - 1-based page index
   * @param imageIndex - 0-based image index on the page
   */
  async renderImage(pageIndex: number, imageIndex: number): Promise<Buffer> {
    const files = await this.extractPageImages(pageIndex);
    const file = files.at(imageIndex);
    if (imageIndex < 0 || !file) {
      throw new RangeError(
        `[PageRasterizer] Page ${pageIndex} has no image ${imageIndex}`,
      );
    }
    return readFile(file);
  }

  /**
   * Remove all intermediate files.
   */
  async dispose(): Promise<void> {
    const workDir = this.workDir;
    if (!workDir) return;
    this.workDir = undefined;
    this.imageFiles.clear();
    await rm(await workDir, { recursive: true, force: true });
  }

  private extractPageImages(pageIndex: number): Promise<string[]> {
    let files = this.imageFiles.get(pageIndex);
    if (!files) {
      files = this.runPdfImages(pageIndex);
      this.imageFiles.set(pageIndex, files);
    }
    return files;
  }

  private async runPdfImages(pageIndex: number): Promise<string[]> {
    const pageDir = join(await this.ensureWorkDir(), `page_${pageIndex}`);
    await mkdir(pageDir, { recursive: true });

    await this.run('pdfimages', [
      '-png',
      '-f',
      pageIndex.toString(),
      '-l',
      pageIndex.toString(),
      this.pdfPath,
      join(pageDir, 'img'),
    ]);

    const files = (await readdir(pageDir))
      .filter((f) => f.startsWith('img-') && f.endsWith('.png'))
      .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }))
      .map((f) => join(pageDir, f));

    this.logger.debug(
      `[PageRasterizer] Page ${pageIndex}: ${files.length} embedded images`,
    );

    return files;
  }

  private ensureWorkDir(): Promise<string> {
    this.workDir ??= mkdtemp(join(tmpdir(), 'tgdoc-raster-'));
    return this.workDir;
  }

  private async run(command: string, args: string[]): Promise<void> {
    const result = await spawnAsync(command, args, {
      timeout: this.timeoutMs,
      captureStdout: false,
    });

    if (result.code !== 0) {
      throw new Error(
        `[PageRasterizer] ${command} failed: ${result.stderr.trim() || `exit code ${result.code}`}`,
      );
    }
  }
}
