import type { LoggerMethods } from '@tgdoc/logger';
import type { ParsedPdf } from '@tgdoc/pdf-parser';

import { PDFParser } from '@tgdoc/pdf-parser';
import { mkdir, writeFile } from 'node:fs/promises';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { PublishError } from '../errors/publish-error';
import { GuidelinePublisher } from './guideline-publisher';

vi.mock('@tgdoc/pdf-parser', () => ({
  PDFParser: vi.fn(),
}));

vi.mock('node:fs/promises', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node:fs/promises')>()),
  mkdir: vi.fn(),
  writeFile: vi.fn(),
}));

const tableImage = Buffer.from('table');
const figureImage = Buffer.from('figure');

const parsed: ParsedPdf = {
  pages: [
    {
      index: 1,
      rawText: [
        'INTRODUCTION',
        'The phototoxicity of each chemical was assessed in the assay.',
        '',
        '',
        '[TABLE]',
      ].join('\n'),
      tableRegions: [
        { pageIndex: 1, boundingBox: [50, 300, 550, 500], ordinal: 0 },
      ],
    },
  ],
  assets: [
    {
      kind: 'table',
      sourcePage: 1,
      sourceIndex: 0,
      ordinal: 1,
      image: tableImage,
    },
    {
      kind: 'figure',
      sourcePage: 1,
      sourceIndex: 0,
      ordinal: 1,
      image: figureImage,
    },
  ],
  dropped: [
    {
      origin: 'embedded-image',
      sourcePage: 1,
      sourceIndex: 1,
      reason: 'uniform',
    },
  ],
};

describe('GuidelinePublisher', () => {
  let mockLogger: LoggerMethods;
  let mockInit: ReturnType<typeof vi.fn>;
  let mockParse: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    mockInit = vi.fn();
    mockParse = vi.fn().mockResolvedValue(parsed);
    vi.mocked(PDFParser).mockImplementation(function () {
      return { init: mockInit, parse: mockParse } as unknown as PDFParser;
    });
    vi.mocked(mkdir).mockResolvedValue(undefined);
    vi.mocked(writeFile).mockResolvedValue(undefined);
  });

  test('init checks the external tools', () => {
    new GuidelinePublisher({ logger: mockLogger }).init();

    expect(mockInit).toHaveBeenCalledTimes(1);
  });

  test('writes images and both documents', async () => {
    const publisher = new GuidelinePublisher({ logger: mockLogger });

    const result = await publisher.publish({
      pdfPath: '/in/OECD_TG_432.pdf',
      outputDir: '/out',
    });

    expect(mockParse).toHaveBeenCalledWith('/in/OECD_TG_432.pdf', {
      abortSignal: undefined,
    });
    expect(mkdir).toHaveBeenCalledWith('/out/images', { recursive: true });
    expect(writeFile).toHaveBeenCalledWith(
      '/out/images/table_1.png',
      tableImage,
    );
    expect(writeFile).toHaveBeenCalledWith(
      '/out/images/figure_1.png',
      figureImage,
    );
    expect(result.imagePaths).toEqual([
      '/out/images/table_1.png',
      '/out/images/figure_1.png',
    ]);
    expect(result.sourceQmdPath).toBe('/out/OECD_TG_432_en.qmd');
    expect(result.translatedQmdPath).toBe('/out/OECD_TG_432_zh-CN.qmd');
    expect(writeFile).toHaveBeenCalledWith(
      '/out/OECD_TG_432_en.qmd',
      expect.stringMatching(
        /^---\ntitle: "OECD Test Guideline No\. 432"\ndate: "\d{4}-\d{2}-\d{2}"\ndoc-number: "432"\nkeywords: \["OECD", "test guideline", "toxicology", "in vitro"\]\nlang: en\n---\n/,
      ),
      'utf-8',
    );
    expect(writeFile).toHaveBeenCalledWith(
      '/out/OECD_TG_432_zh-CN.qmd',
      expect.stringContaining('\n![表 1](images/table_1.png){#tbl-1}\n'),
      'utf-8',
    );
  });

  test('returns the processing summary', async () => {
    const publisher = new GuidelinePublisher({ logger: mockLogger });

    const { summary } = await publisher.publish({
      pdfPath: '/in/OECD_TG_432.pdf',
      outputDir: '/out',
    });

    expect(summary).toMatchObject({
      pageCount: 1,
      figureCount: 1,
      tableCount: 1,
      droppedAssets: parsed.dropped,
      assembly: { warnings: [] },
      translation: {
        targetLanguage: 'zh-CN',
        totalUnits: 2,
        translatedUnits: 2,
        failedUnits: [],
      },
    });
    expect(summary.usage.total.totalTokens).toBe(0);
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[GuidelinePublisher] 1 pages, 1 figures, 1 tables (1 images dropped)',
    );
  });

  test('rejects invalid metadata before parsing', async () => {
    const publisher = new GuidelinePublisher({ logger: mockLogger });

    await expect(
      publisher.publish({
        pdfPath: '/in/OECD_TG_432.pdf',
        outputDir: '/out',
        metadata: { date: 'yesterday' },
      }),
    ).rejects.toThrow(PublishError);
    expect(mockParse).not.toHaveBeenCalled();
    expect(writeFile).not.toHaveBeenCalled();
  });

  test('writes nothing when parsing fails', async () => {
    mockParse.mockRejectedValue(new Error('pdftotext failed'));
    const publisher = new GuidelinePublisher({ logger: mockLogger });

    await expect(
      publisher.publish({ pdfPath: '/in/OECD_TG_432.pdf', outputDir: '/out' }),
    ).rejects.toThrow('pdftotext failed');
    expect(mkdir).not.toHaveBeenCalled();
    expect(writeFile).not.toHaveBeenCalled();
  });

  test('wraps write failures', async () => {
    vi.mocked(writeFile).mockRejectedValue(new Error('EACCES'));
    const publisher = new GuidelinePublisher({ logger: mockLogger });

    await expect(
      publisher.publish({ pdfPath: '/in/OECD_TG_432.pdf', outputDir: '/out' }),
    ).rejects.toThrow(
      new PublishError('Cannot write /out/images/table_1.png: EACCES'),
    );
  });

  test('warns when the glossary targets another language', async () => {
    const publisher = new GuidelinePublisher({
      logger: mockLogger,
      targetLanguage: 'fr',
    });

    const result = await publisher.publish({
      pdfPath: '/in/OECD_TG_432.pdf',
      outputDir: '/out',
    });

    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[GuidelinePublisher] Glossary targets zh-CN, translating into fr',
    );
    expect(result.translatedQmdPath).toBe('/out/OECD_TG_432_fr.qmd');
  });
});
