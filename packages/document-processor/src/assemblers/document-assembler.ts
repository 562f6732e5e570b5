import type { LoggerMethods } from '@tgdoc/logger';
import type {
  AssemblyReport,
  AssemblyWarning,
  Block,
  DocumentFrontmatter,
  GuidelineDocument,
  HeadingLevel,
  Page,
  ReferenceEntryBlock,
  VisualAsset,
  VisualAssetKind,
} from '@tgdoc/model';

import { sortBy } from 'es-toolkit';

import { TextCleaner } from '../utils/text-cleaner';
import { StructuralIntegrityError } from './structural-integrity-error';

export interface AssemblyResult {
  document: GuidelineDocument;
  report: AssemblyReport;
}

const PLACEHOLDERS: ReadonlyArray<readonly [RegExp, VisualAssetKind]> = [
  [/^\[TABLE(?::[^\]]*)?\]$/i, 'table'],
  [/^\[FIGURE(?::[^\]]*)?\]$/i, 'figure'],
];
const REFERENCE_MARKER =
  /^(?:[1-9]\d?\.?\s+)?(?:literature|references|bibliography)\s*:?$/i;
const ANNEX_MARKER = /^annex(?:\s+(?:\d+|[IVX]+|[A-Z]))?(?:\s*[:.–-].*)?$/i;
const REFERENCE_ENTRY = /^\((\d+)\)\s*(.*)$/;

/**
 * Mutable state of one assembly run
 */
interface AssemblyState {
  blocks: Block[];
  warnings: AssemblyWarning[];
  paragraph: string[];
  /**
   * Open reference entry. Its block is already in `blocks` and grows with
   * every continuation line, across blank runs and page ends.
   */
  reference?: { block: ReferenceEntryBlock; lines: string[] };
  inReferences: boolean;
  expectedReference: number;
}

/**
 * DocumentAssembler - Builds the canonical block sequence
 *
 * Walks the normalized page texts line by line and emits page breaks,
 * headings, paragraphs, reference entries and figure/table references.
 * Every `[TABLE]` / `[FIGURE]` placeholder must resolve to a kept asset of
 * the same page; assets no placeholder claimed are appended at the end of
 * their page.
 */
export class DocumentAssembler {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @param normalizedTexts - Formula-normalized text, one per page
   * @param headings - Heading level by line index, one map per page
   * @throws {StructuralIntegrityError} When a placeholder or reference has
   * no matching asset
   */
  assemble(
    pages: readonly Page[],
    normalizedTexts: readonly string[],
    headings: readonly ReadonlyMap<number, HeadingLevel>[],
    assets: readonly VisualAsset[],
    frontmatter: DocumentFrontmatter,
  ): AssemblyResult {
    if (
      normalizedTexts.length !== pages.length ||
      headings.length !== pages.length
    ) {
      throw new StructuralIntegrityError(
        `Expected ${pages.length} page texts and heading maps, got ${normalizedTexts.length} and ${headings.length}`,
      );
    }

    const state: AssemblyState = {
      blocks: [],
      warnings: [],
      paragraph: [],
      inReferences: false,
      expectedReference: 1,
    };

    pages.forEach((page, pageIdx) => {
      this.assemblePage(
        state,
        page,
        normalizedTexts[pageIdx],
        headings[pageIdx],
        assets.filter((asset) => asset.sourcePage === page.index),
      );
    });

    const warnings = [
      ...state.warnings,
      ...validateReferences(state.blocks, assets),
    ];
    for (const warning of warnings) {
      this.logger.warn(
        `[DocumentAssembler] ${warning.code} (page ${warning.pageIndex}): ${warning.message}`,
      );
    }

    this.logger.info(
      `[DocumentAssembler] Assembled ${state.blocks.length} blocks from ${pages.length} pages (${warnings.length} warnings)`,
    );

    return {
      document: Object.freeze({
        frontmatter: Object.freeze({ ...frontmatter }),
        blocks: Object.freeze(state.blocks.map((block) => Object.freeze(block))),
      }),
      report: { warnings },
    };
  }

  private assemblePage(
    state: AssemblyState,
    page: Page,
    text: string,
    headings: ReadonlyMap<number, HeadingLevel>,
    pageAssets: readonly VisualAsset[],
  ): void {
    state.blocks.push({ type: 'page-break', pageIndex: page.index });

    const consumed = new Set<VisualAsset>();
    let blankRun = 0;

    text.split('\n').forEach((line, lineIdx) => {
      const trimmed = line.trim();

      if (trimmed === '') {
        blankRun++;
        if (blankRun >= 2) this.flushParagraph(state);
        return;
      }
      blankRun = 0;

      if (!TextCleaner.isValidText(trimmed)) return;

      const placeholder = PLACEHOLDERS.find(([pattern]) =>
        pattern.test(trimmed),
      );
      if (placeholder) {
        this.flush(state);
        const asset = this.resolvePlaceholder(
          page,
          trimmed,
          placeholder[1],
          pageAssets,
          consumed,
        );
        consumed.add(asset);
        state.blocks.push(this.refBlock(asset));
        return;
      }

      if (REFERENCE_MARKER.test(trimmed) || ANNEX_MARKER.test(trimmed)) {
        this.flush(state);
        state.inReferences = REFERENCE_MARKER.test(trimmed);
        state.expectedReference = 1;
        state.blocks.push(this.headingBlock(1, trimmed));
        return;
      }

      const level = headings.get(lineIdx);
      if (level !== undefined) {
        this.flush(state);
        state.inReferences = false;
        state.blocks.push(this.headingBlock(level, trimmed));
        return;
      }

      if (trimmed.startsWith('$$') && trimmed.endsWith('$$')) {
        this.flush(state);
        state.blocks.push({ type: 'paragraph', text: trimmed });
        return;
      }

      if (state.inReferences) {
        const entry = REFERENCE_ENTRY.exec(trimmed);
        if (entry) {
          this.flush(state);
          this.startReference(state, page, Number(entry[1]), entry[2]);
          return;
        }
        if (state.reference) {
          state.reference.lines.push(trimmed);
          state.reference.block.text = TextCleaner.joinLines(
            state.reference.lines,
          );
          return;
        }
      }

      state.paragraph.push(trimmed);
    });

    this.flushParagraph(state);

    for (const kind of ['figure', 'table'] as const) {
      const unreferenced = pageAssets.filter(
        (asset) => asset.kind === kind && !consumed.has(asset),
      );
      for (const asset of sortBy(unreferenced, [(asset) => asset.ordinal])) {
        state.blocks.push(this.refBlock(asset));
      }
    }
  }

  private resolvePlaceholder(
    page: Page,
    placeholder: string,
    kind: VisualAssetKind,
    pageAssets: readonly VisualAsset[],
    consumed: ReadonlySet<VisualAsset>,
  ): VisualAsset {
    const candidates = sortBy(
      pageAssets.filter((asset) => asset.kind === kind && !consumed.has(asset)),
      [(asset) => asset.sourceIndex],
    );
    const asset = candidates.at(0);
    if (!asset) {
      throw new StructuralIntegrityError(
        `Page ${page.index}: ${placeholder} placeholder has no unconsumed ${kind} asset`,
      );
    }
    return asset;
  }

  private startReference(
    state: AssemblyState,
    page: Page,
    index: number,
    text: string,
  ): void {
    const expected = state.expectedReference;
    if (index > expected) {
      state.warnings.push({
        code: 'W001',
        message: `Reference (${index}) follows (${expected - 1}); numbering has a gap`,
        pageIndex: page.index,
      });
    } else if (index < expected) {
      state.warnings.push({
        code: 'W002',
        message: `Reference (${index}) repeats or goes back after (${expected - 1})`,
        pageIndex: page.index,
      });
    }

    state.expectedReference = Math.max(expected, index + 1);

    const block: ReferenceEntryBlock = {
      type: 'reference-entry',
      index,
      text: TextCleaner.joinLines([text]),
    };
    state.blocks.push(block);
    state.reference = { block, lines: [text] };
  }

  /**
   * Close the open paragraph and reference entry, if any
   */
  private flush(state: AssemblyState): void {
    this.flushParagraph(state);
    state.reference = undefined;
  }

  /**
   * Close the open paragraph only. Blank runs and page ends call this, so a
   * reference entry continues onto the next flow block or page.
   */
  private flushParagraph(state: AssemblyState): void {
    if (state.paragraph.length > 0) {
      const text = TextCleaner.joinLines(state.paragraph);
      if (text) state.blocks.push({ type: 'paragraph', text });
      state.paragraph = [];
    }
  }

  private headingBlock(level: HeadingLevel, line: string): Block {
    const text = TextCleaner.normalize(line);
    return {
      type: 'heading',
      level,
      text: TextCleaner.isAllCaps(text) ? TextCleaner.toTitleCase(text) : text,
    };
  }

  private refBlock(asset: VisualAsset): Block {
    return asset.kind === 'figure'
      ? { type: 'figure-ref', ordinal: asset.ordinal }
      : { type: 'table-ref', ordinal: asset.ordinal };
  }
}

/**
 * Check every figure/table reference against the kept assets.
 *
 * @returns W003 warnings for assets no block references
 * @throws {StructuralIntegrityError} When a reference points to no asset or
 * an asset is referenced twice
 */
export function validateReferences(
  blocks: readonly Block[],
  assets: readonly VisualAsset[],
): AssemblyWarning[] {
  const byKey = new Map(
    assets.map((asset) => [`${asset.kind}:${asset.ordinal}`, asset]),
  );
  const referenced = new Set<string>();

  for (const block of blocks) {
    if (block.type !== 'figure-ref' && block.type !== 'table-ref') continue;

    const kind = block.type === 'figure-ref' ? 'figure' : 'table';
    const key = `${kind}:${block.ordinal}`;
    if (!byKey.has(key)) {
      throw new StructuralIntegrityError(
        `${kind} reference ${block.ordinal} has no matching asset`,
      );
    }
    if (referenced.has(key)) {
      throw new StructuralIntegrityError(
        `${kind} ${block.ordinal} is referenced more than once`,
      );
    }
    referenced.add(key);
  }

  return assets
    .filter((asset) => !referenced.has(`${asset.kind}:${asset.ordinal}`))
    .map((asset) => ({
      code: 'W003' as const,
      message: `${asset.kind} ${asset.ordinal} comes from a page that was not assembled`,
      pageIndex: asset.sourcePage,
    }));
}
