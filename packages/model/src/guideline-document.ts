/**
 * Heading depth. Level 1 is reserved for structural markers the assembler
 * inserts (reference list, annexes).
 */
export type HeadingLevel = 1 | 2 | 3 | 4;

export interface HeadingBlock {
  type: 'heading';
  level: HeadingLevel;
  text: string;

  /**
   * Set on translated documents when at least one unit of this block kept
   * its source-language text
   */
  untranslated?: boolean;
}

export interface ParagraphBlock {
  type: 'paragraph';
  text: string;
  untranslated?: boolean;
}

export interface FigureRefBlock {
  type: 'figure-ref';
  ordinal: number;
}

export interface TableRefBlock {
  type: 'table-ref';
  ordinal: number;
}

export interface PageBreakBlock {
  type: 'page-break';
  pageIndex: number;
}

export interface ReferenceEntryBlock {
  type: 'reference-entry';

  /**
   * Number from the leading `(N)` marker
   */
  index: number;
  text: string;
}

/**
 * Atomic unit of a guideline document body
 */
export type Block =
  | HeadingBlock
  | ParagraphBlock
  | FigureRefBlock
  | TableRefBlock
  | PageBreakBlock
  | ReferenceEntryBlock;

export type BlockType = Block['type'];

/**
 * Publication metadata. Carried through the pipeline untouched; only the
 * renderer reads it.
 */
export interface DocumentFrontmatter {
  title: string;
  subtitle?: string;
  docNumber?: string;
  date?: string;
  publicationDate?: string;
  keywords?: readonly string[];
}

/**
 * Canonical (or translated) document
 *
 * A translated document has the same block count, the same block type at
 * every position and the same figure/table ordinals as its source.
 */
export interface GuidelineDocument {
  frontmatter: DocumentFrontmatter;
  blocks: readonly Block[];
}
