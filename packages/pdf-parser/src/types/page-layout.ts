import type { BoundingBox } from '@tgdoc/model';

/**
 * Word with its box as reported by `pdftotext -bbox-layout`
 */
export interface LayoutWord {
  text: string;
  box: BoundingBox;
}

/**
 * Text line inside a flow block
 */
export interface LayoutLine {
  words: LayoutWord[];

  /**
   * Union of the word boxes
   */
  box: BoundingBox;
}

/**
 * Flow block, usually one paragraph
 */
export interface LayoutBlock {
  lines: LayoutLine[];
}

/**
 * Word geometry of one page, in reading order
 */
export interface PageLayout {
  /**
   * 1-based page index
   */
  pageIndex: number;
  width: number;
  height: number;
  blocks: LayoutBlock[];
}
