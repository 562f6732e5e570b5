/**
 * Axis-aligned box in PDF points, origin at the top-left of the page.
 *
 * Order follows the extraction tools: `[x0, top, x1, bottom]`.
 */
export type BoundingBox = readonly [
  x0: number,
  top: number,
  x1: number,
  bottom: number,
];

/**
 * Tabular region detected on a page
 *
 * Consumed twice: once as a `[TABLE]` placeholder inside the page text and
 * once as a crop request for the table screenshot.
 */
export interface TableRegion {
  /**
   * 1-based page index the region was detected on
   */
  pageIndex: number;

  boundingBox: BoundingBox;

  /**
   * 0-based position among the regions of the same page, in detection order
   * (top-to-bottom, then left-to-right)
   */
  ordinal: number;
}

/**
 * Ordered unit of extracted input
 */
export interface Page {
  /**
   * 1-based page index
   */
  index: number;

  /**
   * Plain page text. Lines are separated by `\n` and flow blocks by two
   * blank lines. Every table region outside the cover page is replaced by a
   * single `[TABLE]` line.
   */
  rawText: string;

  tableRegions: readonly TableRegion[];
}
