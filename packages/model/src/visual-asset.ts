/**
 * Kind of raster asset kept for the publication
 */
export type VisualAssetKind = 'figure' | 'table';

/**
 * Where a candidate image came from.
 *
 * - `embedded-image`: an image object found inside the page
 * - `table-region`: a screenshot requested for a detected table
 */
export type VisualAssetOrigin = 'embedded-image' | 'table-region';

/**
 * Reason an image candidate was dropped
 */
export type DropReason = 'cover-page' | 'uniform' | 'dominant-extreme';

/**
 * Kept image with its final ordinal
 *
 * Ordinals are 1-based, dense and monotonic per kind. A dropped candidate
 * never receives one.
 */
export interface VisualAsset {
  kind: VisualAssetKind;

  /**
   * 1-based page the asset came from
   */
  sourcePage: number;

  /**
   * Image index (embedded images) or region ordinal (tables) on the page
   */
  sourceIndex: number;

  ordinal: number;

  /**
   * PNG bytes
   */
  image: Buffer;
}

/**
 * Candidate that did not survive filtering
 */
export interface DroppedAsset {
  origin: VisualAssetOrigin;
  sourcePage: number;
  sourceIndex: number;
  reason: DropReason;
}
