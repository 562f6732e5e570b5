/**
 * Page whose images and tables are never published
 */
export const COVER_PAGE_INDEX = 1;

/**
 * Configuration constants for PopplerPageExtractor
 */
export const PAGE_EXTRACTION = {
  /**
   * Timeout for a single pdfinfo/pdftotext run in milliseconds
   */
  COMMAND_TIMEOUT_MS: 120000,

  /**
   * Placeholder line that replaces every table region in the page text,
   * except on the cover page
   */
  TABLE_PLACEHOLDER: '[TABLE]',
} as const;

/**
 * Configuration constants for TableDetector
 */
export const TABLE_DETECTION = {
  /**
   * Minimum number of consecutive rows that form a table
   */
  MIN_ROWS: 3,

  /**
   * Minimum number of word columns per row
   */
  MIN_COLUMNS: 2,

  /**
   * Horizontal gap (points) between words that starts a new column
   */
  COLUMN_GAP_PT: 12,

  /**
   * Allowed deviation of a row's column count from the run's first row
   */
  COLUMN_COUNT_TOLERANCE: 1,

  /**
   * Words whose vertical centres are this close (points) share a row
   */
  ROW_TOLERANCE_PT: 2,
} as const;

/**
 * Configuration constants for PageRasterizer
 */
export const PAGE_RASTERIZER = {
  /**
   * ImageMagick density (DPI) for table screenshots
   */
  DENSITY: 300,

  /**
   * PDF user space units per inch
   */
  POINTS_PER_INCH: 72,

  /**
   * Margin (points) added around a table region before cropping
   */
  CROP_MARGIN_PT: 4,

  COMMAND_TIMEOUT_MS: 120000,
} as const;

/**
 * Configuration constants for VisualAssetFilter
 */
export const VISUAL_ASSET_FILTER = {
  /**
   * Pixel variance below which an image counts as a solid colour
   */
  VARIANCE_THRESHOLD: 1.0,

  /**
   * Luminance below which a pixel counts as near-black
   */
  BLACK_CUTOFF: 15,

  /**
   * Luminance above which a pixel counts as near-white
   */
  WHITE_CUTOFF: 240,

  /**
   * Fraction of near-black or near-white pixels that marks an image as blank
   */
  DOMINANCE_THRESHOLD: 0.98,

  /**
   * Number of images decoded in parallel
   */
  CONCURRENCY: 4,
} as const;
