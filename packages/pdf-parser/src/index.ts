export {
  PDFParser,
  type ParsePdfOptions,
  type ParsedPdf,
} from './core/pdf-parser';
export { ExtractionError } from './errors/extraction-error';
export {
  type AdmissionResult,
  type AssetCandidate,
  type FilterDecision,
  type ImagePosition,
  OrdinalCounter,
  VisualAssetFilter,
  type VisualAssetFilterOptions,
} from './filters/visual-asset-filter';
export {
  type PixelStatistics,
  type RawPixels,
  computePixelStatistics,
  decodePixels,
} from './filters/pixel-statistics';
export {
  PopplerPageExtractor,
  type PopplerPageExtractorOptions,
} from './processors/poppler-page-extractor';
export {
  TableDetector,
  type TableDetectorOptions,
} from './processors/table-detector';
export {
  PageRasterizer,
  type PageRasterizerOptions,
} from './processors/page-rasterizer';
export type {
  LayoutBlock,
  LayoutLine,
  LayoutWord,
  PageLayout,
} from './types/page-layout';
