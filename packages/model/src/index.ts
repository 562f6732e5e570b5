export type { BoundingBox, Page, TableRegion } from './page';
export type {
  DropReason,
  DroppedAsset,
  VisualAsset,
  VisualAssetKind,
  VisualAssetOrigin,
} from './visual-asset';
export type {
  Block,
  BlockType,
  DocumentFrontmatter,
  FigureRefBlock,
  GuidelineDocument,
  HeadingBlock,
  HeadingLevel,
  PageBreakBlock,
  ParagraphBlock,
  ReferenceEntryBlock,
  TableRefBlock,
} from './guideline-document';
export type { GlossaryEntry } from './glossary';
export type {
  AssemblyReport,
  AssemblyWarning,
  FailedUnit,
  ProcessingSummary,
  TranslationReport,
  UnitFailureReason,
} from './processing-report';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
