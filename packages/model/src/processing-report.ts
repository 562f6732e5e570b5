import type { DroppedAsset } from './visual-asset';
import type { TokenUsageReport } from './token-usage-report';

/**
 * Non-fatal problem found while assembling the document
 */
export interface AssemblyWarning {
  /**
   * W001 reference numbering gap, W002 reference numbering repeat,
   * W003 asset on a page that was never assembled
   */
  code: 'W001' | 'W002' | 'W003';
  message: string;
  pageIndex: number;
}

export interface AssemblyReport {
  warnings: AssemblyWarning[];
}

/**
 * Why a translation unit kept its source text
 */
export type UnitFailureReason = 'integrity' | 'backend';

export interface FailedUnit {
  /**
   * Position of the owning block in the document
   */
  blockIndex: number;

  /**
   * Position of the unit inside the block
   */
  unitIndex: number;
  reason: UnitFailureReason;
  message: string;
}

export interface TranslationReport {
  targetLanguage: string;
  totalUnits: number;
  translatedUnits: number;
  failedUnits: FailedUnit[];
}

/**
 * Counts reported at the end of a run
 */
export interface ProcessingSummary {
  pageCount: number;
  figureCount: number;
  tableCount: number;
  droppedAssets: DroppedAsset[];

  /**
   * Lines whose heading score fell just short of the threshold and were
   * kept as body text
   */
  ambiguousLineCount: number;
  assembly: AssemblyReport;
  translation: TranslationReport;
  usage: TokenUsageReport;
}
