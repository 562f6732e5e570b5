import type { LoggerMethods } from '@tgdoc/logger';
import type {
  DropReason,
  DroppedAsset,
  VisualAsset,
  VisualAssetKind,
  VisualAssetOrigin,
} from '@tgdoc/model';

import { ConcurrentPool } from '@tgdoc/shared';
import { sortBy } from 'es-toolkit';

import { COVER_PAGE_INDEX, VISUAL_ASSET_FILTER } from '../config/constants';
import {
  type RawPixels,
  computePixelStatistics,
  decodePixels,
} from './pixel-statistics';

/**
 * Outcome of classifying one image
 */
export type FilterDecision =
  | { action: 'keep'; kind: VisualAssetKind }
  | { action: 'drop'; reason: DropReason };

/**
 * Where an image sits on its page
 */
export interface ImagePosition {
  origin: VisualAssetOrigin;
  /**
   * Image index (embedded images) or region ordinal (table screenshots)
   */
  index: number;
}

/**
 * Image waiting for classification
 */
export interface AssetCandidate extends ImagePosition {
  /**
   * 1-based page index
   */
  page: number;
  image: Buffer;
}

export interface AdmissionResult {
  /**
   * Kept assets in (page, origin, index) order
   */
  assets: VisualAsset[];
  dropped: DroppedAsset[];
}

export interface VisualAssetFilterOptions {
  /** Variance below which an image is uniform (default: 1.0) */
  varianceThreshold?: number;
  /** Near-black luminance cutoff (default: 15) */
  blackCutoff?: number;
  /** Near-white luminance cutoff (default: 240) */
  whiteCutoff?: number;
  /** Fraction of near-black or near-white pixels that drops an image (default: 0.98) */
  dominanceThreshold?: number;
  /** Images decoded in parallel during admit() (default: 4) */
  concurrency?: number;
  /** Image decoder, sharp by default */
  decodePixels?: (image: Buffer) => Promise<RawPixels>;
}

/**
 * Per-kind ordinal source. Ordinals start at 1 and are only handed out for
 * kept assets.
 */
export class OrdinalCounter {
  private readonly counts: Record<VisualAssetKind, number> = {
    figure: 0,
    table: 0,
  };

  next(kind: VisualAssetKind): number {
    return ++this.counts[kind];
  }
}

/**
 * Decides which extracted images are worth publishing.
 *
 * Everything on the cover page is dropped, table screenshots included. Other
 * table screenshots are always kept. Solid-colour images and images that are
 * almost entirely near-black or near-white are dropped. Variance is checked
 * before colour dominance.
 */
export class VisualAssetFilter {
  private readonly varianceThreshold: number;
  private readonly blackCutoff: number;
  private readonly whiteCutoff: number;
  private readonly dominanceThreshold: number;
  private readonly concurrency: number;
  private readonly decode: (image: Buffer) => Promise<RawPixels>;

  constructor(
    private readonly logger: LoggerMethods,
    options: VisualAssetFilterOptions = {},
  ) {
    this.varianceThreshold =
      options.varianceThreshold ?? VISUAL_ASSET_FILTER.VARIANCE_THRESHOLD;
    this.blackCutoff = options.blackCutoff ?? VISUAL_ASSET_FILTER.BLACK_CUTOFF;
    this.whiteCutoff = options.whiteCutoff ?? VISUAL_ASSET_FILTER.WHITE_CUTOFF;
    this.dominanceThreshold =
      options.dominanceThreshold ?? VISUAL_ASSET_FILTER.DOMINANCE_THRESHOLD;
    this.concurrency = options.concurrency ?? VISUAL_ASSET_FILTER.CONCURRENCY;
    this.decode = options.decodePixels ?? decodePixels;
  }

  /**
   * Classify a single image. Does not assign ordinals.
   */
  async classify(
    image: Buffer,
    page: number,
    position: ImagePosition,
  ): Promise<FilterDecision> {
    if (page === COVER_PAGE_INDEX) {
      return { action: 'drop', reason: 'cover-page' };
    }

    if (position.origin === 'table-region') {
      return { action: 'keep', kind: 'table' };
    }

    const stats = computePixelStatistics(await this.decode(image), {
      black: this.blackCutoff,
      white: this.whiteCutoff,
    });

    if (stats.variance < this.varianceThreshold) {
      return { action: 'drop', reason: 'uniform' };
    }

    if (
      stats.darkFraction > this.dominanceThreshold ||
      stats.lightFraction > this.dominanceThreshold
    ) {
      return { action: 'drop', reason: 'dominant-extreme' };
    }

    return { action: 'keep', kind: 'figure' };
  }

  /**
   * Classify all candidates, then assign ordinals in one sequential pass.
   *
   * Classification runs concurrently. Ordinals are assigned afterwards in
   * (page, origin, index) order, so the result does not depend on which
   * decode finished first.
   *
   * @param candidates - Images of the whole document
   * @param counter - Ordinal source, shared when admitting in several calls
   */
  async admit(
    candidates: readonly AssetCandidate[],
    counter: OrdinalCounter = new OrdinalCounter(),
  ): Promise<AdmissionResult> {
    const decisions = await ConcurrentPool.run(
      candidates,
      this.concurrency,
      (candidate) => this.classify(candidate.image, candidate.page, candidate),
    );

    const ordered = sortBy(
      candidates.map((candidate, i) => ({ candidate, decision: decisions[i] })),
      [
        (entry) => entry.candidate.page,
        (entry) => entry.candidate.origin,
        (entry) => entry.candidate.index,
      ],
    );

    const assets: VisualAsset[] = [];
    const dropped: DroppedAsset[] = [];

    for (const { candidate, decision } of ordered) {
      if (decision.action === 'drop') {
        dropped.push({
          origin: candidate.origin,
          sourcePage: candidate.page,
          sourceIndex: candidate.index,
          reason: decision.reason,
        });
        continue;
      }

      assets.push({
        kind: decision.kind,
        sourcePage: candidate.page,
        sourceIndex: candidate.index,
        ordinal: counter.next(decision.kind),
        image: candidate.image,
      });
    }

    const figureCount = assets.filter((a) => a.kind === 'figure').length;
    this.logger.info(
      `[VisualAssetFilter] Kept ${figureCount} figures and ${assets.length - figureCount} tables, dropped ${dropped.length} images`,
    );

    return { assets, dropped };
  }
}
