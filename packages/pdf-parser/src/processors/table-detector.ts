import type { BoundingBox, TableRegion } from '@tgdoc/model';

import { sortBy } from 'es-toolkit';

import type { LayoutWord, PageLayout } from '../types/page-layout';

import { TABLE_DETECTION } from '../config/constants';
import { unionBoxes } from './bbox-layout-parser';

export interface TableDetectorOptions {
  /**
   * Minimum number of consecutive rows (default: 3)
   */
  minRows?: number;

  /**
   * Minimum number of columns per row (default: 2)
   */
  minColumns?: number;

  /**
   * Gap in points that separates two columns (default: 12)
   */
  columnGap?: number;

  /**
   * Allowed column count deviation from the run's first row (default: 1)
   */
  columnTolerance?: number;
}

/**
 * Visual row: words of the page that share a baseline, left to right
 */
export interface LayoutRow {
  words: LayoutWord[];
  box: BoundingBox;
}

function verticalCenter(box: BoundingBox): number {
  return (box[1] + box[3]) / 2;
}

/**
 * Finds tabular regions from word geometry.
 *
 * Rows are rebuilt from all words of the page, since pdftotext often splits
 * table cells into separate flow blocks. A table is a run of consecutive rows
 * that each split into several columns at wide horizontal gaps and whose
 * column count stays close to the run's first row.
 */
export class TableDetector {
  private readonly minRows: number;
  private readonly minColumns: number;
  private readonly columnGap: number;
  private readonly columnTolerance: number;

  constructor(options: TableDetectorOptions = {}) {
    this.minRows = options.minRows ?? TABLE_DETECTION.MIN_ROWS;
    this.minColumns = options.minColumns ?? TABLE_DETECTION.MIN_COLUMNS;
    this.columnGap = options.columnGap ?? TABLE_DETECTION.COLUMN_GAP_PT;
    this.columnTolerance =
      options.columnTolerance ?? TABLE_DETECTION.COLUMN_COUNT_TOLERANCE;
  }

  /**
   * Detect table regions on one page, ordered top to bottom.
   */
  detect(layout: PageLayout): TableRegion[] {
    const rows = TableDetector.groupRows(layout);
    const columnCounts = rows.map((row) => this.countColumns(row));
    const regions: TableRegion[] = [];

    let start = 0;
    while (start < rows.length) {
      const firstCount = columnCounts[start];
      if (firstCount < this.minColumns) {
        start++;
        continue;
      }

      let end = start + 1;
      while (
        end < rows.length &&
        columnCounts[end] >= this.minColumns &&
        Math.abs(columnCounts[end] - firstCount) <= this.columnTolerance
      ) {
        end++;
      }

      if (end - start >= this.minRows) {
        regions.push({
          pageIndex: layout.pageIndex,
          boundingBox: unionBoxes(
            rows.slice(start, end).map((row) => row.box),
          ),
          ordinal: regions.length,
        });
        start = end;
      } else {
        start++;
      }
    }

    return regions;
  }

  /**
   * Number of columns in a row: one more than the number of wide gaps
   */
  countColumns(row: LayoutRow): number {
    let columns = 1;
    for (let i = 1; i < row.words.length; i++) {
      if (row.words[i].box[0] - row.words[i - 1].box[2] >= this.columnGap) {
        columns++;
      }
    }
    return columns;
  }

  /**
   * Group every word of the page into visual rows, top to bottom.
   */
  static groupRows(
    layout: PageLayout,
    tolerance: number = TABLE_DETECTION.ROW_TOLERANCE_PT,
  ): LayoutRow[] {
    const words = layout.blocks.flatMap((block) =>
      block.lines.flatMap((line) => line.words),
    );
    const byCenter = sortBy(words, [(word) => verticalCenter(word.box)]);

    const groups: LayoutWord[][] = [];
    let rowCenter = Number.NEGATIVE_INFINITY;
    for (const word of byCenter) {
      const center = verticalCenter(word.box);
      const current = groups.at(-1);
      if (current && Math.abs(center - rowCenter) <= tolerance) {
        current.push(word);
      } else {
        groups.push([word]);
        rowCenter = center;
      }
    }

    return groups.map((group) => {
      const ordered = sortBy(group, [(word) => word.box[0]]);
      return {
        words: ordered,
        box: unionBoxes(ordered.map((word) => word.box)),
      };
    });
  }
}
