/**
 * Base table engine
 *
 * Shared by the text and HTML renderers: works out the table width from
 * ragged rows, resolves column alignment and pads rows/headers so every
 * renderer sees a rectangular table.
 */

import { pad, padded } from '../utils/pad.js';
import type {
  Alignment,
  AlignmentHints,
  Cell,
  CellValue,
  ColumnFormat,
  Headers,
  Row,
  RowWidth,
} from './types.js';

/**
 * Alignment implied by a present cell value
 */
export function alignmentFor(value: CellValue): Alignment {
  return typeof value === 'string' ? 'left' : 'right';
}

/**
 * Printed form of a cell (holes print as empty)
 */
export function cellText(cell: Cell): string {
  return cell === undefined ? '' : String(cell);
}

export abstract class BaseTable {
  protected headerLabels?: Headers;
  protected alignHints?: AlignmentHints;
  protected columnFormats?: ColumnFormat[];

  headers(headers: Headers | undefined): void {
    this.headerLabels = headers;
  }

  alignments(align: AlignmentHints | undefined): void {
    this.alignHints = align;
  }

  colFormat(formats: ColumnFormat[] | undefined): void {
    this.columnFormats = formats;
  }

  getColFormat(): ColumnFormat[] | undefined {
    return this.columnFormats;
  }

  /**
   * Narrowest and widest lengths among the headers (if set) and rows.
   * With nothing to measure, both are 0.
   */
  rowWidth(rows: readonly Row[]): RowWidth {
    let maxWidth = 0;
    let minWidth: number | undefined;
    if (this.headerLabels !== undefined) {
      maxWidth = this.headerLabels.length;
      minWidth = maxWidth;
    }
    for (const row of rows) {
      maxWidth = Math.max(maxWidth, row.length);
      minWidth = minWidth === undefined ? row.length : Math.min(minWidth, row.length);
    }
    return { minWidth: minWidth ?? maxWidth, maxWidth };
  }

  /**
   * Resolve one alignment per column.
   *
   * Explicit hints win. Each remaining column takes its alignment from the
   * first non-hole value found scanning rows top to bottom; the scan stops
   * once every column is resolved. Columns holding only holes are left.
   */
  findAlignments(rows: readonly Row[], width: number): Alignment[] {
    const align = padded(this.alignHints, width, undefined).slice(0, width);
    let unknown = align.filter((a) => a === undefined).length;

    for (const row of rows) {
      if (unknown === 0) {
        break;
      }
      const limit = Math.min(row.length, width);
      for (let i = 0; i < limit && unknown > 0; i++) {
        const value = row[i];
        if (align[i] !== undefined || value === undefined) {
          continue;
        }
        align[i] = alignmentFor(value);
        unknown--;
      }
    }

    return align.map((a) => a ?? 'left');
  }

  /**
   * New rows padded with holes to `width`; the input rows are untouched
   */
  padRows(rows: readonly Row[], width: number): Row[] {
    return rows.map((row) => padded<Cell>(row, width, undefined));
  }

  /**
   * Headers ready for rendering, or undefined when there are none.
   * Returns the stored array itself when it needs no changes.
   */
  padHeaders(width: number): string[] | undefined {
    const headers = this.headerLabels;
    if (headers === undefined || headers.length === 0) {
      return undefined;
    }
    if (headers.length >= width && isComplete(headers)) {
      return headers;
    }
    return pad(
      headers.map((h) => h ?? ''),
      width,
      ''
    );
  }

  /**
   * Width, alignment and padding in one pass, for renderers
   */
  protected prepare(rows: readonly Row[]): PreparedTable {
    const { maxWidth } = this.rowWidth(rows);
    return {
      width: maxWidth,
      headers: this.padHeaders(maxWidth),
      align: this.findAlignments(rows, maxWidth),
      rows: this.padRows(rows, maxWidth),
    };
  }

  abstract show(rows: readonly Row[]): void;
}

/**
 * Rendering context for a single call
 */
export interface PreparedTable {
  width: number;
  headers?: string[];
  align: Alignment[];
  rows: Row[];
}

function isComplete(headers: Headers): headers is string[] {
  return headers.every((h) => h !== undefined);
}
