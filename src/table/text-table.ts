/**
 * Fixed-width text table renderer
 */

import { BaseTable, cellText } from './base-table.js';
import type { Alignment, Row } from './types.js';

/** Separator between columns */
export const COLUMN_GAP = '  ';

/**
 * Justify text within a column of the given width
 */
export function justify(text: string, width: number, align: Alignment): string {
  switch (align) {
    case 'right':
      return text.padStart(width);
    case 'center': {
      const left = Math.floor((width - text.length) / 2);
      return (' '.repeat(Math.max(left, 0)) + text).padEnd(width);
    }
    default:
      return text.padEnd(width);
  }
}

export class TextTable extends BaseTable {
  /**
   * @param write Line writer (default: console.log)
   */
  constructor(private readonly write: (line: string) => void = console.log) {
    super();
  }

  /**
   * Render the table as lines of text joined by newlines.
   * Trailing whitespace is trimmed from every line.
   */
  format(rows: readonly Row[]): string {
    return this.formatLines(rows).join('\n');
  }

  show(rows: readonly Row[]): void {
    for (const line of this.formatLines(rows)) {
      this.write(line);
    }
  }

  private formatLines(rows: readonly Row[]): string[] {
    const table = this.prepare(rows);
    const body = table.rows.map((row) => row.map(cellText));

    const widths: number[] = [];
    for (let i = 0; i < table.width; i++) {
      widths.push(table.headers?.[i]?.length ?? 0);
    }
    for (const cells of body) {
      for (let i = 0; i < table.width; i++) {
        widths[i] = Math.max(widths[i], cells[i].length);
      }
    }

    const formatLine = (cells: string[]): string =>
      cells
        .map((text, i) => justify(text, widths[i], table.align[i]))
        .join(COLUMN_GAP)
        .trimEnd();

    const lines: string[] = [];
    if (table.headers) {
      lines.push(formatLine(table.headers));
    }
    for (const cells of body) {
      lines.push(formatLine(cells));
    }
    return lines;
  }
}
