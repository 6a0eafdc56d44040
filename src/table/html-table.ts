/**
 * HTML table renderer
 *
 * Cell content is inserted as-is (no escaping); callers pass trusted text.
 */

import { BaseTable, cellText } from './base-table.js';
import type { HtmlSink } from '../display/sink.js';
import type { Alignment, Row } from './types.js';

/** Class applied to the wrapper div of every HTML fragment */
export const WRAPPER_CLASS = 'polaris';

/** CSS classes for each resolved alignment */
export const ALIGN_CLASSES: Record<Alignment, string> = {
  left: 'polaris-left',
  center: 'polaris-center',
  right: 'polaris-right',
};

/**
 * Style block for the table classes
 */
export const STYLES = `
<style>
  .polaris table {
    border: 1px solid black;
    border-collapse: collapse;
  }

  .polaris th, .polaris td {
    padding: 4px 1em;
    text-align: left;
  }

  td.polaris-right, th.polaris-right {
    text-align: right;
  }

  td.polaris-center, th.polaris-center {
    text-align: center;
  }

  .polaris .polaris-left {
    text-align: left;
  }

  .polaris-alert {
    color: red;
  }
</style>
`;

/**
 * Wrap a fragment in the styled container
 */
export function wrap(markup: string): string {
  return `<div class="${WRAPPER_CLASS}">${markup}</div>`;
}

export function startTag(tag: string, align?: Alignment): string {
  if (align === undefined) {
    return `<${tag}>`;
  }
  return `<${tag} class="${ALIGN_CLASSES[align]}">`;
}

export class HtmlTable extends BaseTable {
  constructor(private readonly sink: HtmlSink) {
    super();
  }

  /**
   * Render the table as markup, one element row per line
   */
  format(rows: readonly Row[]): string {
    const table = this.prepare(rows);
    const lines: string[] = [];

    if (table.headers) {
      const cells = table.headers.map(
        (label, i) => `${startTag('th', table.align[i])}${label}</th>`
      );
      lines.push(`<tr>${cells.join('')}</tr>`);
    }
    for (const row of table.rows) {
      const cells = row.map(
        (cell, i) => `${startTag('td', table.align[i])}${cellText(cell)}</td>`
      );
      lines.push(`<tr>${cells.join('')}</tr>`);
    }

    if (lines.length === 0) {
      return '<table></table>';
    }
    return ['<table>', ...lines, '</table>'].join('\n');
  }

  show(rows: readonly Row[]): void {
    this.sink.display(wrap(this.format(rows)));
  }
}
