/**
 * Display - picks the text or HTML renderer and owns HTML style state
 */

import { listToTable, objectToTable, type ColumnSelection } from '../table/adapters.js';
import { HtmlTable, STYLES, wrap } from '../table/html-table.js';
import { TextTable } from '../table/text-table.js';
import type { BaseTable } from '../table/base-table.js';
import type { Headers, Row } from '../table/types.js';
import { StreamHtmlSink, type HtmlSink } from './sink.js';

export type DisplayMode = 'text' | 'html';

export interface DisplayOptions {
  /** Destination for HTML fragments (default: stdout) */
  sink?: HtmlSink;
  /** Line writer for text output (default: console.log) */
  write?: (line: string) => void;
}

export class Display {
  private currentMode: DisplayMode = 'text';
  /** Flips to true, once, when the style block has been sent to the sink */
  private htmlInitialized = false;
  private readonly sink: HtmlSink;
  private readonly write: (line: string) => void;

  constructor(options: DisplayOptions = {}) {
    this.sink = options.sink ?? new StreamHtmlSink();
    this.write = options.write ?? console.log;
  }

  get mode(): DisplayMode {
    return this.currentMode;
  }

  get stylesEmitted(): boolean {
    return this.htmlInitialized;
  }

  text(): void {
    this.currentMode = 'text';
  }

  /**
   * Switch to HTML output; the style block is emitted on first use only
   */
  html(): void {
    this.currentMode = 'html';
    if (!this.htmlInitialized) {
      this.sink.display(STYLES);
      this.htmlInitialized = true;
    }
  }

  /**
   * A fresh renderer for the current mode
   */
  table(): BaseTable {
    if (this.currentMode === 'html') {
      return new HtmlTable(this.sink);
    }
    return new TextTable(this.write);
  }

  alert(msg: string): void {
    if (this.currentMode === 'html') {
      this.sink.display(wrap(`<span class="polaris-alert">${msg}</span>`));
    } else {
      this.write(msg);
    }
  }

  message(msg: string): void {
    if (this.currentMode === 'html') {
      this.sink.display(wrap(msg));
    } else {
      this.write(msg);
    }
  }

  showTable(rows: readonly Row[], headers?: Headers): void {
    const table = this.table();
    table.headers(headers);
    table.show(rows);
  }

  showObject(obj: Record<string, unknown>, labels?: ColumnSelection): void {
    const { headers, rows } = objectToTable(obj, labels);
    this.showTable(rows, headers);
  }

  showObjectList(objects: ReadonlyArray<Record<string, unknown>>, columns?: ColumnSelection): void {
    const { headers, rows } = listToTable(objects, columns);
    this.showTable(rows, headers);
  }
}
