/**
 * Table data model
 */

/** A present cell value */
export type CellValue = string | number | boolean | null;

/** A cell: a present value, or a hole (`undefined`) */
export type Cell = CellValue | undefined;

/** One table row; rows of a table may differ in length */
export type Row = Cell[];

/** Header labels; holes render as empty labels */
export type Headers = Array<string | undefined>;

export type Alignment = 'left' | 'center' | 'right';

/** Per-column alignment hints; `undefined` entries are inferred */
export type AlignmentHints = Array<Alignment | undefined>;

/**
 * Per-column format hint.
 * Stored with the table but not applied by the built-in renderers.
 */
export type ColumnFormat = string | undefined;

export interface RowWidth {
  minWidth: number;
  maxWidth: number;
}

/**
 * Header + body pair produced by the object adapters
 */
export interface TableData {
  headers: Headers;
  rows: Row[];
}
