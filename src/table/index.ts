export type {
  Alignment,
  AlignmentHints,
  Cell,
  CellValue,
  ColumnFormat,
  Headers,
  Row,
  RowWidth,
  TableData,
} from './types.js';
export { BaseTable, alignmentFor, cellText } from './base-table.js';
export type { PreparedTable } from './base-table.js';
export { TextTable, justify, COLUMN_GAP } from './text-table.js';
export { HtmlTable, STYLES, ALIGN_CLASSES, startTag, wrap } from './html-table.js';
export { objectToTable, listToTable, inferKeys, toCell, OBJECT_HEADERS } from './adapters.js';
export type { ColumnSelection } from './adapters.js';
