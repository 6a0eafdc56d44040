/**
 * Object-to-table adapters
 *
 * Turn a single object, or a list of objects, into the header + rows shape
 * the renderers consume.
 */

import type { Cell, Row, TableData } from './types.js';

/**
 * Ordered selection of columns: object key -> column label
 */
export type ColumnSelection = Record<string, string>;

export const OBJECT_HEADERS = ['Key', 'Value'];

/**
 * Convert an arbitrary value to a cell.
 * Nested objects and arrays are shown as JSON text.
 */
export function toCell(value: unknown): Cell {
  switch (typeof value) {
    case 'undefined':
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'bigint':
      return value.toString();
    case 'object':
      return value === null ? null : JSON.stringify(value);
    default:
      return String(value);
  }
}

/**
 * Identity selection (key labels itself) over an object's own keys,
 * or over the first object's keys when given a list
 */
export function inferKeys(
  data: Record<string, unknown> | ReadonlyArray<Record<string, unknown>>
): ColumnSelection {
  let sample: Record<string, unknown>;
  if (isObjectList(data)) {
    if (data.length === 0) {
      throw new Error('cannot infer columns from an empty list');
    }
    sample = data[0];
  } else {
    sample = data;
  }
  const keys: ColumnSelection = {};
  for (const key of Object.keys(sample)) {
    keys[key] = key;
  }
  return keys;
}

/**
 * Two-column Key/Value table of the selected keys of one object
 */
export function objectToTable(obj: Record<string, unknown>, labels?: ColumnSelection): TableData {
  const selection = labels ?? inferKeys(obj);
  const rows: Row[] = Object.entries(selection).map(([key, label]) => [label, field(obj, key)]);
  return { headers: [...OBJECT_HEADERS], rows };
}

/**
 * One row per object; keys an object lacks become holes
 */
export function listToTable(
  objects: ReadonlyArray<Record<string, unknown>>,
  columns?: ColumnSelection
): TableData {
  const selection = columns ?? inferKeys(objects);
  const keys = Object.keys(selection);
  const rows: Row[] = objects.map((obj) => keys.map((key) => field(obj, key)));
  return { headers: Object.values(selection), rows };
}

function field(obj: Record<string, unknown>, key: string): Cell {
  return Object.hasOwn(obj, key) ? toCell(obj[key]) : undefined;
}

function isObjectList(
  data: Record<string, unknown> | ReadonlyArray<Record<string, unknown>>
): data is ReadonlyArray<Record<string, unknown>> {
  return Array.isArray(data);
}
