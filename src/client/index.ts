export { PolarisClient } from './client.js';
export type { PolarisClientOptions, RequestOptions } from './client.js';
export { Table, SUMMARY_LABELS, DETAIL_LABELS, SCHEMA_COLUMNS } from './table.js';
export { Show, toMb, PROJECT_HEADERS, PROJECT_LABELS } from './show.js';
export { PolarisApiError, NotFoundError, extractErrorMessage } from './errors.js';
export * from './endpoints.js';
export type * from './types.js';
