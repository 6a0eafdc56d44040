/**
 * Table - handle on one Polaris table
 */

import type { Display } from '../display/display.js';
import type { ColumnSelection } from '../table/adapters.js';
import type { PolarisClient } from './client.js';
import { NotFoundError, PolarisApiError } from './errors.js';
import type { PushEvent, SchemaColumn, TableDetails, TableSummary } from './types.js';

export const SUMMARY_LABELS: ColumnSelection = {
  name: 'Name',
  id: 'ID',
  version: 'Version',
  lastUpdateDateTime: 'Last Update',
  lastModifiedByUsername: 'Updated By',
  createdByUsername: 'Created By',
  timePartitioning: 'Time Partitioning',
  pushEndpointUrl: 'Push Endpoint',
};

export const DETAIL_LABELS: ColumnSelection = {
  ...SUMMARY_LABELS,
  status: 'Status',
  totalDataSize: 'Data Size (bytes)',
  totalRows: 'Row Count',
};

export const SCHEMA_COLUMNS: ColumnSelection = { name: 'Name', type: 'Type' };

export class Table {
  readonly name: string;
  readonly id: string;
  private cachedSchema: SchemaColumn[] | null = null;

  constructor(
    private readonly client: PolarisClient,
    info: Pick<TableSummary, 'name' | 'id'>
  ) {
    this.name = info.name;
    this.id = info.id;
  }

  getClient(): PolarisClient {
    return this.client;
  }

  async description(): Promise<string | undefined> {
    const info = await this.client.resolveTableName(this.name);
    return info?.description;
  }

  async summary(): Promise<TableSummary> {
    return this.client.tableSummary(this.id);
  }

  async details(): Promise<TableDetails> {
    return this.client.tableDetails(this.id);
  }

  /**
   * Columns accepted by the push API. Does not include the mandatory
   * `__time` column.
   */
  async inputSchema(): Promise<SchemaColumn[] | undefined> {
    const details = await this.details();
    return details.inputSchema;
  }

  /**
   * Table schema, fetched once and cached
   */
  async schema(): Promise<SchemaColumn[]> {
    if (this.cachedSchema === null) {
      const schemas = await this.client.schemas();
      const schema = schemas[this.name];
      if (schema === undefined) {
        throw new NotFoundError(`Schema not found for table '${this.name}'`);
      }
      this.cachedSchema = schema.columns;
    }
    return this.cachedSchema;
  }

  async showSummary(): Promise<void> {
    this.display().showObject(await this.summary(), SUMMARY_LABELS);
  }

  async showDetails(): Promise<void> {
    this.display().showObject(await this.details(), DETAIL_LABELS);
  }

  async showInputSchema(): Promise<void> {
    const schema = await this.inputSchema();
    if (schema === undefined || schema.length === 0) {
      return;
    }
    this.display().showObjectList(schema, SCHEMA_COLUMNS);
  }

  async showSchema(): Promise<void> {
    this.display().showObjectList(await this.schema(), SCHEMA_COLUMNS);
  }

  /**
   * Insert rows through the push API.
   *
   * Rows must match the input schema. Events with a `__time` older than
   * about a week are silently dropped by Polaris.
   */
  async insert(rows: PushEvent | PushEvent[]): Promise<void> {
    await this.client.pushEvents(this.id, rows);
  }

  /**
   * Drop this table and its data. Deletion completes asynchronously on the
   * server; poll exists() before re-creating a table of the same name.
   */
  async drop(): Promise<void> {
    await this.client.dropTable(this.id);
  }

  async exists(): Promise<boolean> {
    try {
      await this.details();
      return true;
    } catch (error) {
      if (error instanceof PolarisApiError && error.status === 404) {
        return false;
      }
      throw error;
    }
  }

  async enablePush(): Promise<void> {
    await this.client.enablePushForTable(this.id);
  }

  async disablePush(): Promise<void> {
    await this.client.disablePushForTable(this.id);
  }

  async isPushEnabled(): Promise<boolean> {
    const details = await this.details();
    return typeof details.pushEndpointUrl === 'string';
  }

  private display(): Display {
    return this.client.show().display;
  }
}
