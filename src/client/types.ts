/**
 * Polaris API payload types
 *
 * Only the fields this client reads are spelled out; payloads carry more.
 */

export interface OAuthToken {
  access_token: string;
  token_type?: string;
  expires_in?: number;
  [key: string]: unknown;
}

/**
 * List endpoints wrap their results in `values`
 */
export interface ListResponse<T> {
  values: T[];
}

export interface TableSummary {
  id: string;
  name: string;
  description?: string;
  version?: number;
  lastUpdateDateTime?: string;
  lastModifiedByUsername?: string;
  createdByUsername?: string;
  timePartitioning?: string;
  pushEndpointUrl?: string | null;
  [key: string]: unknown;
}

export interface SchemaColumn {
  name: string;
  type: string;
  [key: string]: unknown;
}

export interface TableDetails extends TableSummary {
  status?: string;
  totalDataSize?: number;
  totalRows?: number;
  inputSchema?: SchemaColumn[];
}

/**
 * Body of POST /tables
 */
export interface TableRequest {
  name: string;
  description?: string;
  partitioningGranularity?: string;
  [key: string]: unknown;
}

/**
 * GET /schemas result, keyed by table name
 */
export type SchemaMap = Record<string, { columns: SchemaColumn[]; [key: string]: unknown }>;

export interface Project {
  metadata: {
    name: string;
    uid: string;
    [key: string]: unknown;
  };
  spec: {
    plan?: string;
    desiredState?: string;
    [key: string]: unknown;
  };
  status: {
    currentBytes?: number;
    maxBytes?: number;
    state?: string;
    [key: string]: unknown;
  };
}

/**
 * One event for the push API; must carry `__time`
 */
export type PushEvent = Record<string, unknown>;

/**
 * One SQL result row, column name -> value
 */
export type QueryRow = Record<string, unknown>;
