/**
 * Configuration types for polaris-client
 */

export interface Config {
  version: 1;
  /** Organization name, used as the OAuth realm */
  org?: string;
  /** OAuth client ID */
  clientId?: string;
  /** OAuth client secret */
  clientSecret?: string;
  /** Environment prefix (e.g. 'eng' for api.eng.imply.io); empty for production */
  domain?: string;
  /** Project used for SQL queries; inferred when unset */
  project?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Everything needed to open a client session
 */
export interface Credentials {
  org: string;
  clientId: string;
  clientSecret: string;
  domain?: string;
  project?: string;
  timeoutMs?: number;
}

export const DEFAULT_CONFIG: Config = {
  version: 1,
};

/**
 * Environment variables that override config file values
 */
export const ENV_VARS = {
  org: 'POLARIS_ORG',
  clientId: 'POLARIS_CLIENT_ID',
  clientSecret: 'POLARIS_CLIENT_SECRET',
  domain: 'POLARIS_DOMAIN',
  project: 'POLARIS_PROJECT',
} as const;
