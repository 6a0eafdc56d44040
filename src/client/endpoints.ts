/**
 * Polaris REST endpoints
 *
 * `{}` placeholders are filled in order; the first one in the host part is
 * the environment domain prefix ('' for production).
 */

export const TOKEN_URL = 'https://id.{}imply.io/auth/realms/{}/protocol/openid-connect/token';
export const BASE_URL = 'https://api.{}imply.io/v1';

export const REQ_TABLES = '/tables';
export const REQ_TABLE = REQ_TABLES + '/{}';
export const REQ_SCHEMAS = '/schemas';
export const REQ_PROJECTS = '/projects';
export const REQ_QUERY = REQ_PROJECTS + '/{}/query/sql';
export const REQ_EVENTS = '/events/{}';

/** Push streaming toggle for a table (not part of the public API docs) */
export const REQ_ENABLE_PUSH = REQ_TABLE + '/ingestion/streaming';

/** Name of the project used when none is chosen */
export const DEFAULT_PROJECT = 'default';
