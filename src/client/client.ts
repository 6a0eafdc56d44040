/**
 * Polaris REST client
 *
 * Authenticates with OAuth client credentials and wraps the table, schema,
 * project, event push and SQL endpoints. Requests carry a bearer token; a
 * 401 response renews the token once and repeats the request.
 */

import { Display } from '../display/display.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { fillPlaceholders, isBlank } from '../utils/text.js';
import {
  BASE_URL,
  DEFAULT_PROJECT,
  REQ_ENABLE_PUSH,
  REQ_EVENTS,
  REQ_PROJECTS,
  REQ_QUERY,
  REQ_SCHEMAS,
  REQ_TABLE,
  REQ_TABLES,
  TOKEN_URL,
} from './endpoints.js';
import { NotFoundError, PolarisApiError, extractErrorMessage } from './errors.js';
import { Show } from './show.js';
import { Table } from './table.js';
import type {
  ListResponse,
  OAuthToken,
  Project,
  PushEvent,
  QueryRow,
  SchemaMap,
  TableDetails,
  TableRequest,
  TableSummary,
} from './types.js';

/** Request timeout in milliseconds */
const REQUEST_TIMEOUT_MS = 30000;

export interface PolarisClientOptions {
  /** Organization name (the OAuth realm) */
  org: string;
  clientId: string;
  clientSecret: string;
  /** Environment prefix, e.g. 'eng' for api.eng.imply.io; blank for production */
  domain?: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Log every request and error body */
  trace?: boolean;
  /** Display used by show(); a text-mode Display on stdout by default */
  display?: Display;
}

export interface RequestOptions {
  /** Values for `{}` placeholders in the request path */
  args?: string[];
  /** Query string parameters */
  params?: Record<string, string>;
  headers?: Record<string, string>;
  /** Throw PolarisApiError on an error status (default: true) */
  requireOk?: boolean;
}

type Sender = (headers: Record<string, string>) => Promise<Response>;

export class PolarisClient {
  readonly org: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly domain: string;
  private readonly timeout: number;
  private readonly logger: Logger;
  private tracing: boolean;
  private token: OAuthToken | null = null;
  private projectId: string | null = null;
  private presenter: Show | null = null;
  private readonly display?: Display;

  constructor(options: PolarisClientOptions) {
    this.org = options.org;
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.domain = isBlank(options.domain) ? '' : `${options.domain}.`;
    this.timeout = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger();
    this.tracing = options.trace === true;
    this.display = options.display;
  }

  // -------- REST --------

  trace(flag: boolean): void {
    this.tracing = flag;
  }

  /**
   * Full URL for a request path, with `{}` placeholders filled from `args`
   * (URL-encoded)
   */
  buildUrl(req: string, args: readonly string[] = []): string {
    return fillPlaceholders(BASE_URL + req, [this.domain, ...args.map((arg) => encodeURIComponent(arg))]);
  }

  /**
   * Throw PolarisApiError unless the status is a success or redirect.
   *
   * The message comes from the JSON error payload when there is one.
   */
  async checkError(response: Response): Promise<void> {
    if (response.status < 400) {
      return;
    }

    const text = await response.text();
    if (this.tracing) {
      this.logger.warn({ event: 'http_error', status: response.status, url: response.url, body: text });
    }
    const body = parseJson(text);
    let message = extractErrorMessage(body);
    if (message === undefined) {
      message = response.status === 404 ? 'Not found' : `HTTP ${response.status} ${response.statusText}`.trim();
    }
    throw new PolarisApiError(message, response.status, body);
  }

  /**
   * Obtain a fresh OAuth access token from the client ID and secret.
   * Done automatically before the first request and on a 401.
   */
  async renewToken(): Promise<OAuthToken> {
    const url = fillPlaceholders(TOKEN_URL, [this.domain, encodeURIComponent(this.org)]);
    if (this.tracing) {
      this.logger.info({ event: 'token_renew', method: 'POST', url });
    }
    const response = await this.fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: this.clientId,
        client_secret: this.clientSecret,
        grant_type: 'client_credentials',
      }).toString(),
    });
    await this.checkError(response);
    const token = (await response.json()) as OAuthToken;
    this.token = token;
    return token;
  }

  async get(req: string, options: RequestOptions = {}): Promise<Response> {
    const url = this.withParams(this.buildUrl(req, options.args), options.params);
    this.traceRequest('GET', url);
    const response = await this.submit(
      (headers) => this.fetch(url, { method: 'GET', headers }),
      options.headers
    );
    return this.finish(response, options);
  }

  async getJson<T = unknown>(req: string, options: RequestOptions = {}): Promise<T> {
    const response = await this.get(req, options);
    return (await response.json()) as T;
  }

  /**
   * POST a raw string body
   */
  async post(req: string, body: string, options: RequestOptions = {}): Promise<Response> {
    const url = this.withParams(this.buildUrl(req, options.args), options.params);
    this.traceRequest('POST', url, body);
    const response = await this.submit(
      (headers) => this.fetch(url, { method: 'POST', headers, body }),
      options.headers
    );
    if (this.tracing) {
      this.logger.info({ event: 'http_response', method: 'POST', url, status: response.status });
    }
    return this.finish(response, options);
  }

  /**
   * POST `body` as JSON and parse the JSON response
   */
  async postJson<T = unknown>(req: string, body: unknown, options: RequestOptions = {}): Promise<T> {
    const response = await this.postOnlyJson(req, body, options);
    await this.checkError(response);
    return (await response.json()) as T;
  }

  /**
   * POST `body` as JSON without checking the response status;
   * error handling is up to the caller
   */
  async postOnlyJson(req: string, body: unknown, options: RequestOptions = {}): Promise<Response> {
    const url = this.withParams(this.buildUrl(req, options.args), options.params);
    const payload = JSON.stringify(body);
    this.traceRequest('POST', url, payload);
    return this.submit(
      (headers) => this.fetch(url, { method: 'POST', headers, body: payload }),
      { 'Content-Type': 'application/json', ...options.headers }
    );
  }

  async deleteReq(req: string, options: RequestOptions = {}): Promise<Response> {
    const url = this.withParams(this.buildUrl(req, options.args), options.params);
    this.traceRequest('DELETE', url);
    const response = await this.submit(
      (headers) => this.fetch(url, { method: 'DELETE', headers }),
      options.headers
    );
    return this.finish(response, options);
  }

  async deleteJson<T = unknown>(req: string, options: RequestOptions = {}): Promise<T> {
    const response = await this.deleteReq(req, options);
    return (await response.json()) as T;
  }

  // -------- Display --------

  /**
   * Presenter that renders Polaris information as text or HTML tables
   */
  show(): Show {
    if (this.presenter === null) {
      this.presenter = new Show(this, this.display ?? new Display());
    }
    return this.presenter;
  }

  // -------- Tables --------

  /**
   * Create a table from a name (empty table) or a full table request
   */
  async createTable(table: string | TableRequest): Promise<Table> {
    const request: TableRequest = typeof table === 'string' ? { name: table } : table;
    const details = await this.postJson<TableSummary>(REQ_TABLES, request);
    return new Table(this, details);
  }

  /**
   * Drop a table by ID. Polaris reports success even for an unknown ID.
   */
  async dropTable(tableId: string): Promise<Response> {
    return this.deleteReq(REQ_TABLE, { args: [tableId] });
  }

  async allTableSummaries(): Promise<TableSummary[]> {
    const body = await this.getJson<ListResponse<TableSummary>>(REQ_TABLES, { params: { detail: 'summary' } });
    return body.values;
  }

  async allTableDetails(): Promise<TableDetails[]> {
    const body = await this.getJson<ListResponse<TableDetails>>(REQ_TABLES, { params: { detail: 'detailed' } });
    return body.values;
  }

  /**
   * Summary for the named table, or null when no such table exists
   */
  async resolveTableName(tableName: string): Promise<TableSummary | null> {
    const body = await this.getJson<ListResponse<TableSummary>>(REQ_TABLES, { params: { name: tableName } });
    return body.values[0] ?? null;
  }

  async tableId(tableName: string): Promise<string | null> {
    const info = await this.resolveTableName(tableName);
    return info?.id ?? null;
  }

  async tableSummary(tableId: string): Promise<TableSummary> {
    return this.getJson<TableSummary>(REQ_TABLE, { args: [tableId], params: { detail: 'summary' } });
  }

  async tableDetails(tableId: string): Promise<TableDetails> {
    return this.getJson<TableDetails>(REQ_TABLE, { args: [tableId], params: { detail: 'detailed' } });
  }

  /**
   * @throws NotFoundError if the name is undefined
   */
  async tableForName(name: string): Promise<Table> {
    const info = await this.resolveTableName(name);
    if (info === null) {
      throw new NotFoundError(`Table '${name}' is not defined`);
    }
    return new Table(this, info);
  }

  /**
   * @throws NotFoundError if the ID is undefined
   */
  async tableForId(id: string): Promise<Table> {
    try {
      return new Table(this, await this.tableSummary(id));
    } catch (error) {
      if (error instanceof PolarisApiError && error.status === 404) {
        throw new NotFoundError(`Table ID '${id}' is not defined`);
      }
      throw error;
    }
  }

  /**
   * Schemas of all tables, keyed by table name
   */
  async schemas(): Promise<SchemaMap> {
    return this.getJson<SchemaMap>(REQ_SCHEMAS);
  }

  /**
   * Push (insert) one or more events into a table.
   *
   * The push API takes line-delimited JSON. Each event must carry `__time`
   * plus the columns of the table's input schema.
   */
  async pushEvents(tableId: string, events: PushEvent | PushEvent[] | undefined): Promise<Response | undefined> {
    if (events === undefined) {
      return undefined;
    }
    const list = Array.isArray(events) ? events : [events];
    const lines = list.map((event) => JSON.stringify(event));
    return this.post(REQ_EVENTS, lines.join('\n'), { args: [tableId] });
  }

  async enablePushForTable(tableId: string): Promise<Response> {
    return this.post(REQ_ENABLE_PUSH, '', { args: [tableId] });
  }

  async disablePushForTable(tableId: string): Promise<Response> {
    return this.deleteReq(REQ_ENABLE_PUSH, { args: [tableId] });
  }

  // -------- Projects --------

  async projects(): Promise<Project[]> {
    const body = await this.getJson<Project[] | ListResponse<Project>>(REQ_PROJECTS);
    return Array.isArray(body) ? body : body.values;
  }

  /**
   * Project with the given name (case-insensitive), or null
   */
  async project(projectName: string): Promise<Project | null> {
    const target = projectName.toLowerCase();
    const projects = await this.projects();
    return projects.find((p) => p.metadata.name.toLowerCase() === target) ?? null;
  }

  async defaultProject(): Promise<Project | null> {
    const projects = await this.projects();
    return projects.find((p) => p.metadata.name === DEFAULT_PROJECT) ?? null;
  }

  /**
   * Run subsequent queries in the named project
   */
  async setProject(projectName: string): Promise<void> {
    const project = await this.project(projectName);
    if (project === null) {
      throw new NotFoundError(`Project "${projectName}" is undefined`);
    }
    this.projectId = project.metadata.uid;
  }

  getProjectId(): string | null {
    return this.projectId;
  }

  /**
   * Pick the query project: the only project, else the default one
   */
  async inferProject(): Promise<string> {
    const projects = await this.projects();
    if (projects.length === 0) {
      throw new NotFoundError('No projects found');
    }
    const chosen =
      projects.length === 1 ? projects[0] : projects.find((p) => p.metadata.name === DEFAULT_PROJECT);
    if (chosen === undefined) {
      throw new Error('More than one project defined: please call setProject()');
    }
    this.projectId = chosen.metadata.uid;
    return this.projectId;
  }

  /**
   * Execute a SQL query in the current project (inferred when unset).
   *
   * Rows come back as objects keyed by column name; an empty result carries
   * no schema.
   */
  async sql(stmt: string): Promise<QueryRow[]> {
    const projectId = this.projectId ?? (await this.inferProject());
    return this.postJson<QueryRow[]>(REQ_QUERY, { query: stmt }, { args: [projectId] });
  }

  // -------- Internals --------

  private async submit(send: Sender, headers: Record<string, string> = {}): Promise<Response> {
    const token = this.token ?? (await this.renewToken());
    let response = await send({ ...headers, Authorization: `Bearer ${token.access_token}` });
    if (response.status === 401) {
      await response.arrayBuffer();
      const renewed = await this.renewToken();
      response = await send({ ...headers, Authorization: `Bearer ${renewed.access_token}` });
    }
    return response;
  }

  private async finish(response: Response, options: RequestOptions): Promise<Response> {
    if (options.requireOk !== false) {
      await this.checkError(response);
    }
    return response;
  }

  private withParams(url: string, params?: Record<string, string>): string {
    if (params === undefined || Object.keys(params).length === 0) {
      return url;
    }
    return `${url}?${new URLSearchParams(params).toString()}`;
  }

  private traceRequest(method: string, url: string, body?: string): void {
    if (this.tracing) {
      this.logger.info({ event: 'http_request', method, url, body });
    }
  }

  /**
   * Fetch with timeout
   */
  private async fetch(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
