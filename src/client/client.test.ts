/**
 * Tests for PolarisClient
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PolarisClient } from './client.js';
import { NotFoundError, PolarisApiError } from './errors.js';
import { apiCalls, jsonResponse, stubFetch } from '../test-utils/http.js';

function createClient(extra: { domain?: string } = {}) {
  return new PolarisClient({
    org: 'acme',
    clientId: 'test-client',
    clientSecret: 'test-secret',
    ...extra,
  });
}

const PROJECTS = [
  { metadata: { name: 'Default', uid: 'p-1' }, spec: { plan: 'dev' }, status: { state: 'RUNNING' } },
  { metadata: { name: 'staging', uid: 'p-2' }, spec: { plan: 'dev' }, status: { state: 'RUNNING' } },
];

describe('PolarisClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('buildUrl', () => {
    it('should fill placeholders with encoded arguments', () => {
      const client = createClient();
      expect(client.buildUrl('/tables/{}', ['a b/c'])).toBe('https://api.imply.io/v1/tables/a%20b%2Fc');
    });

    it('should prefix the domain', () => {
      const client = createClient({ domain: 'eng' });
      expect(client.buildUrl('/tables')).toBe('https://api.eng.imply.io/v1/tables');
    });

    it('should treat a blank domain as production', () => {
      const client = createClient({ domain: '  ' });
      expect(client.buildUrl('/schemas')).toBe('https://api.imply.io/v1/schemas');
    });
  });

  describe('authentication', () => {
    it('should fetch a token before the first request', async () => {
      const mockFetch = stubFetch(() => jsonResponse({ values: [] }));
      const client = createClient({ domain: 'eng' });

      await client.allTableSummaries();

      const [tokenUrl, tokenInit] = mockFetch.mock.calls[0];
      expect(tokenUrl).toBe('https://id.eng.imply.io/auth/realms/acme/protocol/openid-connect/token');
      expect(tokenInit.method).toBe('POST');
      expect(tokenInit.body).toBe('client_id=test-client&client_secret=test-secret&grant_type=client_credentials');

      const [url, init] = mockFetch.mock.calls[1];
      expect(url).toBe('https://api.eng.imply.io/v1/tables?detail=summary');
      expect(init.headers).toEqual({ Authorization: 'Bearer test-token' });
    });

    it('should reuse the token across requests', async () => {
      const mockFetch = stubFetch(() => jsonResponse({ values: [] }));
      const client = createClient();

      await client.allTableSummaries();
      await client.allTableDetails();

      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should renew the token once on 401 and retry', async () => {
      const expired = jsonResponse({ message: 'expired' }, 401);
      let attempts = 0;
      const mockFetch = stubFetch(() => {
        attempts++;
        return attempts === 1 ? expired : jsonResponse({ values: [] });
      });
      const client = createClient();

      await expect(client.allTableSummaries()).resolves.toEqual([]);
      expect(mockFetch).toHaveBeenCalledTimes(4);
      expect(apiCalls(mockFetch)).toHaveLength(2);
      expect(expired.bodyUsed).toBe(true);
    });

    it('should fail when the token request is rejected', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => jsonResponse({ error: { code: 'unauthorized_client' } }, 400))
      );
      const client = createClient();

      await expect(client.renewToken()).rejects.toThrow('unauthorized_client');
    });
  });

  describe('error handling', () => {
    it('should use the message from the JSON payload', async () => {
      stubFetch(() => jsonResponse({ code: 400, message: 'Unable to process JSON' }, 400));
      const client = createClient();

      await expect(client.getJson('/tables')).rejects.toThrow('Unable to process JSON');
    });

    it('should use the nested error message', async () => {
      const body = { error: { code: 'AlreadyExists', message: 'A table with name [events] already exists' } };
      stubFetch(() => jsonResponse(body, 409));
      const client = createClient();

      const error = await client.createTable('events').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(PolarisApiError);
      if (error instanceof PolarisApiError) {
        expect(error.message).toBe('A table with name [events] already exists');
        expect(error.status).toBe(409);
        expect(error.body).toEqual(body);
      }
    });

    it('should fall back to the error code', async () => {
      stubFetch(() => jsonResponse({ error: { code: 'Conflict', message: ' ' } }, 409));
      const client = createClient();

      await expect(client.getJson('/tables')).rejects.toThrow('Conflict');
    });

    it('should report Not found for a bare 404', async () => {
      stubFetch(() => new Response('', { status: 404 }));
      const client = createClient();

      await expect(client.tableDetails('t-1')).rejects.toThrow('Not found');
    });

    it('should report the status for other bare errors', async () => {
      stubFetch(() => new Response('gateway down', { status: 502 }));
      const client = createClient();

      await expect(client.getJson('/tables')).rejects.toThrow('HTTP 502');
    });

    it('should return the response when requireOk is false', async () => {
      stubFetch(() => new Response('', { status: 404 }));
      const client = createClient();

      const response = await client.get('/tables/{}', { args: ['t-1'], requireOk: false });
      expect(response.status).toBe(404);
    });

    it('should not check the status in postOnlyJson', async () => {
      const mockFetch = stubFetch(() => jsonResponse({ message: 'bad' }, 400));
      const client = createClient();

      const response = await client.postOnlyJson('/tables', { name: 'x' });
      expect(response.status).toBe(400);
      const [, init] = apiCalls(mockFetch)[0];
      expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-token' });
      expect(init.body).toBe('{"name":"x"}');
    });
  });

  describe('tables', () => {
    it('should resolve a table name', async () => {
      const mockFetch = stubFetch(() => jsonResponse({ values: [{ id: 't-1', name: 'events' }] }));
      const client = createClient();

      await expect(client.resolveTableName('events')).resolves.toEqual({ id: 't-1', name: 'events' });
      await expect(client.tableId('events')).resolves.toBe('t-1');
      expect(apiCalls(mockFetch)[0][0]).toBe('https://api.imply.io/v1/tables?name=events');
    });

    it('should return null for an unknown table name', async () => {
      stubFetch(() => jsonResponse({ values: [] }));
      const client = createClient();

      await expect(client.resolveTableName('nope')).resolves.toBeNull();
      await expect(client.tableId('nope')).resolves.toBeNull();
    });

    it('should throw NotFoundError from tableForName', async () => {
      stubFetch(() => jsonResponse({ values: [] }));
      const client = createClient();

      await expect(client.tableForName('nope')).rejects.toThrow(NotFoundError);
      await expect(client.tableForName('nope')).rejects.toThrow("Table 'nope' is not defined");
    });

    it('should throw NotFoundError from tableForId on 404', async () => {
      stubFetch(() => new Response('', { status: 404 }));
      const client = createClient();

      await expect(client.tableForId('t-9')).rejects.toThrow("Table ID 't-9' is not defined");
    });

    it('should create a table from a name', async () => {
      const mockFetch = stubFetch(() => jsonResponse({ id: 't-2', name: 'metrics' }, 201));
      const client = createClient();

      const table = await client.createTable('metrics');

      expect(table.id).toBe('t-2');
      expect(table.name).toBe('metrics');
      const [url, init] = apiCalls(mockFetch)[0];
      expect(url).toBe('https://api.imply.io/v1/tables');
      expect(init.body).toBe('{"name":"metrics"}');
    });

    it('should push events as JSON lines', async () => {
      const mockFetch = stubFetch(() => new Response('', { status: 200 }));
      const client = createClient();

      await client.pushEvents('t-1', [
        { __time: '2024-01-01T00:00:00Z', value: 1 },
        { __time: '2024-01-01T00:00:01Z', value: 2 },
      ]);

      const [url, init] = apiCalls(mockFetch)[0];
      expect(url).toBe('https://api.imply.io/v1/events/t-1');
      expect(init.method).toBe('POST');
      expect(init.body).toBe(
        '{"__time":"2024-01-01T00:00:00Z","value":1}\n{"__time":"2024-01-01T00:00:01Z","value":2}'
      );
    });

    it('should wrap a single event', async () => {
      const mockFetch = stubFetch(() => new Response('', { status: 200 }));
      const client = createClient();

      await client.pushEvents('t-1', { __time: 't', a: 'b' });

      expect(apiCalls(mockFetch)[0][1].body).toBe('{"__time":"t","a":"b"}');
    });

    it('should not send anything for undefined events', async () => {
      const mockFetch = stubFetch(() => new Response('', { status: 200 }));
      const client = createClient();

      await expect(client.pushEvents('t-1', undefined)).resolves.toBeUndefined();
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should toggle push streaming', async () => {
      const mockFetch = stubFetch(() => new Response('', { status: 200 }));
      const client = createClient();

      await client.enablePushForTable('t-1');
      await client.disablePushForTable('t-1');

      const calls = apiCalls(mockFetch).map(([url, init]) => `${init.method} ${url}`);
      expect(calls).toEqual([
        'POST https://api.imply.io/v1/tables/t-1/ingestion/streaming',
        'DELETE https://api.imply.io/v1/tables/t-1/ingestion/streaming',
      ]);
    });
  });

  describe('projects', () => {
    it('should find a project by name ignoring case', async () => {
      stubFetch(() => jsonResponse(PROJECTS));
      const client = createClient();

      const project = await client.project('DEFAULT');
      expect(project?.metadata.uid).toBe('p-1');
      await expect(client.project('missing')).resolves.toBeNull();
    });

    it('should accept a wrapped project list', async () => {
      stubFetch(() => jsonResponse({ values: PROJECTS }));
      const client = createClient();

      await expect(client.projects()).resolves.toHaveLength(2);
    });

    it('should match the default project exactly', async () => {
      stubFetch(() => jsonResponse(PROJECTS));
      const client = createClient();

      await expect(client.defaultProject()).resolves.toBeNull();
    });

    it('should infer the only project', async () => {
      stubFetch(() => jsonResponse([PROJECTS[1]]));
      const client = createClient();

      await expect(client.inferProject()).resolves.toBe('p-2');
      expect(client.getProjectId()).toBe('p-2');
    });

    it('should refuse to guess between several projects', async () => {
      stubFetch(() => jsonResponse(PROJECTS));
      const client = createClient();

      await expect(client.inferProject()).rejects.toThrow('More than one project defined');
    });

    it('should report no projects', async () => {
      stubFetch(() => jsonResponse([]));
      const client = createClient();

      await expect(client.inferProject()).rejects.toThrow('No projects found');
    });

    it('should reject an unknown project', async () => {
      stubFetch(() => jsonResponse(PROJECTS));
      const client = createClient();

      await expect(client.setProject('prod')).rejects.toThrow('Project "prod" is undefined');
    });
  });

  describe('sql', () => {
    it('should query in the selected project', async () => {
      const mockFetch = stubFetch((url) =>
        url.endsWith('/projects') ? jsonResponse(PROJECTS) : jsonResponse([{ n: 3 }])
      );
      const client = createClient();

      await client.setProject('staging');
      const rows = await client.sql('SELECT COUNT(*) AS n FROM events');

      expect(rows).toEqual([{ n: 3 }]);
      const [url, init] = apiCalls(mockFetch)[1];
      expect(url).toBe('https://api.imply.io/v1/projects/p-2/query/sql');
      expect(init.body).toBe('{"query":"SELECT COUNT(*) AS n FROM events"}');
    });

    it('should infer the project when none is set', async () => {
      const mockFetch = stubFetch((url) =>
        url.endsWith('/projects') ? jsonResponse([PROJECTS[0]]) : jsonResponse([])
      );
      const client = createClient();

      await expect(client.sql('SELECT 1')).resolves.toEqual([]);
      expect(apiCalls(mockFetch)[1][0]).toBe('https://api.imply.io/v1/projects/p-1/query/sql');
    });
  });

  describe('trace', () => {
    it('should log requests when tracing', async () => {
      stubFetch(() => jsonResponse({}));
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const client = new PolarisClient({
        org: 'acme',
        clientId: 'test-client',
        clientSecret: 'test-secret',
        logger,
      });

      await client.schemas();
      expect(logger.info).not.toHaveBeenCalled();

      client.trace(true);
      await client.schemas();
      expect(logger.info).toHaveBeenCalledWith({
        event: 'http_request',
        method: 'GET',
        url: 'https://api.imply.io/v1/schemas',
        body: undefined,
      });
    });

    it('should log error bodies when tracing', async () => {
      stubFetch(() => jsonResponse({ message: 'Table not ready' }, 409));
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const client = new PolarisClient({
        org: 'acme',
        clientId: 'test-client',
        clientSecret: 'test-secret',
        logger,
        trace: true,
      });

      await expect(client.schemas()).rejects.toThrow('Table not ready');
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({
          event: 'http_error',
          status: 409,
          body: '{"message":"Table not ready"}',
        })
      );
    });

    it('should keep the client secret out of trace logs', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => jsonResponse({ error: { code: 'invalid_client' } }, 401))
      );
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const client = new PolarisClient({
        org: 'acme',
        clientId: 'test-client',
        clientSecret: 'test-secret',
        logger,
        trace: true,
      });

      await expect(client.schemas()).rejects.toThrow('invalid_client');
      expect(logger.info).toHaveBeenCalledWith(expect.objectContaining({ event: 'token_renew' }));
      expect(logger.warn).toHaveBeenCalledWith(expect.objectContaining({ event: 'http_error', status: 401 }));

      const logged = JSON.stringify([
        logger.debug.mock.calls,
        logger.info.mock.calls,
        logger.warn.mock.calls,
        logger.error.mock.calls,
      ]);
      expect(logged).not.toContain('test-secret');
    });
  });
});
