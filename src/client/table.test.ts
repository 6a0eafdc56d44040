/**
 * Tests for the Table handle
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PolarisClient } from './client.js';
import { Display } from '../display/display.js';
import { BufferHtmlSink } from '../display/sink.js';
import { apiCalls, jsonResponse, stubFetch } from '../test-utils/http.js';

function createClient(write: (line: string) => void = () => {}) {
  return new PolarisClient({
    org: 'acme',
    clientId: 'test-client',
    clientSecret: 'test-secret',
    display: new Display({ write, sink: new BufferHtmlSink() }),
  });
}

describe('Table', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should report existence from the details endpoint', async () => {
    let status = 200;
    stubFetch(() => (status === 200 ? jsonResponse({ id: 't-1', name: 'events' }) : new Response('', { status })));
    const table = await createClient().createTable('events');

    await expect(table.exists()).resolves.toBe(true);
    status = 404;
    await expect(table.exists()).resolves.toBe(false);
    status = 500;
    await expect(table.exists()).rejects.toThrow('HTTP 500');
  });

  it('should fetch the schema once', async () => {
    const mockFetch = stubFetch((url) =>
      url.endsWith('/schemas')
        ? jsonResponse({ events: { columns: [{ name: '__time', type: 'timestamp' }] } })
        : jsonResponse({ values: [{ id: 't-1', name: 'events' }] })
    );
    const table = await createClient().tableForName('events');

    await table.schema();
    const schema = await table.schema();

    expect(schema).toEqual([{ name: '__time', type: 'timestamp' }]);
    expect(apiCalls(mockFetch).filter(([url]) => url.endsWith('/schemas'))).toHaveLength(1);
  });

  it('should fail when the schema is missing', async () => {
    stubFetch((url) =>
      url.endsWith('/schemas') ? jsonResponse({}) : jsonResponse({ values: [{ id: 't-1', name: 'events' }] })
    );
    const table = await createClient().tableForName('events');

    await expect(table.schema()).rejects.toThrow("Schema not found for table 'events'");
  });

  it('should detect push streaming from the endpoint URL', async () => {
    let details: Record<string, unknown> = { id: 't-1', name: 'events', pushEndpointUrl: null };
    stubFetch(() => jsonResponse(details));
    const table = await createClient().createTable('events');

    await expect(table.isPushEnabled()).resolves.toBe(false);
    details = { ...details, pushEndpointUrl: 'https://api.imply.io/v1/events/t-1' };
    await expect(table.isPushEnabled()).resolves.toBe(true);
  });

  it('should show the input schema as a table', async () => {
    const write = vi.fn();
    stubFetch(() =>
      jsonResponse({
        id: 't-1',
        name: 'events',
        inputSchema: [
          { name: 'country', type: 'string' },
          { name: 'clicks', type: 'long' },
        ],
      })
    );
    const table = await createClient(write).createTable('events');

    await table.showInputSchema();

    expect(write.mock.calls).toEqual([['Name     Type'], ['country  string'], ['clicks   long']]);
  });

  it('should show nothing for an empty input schema', async () => {
    const write = vi.fn();
    stubFetch(() => jsonResponse({ id: 't-1', name: 'events', inputSchema: [] }));
    const table = await createClient(write).createTable('events');

    await table.showInputSchema();

    expect(write).not.toHaveBeenCalled();
  });

  it('should show the summary with labels', async () => {
    const write = vi.fn();
    stubFetch(() => jsonResponse({ id: 't-1', name: 'events', version: 3 }));
    const table = await createClient(write).createTable('events');

    await table.showSummary();

    expect(write.mock.calls.slice(0, 4)).toEqual([
      ['Key                Value'],
      ['Name               events'],
      ['ID                 t-1'],
      ['Version            3'],
    ]);
    expect(write).toHaveBeenCalledTimes(9);
  });

  it('should insert rows and drop through the client', async () => {
    const mockFetch = stubFetch(() => jsonResponse({ id: 't-1', name: 'events' }));
    const table = await createClient().createTable('events');

    await table.insert({ __time: 't', n: 1 });
    await table.drop();

    const calls = apiCalls(mockFetch).map(([url, init]) => `${init.method} ${url}`);
    expect(calls.slice(1)).toEqual([
      'POST https://api.imply.io/v1/events/t-1',
      'DELETE https://api.imply.io/v1/tables/t-1',
    ]);
  });
});
