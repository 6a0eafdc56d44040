/**
 * Shared fetch stubs for tests
 */

import { vi } from 'vitest';

export const TEST_TOKEN = { access_token: 'test-token', token_type: 'Bearer', expires_in: 300 };

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export type Handler = (url: string, init: RequestInit) => Response;

/**
 * Stub global fetch: token requests get TEST_TOKEN, everything else goes
 * to `handler`
 */
export function stubFetch(handler: Handler) {
  const mockFetch = vi.fn(async (url: string, init: RequestInit): Promise<Response> => {
    if (url.includes('/protocol/openid-connect/token')) {
      return jsonResponse(TEST_TOKEN);
    }
    return handler(url, init);
  });
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

/**
 * Calls that went to the API (token requests filtered out)
 */
export function apiCalls(mockFetch: ReturnType<typeof stubFetch>): Array<[string, RequestInit]> {
  return mockFetch.mock.calls.filter(([url]) => !url.includes('/protocol/openid-connect/token'));
}
