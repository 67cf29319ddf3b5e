/**
 * Test Mocks
 *
 * A real Supabase client whose fetch is a spy, so adapter tests exercise the
 * actual query builder and see the exact PostgREST / GoTrue requests.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { Mock } from 'vitest';
import { vi } from 'vitest';

export const TEST_SUPABASE_URL = 'http://localhost:54321';

export type FetchMock = Mock<typeof fetch>;

export function createFetchMock(): FetchMock {
  return vi.fn<typeof fetch>();
}

export function createTestSupabaseClient(fetchMock: FetchMock): SupabaseClient {
  return createClient(TEST_SUPABASE_URL, 'test-key', {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
    global: { fetch: fetchMock },
  });
}

/**
 * 2xx response with a JSON body
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * PostgREST error response, e.g. { code: '23505', message: '...' }
 */
export function errorResponse(
  body: Record<string, unknown>,
  status = 400
): Response {
  return jsonResponse(body, status);
}

/**
 * Response to a head:true count query
 */
export function countResponse(count: number): Response {
  return new Response(null, {
    status: 200,
    headers: { 'content-range': `*/${count}` },
  });
}

export interface RecordedRequest {
  url: URL;
  method: string;
  body: unknown;
}

/**
 * Decode the index-th call made through the fetch spy
 */
export function recordedRequest(
  fetchMock: FetchMock,
  index = 0
): RecordedRequest {
  const call = fetchMock.mock.calls[index];
  if (call === undefined) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [input, init] = call;
  const url =
    input instanceof Request ? input.url : input instanceof URL ? input.href : input;
  const rawBody = init?.body;
  return {
    url: new URL(url),
    method: init?.method ?? 'GET',
    body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
  };
}
