/**
 * Tests for the store client: request shape, response mapping, and the
 * error taxonomy, including the store's habit of reporting auth and
 * not-found conditions as 500 responses.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StoreClient, errorFromResponse, identityFromDescription } from '../client.js';
import { UpstreamAuthInvalid, UpstreamTransient, UpstreamUnexpected } from '../../errors.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const API_KEY = 'test-store-key';

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });
}

function errorBody(status: number, error: string, message: string, httpStatus = status): Response {
  return jsonResponse({ status_code: status, error, message }, httpStatus);
}

let client: StoreClient;

beforeEach(() => {
  mockFetch.mockReset();
  client = new StoreClient({ baseUrl: 'https://store.test/v1/', timeoutMs: 50 });
});

describe('requests', () => {
  it('sends the API key and builds the lookup URL', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ results: [{ id: '42' }], page: 1, page_count: 1 }));

    const id = await client.lookupLicense(API_KEY, { kind: 'long', value: '3642d957-c5d8-4d18-a1ae-cd071c534191' });

    expect(id).toBe('42');
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://store.test/v1/licenses?key=3642d957-c5d8-4d18-a1ae-cd071c534191');
    expect(init.method).toBe('GET');
    expect(init.headers['x-api-key']).toBe(API_KEY);
  });

  it('creates activations with the identity in the description', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: '7', description: 'user_u1' }, 201));

    const activation = await client.createActivation(API_KEY, '42', 'u1');

    expect(activation).toEqual({ id: '7', licenseId: '42', description: 'user_u1', identity: 'u1' });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://store.test/v1/licenses/42/activations');
    expect(JSON.parse(init.body)).toEqual({ description: 'user_u1' });
  });

  it('maps license detail', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        id: '42',
        short_key: 'XXXX-cd071c534191',
        key: '3642d957-c5d8-4d18-a1ae-cd071c534191',
        inventory_item: { target_id: 'p1', target_version_id: null, item: { name: 'Ring Pack' } },
        activations: { total_count: 2 },
      }),
    );

    const license = await client.getLicense(API_KEY, '42');

    expect(license).toEqual({
      id: '42',
      shortKey: 'XXXX-cd071c534191',
      key: '3642d957-c5d8-4d18-a1ae-cd071c534191',
      productId: 'p1',
      productName: 'Ring Pack',
      versionId: null,
      activationCount: 2,
      locked: false,
    });
  });

  it('fetches versions for every product and keeps product order', async () => {
    mockFetch.mockImplementation(async (url: string) => {
      const id = url.split('/').pop();
      return jsonResponse({ id, name: `Product ${id}`, versions: [{ id: `${id}-v1`, name: 'v1' }] });
    });

    const versions = await client.listVersions(API_KEY, [
      { id: 'a', name: 'A' },
      { id: 'b', name: 'B' },
      { id: 'c', name: 'C' },
      { id: 'd', name: 'D' },
      { id: 'e', name: 'E' },
    ]);

    expect(versions.map((v) => v.id)).toEqual(['a-v1', 'b-v1', 'c-v1', 'd-v1', 'e-v1']);
    expect(versions[0]).toEqual({ id: 'a-v1', productId: 'a', name: 'v1' });
    expect(mockFetch).toHaveBeenCalledTimes(5);
  });

  it('falls back to the username when the display name is blank', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ name: '  ', username: 'creator', scopes: ['products_read'] }));

    const user = await client.getOwnUser(API_KEY);

    expect(user).toEqual({ username: 'creator', displayName: 'creator', scopes: ['products_read'] });
  });
});

describe('not-found handling', () => {
  it('returns null for a license the store reports missing with a 500', async () => {
    mockFetch.mockResolvedValueOnce(errorBody(500, 'Bad Request', 'Resource not found.'));

    expect(await client.getLicense(API_KEY, '42')).toBeNull();
  });

  it('returns null for a license that belongs to another account', async () => {
    mockFetch.mockResolvedValueOnce(errorBody(403, 'Forbidden', 'You are not authorized.'));

    expect(await client.getLicense(API_KEY, '42')).toBeNull();
  });

  it('returns false when deleting an activation that is gone', async () => {
    mockFetch.mockResolvedValueOnce(errorBody(404, 'Not Found', 'Resource not found.'));

    expect(await client.deleteActivation(API_KEY, '42', '7')).toBe(false);
  });

  it('returns null when no license matches', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ results: [] }));

    expect(await client.lookupLicense(API_KEY, { kind: 'short', value: 'XXXX-cd071c534191' })).toBeNull();
  });
});

describe('error mapping', () => {
  it('treats 401 as invalid credentials', async () => {
    mockFetch.mockResolvedValueOnce(errorBody(401, 'Unauthorized', 'Invalid or expired API key'));

    await expect(client.listProducts(API_KEY)).rejects.toBeInstanceOf(UpstreamAuthInvalid);
  });

  it('recognizes auth failures disguised as 500', async () => {
    mockFetch.mockResolvedValueOnce(errorBody(500, 'Bad Request', 'Invalid or expired API key'));

    await expect(client.listProducts(API_KEY)).rejects.toBeInstanceOf(UpstreamAuthInvalid);
  });

  it('recognizes multi-part auth messages', () => {
    const err = errorFromResponse('GET /products', 500, {
      status_code: 500,
      error: 'Bad Request',
      message: [{ message: 'You are not authorized.', code: 'forbidden' }],
    });

    expect(err).toBeInstanceOf(UpstreamAuthInvalid);
    expect(err.retryable).toBe(false);
  });

  it('treats other 5xx and 429 as transient', async () => {
    mockFetch.mockResolvedValueOnce(new Response('bad gateway', { status: 502 }));
    await expect(client.listProducts(API_KEY)).rejects.toBeInstanceOf(UpstreamTransient);

    mockFetch.mockResolvedValueOnce(new Response('slow down', { status: 429 }));
    await expect(client.listProducts(API_KEY)).rejects.toMatchObject({ retryable: true, status: 429 });
  });

  it('treats transport failures as transient', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(client.listProducts(API_KEY)).rejects.toThrow('GET /products failed: fetch failed');
  });

  it('times out slow calls', async () => {
    mockFetch.mockImplementationOnce(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    await expect(client.listProducts(API_KEY)).rejects.toThrow('GET /products failed: timed out after 50ms');
  });

  it('times out a body that stops arriving after the headers', async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"results":['));
      },
    });
    mockFetch.mockResolvedValueOnce(new Response(stalled, { status: 200 }));

    await expect(client.listProducts(API_KEY)).rejects.toThrow('GET /products failed: timed out after 50ms');
  });

  it('treats unmapped 4xx as unexpected', async () => {
    mockFetch.mockResolvedValueOnce(errorBody(422, 'Unprocessable Entity', 'nope'));

    await expect(client.listProducts(API_KEY)).rejects.toBeInstanceOf(UpstreamUnexpected);
  });

  it('rejects responses of the wrong shape with a nonce', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ items: [] }));

    const err = await client.listProducts(API_KEY).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamUnexpected);
    expect(err instanceof UpstreamUnexpected && err.nonce).toMatch(/^[a-z0-9]{8}$/);
  });

  it('refuses paginated listings', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ results: [], page: 1, page_count: 3 }));

    await expect(client.listProducts(API_KEY)).rejects.toThrow(/requires pagination \(3 pages\)/);
  });

  it('refuses a lookup that matches more than one license', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ results: [{ id: '1' }, { id: '2' }] }));

    await expect(
      client.lookupLicense(API_KEY, { kind: 'short', value: 'XXXX-cd071c534191' }),
    ).rejects.toBeInstanceOf(UpstreamUnexpected);
  });
});

describe('identityFromDescription', () => {
  it('parses gateway descriptions and ignores others', () => {
    expect(identityFromDescription('user_12345')).toBe('12345');
    expect(identityFromDescription('user_')).toBeNull();
    expect(identityFromDescription('manual activation')).toBeNull();
  });
});
