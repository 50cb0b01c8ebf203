/**
 * Tests for the Hono app: API delegation, probes, metrics and CORS.
 */

import { describe, it, expect, vi } from 'vitest';
import type { ApiHandler } from '@keyward/api';
import { createApp, markReady, routeLabel } from '../server.js';
import { InMemoryKVAdapter } from '../kv-adapter.js';

const echo: ApiHandler = async (request) =>
  new Response(JSON.stringify({ method: request.method, path: new URL(request.url).pathname }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });

describe('createApp', () => {
  it('reports startup and readiness only after markReady', async () => {
    const app = createApp({ kv: new InMemoryKVAdapter(), handler: echo });

    expect((await app.request('/health/startup')).status).toBe(503);
    expect((await app.request('/health/ready')).status).toBe(503);
    expect((await app.request('/health/live')).status).toBe(200);

    markReady();
    const ready = await app.request('/health/ready');

    expect((await app.request('/health/startup')).status).toBe(200);
    expect(ready.status).toBe(200);
    expect(await ready.json()).toMatchObject({ status: 'ok', checks: { redis: { ok: true } } });
  });

  it('hands /v1 requests to the API handler', async () => {
    const app = createApp({ kv: new InMemoryKVAdapter(), handler: echo });

    const res = await app.request('/v1/stores/s1/activations', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ method: 'POST', path: '/v1/stores/s1/activations' });
  });

  it('turns a thrown handler error into a 500', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const app = createApp({
      kv: new InMemoryKVAdapter(),
      handler: async () => {
        throw new Error('boom');
      },
    });

    const res = await app.request('/v1/stores/s1/products');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error', message: 'boom' });
  });

  it('counts requests by route label', async () => {
    const app = createApp({ kv: new InMemoryKVAdapter(), handler: echo });

    await app.request('/v1/stores/s1/refresh', { method: 'POST' });
    const metrics = await (await app.request('/metrics')).text();

    expect(metrics).toContain('keyward_requests_total{route="POST refresh",status="200"} 1');
  });

  it('answers preflight requests', async () => {
    const app = createApp({ kv: new InMemoryKVAdapter(), handler: echo });

    const res = await app.request('/v1/stores/s1/activations', {
      method: 'OPTIONS',
      headers: { Origin: 'https://app.example', 'Access-Control-Request-Method': 'POST' },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
  });

  it('returns a JSON 404 outside the API', async () => {
    const app = createApp({ kv: new InMemoryKVAdapter(), handler: echo });

    const res = await app.request('/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found', code: 'not_found' });
  });
});

describe('routeLabel', () => {
  it('drops ids from the path', () => {
    expect(routeLabel('GET', '/v1/stores/s1/products')).toBe('GET products');
    expect(routeLabel('GET', '/v1/stores/s1/products/p1/versions')).toBe('GET versions');
    expect(routeLabel('GET', '/v1/stores/s1/licenses/9001')).toBe('GET license');
    expect(routeLabel('POST', '/v1/stores/s1/licenses/9001/lock')).toBe('POST license_lock');
    expect(routeLabel('DELETE', '/v1/stores/s1/licenses/9001/activations/u1')).toBe('DELETE license_activation');
    expect(routeLabel('PUT', '/v1/stores/s1/credential')).toBe('PUT credential');
    expect(routeLabel('DELETE', '/v1/stores/s1')).toBe('DELETE store');
    expect(routeLabel('GET', '/v1/other')).toBe('unknown');
  });
});
