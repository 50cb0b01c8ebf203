/**
 * HTTP Server: Hono-based request handling for the keyward runtime
 *
 * Responsibilities:
 *   1. Creates the Hono app with health, metrics, and CORS middleware
 *   2. Routes /v1/* requests to the core API handler
 *   3. Instruments requests with Prometheus metrics
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { ApiHandler, KVStore } from '@keyward/api';

import { healthApp, configureHealth, markReady } from './health.js';
import { metricsApp, incRequests, startRequestTimer } from './metrics.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServerConfig {
  kv: KVStore;
  handler: ApiHandler;
}

/**
 * Collapse a request path to a low-cardinality metrics label. Store ids,
 * license ids and identities never reach Prometheus.
 */
export function routeLabel(method: string, path: string): string {
  const parts = path.split('/').filter(Boolean);
  if (parts[0] !== 'v1' || parts[1] !== 'stores' || parts.length < 3) return 'unknown';

  const rest = parts.slice(3);
  if (rest.length === 0) return `${method} store`;
  if (rest[0] === 'licenses') {
    if (rest.length === 2) return `${method} license`;
    if (rest[2] === 'activations') return `${method} license_activation`;
    return `${method} license_${rest[2] ?? 'unknown'}`;
  }
  if (rest[0] === 'products' && rest.length > 1) return `${method} versions`;
  return `${method} ${rest[0]}`;
}

// ---------------------------------------------------------------------------
// App factory
// ---------------------------------------------------------------------------

export function createApp(config: ServerConfig): Hono {
  const app = new Hono();

  configureHealth({ kv: config.kv });

  // -------------------------------------------------------------------------
  // Middleware
  // -------------------------------------------------------------------------

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization'],
      maxAge: 86400,
    }),
  );

  // -------------------------------------------------------------------------
  // Health + Metrics sub-apps
  // -------------------------------------------------------------------------

  app.route('/', healthApp);
  app.route('/', metricsApp);

  // -------------------------------------------------------------------------
  // Core API
  // -------------------------------------------------------------------------

  app.all('/v1/*', async (c) => {
    const route = routeLabel(c.req.method, new URL(c.req.url).pathname);
    const endTimer = startRequestTimer(route);

    try {
      const response = await config.handler(c.req.raw);
      incRequests(route, response.status);
      return response;
    } catch (err) {
      incRequests(route, 500);
      console.error('[server] Unhandled error in API handler:', err);
      return c.json(
        {
          error: 'Internal server error',
          message: err instanceof Error ? err.message : 'Unknown error',
        },
        500,
      );
    } finally {
      endTimer();
    }
  });

  app.notFound((c) => c.json({ error: 'Not found', code: 'not_found' }, 404));

  return app;
}

export { markReady };
