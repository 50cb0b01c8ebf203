/**
 * Health Endpoints: Kubernetes-standard probes
 *
 * Exposes three probe paths as a Hono sub-app:
 *   /health/live    Liveness: always 200 (process is alive)
 *   /health/ready   Readiness: checks Redis when configured
 *   /health/startup Startup: 503 until initialization completes, then 200
 *
 * Usage:
 *   import { healthApp, markReady } from './health.js';
 *   app.route('/', healthApp);
 *   // after initialization completes:
 *   markReady();
 */

import { Hono } from 'hono';
import type { KVStore } from '@keyward/api';
import { RedisKVAdapter } from './kv-adapter.js';

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let isReady = false;
let startupComplete = false;
let kvAdapter: KVStore | undefined;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Call once initialization is complete to flip startup/ready probes. */
export function markReady(): void {
  isReady = true;
  startupComplete = true;
}

/** Call on shutdown so load balancers stop routing here. */
export function markDraining(): void {
  isReady = false;
}

export function configureHealth(opts: { kv?: KVStore }): void {
  kvAdapter = opts.kv;
}

// ---------------------------------------------------------------------------
// Readiness checks
// ---------------------------------------------------------------------------

async function checkRedis(): Promise<{ ok: boolean; latencyMs?: number; error?: string }> {
  if (!(kvAdapter instanceof RedisKVAdapter)) return { ok: true }; // in-memory, always ok

  const start = Date.now();
  try {
    const pong = await kvAdapter.getRedisClient().ping();
    return { ok: pong === 'PONG', latencyMs: Date.now() - start };
  } catch (err) {
    return {
      ok: false,
      latencyMs: Date.now() - start,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

// ---------------------------------------------------------------------------
// Hono sub-app
// ---------------------------------------------------------------------------

export const healthApp = new Hono();

healthApp.get('/health/live', (c) => {
  return c.json({ status: 'ok', timestamp: new Date().toISOString() }, 200);
});

healthApp.get('/health/ready', async (c) => {
  if (!isReady) {
    return c.json({ status: 'not_ready' }, 503);
  }

  const redis = await checkRedis();

  return c.json(
    {
      status: redis.ok ? 'ok' : 'degraded',
      checks: { redis },
      timestamp: new Date().toISOString(),
    },
    redis.ok ? 200 : 503,
  );
});

healthApp.get('/health/startup', (c) => {
  if (!startupComplete) {
    return c.json({ status: 'starting' }, 503);
  }
  return c.json({ status: 'ok', timestamp: new Date().toISOString() }, 200);
});
