/**
 * Prometheus Metrics: prom-client integration
 *
 * Exposes a /metrics endpoint via a Hono sub-app and provides helper
 * functions for instrumenting the HTTP surface, activations and the
 * metadata refresh scheduler.
 *
 * Metrics:
 *   keyward_requests_total{route,status}                 Counter
 *   keyward_request_duration_seconds{route}               Histogram
 *   keyward_activations_total{status}                     Counter
 *   keyward_metadata_refreshes_total{mode,outcome}        Counter
 *   keyward_metadata_refresh_duration_seconds{mode}       Histogram
 *   keyward_cron_runs_total{job,result}                   Counter
 *   + default process_* and nodejs_* metrics
 */

import { Hono } from 'hono';
import client from 'prom-client';
import type { RefreshMode, RefreshOutcome } from '@keyward/api';

// ---------------------------------------------------------------------------
// Registry & default metrics
// ---------------------------------------------------------------------------

export const register = new client.Registry();

client.collectDefaultMetrics({ register });

// ---------------------------------------------------------------------------
// Custom metrics
// ---------------------------------------------------------------------------

const requestsTotal = new client.Counter({
  name: 'keyward_requests_total',
  help: 'Total number of API requests',
  labelNames: ['route', 'status'] as const,
  registers: [register],
});

const requestDuration = new client.Histogram({
  name: 'keyward_request_duration_seconds',
  help: 'Duration of API requests in seconds',
  labelNames: ['route'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

const activationsTotal = new client.Counter({
  name: 'keyward_activations_total',
  help: 'Activation attempts by outcome',
  labelNames: ['status'] as const,
  registers: [register],
});

const refreshesTotal = new client.Counter({
  name: 'keyward_metadata_refreshes_total',
  help: 'Store metadata refreshes by trigger and outcome',
  labelNames: ['mode', 'outcome'] as const,
  registers: [register],
});

const refreshDuration = new client.Histogram({
  name: 'keyward_metadata_refresh_duration_seconds',
  help: 'Duration of store metadata refreshes in seconds',
  labelNames: ['mode'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [register],
});

const cronRunsTotal = new client.Counter({
  name: 'keyward_cron_runs_total',
  help: 'Total cron job executions',
  labelNames: ['job', 'result'] as const,
  registers: [register],
});

// ---------------------------------------------------------------------------
// Helper functions
// ---------------------------------------------------------------------------

export function incRequests(route: string, status: number): void {
  requestsTotal.inc({ route, status: String(status) });
}

/**
 * Create a timer that records request duration when stopped.
 *   const end = startRequestTimer('activations');
 *   // ... handle request ...
 *   end();
 */
export function startRequestTimer(route: string): () => void {
  const end = requestDuration.startTimer({ route });
  return () => {
    end();
  };
}

export function incActivation(status: string): void {
  activationsTotal.inc({ status });
}

export function recordRefresh(mode: RefreshMode, outcome: RefreshOutcome, durationMs: number): void {
  refreshesTotal.inc({ mode, outcome });
  refreshDuration.observe({ mode }, durationMs / 1000);
}

export function incCronRun(job: string, result: 'success' | 'error'): void {
  cronRunsTotal.inc({ job, result });
}

// ---------------------------------------------------------------------------
// Hono sub-app
// ---------------------------------------------------------------------------

export const metricsApp = new Hono();

metricsApp.get('/metrics', async (c) => {
  const metrics = await register.metrics();
  return c.text(metrics, 200, {
    'Content-Type': register.contentType,
  });
});
