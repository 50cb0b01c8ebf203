/**
 * Entrypoint: main entry point for the keyward runtime
 *
 * Orchestrates:
 *   1. Structured logger initialization
 *   2. Environment validation and KV adapter creation
 *   3. Core wiring (store client, cache, resolver, scheduler)
 *   4. HTTP server creation and startup
 *   5. Cron schedule for the routine metadata sweep
 *   6. Graceful shutdown on SIGTERM/SIGINT
 *
 * Supports KEYWARD_ROLE env var:
 *   - "gateway"   HTTP server only (no cron jobs)
 *   - "scheduler" Cron jobs only (no HTTP server)
 *   - "all"       Both HTTP server and cron jobs (default)
 */

import { serve } from '@hono/node-server';
import cron, { type ScheduledTask } from 'node-cron';
import { createApiHandler, createCore } from '@keyward/api';

import { initLogger, logger } from './logger.js';
import { buildRuntimeConfig } from './env-builder.js';
import { createKVAdapter, RedisKVAdapter } from './kv-adapter.js';
import { createApp, markReady } from './server.js';
import { markDraining } from './health.js';
import { incActivation, recordRefresh } from './metrics.js';
import { runSweepJob } from './jobs.js';

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  // 1. Validate configuration, then initialize the structured logger
  const config = buildRuntimeConfig();
  initLogger({ level: config.logLevel, service: `keyward-${config.role}` });

  logger.info(`Starting keyward runtime (role=${config.role})`);
  logger.info(`Node.js ${process.version}, platform=${process.platform}`);

  // 2. Create KV adapter (Redis or in-memory)
  const kv = createKVAdapter(config.redisUrl);
  if (kv instanceof RedisKVAdapter) {
    await kv.getRedisClient().connect();
    logger.info('KV adapter: Redis');
  } else {
    logger.info('KV adapter: in-memory (set REDIS_URL for Redis)');
  }

  // 3. Core
  const core = createCore({
    kv,
    storeApiUrl: config.storeApiUrl,
    storeApiTimeoutMs: config.storeApiTimeoutMs,
    singleOwner: config.singleOwner,
    lowPriorityExpiryMs: config.lowPriorityExpiryMs,
    highPriorityExpiryMs: config.highPriorityExpiryMs,
    onRefresh: (_storeId, mode, outcome, durationMs) => recordRefresh(mode, outcome, durationMs),
  });

  const cronTasks: ScheduledTask[] = [];
  let httpServer: ReturnType<typeof serve> | null = null;

  // 4. Start HTTP server (gateway + all roles)
  if (config.role === 'gateway' || config.role === 'all') {
    const handler = createApiHandler({
      ...core,
      adminToken: config.adminToken,
      onActivation: (_storeId, status) => incActivation(status),
    });
    const app = createApp({ kv, handler });

    httpServer = serve({
      fetch: app.fetch,
      port: config.port,
      hostname: config.host,
    });

    logger.info(`HTTP server listening on ${config.host}:${config.port}`);
  }

  // 5. Start cron scheduler (scheduler + all roles)
  if (config.role === 'scheduler' || config.role === 'all') {
    const sweepTask = cron.schedule(config.sweepCron, () => runSweepJob(core.scheduler));
    cronTasks.push(sweepTask);
    logger.info(`Cron scheduled: metadata sweep (${config.sweepCron})`);

    // Catch up on anything that went stale while the process was down.
    void runSweepJob(core.scheduler);
  }

  // 6. Mark as ready
  markReady();
  logger.info('Startup complete, ready to serve requests');

  // 7. Graceful shutdown
  let isShuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(`Received ${signal}, starting graceful shutdown`);
    markDraining();

    for (const task of cronTasks) {
      task.stop();
    }

    await core.scheduler.stop();

    const server = httpServer;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        setTimeout(() => {
          logger.warn('HTTP server close timed out, forcing shutdown');
          resolve();
        }, 15_000).unref();
      });
    }

    if (kv instanceof RedisKVAdapter) {
      await kv.getRedisClient().quit();
    }

    logger.info('Graceful shutdown complete');
    process.exit(0);
  }

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

main().catch((err: unknown) => {
  console.error('Fatal startup error:', err);
  process.exit(1);
});
