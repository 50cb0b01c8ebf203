/**
 * Environment Builder: maps process.env to the runtime config
 *
 * Reads every setting once at startup and fails fast on missing or
 * malformed values, before any port is bound or cron task scheduled.
 */

import cron from 'node-cron';
import { DEFAULT_STORE_API_URL } from '@keyward/api';

export type RuntimeRole = 'gateway' | 'scheduler' | 'all';

export interface RuntimeConfig {
  role: RuntimeRole;
  adminToken: string;
  storeApiUrl: string;
  storeApiTimeoutMs: number;
  redisUrl?: string;
  port: number;
  host: string;
  sweepCron: string;
  lowPriorityExpiryMs: number;
  highPriorityExpiryMs: number;
  singleOwner: boolean;
  logLevel?: string;
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

export class EnvValidationError extends Error {
  constructor(problems: string[]) {
    super(
      `Invalid environment configuration:\n  ${problems.join('\n  ')}\n\n` +
        'Set them in your .env or deployment configuration.',
    );
    this.name = 'EnvValidationError';
  }
}

type Env = Record<string, string | undefined>;

function env(source: Env, key: string, fallback?: string): string {
  const value = source[key];
  return value !== undefined && value !== '' ? value : fallback ?? '';
}

function positiveInt(source: Env, key: string, fallback: number, problems: string[]): number {
  const raw = source[key];
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    problems.push(`${key} must be a positive integer (got "${raw}")`);
    return fallback;
  }
  return n;
}

function bool(source: Env, key: string, fallback: boolean, problems: string[]): boolean {
  const raw = source[key];
  if (raw === undefined || raw === '') return fallback;
  if (['true', '1', 'yes'].includes(raw.toLowerCase())) return true;
  if (['false', '0', 'no'].includes(raw.toLowerCase())) return false;
  problems.push(`${key} must be true or false (got "${raw}")`);
  return fallback;
}

function isRole(value: string): value is RuntimeRole {
  return value === 'gateway' || value === 'scheduler' || value === 'all';
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export function buildRuntimeConfig(source: Env = process.env): RuntimeConfig {
  const problems: string[] = [];

  const adminToken = env(source, 'ADMIN_TOKEN');
  if (!adminToken) problems.push('ADMIN_TOKEN is required');

  const rawRole = env(source, 'KEYWARD_ROLE', 'all');
  if (!isRole(rawRole)) problems.push(`KEYWARD_ROLE must be gateway, scheduler or all (got "${rawRole}")`);

  const sweepCron = env(source, 'SWEEP_CRON', '*/5 * * * *');
  if (!cron.validate(sweepCron)) problems.push(`SWEEP_CRON is not a valid cron expression: "${sweepCron}"`);

  const storeApiUrl = env(source, 'STORE_API_URL', DEFAULT_STORE_API_URL);
  if (!URL.canParse(storeApiUrl)) problems.push(`STORE_API_URL is not a valid URL: "${storeApiUrl}"`);

  const config: RuntimeConfig = {
    role: isRole(rawRole) ? rawRole : 'all',
    adminToken,
    storeApiUrl,
    storeApiTimeoutMs: positiveInt(source, 'STORE_API_TIMEOUT_MS', 3000, problems),
    redisUrl: source.REDIS_URL || undefined,
    port: positiveInt(source, 'PORT', 8787, problems),
    host: env(source, 'HOST', '0.0.0.0'),
    sweepCron,
    lowPriorityExpiryMs: positiveInt(source, 'LOW_PRIORITY_EXPIRY_SECONDS', 86_400, problems) * 1000,
    highPriorityExpiryMs: positiveInt(source, 'HIGH_PRIORITY_EXPIRY_SECONDS', 60, problems) * 1000,
    singleOwner: bool(source, 'SINGLE_OWNER', true, problems),
    logLevel: source.LOG_LEVEL || undefined,
  };

  if (problems.length > 0) {
    throw new EnvValidationError(problems);
  }
  return config;
}
