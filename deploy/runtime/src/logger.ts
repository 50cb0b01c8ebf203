/**
 * Structured JSON Logger
 *
 * One JSON object per line:
 *   {"timestamp":"2026-01-15T12:00:00.000Z","level":"info","service":"keyward-gateway",
 *    "component":"Activation","message":"license 9001 activated for u1 (100)"}
 *
 * The core logs through console with a `[Component]` prefix and knows nothing
 * about this module. initLogger() patches console so those lines come out
 * with the prefix lifted into `component`, and upstream errors passed as
 * arguments carry their endpoint, status and reference id as fields.
 */

import { isUpstreamError, UpstreamUnexpected } from '@keyward/api';

// ---------------------------------------------------------------------------
// Log levels
// ---------------------------------------------------------------------------

const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export interface ErrorFields {
  name: string;
  message: string;
  endpoint?: string;
  status?: number;
  retryable?: boolean;
  ref?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  component?: string;
  message: string;
  error?: ErrorFields;
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let currentLevel: LogLevel = 'info';
let serviceName = 'keyward';

const originalConsole = {
  log: console.log.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  debug: console.debug.bind(console),
};

// ---------------------------------------------------------------------------
// Entry building
// ---------------------------------------------------------------------------

const COMPONENT_PREFIX = /^\[([A-Za-z][\w-]*)\]\s*/;

function errorFields(err: Error, level: LogLevel): ErrorFields {
  const fields: ErrorFields = { name: err.name, message: err.message };
  if (isUpstreamError(err)) {
    fields.endpoint = err.endpoint;
    if (err.status !== null) fields.status = err.status;
    fields.retryable = err.retryable;
    if (err instanceof UpstreamUnexpected) fields.ref = err.nonce;
  } else if (level === 'error' && err.stack) {
    fields.stack = err.stack;
  }
  return fields;
}

function stringify(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}

/** Turn console-style arguments into a log entry. The first Error becomes `error`. */
export function buildEntry(level: LogLevel, args: readonly unknown[], now: Date = new Date()): LogEntry {
  const parts = args.map(stringify);
  let component: string | undefined;
  const match = parts[0]?.match(COMPONENT_PREFIX);
  if (match) {
    component = match[1];
    parts[0] = parts[0].slice(match[0].length);
  }

  const entry: LogEntry = {
    timestamp: now.toISOString(),
    level,
    service: serviceName,
    message: parts.filter((p) => p.length > 0).join(' '),
  };
  if (component) entry.component = component;
  const err = args.find((a): a is Error => a instanceof Error);
  if (err) entry.error = errorFields(err, level);
  return entry;
}

function writeLog(level: LogLevel, args: unknown[]): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;
  const writer = level === 'error' ? originalConsole.error : originalConsole.log;
  writer(JSON.stringify(buildEntry(level, args)));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export const logger = {
  debug(...args: unknown[]): void {
    writeLog('debug', args);
  },
  info(...args: unknown[]): void {
    writeLog('info', args);
  },
  warn(...args: unknown[]): void {
    writeLog('warn', args);
  },
  error(...args: unknown[]): void {
    writeLog('error', args);
  },
};

/**
 * Set the level and service name, and route console through the logger.
 * Call once at startup.
 */
export function initLogger(opts?: { level?: string; service?: string }): void {
  const rawLevel = opts?.level ?? process.env.LOG_LEVEL ?? 'info';
  if (isLogLevel(rawLevel)) {
    currentLevel = rawLevel;
  } else {
    originalConsole.warn(`[logger] Unknown LOG_LEVEL "${rawLevel}", defaulting to "info"`);
    currentLevel = 'info';
  }

  if (opts?.service) {
    serviceName = opts.service;
  }

  console.log = (...args: unknown[]) => writeLog('info', args);
  console.info = (...args: unknown[]) => writeLog('info', args);
  console.warn = (...args: unknown[]) => writeLog('warn', args);
  console.error = (...args: unknown[]) => writeLog('error', args);
  console.debug = (...args: unknown[]) => writeLog('debug', args);
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** For tests. */
export function restoreConsole(): void {
  console.log = originalConsole.log;
  console.info = originalConsole.info;
  console.warn = originalConsole.warn;
  console.error = originalConsole.error;
  console.debug = originalConsole.debug;
}
