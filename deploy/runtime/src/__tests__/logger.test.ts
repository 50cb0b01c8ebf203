import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { UpstreamTransient, UpstreamUnexpected } from '@keyward/api';
import { buildEntry, getLogLevel, initLogger, restoreConsole } from '../logger.js';

const AT = new Date('2026-01-15T12:00:00.000Z');

beforeEach(() => {
  initLogger({ level: 'debug', service: 'keyward-test' });
});

afterEach(() => {
  restoreConsole();
});

describe('initLogger', () => {
  it('takes the configured level', () => {
    initLogger({ level: 'warn', service: 'keyward-test' });

    expect(getLogLevel()).toBe('warn');
  });

  it('falls back to info for an unknown level', () => {
    initLogger({ level: 'verbose' });

    expect(getLogLevel()).toBe('info');
  });
});

describe('buildEntry', () => {
  it('lifts the component prefix into its own field', () => {
    const entry = buildEntry('info', ['[Activation] license 9001 activated for u1 (100)'], AT);

    expect(entry).toEqual({
      timestamp: '2026-01-15T12:00:00.000Z',
      level: 'info',
      service: 'keyward-test',
      component: 'Activation',
      message: 'license 9001 activated for u1 (100)',
    });
  });

  it('joins plain arguments without a component', () => {
    const entry = buildEntry('warn', ['sweep summary', { refreshed: 2 }], AT);

    expect(entry.component).toBeUndefined();
    expect(entry.message).toBe('sweep summary {"refreshed":2}');
  });

  it('records upstream error details and the reference id', () => {
    const err = new UpstreamUnexpected('GET /products returned status code 422', 'GET /products', 422);

    const entry = buildEntry('error', ['[Scheduler] sweep refresh of s1 failed:', err], AT);

    expect(entry.component).toBe('Scheduler');
    expect(entry.message).toBe(`sweep refresh of s1 failed: ${err.message}`);
    expect(entry.error).toEqual({
      name: 'UpstreamUnexpected',
      message: err.message,
      endpoint: 'GET /products',
      status: 422,
      retryable: false,
      ref: err.nonce,
    });
  });

  it('omits the status of a transport failure', () => {
    const err = new UpstreamTransient('GET /me failed: fetch failed', 'GET /me');

    const entry = buildEntry('warn', [err], AT);

    expect(entry.error).toEqual({
      name: 'UpstreamTransient',
      message: 'GET /me failed: fetch failed',
      endpoint: 'GET /me',
      retryable: true,
    });
  });

  it('keeps the stack of other errors at error level', () => {
    const entry = buildEntry('error', ['Shutdown failed:', new Error('boom')], AT);

    expect(entry.message).toBe('Shutdown failed: boom');
    expect(entry.error?.name).toBe('Error');
    expect(entry.error?.stack).toContain('Error: boom');
  });
});
