// Shared response helpers for the route handlers.

import { StoreNotConfigured, UpstreamAuthInvalid, UpstreamTransient, UpstreamUnexpected } from './errors.js';

export const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, PUT, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

export const GENERIC_LICENSE_MESSAGE = 'The provided license key was not valid or is already in use';

export const CREDENTIALS_MISCONFIGURED_MESSAGE =
  "The store's API credentials are misconfigured; contact the server administrator";

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      'Content-Type': 'application/json',
      ...corsHeaders,
    },
  });
}

export function errorResponse(message: string, status: number, code?: string, extra?: Record<string, unknown>): Response {
  return jsonResponse({ error: message, ...(code ? { code } : {}), ...extra }, status);
}

/**
 * Map a thrown error to a response. Store credential problems are kept apart
 * from bad license keys: the operator fixes one, the end user the other.
 */
export function upstreamErrorResponse(err: unknown): Response {
  if (err instanceof StoreNotConfigured) {
    return errorResponse(err.message, 412, 'store_not_configured');
  }
  if (err instanceof UpstreamAuthInvalid) {
    return errorResponse(CREDENTIALS_MISCONFIGURED_MESSAGE, 502, 'store_credentials_invalid');
  }
  if (err instanceof UpstreamTransient) {
    return errorResponse('The store is temporarily unavailable; try again shortly', 503, 'store_unavailable', {
      retryable: true,
    });
  }
  if (err instanceof UpstreamUnexpected) {
    return errorResponse(`The store returned an unexpected response (ref ${err.nonce})`, 502, 'store_unexpected', {
      ref: err.nonce,
    });
  }
  console.error('[API] Unexpected error:', err);
  return errorResponse(`Internal server error: ${err instanceof Error ? err.message : 'Unknown error'}`, 500);
}

export async function readJsonBody(request: Request): Promise<Record<string, unknown> | null> {
  try {
    const body: unknown = await request.json();
    return body && typeof body === 'object' && !Array.isArray(body) ? { ...body } : null;
  } catch {
    return null;
  }
}

/** Length-independent comparison for the admin bearer token. */
export function tokenMatches(presented: string, expected: string): boolean {
  let diff = presented.length ^ expected.length;
  for (let i = 0; i < expected.length; i++) {
    diff |= (presented.charCodeAt(i) || 0) ^ expected.charCodeAt(i);
  }
  return diff === 0;
}

export function isAdmin(request: Request, adminToken: string): boolean {
  const header = request.headers.get('Authorization') ?? '';
  if (!header.startsWith('Bearer ')) return false;
  return tokenMatches(header.slice('Bearer '.length).trim(), adminToken);
}
