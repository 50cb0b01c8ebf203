/**
 * Store and catalog route handlers.
 */

import { UpstreamAuthInvalid, StoreNotConfigured } from '../errors.js';
import { errorResponse, jsonResponse, readJsonBody, upstreamErrorResponse } from '../http.js';
import type { ActivationAudit } from '../licensing/audit.js';
import type { StoreClient } from '../store/client.js';
import { REQUIRED_SCOPES } from '../store/types.js';
import type { RefreshScheduler } from './scheduler.js';
import type { MetadataCacheStore } from './store.js';
import type { CacheEntry } from './types.js';

function entrySummary(entry: CacheEntry) {
  return {
    last_refreshed: new Date(entry.lastRefreshed).toISOString(),
    product_count: entry.products.length,
    version_count: entry.versions.length,
  };
}

// ============================================
// Public: autocomplete
// ============================================

export async function handleProducts(scheduler: RefreshScheduler, storeId: string, url: URL): Promise<Response> {
  try {
    const products = await scheduler.autocompleteProducts(storeId, url.searchParams.get('q') ?? '');
    return jsonResponse({ products });
  } catch (err) {
    return upstreamErrorResponse(err);
  }
}

export async function handleVersions(
  scheduler: RefreshScheduler,
  storeId: string,
  productId: string,
  url: URL,
): Promise<Response> {
  try {
    const versions = await scheduler.autocompleteVersions(storeId, productId, url.searchParams.get('q') ?? '');
    return jsonResponse({ versions });
  } catch (err) {
    return upstreamErrorResponse(err);
  }
}

// ============================================
// Admin
// ============================================

export async function handleRefresh(scheduler: RefreshScheduler, storeId: string): Promise<Response> {
  try {
    const entry = await scheduler.forceRefresh(storeId);
    return jsonResponse({ store_id: storeId, state: 'fresh', ...entrySummary(entry) });
  } catch (err) {
    return upstreamErrorResponse(err);
  }
}

export async function handleStoreStatus(
  cache: MetadataCacheStore,
  scheduler: RefreshScheduler,
  storeId: string,
): Promise<Response> {
  const credential = await cache.getCredential(storeId);
  if (!credential) return upstreamErrorResponse(new StoreNotConfigured(storeId));

  const entry = await cache.get(storeId);
  return jsonResponse({
    store_id: storeId,
    state: await scheduler.stateOf(storeId),
    invalid: credential.invalid,
    username: credential.username,
    ...(entry ? entrySummary(entry) : { last_refreshed: null, product_count: 0, version_count: 0 }),
  });
}

/**
 * Register or rotate a store's API key. The key is checked against the store
 * first and must carry every required scope.
 */
export async function handleSetCredential(
  client: StoreClient,
  cache: MetadataCacheStore,
  scheduler: RefreshScheduler,
  request: Request,
  storeId: string,
): Promise<Response> {
  const body = await readJsonBody(request);
  const apiKey = body?.api_key;
  if (typeof apiKey !== 'string' || apiKey.trim().length === 0) {
    return errorResponse('api_key is required', 400, 'bad_request');
  }

  try {
    const user = await client.getOwnUser(apiKey.trim());
    const missing = REQUIRED_SCOPES.filter((scope) => !user.scopes.includes(scope));
    if (missing.length > 0) {
      return errorResponse(`API key is missing required scopes: ${missing.join(', ')}`, 422, 'missing_scopes', {
        missing,
      });
    }

    const credential = await cache.setCredential(storeId, apiKey.trim(), user.username);
    console.log(`[API] store ${storeId} credential set for ${user.displayName}`);

    scheduler.warm(storeId).catch((err: unknown) => {
      console.warn(`[API] initial warm of ${storeId} failed:`, err instanceof Error ? err.message : err);
    });

    return jsonResponse({ store_id: storeId, username: credential.username, display_name: user.displayName });
  } catch (err) {
    if (err instanceof UpstreamAuthInvalid) {
      return errorResponse('The store rejected this API key', 400, 'invalid_api_key');
    }
    return upstreamErrorResponse(err);
  }
}

export async function handleDeleteStore(
  cache: MetadataCacheStore,
  audit: ActivationAudit,
  storeId: string,
): Promise<Response> {
  await cache.deleteStore(storeId);
  const records = await audit.removeStore(storeId);
  console.log(`[API] store ${storeId} deleted (${records} audit records)`);
  return jsonResponse({ store_id: storeId, deleted: true, audit_records_removed: records });
}
