/**
 * Keyward API
 *
 * License activation gateway core plus its HTTP surface.
 * Routes:
 * - POST   /v1/stores/:storeId/activations - Activate a license for an identity
 * - GET    /v1/stores/:storeId/products?q= - Product autocomplete
 * - GET    /v1/stores/:storeId/products/:productId/versions?q= - Version autocomplete
 * Admin (Bearer ADMIN_TOKEN):
 * - GET    /v1/stores/:storeId - Cache state
 * - DELETE /v1/stores/:storeId - Forget a store
 * - PUT    /v1/stores/:storeId/credential - Register the store API key
 * - POST   /v1/stores/:storeId/refresh - Force a refresh
 * - GET    /v1/stores/:storeId/licenses/:license - License users
 * - POST   /v1/stores/:storeId/licenses/:license/lock - Lock a license
 * - POST   /v1/stores/:storeId/licenses/:license/unlock - Unlock a license
 * - DELETE /v1/stores/:storeId/licenses/:license/activations/:identity - Deactivate
 */

import {
  handleDeleteStore,
  handleProducts,
  handleRefresh,
  handleSetCredential,
  handleStoreStatus,
  handleVersions,
} from './cache/handlers.js';
import { RefreshScheduler } from './cache/scheduler.js';
import { MetadataCacheStore } from './cache/store.js';
import type { RefreshObserver } from './cache/types.js';
import { corsHeaders, errorResponse, isAdmin, upstreamErrorResponse } from './http.js';
import { ActivationResolver } from './licensing/activation.js';
import { ActivationAudit } from './licensing/audit.js';
import {
  handleActivate,
  handleDeactivate,
  handleLicenseInfo,
  handleLock,
  handleUnlock,
  type ActivationObserver,
} from './licensing/handlers.js';
import type { KVStore } from './storage/kv.js';
import { StoreClient } from './store/client.js';

export * from './errors.js';
export * from './licensing/license-key.js';
export type * from './licensing/types.js';
export type * from './cache/types.js';
export type * from './store/types.js';
export type { KVStore, KVListResult } from './storage/kv.js';
export { StoreClient, DEFAULT_STORE_API_URL, LOCK_IDENTITY } from './store/client.js';
export { MetadataCacheStore } from './cache/store.js';
export { RefreshScheduler, AUTOCOMPLETE_LIMIT, type SweepSummary } from './cache/scheduler.js';
export { ActivationResolver, compareActivationIds } from './licensing/activation.js';
export { ActivationAudit } from './licensing/audit.js';
export { GENERIC_LICENSE_MESSAGE } from './http.js';
export type { ActivationObserver } from './licensing/handlers.js';

// ============================================
// Wiring
// ============================================

export interface KeywardOptions {
  kv: KVStore;
  storeApiUrl?: string;
  storeApiTimeoutMs?: number;
  singleOwner?: boolean;
  lowPriorityExpiryMs?: number;
  highPriorityExpiryMs?: number;
  onRefresh?: RefreshObserver;
  now?: () => number;
}

export interface KeywardCore {
  client: StoreClient;
  cache: MetadataCacheStore;
  audit: ActivationAudit;
  resolver: ActivationResolver;
  scheduler: RefreshScheduler;
}

export function createCore(options: KeywardOptions): KeywardCore {
  const client = new StoreClient({ baseUrl: options.storeApiUrl, timeoutMs: options.storeApiTimeoutMs });
  const cache = new MetadataCacheStore(options.kv, { now: options.now });
  const audit = new ActivationAudit(options.kv);
  const resolver = new ActivationResolver({
    client,
    cache,
    audit,
    singleOwner: options.singleOwner,
    now: options.now,
  });
  const scheduler = new RefreshScheduler({
    client,
    cache,
    lowPriorityExpiryMs: options.lowPriorityExpiryMs,
    highPriorityExpiryMs: options.highPriorityExpiryMs,
    onRefresh: options.onRefresh,
    now: options.now,
  });
  return { client, cache, audit, resolver, scheduler };
}

// ============================================
// Router
// ============================================

export interface ApiHandlerDeps extends KeywardCore {
  adminToken: string;
  onActivation?: ActivationObserver;
}

export type ApiHandler = (request: Request) => Promise<Response>;

const STORE_ID = /^[A-Za-z0-9_-]{1,64}$/;

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

export function createApiHandler(deps: ApiHandlerDeps): ApiHandler {
  const { client, cache, audit, resolver, scheduler } = deps;

  return async function handle(request: Request): Promise<Response> {
    if (request.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders });
    }

    const url = new URL(request.url);
    const match = url.pathname.match(/^\/v1\/stores\/([^/]+)(\/.*)?$/);
    if (!match) return errorResponse('Not found', 404);

    const storeId = decodeSegment(match[1]);
    if (!storeId || !STORE_ID.test(storeId)) {
      return errorResponse('Invalid store id', 400, 'bad_request');
    }
    const rest = match[2] ?? '';
    const method = request.method;

    try {
      // POST /v1/stores/:storeId/activations
      if (rest === '/activations') {
        if (method !== 'POST') return errorResponse('Method not allowed', 405);
        return await handleActivate(resolver, request, storeId, deps.onActivation);
      }

      // GET /v1/stores/:storeId/products
      if (rest === '/products') {
        if (method !== 'GET') return errorResponse('Method not allowed', 405);
        return await handleProducts(scheduler, storeId, url);
      }

      // GET /v1/stores/:storeId/products/:productId/versions
      const versionsMatch = rest.match(/^\/products\/([^/]+)\/versions$/);
      if (versionsMatch) {
        if (method !== 'GET') return errorResponse('Method not allowed', 405);
        const productId = decodeSegment(versionsMatch[1]);
        if (!productId) return errorResponse('Invalid product id', 400, 'bad_request');
        return await handleVersions(scheduler, storeId, productId, url);
      }

      // Everything below is operator-only
      if (!isAdmin(request, deps.adminToken)) {
        return errorResponse('Unauthorized', 401, 'unauthorized');
      }

      if (rest === '' || rest === '/') {
        if (method === 'GET') return await handleStoreStatus(cache, scheduler, storeId);
        if (method === 'DELETE') return await handleDeleteStore(cache, audit, storeId);
        return errorResponse('Method not allowed', 405);
      }

      if (rest === '/credential') {
        if (method !== 'PUT') return errorResponse('Method not allowed', 405);
        return await handleSetCredential(client, cache, scheduler, request, storeId);
      }

      if (rest === '/refresh') {
        if (method !== 'POST') return errorResponse('Method not allowed', 405);
        return await handleRefresh(scheduler, storeId);
      }

      const licenseMatch = rest.match(/^\/licenses\/([^/]+)(\/lock|\/unlock|\/activations\/([^/]+))?$/);
      if (licenseMatch) {
        const license = decodeSegment(licenseMatch[1]);
        if (!license) return errorResponse('Invalid license', 400, 'bad_request');
        const action = licenseMatch[2];

        if (!action) {
          if (method !== 'GET') return errorResponse('Method not allowed', 405);
          return await handleLicenseInfo(resolver, storeId, license);
        }
        if (action === '/lock' || action === '/unlock') {
          if (method !== 'POST') return errorResponse('Method not allowed', 405);
          return action === '/lock'
            ? await handleLock(resolver, storeId, license)
            : await handleUnlock(resolver, storeId, license);
        }
        const identity = decodeSegment(licenseMatch[3] ?? '');
        if (!identity) return errorResponse('Invalid identity', 400, 'bad_request');
        if (method !== 'DELETE') return errorResponse('Method not allowed', 405);
        return await handleDeactivate(resolver, storeId, license, identity);
      }

      return errorResponse('Not found', 404);
    } catch (err) {
      return upstreamErrorResponse(err);
    }
  };
}
