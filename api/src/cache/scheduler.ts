/**
 * Cache Refresh Scheduler
 *
 * Per-store state: fresh -> stale (elapsed time) -> refreshing -> fresh,
 * with `invalid` running alongside. `invalid` is entered on an auth failure
 * and left only through a successful priority warm or forced refresh.
 *
 * Two triggers drive refreshes:
 *   - sweep(): routine pass over every store, skipping invalid ones and ones
 *     refreshed within the low-priority expiry. Errors wait for the next pass.
 *   - warm(): priority path used by autocomplete and admin refresh. Ignores
 *     the invalid flag; success clears it, auth failure sets it and throws.
 *
 * Refreshes of one store never overlap: later triggers join the in-flight
 * promise, unless the store's key changed since it started, in which case
 * they wait for it and refresh again with the new key.
 */

import { StoreNotConfigured, UpstreamAuthInvalid, UpstreamError, UpstreamTransient } from '../errors.js';
import type { StoreClient } from '../store/client.js';
import type { Product, Version } from '../store/types.js';
import type { MetadataCacheStore } from './store.js';
import type { CacheEntry, RefreshMode, RefreshObserver, RefreshOutcome, StoreState } from './types.js';

export const AUTOCOMPLETE_LIMIT = 25;

export interface RefreshSchedulerOptions {
  client: StoreClient;
  cache: MetadataCacheStore;
  /** Age after which the routine sweep refreshes a store. Default 24h. */
  lowPriorityExpiryMs?: number;
  /** Age after which autocomplete triggers a priority warm. Default 60s. */
  highPriorityExpiryMs?: number;
  onRefresh?: RefreshObserver;
  now?: () => number;
}

export interface SweepSummary {
  checked: number;
  refreshed: number;
  skippedInvalid: number;
  skippedFresh: number;
  failed: number;
}

/** An in-flight refresh and the API key it runs with, once read. */
interface Flight {
  apiKey: string | null;
  promise: Promise<CacheEntry>;
}

function outcomeOf(err: unknown): RefreshOutcome {
  if (err instanceof UpstreamAuthInvalid) return 'auth_invalid';
  if (err instanceof UpstreamTransient) return 'transient';
  return 'unexpected';
}

function matchesPartial(name: string, partial: string): boolean {
  return partial.length === 0 || name.toLowerCase().includes(partial);
}

export class RefreshScheduler {
  private readonly client: StoreClient;
  private readonly cache: MetadataCacheStore;
  private readonly lowPriorityExpiryMs: number;
  private readonly highPriorityExpiryMs: number;
  private readonly onRefresh: RefreshObserver | undefined;
  private readonly now: () => number;

  private readonly inFlight = new Map<string, Flight>();
  private readonly controller = new AbortController();
  private sweeping: Promise<SweepSummary> | null = null;
  private stopped = false;

  constructor(options: RefreshSchedulerOptions) {
    this.client = options.client;
    this.cache = options.cache;
    this.lowPriorityExpiryMs = options.lowPriorityExpiryMs ?? 24 * 60 * 60 * 1000;
    this.highPriorityExpiryMs = options.highPriorityExpiryMs ?? 60 * 1000;
    this.onRefresh = options.onRefresh;
    this.now = options.now ?? Date.now;
  }

  // ============================================
  // State
  // ============================================

  async stateOf(storeId: string): Promise<StoreState> {
    if (this.inFlight.has(storeId)) return 'refreshing';
    if (await this.cache.isInvalid(storeId)) return 'invalid';
    const entry = await this.cache.get(storeId);
    if (!entry) return 'stale';
    return this.now() - entry.lastRefreshed >= this.lowPriorityExpiryMs ? 'stale' : 'fresh';
  }

  isRefreshing(storeId: string): boolean {
    return this.inFlight.has(storeId);
  }

  // ============================================
  // Routine sweep
  // ============================================

  /** A sweep started while another is running joins it. */
  sweep(): Promise<SweepSummary> {
    if (this.sweeping) {
      console.debug('[Scheduler] sweep already running, skipping');
      return this.sweeping;
    }
    const run = this.runSweep().finally(() => {
      this.sweeping = null;
    });
    this.sweeping = run;
    return run;
  }

  private async runSweep(): Promise<SweepSummary> {
    const summary: SweepSummary = { checked: 0, refreshed: 0, skippedInvalid: 0, skippedFresh: 0, failed: 0 };
    const start = this.now();

    for (const storeId of await this.cache.listStores()) {
      if (this.stopped) break;
      summary.checked++;

      if (await this.cache.isInvalid(storeId)) {
        summary.skippedInvalid++;
        continue;
      }
      const entry = await this.cache.get(storeId);
      if (entry && this.now() - entry.lastRefreshed < this.lowPriorityExpiryMs) {
        summary.skippedFresh++;
        continue;
      }

      try {
        await this.refresh(storeId, 'sweep');
        summary.refreshed++;
      } catch (err) {
        summary.failed++;
        if (err instanceof UpstreamAuthInvalid) {
          console.warn(`[Scheduler] store ${storeId} credentials rejected; skipping until warmed`);
        } else {
          console.error(`[Scheduler] sweep refresh of ${storeId} failed:`, err instanceof Error ? err.message : err);
        }
      }
    }

    console.log(
      `[Scheduler] sweep done in ${this.now() - start}ms: ${summary.refreshed} refreshed, ` +
        `${summary.skippedFresh} fresh, ${summary.skippedInvalid} invalid, ${summary.failed} failed`,
    );
    return summary;
  }

  // ============================================
  // Priority path
  // ============================================

  /** Priority warm. Ignores the invalid flag; throws on failure. */
  warm(storeId: string): Promise<CacheEntry> {
    return this.refresh(storeId, 'warm');
  }

  /** Administrative refresh. Same path as warm, always awaited by the caller. */
  forceRefresh(storeId: string): Promise<CacheEntry> {
    return this.refresh(storeId, 'force');
  }

  /**
   * Up to 25 products whose name contains `partial` (case-insensitive).
   * A missing entry waits for a warm. An entry older than the high-priority
   * threshold is warmed in the background, unless the store is invalid, in
   * which case the warm is awaited so the caller sees the configuration error.
   */
  async autocompleteProducts(storeId: string, partial: string): Promise<Product[]> {
    const entry = await this.entryForRead(storeId);
    const needle = partial.trim().toLowerCase();
    return entry.products.filter((p) => matchesPartial(p.name, needle)).slice(0, AUTOCOMPLETE_LIMIT);
  }

  async autocompleteVersions(storeId: string, productId: string, partial: string): Promise<Version[]> {
    const entry = await this.entryForRead(storeId);
    const needle = partial.trim().toLowerCase();
    return entry.versions
      .filter((v) => v.productId === productId && matchesPartial(v.name, needle))
      .slice(0, AUTOCOMPLETE_LIMIT);
  }

  private async entryForRead(storeId: string): Promise<CacheEntry> {
    const entry = await this.cache.get(storeId);
    if (!entry) return this.warm(storeId);
    if (this.now() - entry.lastRefreshed <= this.highPriorityExpiryMs) return entry;

    if (await this.cache.isInvalid(storeId)) return this.warm(storeId);

    this.warm(storeId).catch((err: unknown) => {
      console.warn(`[Scheduler] background warm of ${storeId} failed:`, err instanceof Error ? err.message : err);
    });
    return entry;
  }

  // ============================================
  // Single-flight refresh
  // ============================================

  private refresh(storeId: string, mode: RefreshMode): Promise<CacheEntry> {
    if (this.stopped) {
      return Promise.reject(new Error('refresh scheduler is stopped'));
    }
    const pending = this.inFlight.get(storeId);
    if (pending) return this.joinOrFollow(storeId, mode, pending);

    const flight: Flight = {
      apiKey: null,
      promise: this.fetchAndReplace(storeId, mode, (apiKey) => {
        flight.apiKey = apiKey;
      }).finally(() => {
        if (this.inFlight.get(storeId) === flight) this.inFlight.delete(storeId);
      }),
    };
    this.inFlight.set(storeId, flight);
    return flight.promise;
  }

  /**
   * Join the in-flight refresh when it runs with the current key. After a
   * key rotation, wait for it to settle and start one with the new key.
   */
  private async joinOrFollow(storeId: string, mode: RefreshMode, pending: Flight): Promise<CacheEntry> {
    const credential = await this.cache.getCredential(storeId);
    if (!credential || pending.apiKey === null || pending.apiKey === credential.apiKey) {
      return pending.promise;
    }
    await pending.promise.then(
      () => undefined,
      () => undefined,
    );
    return this.refresh(storeId, mode);
  }

  private async fetchAndReplace(
    storeId: string,
    mode: RefreshMode,
    onKey: (apiKey: string) => void,
  ): Promise<CacheEntry> {
    const start = this.now();
    const signal = this.controller.signal;
    try {
      const credential = await this.cache.getCredential(storeId);
      if (!credential) throw new StoreNotConfigured(storeId);
      const { apiKey } = credential;
      onKey(apiKey);

      try {
        const products = await this.client.listProducts(apiKey, { signal });
        const versions = await this.client.listVersions(apiKey, products, { signal });
        const entry = await this.cache.replace(storeId, { products, versions, lastRefreshed: this.now() });

        // a sweep never starts on an invalid store, so this only changes state for warms
        await this.cache.clearInvalid(storeId, apiKey);
        console.log(`[Scheduler] ${mode} refresh of ${storeId}: ${products.length} products, ${versions.length} versions`);
        this.report(storeId, mode, 'success', start);
        return entry;
      } catch (err) {
        if (err instanceof UpstreamAuthInvalid) {
          await this.cache.markInvalid(storeId, apiKey);
        }
        throw err;
      }
    } catch (err) {
      if (err instanceof UpstreamError || err instanceof StoreNotConfigured) {
        this.report(storeId, mode, signal.aborted ? 'aborted' : outcomeOf(err), start);
      }
      throw err;
    }
  }

  private report(storeId: string, mode: RefreshMode, outcome: RefreshOutcome, start: number): void {
    if (!this.onRefresh) return;
    try {
      this.onRefresh(storeId, mode, outcome, this.now() - start);
    } catch (err) {
      console.error('[Scheduler] refresh observer threw:', err);
    }
  }

  // ============================================
  // Shutdown
  // ============================================

  /** Abort in-flight refreshes, wait for them to settle, and refuse new work. */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.controller.abort();
    const pending: Promise<unknown>[] = [...this.inFlight.values()].map((flight) => flight.promise);
    if (this.sweeping) pending.push(this.sweeping);
    await Promise.allSettled(pending);
    console.log(`[Scheduler] stopped (${pending.length} in-flight drained)`);
  }
}
