/**
 * Metadata Cache Store
 *
 * Per-store record of { credential, cache entry } held as frozen snapshots
 * in process and written through to KV. Readers always get a whole entry:
 * `replace` builds the new snapshot first and swaps the reference last.
 *
 * Snapshots are re-read from KV once they are older than `syncIntervalMs`,
 * so a gateway node picks up refreshes done by a separate scheduler node.
 */

import { getJson, listAllKeys, type KVStore } from '../storage/kv.js';
import type { Product, Version } from '../store/types.js';
import type { CacheEntry, StoreCredential } from './types.js';

const STORE_PREFIX = 'store:';
const CREDENTIAL_SUFFIX = ':credential';
const CACHE_SUFFIX = ':cache';

export function credentialKey(storeId: string): string {
  return `${STORE_PREFIX}${storeId}${CREDENTIAL_SUFFIX}`;
}

export function cacheKey(storeId: string): string {
  return `${STORE_PREFIX}${storeId}${CACHE_SUFFIX}`;
}

interface Snapshot<T> {
  value: T | null;
  loadedAt: number;
}

export interface MetadataCacheStoreOptions {
  syncIntervalMs?: number;
  now?: () => number;
}

// ============================================
// KV value guards
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function isProduct(value: unknown): value is Product {
  return isRecord(value) && typeof value.id === 'string' && typeof value.name === 'string';
}

function isVersion(value: unknown): value is Version {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.productId === 'string' &&
    typeof value.name === 'string'
  );
}

function parseEntry(value: unknown): CacheEntry | null {
  if (!isRecord(value)) return null;
  const { products, versions, lastRefreshed } = value;
  if (!Array.isArray(products) || !products.every(isProduct)) return null;
  if (!Array.isArray(versions) || !versions.every(isVersion)) return null;
  if (typeof lastRefreshed !== 'number') return null;
  return freezeEntry({ products, versions, lastRefreshed });
}

function parseCredential(value: unknown): StoreCredential | null {
  if (!isRecord(value)) return null;
  if (typeof value.apiKey !== 'string' || typeof value.invalid !== 'boolean') return null;
  return Object.freeze({
    apiKey: value.apiKey,
    invalid: value.invalid,
    username: typeof value.username === 'string' ? value.username : null,
    updatedAt: typeof value.updatedAt === 'number' ? value.updatedAt : 0,
  });
}

export function freezeEntry(entry: {
  products: readonly Product[];
  versions: readonly Version[];
  lastRefreshed: number;
}): CacheEntry {
  return Object.freeze({
    products: Object.freeze(entry.products.map((p) => Object.freeze({ id: p.id, name: p.name }))),
    versions: Object.freeze(
      entry.versions.map((v) => Object.freeze({ id: v.id, productId: v.productId, name: v.name })),
    ),
    lastRefreshed: entry.lastRefreshed,
  });
}

// ============================================
// Store
// ============================================

export class MetadataCacheStore {
  private readonly entries = new Map<string, Snapshot<CacheEntry>>();
  private readonly credentials = new Map<string, Snapshot<StoreCredential>>();
  private readonly syncIntervalMs: number;
  private readonly now: () => number;

  constructor(
    private readonly kv: KVStore,
    options: MetadataCacheStoreOptions = {},
  ) {
    this.syncIntervalMs = options.syncIntervalMs ?? 30_000;
    this.now = options.now ?? Date.now;
  }

  async get(storeId: string): Promise<CacheEntry | null> {
    return this.read(this.entries, cacheKey(storeId), parseEntry);
  }

  /**
   * The only mutation of cached content. KV is written first so a crash
   * between the two steps never leaves the process ahead of storage.
   */
  async replace(
    storeId: string,
    entry: { products: readonly Product[]; versions: readonly Version[]; lastRefreshed: number },
  ): Promise<CacheEntry> {
    const frozen = freezeEntry(entry);
    await this.kv.put(cacheKey(storeId), JSON.stringify(frozen));
    this.entries.set(cacheKey(storeId), { value: frozen, loadedAt: this.now() });
    return frozen;
  }

  async getCredential(storeId: string): Promise<StoreCredential | null> {
    return this.read(this.credentials, credentialKey(storeId), parseCredential);
  }

  async setCredential(storeId: string, apiKey: string, username: string | null): Promise<StoreCredential> {
    const credential: StoreCredential = Object.freeze({
      apiKey,
      invalid: false,
      username,
      updatedAt: this.now(),
    });
    await this.writeCredential(storeId, credential);
    return credential;
  }

  /**
   * No-op for unknown stores. Never touches the cache entry. With `apiKey`,
   * only flags the credential if it still holds that key, so a refresh
   * started before a key rotation cannot flag the new key.
   */
  async markInvalid(storeId: string, apiKey?: string): Promise<void> {
    await this.setInvalid(storeId, true, apiKey);
  }

  async clearInvalid(storeId: string, apiKey?: string): Promise<void> {
    await this.setInvalid(storeId, false, apiKey);
  }

  async isInvalid(storeId: string): Promise<boolean> {
    return (await this.getCredential(storeId))?.invalid ?? false;
  }

  async deleteStore(storeId: string): Promise<void> {
    await Promise.all([this.kv.delete(credentialKey(storeId)), this.kv.delete(cacheKey(storeId))]);
    this.credentials.set(credentialKey(storeId), { value: null, loadedAt: this.now() });
    this.entries.set(cacheKey(storeId), { value: null, loadedAt: this.now() });
  }

  /** Ids of every store with a registered credential. */
  async listStores(): Promise<string[]> {
    const keys = await listAllKeys(this.kv, STORE_PREFIX);
    const ids = keys
      .filter((k) => k.endsWith(CREDENTIAL_SUFFIX))
      .map((k) => k.slice(STORE_PREFIX.length, k.length - CREDENTIAL_SUFFIX.length));
    return [...new Set(ids)].sort();
  }

  private async setInvalid(storeId: string, invalid: boolean, apiKey?: string): Promise<void> {
    const current = await this.getCredential(storeId);
    if (!current || current.invalid === invalid) return;
    if (apiKey !== undefined && current.apiKey !== apiKey) {
      console.debug(`[Cache] store ${storeId} key changed; invalid flag left as is`);
      return;
    }
    await this.writeCredential(storeId, Object.freeze({ ...current, invalid }));
    console.log(`[Cache] store ${storeId} ${invalid ? 'marked' : 'cleared'} invalid`);
  }

  private async writeCredential(storeId: string, credential: StoreCredential): Promise<void> {
    await this.kv.put(credentialKey(storeId), JSON.stringify(credential));
    this.credentials.set(credentialKey(storeId), { value: credential, loadedAt: this.now() });
  }

  private async read<T>(
    snapshots: Map<string, Snapshot<T>>,
    key: string,
    parse: (raw: unknown) => T | null,
  ): Promise<T | null> {
    const cached = snapshots.get(key);
    const startedAt = this.now();
    if (cached && startedAt - cached.loadedAt < this.syncIntervalMs) return cached.value;

    const value = parse(await getJson(this.kv, key));
    // A local write that landed while we were reading wins over the KV copy
    const latest = snapshots.get(key);
    if (latest && latest !== cached && latest.loadedAt >= startedAt) return latest.value;

    snapshots.set(key, { value, loadedAt: this.now() });
    return value;
  }
}
