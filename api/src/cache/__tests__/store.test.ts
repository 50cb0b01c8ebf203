import { describe, it, expect, beforeEach } from 'vitest';
import { MetadataCacheStore } from '../store.js';
import { MemoryKV } from '../../__tests__/helpers.js';

const OLD = {
  products: [{ id: 'p1', name: 'Silver Ring' }],
  versions: [{ id: 'v1', productId: 'p1', name: '1.0' }],
  lastRefreshed: 1000,
};

const NEW = {
  products: [
    { id: 'p1', name: 'Silver Ring' },
    { id: 'p2', name: 'Gold Ring' },
  ],
  versions: [
    { id: 'v1', productId: 'p1', name: '1.0' },
    { id: 'v2', productId: 'p2', name: '2.0' },
  ],
  lastRefreshed: 2000,
};

let kv: MemoryKV;
let clock: number;
let cache: MetadataCacheStore;

beforeEach(() => {
  kv = new MemoryKV();
  clock = 10_000;
  cache = new MetadataCacheStore(kv, { now: () => clock, syncIntervalMs: 1000 });
});

describe('entries', () => {
  it('returns null for a store never refreshed', async () => {
    expect(await cache.get('s1')).toBeNull();
  });

  it('stores a frozen snapshot and writes it through to KV', async () => {
    await cache.replace('s1', OLD);

    const entry = await cache.get('s1');
    expect(entry).toEqual(OLD);
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry?.products)).toBe(true);
    expect(Object.isFrozen(entry?.products[0])).toBe(true);
    expect(JSON.parse(kv.data.get('store:s1:cache') ?? 'null')).toEqual(OLD);
  });

  it('does not share arrays with the caller', async () => {
    const products = [{ id: 'p1', name: 'Silver Ring' }];
    await cache.replace('s1', { products, versions: [], lastRefreshed: 1 });

    products.push({ id: 'p9', name: 'Late Addition' });

    expect((await cache.get('s1'))?.products).toHaveLength(1);
  });

  it('never exposes a partially replaced entry', async () => {
    await cache.replace('s1', OLD);
    const held = await cache.get('s1');

    const [during] = await Promise.all([cache.get('s1'), cache.replace('s1', NEW)]);
    const after = await cache.get('s1');

    expect([OLD, NEW]).toContainEqual(during);
    expect(held).toEqual(OLD);
    expect(after).toEqual(NEW);
  });

  it('hydrates from KV in a fresh process', async () => {
    await cache.replace('s1', NEW);

    const restarted = new MetadataCacheStore(kv, { now: () => clock });

    expect(await restarted.get('s1')).toEqual(NEW);
  });

  it('picks up another node’s refresh after the sync interval', async () => {
    const other = new MetadataCacheStore(kv, { now: () => clock, syncIntervalMs: 1000 });
    await cache.replace('s1', OLD);
    expect(await other.get('s1')).toEqual(OLD);

    await cache.replace('s1', NEW);
    expect(await other.get('s1')).toEqual(OLD);

    clock += 1000;
    expect(await other.get('s1')).toEqual(NEW);
  });

  it('treats a corrupt KV value as missing', async () => {
    kv.data.set('store:s1:cache', 'not json');
    expect(await cache.get('s1')).toBeNull();

    kv.data.set('store:s2:cache', JSON.stringify({ products: 'nope', versions: [], lastRefreshed: 1 }));
    expect(await cache.get('s2')).toBeNull();
  });
});

describe('credentials', () => {
  it('flags and clears invalid without touching the entry', async () => {
    await cache.setCredential('s1', 'test-store-key', 'creator');
    await cache.replace('s1', OLD);
    const entry = await cache.get('s1');

    await cache.markInvalid('s1');
    expect(await cache.isInvalid('s1')).toBe(true);
    expect(await cache.get('s1')).toBe(entry);
    expect(JSON.parse(kv.data.get('store:s1:credential') ?? '{}')).toMatchObject({
      apiKey: 'test-store-key',
      invalid: true,
      username: 'creator',
    });

    await cache.clearInvalid('s1');
    expect(await cache.isInvalid('s1')).toBe(false);
  });

  it('ignores flag changes for unknown stores', async () => {
    await cache.markInvalid('ghost');

    expect(kv.data.has('store:ghost:credential')).toBe(false);
    expect(await cache.getCredential('ghost')).toBeNull();
  });

  it('leaves the flag alone when the credential holds a different key', async () => {
    await cache.setCredential('s1', 'new-key', null);

    await cache.markInvalid('s1', 'old-key');
    expect(await cache.isInvalid('s1')).toBe(false);

    await cache.markInvalid('s1', 'new-key');
    expect(await cache.isInvalid('s1')).toBe(true);
  });

  it('resets the invalid flag when a new key is registered', async () => {
    await cache.setCredential('s1', 'old-key', null);
    await cache.markInvalid('s1');

    const credential = await cache.setCredential('s1', 'new-key', 'creator');

    expect(credential).toEqual({ apiKey: 'new-key', invalid: false, username: 'creator', updatedAt: 10_000 });
  });

  it('lists stores with credentials only', async () => {
    await cache.setCredential('s2', 'test-store-key', null);
    await cache.setCredential('s1', 'test-store-key', null);
    kv.data.set('store:orphan:cache', JSON.stringify(OLD));

    expect(await cache.listStores()).toEqual(['s1', 's2']);
  });

  it('deletes both halves of the store record', async () => {
    await cache.setCredential('s1', 'test-store-key', null);
    await cache.replace('s1', OLD);

    await cache.deleteStore('s1');

    expect(kv.data.size).toBe(0);
    expect(await cache.get('s1')).toBeNull();
    expect(await cache.getCredential('s1')).toBeNull();
  });
});
