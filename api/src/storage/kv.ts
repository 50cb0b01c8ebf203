/**
 * Key/value persistence consumed by the cache store and audit records.
 * A text-only subset of the Workers KVNamespace interface; the runtime
 * provides Redis and in-memory implementations.
 */

export interface KVListResult {
  keys: { name: string }[];
  list_complete: boolean;
  cursor?: string;
}

export interface KVStore {
  get(key: string): Promise<string | null>;
  put(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
  list(options?: { prefix?: string; limit?: number; cursor?: string }): Promise<KVListResult>;
}

/** Collect every key under a prefix, following cursors. */
export async function listAllKeys(kv: KVStore, prefix: string): Promise<string[]> {
  const names: string[] = [];
  let cursor: string | undefined;
  do {
    const page = await kv.list({ prefix, cursor });
    for (const k of page.keys) names.push(k.name);
    cursor = page.list_complete ? undefined : page.cursor;
  } while (cursor);
  return names;
}

export async function getJson(kv: KVStore, key: string): Promise<unknown> {
  const raw = await kv.get(key);
  if (raw === null) return null;
  try {
    return JSON.parse(raw);
  } catch {
    console.warn(`[KV] discarding unparseable value at ${key}`);
    return null;
  }
}
