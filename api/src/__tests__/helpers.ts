/**
 * Test doubles: an in-memory KV and an in-process fake of the store API
 * that answers the client's fetch calls.
 */

import type { KVListResult, KVStore } from '../storage/kv.js';

export const STORE_API_URL = 'https://store.test/v1';
export const STORE_API_KEY = 'test-store-key';

// ============================================================================
// KV
// ============================================================================

export class MemoryKV implements KVStore {
  readonly data = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async put(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  async list(options?: { prefix?: string }): Promise<KVListResult> {
    const prefix = options?.prefix ?? '';
    const keys = [...this.data.keys()]
      .filter((k) => k.startsWith(prefix))
      .sort()
      .map((name) => ({ name }));
    return { keys, list_complete: true };
  }
}

// ============================================================================
// Fake store API
// ============================================================================

export interface FakeActivation {
  id: string;
  description: string;
}

export interface FakeLicense {
  id: string;
  shortKey: string;
  key: string;
  productId: string;
  productName: string;
  versionId: string | null;
  activations: FakeActivation[];
}

export interface FakeProduct {
  id: string;
  name: string;
  versions: { id: string; name: string }[];
}

export interface RecordedCall {
  method: string;
  path: string;
}

type Override = (method: string, path: string) => Response | undefined;

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });
}

export function storeError(status: number, error: string, message: string): Response {
  return json({ status_code: status, error, message }, status);
}

export class FakeStore {
  licenses: FakeLicense[] = [];
  products: FakeProduct[] = [];
  scopes = ['licenses_read', 'licenses_write', 'products_read'];
  apiKey = STORE_API_KEY;
  calls: RecordedCall[] = [];
  override: Override | null = null;

  /** Ids handed to created activations, in arrival order, before falling back to a counter. */
  idQueue: string[] = [];
  private nextId = 100;

  /** When set, creates are held until this many are pending, then released together. */
  createBarrier = 0;
  private heldCreates: (() => void)[] = [];

  addLicense(overrides: Partial<FakeLicense> = {}): FakeLicense {
    const n = this.licenses.length + 1;
    const license: FakeLicense = {
      id: String(9000 + n),
      shortKey: `XXXX-${'a'.repeat(11)}${n}`,
      key: `3642d957-c5d8-4d18-a1ae-cd071c53419${n}`,
      productId: 'prod-1',
      productName: 'Ring Pack',
      versionId: null,
      activations: [],
      ...overrides,
    };
    this.licenses.push(license);
    return license;
  }

  callsTo(method: string, pattern: RegExp): RecordedCall[] {
    return this.calls.filter((c) => c.method === method && pattern.test(c.path));
  }

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const method = init?.method ?? 'GET';
    const path = url.pathname.replace(/^\/v1/, '');
    this.calls.push({ method, path: `${path}${url.search}` });

    const overridden = this.override?.(method, path);
    if (overridden) return overridden;

    const headers = new Headers(init?.headers);
    if (headers.get('x-api-key') !== this.apiKey) {
      return storeError(401, 'Unauthorized', 'Invalid or expired API key');
    }

    return this.route(method, path, url, init);
  };

  private async route(method: string, path: string, url: URL, init?: RequestInit): Promise<Response> {
    if (method === 'GET' && path === '/me') {
      return json({ name: 'Test Creator', username: 'test-creator', scopes: this.scopes });
    }

    if (method === 'GET' && path === '/licenses') {
      const shortKey = url.searchParams.get('short_key');
      const key = url.searchParams.get('key');
      const results = this.licenses
        .filter((l) => (shortKey !== null && l.shortKey === shortKey) || (key !== null && l.key === key))
        .map((l) => ({ id: l.id }));
      return json({ results, page: 1, page_count: 1 });
    }

    const activationMatch = path.match(/^\/licenses\/([^/]+)\/activations(?:\/([^/]+))?$/);
    if (activationMatch) {
      const license = this.licenses.find((l) => l.id === activationMatch[1]);
      if (!license) return storeError(404, 'Not Found', 'Resource not found.');
      const activationId = activationMatch[2];

      if (method === 'GET' && !activationId) {
        return json({ results: license.activations.map((a) => ({ ...a })), page: 1, page_count: 1 });
      }
      if (method === 'POST' && !activationId) {
        await this.waitForBarrier();
        const body: unknown = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
        const description =
          body && typeof body === 'object' && 'description' in body && typeof body.description === 'string'
            ? body.description
            : '';
        const activation = { id: this.idQueue.shift() ?? String(this.nextId++), description };
        license.activations.push(activation);
        return json(activation, 201);
      }
      if (method === 'DELETE' && activationId) {
        const before = license.activations.length;
        license.activations = license.activations.filter((a) => a.id !== activationId);
        if (license.activations.length === before) return storeError(404, 'Not Found', 'Resource not found.');
        return new Response(null, { status: 204 });
      }
    }

    const licenseMatch = path.match(/^\/licenses\/([^/]+)$/);
    if (method === 'GET' && licenseMatch) {
      const license = this.licenses.find((l) => l.id === licenseMatch[1]);
      if (!license) return storeError(404, 'Not Found', 'Resource not found.');
      return json({
        id: license.id,
        short_key: license.shortKey,
        key: license.key,
        inventory_item: {
          target_id: license.productId,
          target_version_id: license.versionId,
          item: { name: license.productName },
        },
        activations: { total_count: license.activations.length },
      });
    }

    if (method === 'GET' && path === '/products') {
      return json({ results: this.products.map((p) => ({ id: p.id, name: p.name })), page: 1, page_count: 1 });
    }

    const productMatch = path.match(/^\/products\/([^/]+)$/);
    if (method === 'GET' && productMatch) {
      const product = this.products.find((p) => p.id === productMatch[1]);
      if (!product) return storeError(404, 'Not Found', 'Resource not found.');
      return json(product);
    }

    return storeError(404, 'Not Found', 'Resource not found.');
  }

  private waitForBarrier(): Promise<void> {
    if (this.createBarrier <= 1) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.heldCreates.push(resolve);
      if (this.heldCreates.length >= this.createBarrier) {
        const release = this.heldCreates;
        this.heldCreates = [];
        this.createBarrier = 0;
        for (const r of release) r();
      }
    });
  }
}
