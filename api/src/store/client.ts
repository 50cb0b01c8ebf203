/**
 * Store API Client
 *
 * Typed wrapper around the creator store's REST API. Every call is bounded
 * by a timeout and every failure is mapped into the upstream error taxonomy,
 * so callers never see a raw fetch error or status code.
 */

import {
  UpstreamAuthInvalid,
  UpstreamTransient,
  UpstreamUnexpected,
  type UpstreamError,
} from '../errors.js';
import type {
  Activation,
  ActivationDto,
  ActivationListDto,
  FullProductDto,
  LicenseDetail,
  LicenseDto,
  LicenseListDto,
  OwnUserDto,
  PageInfoDto,
  Product,
  ProductListDto,
  StoreErrorBodyDto,
  StoreUser,
  Version,
} from './types.js';

export const DEFAULT_STORE_API_URL = 'https://api.creators.jinxxy.com/v1';

/** Prefix of activation descriptions created by the gateway. */
export const DESCRIPTION_PREFIX = 'user_';

/** Identity used for lock activations. No real identity may use it. */
export const LOCK_IDENTITY = '0';

const VERSION_FETCH_CONCURRENCY = 4;

export interface StoreClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  userAgent?: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/** A store response with its body already read. */
interface StoreResponse {
  status: number;
  ok: boolean;
  text: string;
}

export type LicenseKeyQuery =
  | { kind: 'short'; value: string }
  | { kind: 'long'; value: string };

// ============================================
// Activation descriptions
// ============================================

export function activationDescription(identity: string): string {
  return `${DESCRIPTION_PREFIX}${identity}`;
}

export function identityFromDescription(description: string): string | null {
  if (!description.startsWith(DESCRIPTION_PREFIX)) return null;
  const identity = description.slice(DESCRIPTION_PREFIX.length);
  return identity.length > 0 ? identity : null;
}

// ============================================
// Error mapping
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function messageMatches(body: StoreErrorBodyDto, text: string): boolean {
  if (typeof body.message === 'string') return body.message === text;
  return body.message.some((part) => part.message === text);
}

function looksLike401(status: number, body: StoreErrorBodyDto | null): boolean {
  if (status === 401) return true;
  if (!body) return false;
  return body.status_code === 401 || (body.error === 'Bad Request' && messageMatches(body, 'Invalid or expired API key'));
}

function looksLike403(status: number, body: StoreErrorBodyDto | null): boolean {
  if (status === 403) return true;
  if (!body) return false;
  return body.status_code === 403 || (body.error === 'Bad Request' && messageMatches(body, 'You are not authorized.'));
}

function looksLike404(status: number, body: StoreErrorBodyDto | null): boolean {
  if (status === 404) return true;
  if (!body) return false;
  return body.status_code === 404 || (body.error === 'Bad Request' && messageMatches(body, 'Resource not found.'));
}

function parseErrorBody(text: string): StoreErrorBodyDto | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const { status_code, error, message } = parsed;
  if (typeof status_code !== 'number' || typeof error !== 'string') return null;
  if (typeof message === 'string') {
    return { status_code, error, message };
  }
  if (Array.isArray(message)) {
    const parts = message.filter(
      (p): p is { message: string; code: string } =>
        isRecord(p) && typeof p.message === 'string' && typeof p.code === 'string',
    );
    return { status_code, error, message: parts };
  }
  return null;
}

/**
 * Map a non-2xx response to an upstream error.
 * 4xx other than auth are deterministic, so they are never marked retryable.
 */
export function errorFromResponse(
  endpoint: string,
  status: number,
  body: StoreErrorBodyDto | null,
): UpstreamError {
  if (looksLike401(status, body) || looksLike403(status, body)) {
    return new UpstreamAuthInvalid(endpoint, status);
  }
  if (status === 429 || status >= 500) {
    return new UpstreamTransient(`${endpoint} returned status code ${status}`, endpoint, status);
  }
  return new UpstreamUnexpected(`${endpoint} returned status code ${status}`, endpoint, status);
}

// ============================================
// Response shape guards
// ============================================

function isIdName(value: unknown): value is { id: string; name: string } {
  return isRecord(value) && typeof value.id === 'string' && typeof value.name === 'string';
}

function isLicenseList(value: unknown): value is LicenseListDto {
  return (
    isRecord(value) &&
    Array.isArray(value.results) &&
    value.results.every((r) => isRecord(r) && typeof r.id === 'string')
  );
}

function isLicense(value: unknown): value is LicenseDto {
  if (!isRecord(value)) return false;
  const item = value.inventory_item;
  const activations = value.activations;
  return (
    typeof value.id === 'string' &&
    typeof value.short_key === 'string' &&
    typeof value.key === 'string' &&
    isRecord(item) &&
    typeof item.target_id === 'string' &&
    (item.target_version_id === null || item.target_version_id === undefined || typeof item.target_version_id === 'string') &&
    isRecord(item.item) &&
    typeof item.item.name === 'string' &&
    isRecord(activations) &&
    typeof activations.total_count === 'number'
  );
}

function isActivation(value: unknown): value is ActivationDto {
  return isRecord(value) && typeof value.id === 'string' && typeof value.description === 'string';
}

function isActivationList(value: unknown): value is ActivationListDto {
  return isRecord(value) && Array.isArray(value.results) && value.results.every(isActivation);
}

function isProductList(value: unknown): value is ProductListDto {
  return isRecord(value) && Array.isArray(value.results) && value.results.every(isIdName);
}

function isFullProduct(value: unknown): value is FullProductDto {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.name === 'string' &&
    Array.isArray(value.versions) &&
    value.versions.every(isIdName)
  );
}

function isOwnUser(value: unknown): value is OwnUserDto {
  return (
    isRecord(value) &&
    Array.isArray(value.scopes) &&
    value.scopes.every((s) => typeof s === 'string') &&
    (value.username === null || value.username === undefined || typeof value.username === 'string') &&
    (value.name === null || value.name === undefined || typeof value.name === 'string')
  );
}

function toActivation(licenseId: string, dto: ActivationDto): Activation {
  return {
    id: dto.id,
    licenseId,
    description: dto.description,
    identity: identityFromDescription(dto.description),
  };
}

// ============================================
// Client
// ============================================

export class StoreClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: StoreClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_STORE_API_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.userAgent = options.userAgent ?? 'keyward/1.0';
  }

  /**
   * Resolve a short or long key to a license id.
   * Returns null when the store knows no such key.
   */
  async lookupLicense(apiKey: string, key: LicenseKeyQuery, opts: CallOptions = {}): Promise<string | null> {
    const endpoint = 'GET /licenses';
    const param = key.kind === 'short' ? 'short_key' : 'key';
    const response = await this.send(apiKey, 'GET', `/licenses?${param}=${encodeURIComponent(key.value)}`, endpoint, opts);
    const list = this.parseJson(endpoint, this.expectOk(endpoint, response), isLicenseList);
    this.assertSinglePage(endpoint, list);

    if (list.results.length > 1) {
      throw new UpstreamUnexpected(`${endpoint} returned ${list.results.length} matches for one key`, endpoint);
    }
    return list.results[0]?.id ?? null;
  }

  /**
   * Fetch license detail by id. Returns null when the id is unknown or
   * belongs to another store account.
   */
  async getLicense(apiKey: string, licenseId: string, opts: CallOptions = {}): Promise<LicenseDetail | null> {
    const endpoint = 'GET /licenses/<id>';
    const response = await this.send(apiKey, 'GET', `/licenses/${encodeURIComponent(licenseId)}`, endpoint, opts);

    if (!response.ok) {
      const body = parseErrorBody(response.text);
      // the store answers foreign license ids with "not authorized"
      if (looksLike404(response.status, body) || (response.status !== 401 && looksLike403(response.status, body))) {
        console.debug(`[StoreClient] license id ${licenseId} not found`);
        return null;
      }
      throw errorFromResponse(endpoint, response.status, body);
    }

    const dto = this.parseJson(endpoint, response, isLicense);
    return {
      id: dto.id,
      shortKey: dto.short_key,
      key: dto.key,
      productId: dto.inventory_item.target_id,
      productName: dto.inventory_item.item.name,
      versionId: dto.inventory_item.target_version_id ?? null,
      activationCount: dto.activations.total_count,
      locked: false,
    };
  }

  async listActivations(apiKey: string, licenseId: string, opts: CallOptions = {}): Promise<Activation[]> {
    const endpoint = 'GET /licenses/<id>/activations';
    const response = await this.send(
      apiKey,
      'GET',
      `/licenses/${encodeURIComponent(licenseId)}/activations`,
      endpoint,
      opts,
    );
    const list = this.parseJson(endpoint, this.expectOk(endpoint, response), isActivationList);
    this.assertSinglePage(endpoint, list);
    return list.results.map((dto) => toActivation(licenseId, dto));
  }

  async createActivation(
    apiKey: string,
    licenseId: string,
    identity: string,
    opts: CallOptions = {},
  ): Promise<Activation> {
    const endpoint = 'POST /licenses/<id>/activations';
    const response = await this.send(
      apiKey,
      'POST',
      `/licenses/${encodeURIComponent(licenseId)}/activations`,
      endpoint,
      { ...opts, body: { description: activationDescription(identity) } },
    );
    const dto = this.parseJson(endpoint, this.expectOk(endpoint, response), isActivation);
    return toActivation(licenseId, dto);
  }

  /** Returns false when the activation no longer exists. */
  async deleteActivation(
    apiKey: string,
    licenseId: string,
    activationId: string,
    opts: CallOptions = {},
  ): Promise<boolean> {
    const endpoint = 'DELETE /licenses/<id>/activations/<id>';
    const response = await this.send(
      apiKey,
      'DELETE',
      `/licenses/${encodeURIComponent(licenseId)}/activations/${encodeURIComponent(activationId)}`,
      endpoint,
      opts,
    );
    if (response.ok) return true;

    const body = parseErrorBody(response.text);
    if (looksLike404(response.status, body)) return false;
    throw errorFromResponse(endpoint, response.status, body);
  }

  async listProducts(apiKey: string, opts: CallOptions = {}): Promise<Product[]> {
    const endpoint = 'GET /products';
    const response = await this.send(apiKey, 'GET', '/products', endpoint, opts);
    const list = this.parseJson(endpoint, this.expectOk(endpoint, response), isProductList);
    this.assertSinglePage(endpoint, list);
    return list.results.map((p) => ({ id: p.id, name: p.name }));
  }

  /**
   * Fetch versions for the given products. One request per product, a few
   * at a time. Versions come back grouped in product order.
   */
  async listVersions(apiKey: string, products: Product[], opts: CallOptions = {}): Promise<Version[]> {
    const perProduct = await mapWithConcurrency(products, VERSION_FETCH_CONCURRENCY, async (product) => {
      const full = await this.getProduct(apiKey, product.id, opts);
      return full.versions.map((v) => ({ id: v.id, productId: full.id, name: v.name }));
    });
    return perProduct.flat();
  }

  async getProduct(apiKey: string, productId: string, opts: CallOptions = {}): Promise<FullProductDto> {
    const endpoint = 'GET /products/<id>';
    const response = await this.send(apiKey, 'GET', `/products/${encodeURIComponent(productId)}`, endpoint, opts);
    return this.parseJson(endpoint, this.expectOk(endpoint, response), isFullProduct);
  }

  /** Identify the account an API key belongs to. */
  async getOwnUser(apiKey: string, opts: CallOptions = {}): Promise<StoreUser> {
    const endpoint = 'GET /me';
    const response = await this.send(apiKey, 'GET', '/me', endpoint, opts);
    const dto = this.parseJson(endpoint, this.expectOk(endpoint, response), isOwnUser);
    const name = dto.name?.trim();
    return {
      username: dto.username ?? null,
      displayName: name ? name : dto.username ?? 'unknown',
      scopes: dto.scopes,
    };
  }

  // ============================================
  // Transport
  // ============================================

  /**
   * One round trip. The timeout and the caller's signal cover the body read
   * as well as the headers, so a store that stalls mid-body still fails.
   */
  private async send(
    apiKey: string,
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    endpoint: string,
    opts: CallOptions & { body?: unknown },
  ): Promise<StoreResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });
    if (opts.signal?.aborted) controller.abort();

    const headers: Record<string, string> = {
      'x-api-key': apiKey,
      Accept: 'application/json',
      'User-Agent': this.userAgent,
    };
    if (opts.body !== undefined) headers['Content-Type'] = 'application/json';

    const start = Date.now();
    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
        signal: controller.signal,
      });
      const text = await untilAborted(response.text(), controller.signal);
      console.debug(`[StoreClient] ${endpoint} took ${Date.now() - start}ms`);
      return { status: response.status, ok: response.ok, text };
    } catch (err) {
      const reason = controller.signal.aborted
        ? opts.signal?.aborted
          ? 'aborted'
          : `timed out after ${this.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
      throw new UpstreamTransient(`${endpoint} failed: ${reason}`, endpoint);
    } finally {
      clearTimeout(timeout);
      opts.signal?.removeEventListener('abort', onAbort);
    }
  }

  private expectOk(endpoint: string, response: StoreResponse): StoreResponse {
    if (response.ok) return response;
    throw errorFromResponse(endpoint, response.status, parseErrorBody(response.text));
  }

  private parseJson<T>(endpoint: string, response: StoreResponse, guard: (value: unknown) => value is T): T {
    let data: unknown;
    try {
      data = JSON.parse(response.text);
    } catch {
      throw new UpstreamUnexpected(`${endpoint} returned a body that is not JSON`, endpoint, response.status);
    }
    if (!guard(data)) {
      throw new UpstreamUnexpected(`${endpoint} returned an unexpected response shape`, endpoint, response.status);
    }
    return data;
  }

  private assertSinglePage(endpoint: string, page: PageInfoDto): void {
    if (page.page_count !== undefined && page.page_count > 1) {
      throw new UpstreamUnexpected(`${endpoint} requires pagination (${page.page_count} pages)`, endpoint);
    }
  }
}

/** Settle with `promise`, or reject as soon as `signal` aborts. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  }

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
