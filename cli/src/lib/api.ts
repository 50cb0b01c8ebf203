import type { ApiTarget } from "./config.js";

export interface LicenseView {
  id: string;
  product_id: string;
  product_name: string;
  version_id: string | null;
  activation_count: number;
  locked: boolean;
}

export interface ActivationResponse {
  status: "activated";
  created: boolean;
  activation: { id: string; license_id: string; identity: string | null };
  license: LicenseView;
}

export interface ProductMatch {
  id: string;
  name: string;
}

export interface VersionMatch {
  id: string;
  productId: string;
  name: string;
}

export interface RefreshResponse {
  store_id: string;
  state: string;
  last_refreshed: string;
  product_count: number;
  version_count: number;
}

export interface StoreStatus {
  store_id: string;
  state: string;
  invalid: boolean;
  username: string | null;
  last_refreshed: string | null;
  product_count: number;
  version_count: number;
}

export interface CredentialResponse {
  store_id: string;
  username: string | null;
  display_name: string;
}

export interface DeleteStoreResponse {
  store_id: string;
  deleted: boolean;
  audit_records_removed: number;
}

export interface LicenseInfo {
  license: LicenseView;
  identities: string[];
}

export interface LockResponse {
  license_id: string;
  locked: boolean;
  created?: boolean;
  removed?: boolean;
}

export interface DeactivateResponse {
  license_id: string;
  identity: string;
  removed: number;
}

/**
 * Non-2xx answer from the server. `code` is the machine-readable error code
 * from the body when there is one.
 */
export class KeywardApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "KeywardApiError";
  }
}

// ============================================================================
// Response guards
// ============================================================================

type Guard<T> = (value: unknown) => value is T;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isNullableString = (v: unknown): v is string | null => v === null || typeof v === "string";

function hasFields(value: unknown, fields: Record<string, (v: unknown) => boolean>): value is Record<string, unknown> {
  if (!isRecord(value)) return false;
  return Object.entries(fields).every(([key, check]) => check(value[key]));
}

function arrayOf<T>(guard: Guard<T>) {
  return (value: unknown): value is T[] => Array.isArray(value) && value.every(guard);
}

function isLicenseView(v: unknown): v is LicenseView {
  return hasFields(v, {
    id: isString,
    product_id: isString,
    product_name: isString,
    version_id: isNullableString,
    activation_count: isNumber,
    locked: isBoolean,
  });
}

function isActivationResponse(v: unknown): v is ActivationResponse {
  return (
    hasFields(v, { status: (s) => s === "activated", created: isBoolean, license: isLicenseView }) &&
    hasFields(v.activation, { id: isString, license_id: isString, identity: isNullableString })
  );
}

const isProductMatch = (v: unknown): v is ProductMatch => hasFields(v, { id: isString, name: isString });
const isVersionMatch = (v: unknown): v is VersionMatch =>
  hasFields(v, { id: isString, productId: isString, name: isString });

function isProductList(v: unknown): v is { products: ProductMatch[] } {
  return hasFields(v, { products: arrayOf(isProductMatch) });
}

function isVersionList(v: unknown): v is { versions: VersionMatch[] } {
  return hasFields(v, { versions: arrayOf(isVersionMatch) });
}

function isRefreshResponse(v: unknown): v is RefreshResponse {
  return hasFields(v, {
    store_id: isString,
    state: isString,
    last_refreshed: isString,
    product_count: isNumber,
    version_count: isNumber,
  });
}

function isStoreStatus(v: unknown): v is StoreStatus {
  return hasFields(v, {
    store_id: isString,
    state: isString,
    invalid: isBoolean,
    username: isNullableString,
    last_refreshed: isNullableString,
    product_count: isNumber,
    version_count: isNumber,
  });
}

function isCredentialResponse(v: unknown): v is CredentialResponse {
  return hasFields(v, { store_id: isString, username: isNullableString, display_name: isString });
}

function isDeleteStoreResponse(v: unknown): v is DeleteStoreResponse {
  return hasFields(v, { store_id: isString, deleted: isBoolean, audit_records_removed: isNumber });
}

function isLicenseInfo(v: unknown): v is LicenseInfo {
  return hasFields(v, { license: isLicenseView, identities: arrayOf(isString) });
}

function isLockResponse(v: unknown): v is LockResponse {
  return hasFields(v, { license_id: isString, locked: isBoolean });
}

function isDeactivateResponse(v: unknown): v is DeactivateResponse {
  return hasFields(v, { license_id: isString, identity: isString, removed: isNumber });
}

// ============================================================================
// Transport
// ============================================================================

interface RequestOptions {
  body?: unknown;
  admin?: boolean;
}

async function fetchApi<T>(
  target: ApiTarget,
  method: string,
  endpoint: string,
  guard: Guard<T>,
  options: RequestOptions = {},
): Promise<T> {
  const headers: Record<string, string> = { Accept: "application/json" };
  if (options.body !== undefined) headers["Content-Type"] = "application/json";
  if (options.admin) {
    if (!target.adminToken) {
      throw new Error(
        "No admin token configured. Run `keyward config set --token <token>` or set KEYWARD_ADMIN_TOKEN."
      );
    }
    headers.Authorization = `Bearer ${target.adminToken}`;
  }

  const response = await fetch(`${target.url}${endpoint}`, {
    method,
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  });

  const text = await response.text();
  let data: unknown = null;
  try {
    data = text ? JSON.parse(text) : null;
  } catch {
    data = null;
  }

  if (!response.ok) {
    const details = isRecord(data) ? data : {};
    const message = isString(details.error) ? details.error : `API request failed: ${response.status}`;
    throw new KeywardApiError(message, response.status, isString(details.code) ? details.code : undefined, details);
  }

  if (!guard(data)) {
    throw new Error(`Unexpected response from ${method} ${endpoint}`);
  }
  return data;
}

function storePath(store: string): string {
  return `/v1/stores/${encodeURIComponent(store)}`;
}

function licensePath(store: string, license: string): string {
  return `${storePath(store)}/licenses/${encodeURIComponent(license)}`;
}

// ============================================================================
// Endpoints
// ============================================================================

export async function activateLicense(
  target: ApiTarget,
  store: string,
  licenseKey: string,
  identity: string
): Promise<ActivationResponse> {
  return fetchApi(target, "POST", `${storePath(store)}/activations`, isActivationResponse, {
    body: { license_key: licenseKey, identity },
  });
}

export async function searchProducts(target: ApiTarget, store: string, query = ""): Promise<ProductMatch[]> {
  const q = new URLSearchParams({ q: query });
  const result = await fetchApi(target, "GET", `${storePath(store)}/products?${q}`, isProductList);
  return result.products;
}

export async function searchVersions(
  target: ApiTarget,
  store: string,
  productId: string,
  query = ""
): Promise<VersionMatch[]> {
  const q = new URLSearchParams({ q: query });
  const endpoint = `${storePath(store)}/products/${encodeURIComponent(productId)}/versions?${q}`;
  const result = await fetchApi(target, "GET", endpoint, isVersionList);
  return result.versions;
}

export async function refreshStore(target: ApiTarget, store: string): Promise<RefreshResponse> {
  return fetchApi(target, "POST", `${storePath(store)}/refresh`, isRefreshResponse, { admin: true });
}

export async function getStoreStatus(target: ApiTarget, store: string): Promise<StoreStatus> {
  return fetchApi(target, "GET", storePath(store), isStoreStatus, { admin: true });
}

export async function setStoreKey(target: ApiTarget, store: string, apiKey: string): Promise<CredentialResponse> {
  return fetchApi(target, "PUT", `${storePath(store)}/credential`, isCredentialResponse, {
    admin: true,
    body: { api_key: apiKey },
  });
}

export async function removeStore(target: ApiTarget, store: string): Promise<DeleteStoreResponse> {
  return fetchApi(target, "DELETE", storePath(store), isDeleteStoreResponse, { admin: true });
}

export async function getLicenseInfo(target: ApiTarget, store: string, license: string): Promise<LicenseInfo> {
  return fetchApi(target, "GET", licensePath(store, license), isLicenseInfo, { admin: true });
}

export async function lockLicense(target: ApiTarget, store: string, license: string): Promise<LockResponse> {
  return fetchApi(target, "POST", `${licensePath(store, license)}/lock`, isLockResponse, { admin: true });
}

export async function unlockLicense(target: ApiTarget, store: string, license: string): Promise<LockResponse> {
  return fetchApi(target, "POST", `${licensePath(store, license)}/unlock`, isLockResponse, { admin: true });
}

export async function deactivateLicense(
  target: ApiTarget,
  store: string,
  license: string,
  identity: string
): Promise<DeactivateResponse> {
  const endpoint = `${licensePath(store, license)}/activations/${encodeURIComponent(identity)}`;
  return fetchApi(target, "DELETE", endpoint, isDeactivateResponse, { admin: true });
}
