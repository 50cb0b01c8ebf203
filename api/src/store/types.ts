/**
 * Store API types
 *
 * Wire DTOs as the store returns them, plus the internal shapes the rest of
 * the gateway works with.
 */

// ============================================
// Internal shapes
// ============================================

export interface Product {
  id: string;
  name: string;
}

export interface Version {
  id: string;
  productId: string;
  name: string;
}

export interface Activation {
  id: string;
  licenseId: string;
  description: string;
  /** Identity parsed from the description, or null when it was not created by us. */
  identity: string | null;
}

export interface LicenseDetail {
  id: string;
  shortKey: string;
  key: string;
  productId: string;
  productName: string;
  versionId: string | null;
  activationCount: number;
  /** Filled in by the resolver from local lock records; the store has no lock field. */
  locked: boolean;
}

export interface StoreUser {
  username: string | null;
  displayName: string;
  scopes: string[];
}

/** Scopes a store API key needs before it can be registered. */
export const REQUIRED_SCOPES = ['licenses_read', 'licenses_write', 'products_read'] as const;

// ============================================
// Wire DTOs
// ============================================

export interface PageInfoDto {
  page?: number;
  page_count?: number;
}

export interface LicenseListDto extends PageInfoDto {
  results: { id: string }[];
}

export interface LicenseDto {
  id: string;
  short_key: string;
  key: string;
  inventory_item: {
    target_id: string;
    target_version_id: string | null;
    item: { name: string };
  };
  activations: { total_count: number };
}

export interface ActivationDto {
  id: string;
  description: string;
}

export interface ActivationListDto extends PageInfoDto {
  results: ActivationDto[];
}

export interface ProductListDto extends PageInfoDto {
  results: { id: string; name: string }[];
}

export interface FullProductDto {
  id: string;
  name: string;
  versions: { id: string; name: string }[];
}

export interface OwnUserDto {
  name: string | null;
  username: string | null;
  scopes: string[];
}

/**
 * Error body the store sends with non-2xx responses. The store sometimes
 * reports auth failures as 500 with a recognizable message.
 */
export interface StoreErrorBodyDto {
  status_code: number;
  error: string;
  message: string | { message: string; code: string }[];
}
