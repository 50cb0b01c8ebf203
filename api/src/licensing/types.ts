/**
 * Activation outcomes. Upstream failures are thrown, never returned.
 */

import type { Activation, LicenseDetail } from '../store/types.js';
import type { LicenseKind } from './license-key.js';

export interface ActivatedResult {
  status: 'activated';
  activation: Activation;
  /** False when the identity already held an activation and nothing was created. */
  created: boolean;
  license: LicenseDetail;
}

export interface AlreadyActivatedResult {
  status: 'already_activated';
  licenseId: string;
}

export interface InvalidLicenseResult {
  status: 'invalid_license';
  kind: LicenseKind;
  hint: string | null;
}

export interface LicenseLockedResult {
  status: 'license_locked';
  licenseId: string;
}

export type ActivationResult =
  | ActivatedResult
  | AlreadyActivatedResult
  | InvalidLicenseResult
  | LicenseLockedResult;

// ============================================
// Operator operations
// ============================================

export type DeactivateResult =
  | { status: 'deactivated'; licenseId: string; removed: number }
  | InvalidLicenseResult;

export type LockResult =
  | { status: 'locked'; licenseId: string; created: boolean }
  | InvalidLicenseResult;

export type UnlockResult =
  | { status: 'unlocked'; licenseId: string; removed: boolean }
  | InvalidLicenseResult;

export type LicenseUsersResult =
  | { status: 'found'; license: LicenseDetail; identities: string[] }
  | InvalidLicenseResult;

/** Local audit record, one per activation the gateway created. */
export interface ActivationRecord {
  storeId: string;
  licenseId: string;
  activationId: string;
  identity: string;
  createdAt: number;
}
