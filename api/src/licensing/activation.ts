/**
 * Activation Resolver
 *
 * verify -> inspect -> create -> reconcile against a store that has no
 * compare-and-swap. Two callers racing on a fresh license can both pass the
 * inspect step and both create an activation; the second listing after
 * creation settles it: the lowest activation id wins and the loser deletes
 * what it created.
 *
 * The resolver takes no locks and never retries. Upstream errors propagate,
 * except from deleting the loser's activation once the outcome is settled.
 */

import { StoreNotConfigured } from '../errors.js';
import type { MetadataCacheStore } from '../cache/store.js';
import { LOCK_IDENTITY, type StoreClient } from '../store/client.js';
import type { Activation, LicenseDetail } from '../store/types.js';
import type { ActivationAudit } from './audit.js';
import {
  licenseHint,
  redactKey,
  toTrustedKey,
  toUntrustedKey,
  type LicenseKey,
  type LicenseKind,
} from './license-key.js';
import type {
  ActivationResult,
  DeactivateResult,
  InvalidLicenseResult,
  LicenseUsersResult,
  LockResult,
  UnlockResult,
} from './types.js';

export interface ActivationResolverOptions {
  client: StoreClient;
  cache: MetadataCacheStore;
  audit: ActivationAudit;
  /** When on (the default), a license already held by another identity cannot be activated. */
  singleOwner?: boolean;
  now?: () => number;
}

const INTEGER_ID = /^[0-9]+$/;

/**
 * Order activation ids. Integer ids compare numerically; anything else falls
 * back to string order. Assumes the store hands out ids in creation order.
 */
export function compareActivationIds(a: string, b: string): number {
  if (INTEGER_ID.test(a) && INTEGER_ID.test(b)) {
    const x = BigInt(a);
    const y = BigInt(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function lowestActivation(activations: readonly Activation[]): Activation | null {
  let lowest: Activation | null = null;
  for (const activation of activations) {
    if (!lowest || compareActivationIds(activation.id, lowest.id) < 0) lowest = activation;
  }
  return lowest;
}

function isLock(activation: Activation): boolean {
  return activation.identity === LOCK_IDENTITY;
}

function invalid(kind: LicenseKind): InvalidLicenseResult {
  return { status: 'invalid_license', kind, hint: licenseHint(kind) };
}

export function isValidIdentity(identity: string): boolean {
  return identity.length > 0 && identity.length <= 128 && identity !== LOCK_IDENTITY && !/\s/.test(identity);
}

export class ActivationResolver {
  private readonly client: StoreClient;
  private readonly cache: MetadataCacheStore;
  private readonly audit: ActivationAudit;
  private readonly singleOwner: boolean;
  private readonly now: () => number;

  constructor(options: ActivationResolverOptions) {
    this.client = options.client;
    this.cache = options.cache;
    this.audit = options.audit;
    this.singleOwner = options.singleOwner ?? true;
    this.now = options.now ?? Date.now;
  }

  async activate(storeId: string, licenseKey: string, identity: string): Promise<ActivationResult> {
    if (!isValidIdentity(identity)) {
      throw new RangeError(`invalid identity "${identity}"`);
    }
    const apiKey = await this.apiKeyFor(storeId);

    // 1. verify
    const { kind, key } = toUntrustedKey(licenseKey);
    if (!key) {
      console.log(`[Activation] ${identity} presented ${kind} for store ${storeId}`);
      return invalid(kind);
    }
    const licenseId = await this.client.lookupLicense(apiKey, key);
    if (!licenseId) {
      console.log(`[Activation] ${identity} presented unknown ${kind} key ${redactKey(licenseKey)}`);
      return invalid(kind);
    }

    const license = await this.client.getLicense(apiKey, licenseId);
    if (!license) return invalid(kind);
    if (await this.audit.isLocked(storeId, license.id)) {
      return { status: 'license_locked', licenseId: license.id };
    }

    // 2. inspect
    const existing = license.activationCount >= 1 ? await this.client.listActivations(apiKey, license.id) : [];
    if (existing.some(isLock)) {
      return { status: 'license_locked', licenseId: license.id };
    }
    // single owner: only the lowest claimed activation counts, even when
    // an earlier race left the caller holding a higher one
    const holder = lowestActivation(
      existing.filter((a) => (this.singleOwner ? a.identity !== null : a.identity === identity)),
    );
    if (holder?.identity === identity) {
      return { status: 'activated', activation: holder, created: false, license };
    }
    if (holder) {
      console.log(`[Activation] license ${license.id} already held by ${holder.id}; ${identity} refused`);
      return { status: 'already_activated', licenseId: license.id };
    }

    // 3. create
    const created = await this.client.createActivation(apiKey, license.id, identity);
    await this.audit.record({
      storeId,
      licenseId: license.id,
      activationId: created.id,
      identity,
      createdAt: this.now(),
    });

    // 4. reconcile
    const after = await this.client.listActivations(apiKey, license.id);
    const claimed = after.filter((a) => a.identity !== null);
    if (!claimed.some((a) => a.id === created.id)) claimed.push(created);

    const lock = claimed.find(isLock);
    if (lock) {
      await this.rollback(storeId, apiKey, created, lock);
      return { status: 'license_locked', licenseId: license.id };
    }

    const contenders = this.singleOwner ? claimed : claimed.filter((a) => a.identity === identity);
    const winner = lowestActivation(contenders) ?? created;

    if (winner.identity !== identity) {
      console.log(`[Activation] lost race on license ${license.id}: ${winner.id} beat ${created.id}`);
      await this.rollback(storeId, apiKey, created, winner);
      return { status: 'already_activated', licenseId: license.id };
    }

    const activated: LicenseDetail = { ...license, activationCount: Math.max(license.activationCount, 1) };
    if (winner.id !== created.id) {
      // our own earlier activation from a concurrent request
      await this.rollback(storeId, apiKey, created, winner);
      return { status: 'activated', activation: winner, created: false, license: activated };
    }

    console.log(`[Activation] license ${license.id} activated for ${identity} (${created.id})`);
    return { status: 'activated', activation: created, created: true, license: activated };
  }

  /** Remove every activation an identity holds on a license. */
  async deactivate(storeId: string, licenseKey: string, identity: string): Promise<DeactivateResult> {
    const apiKey = await this.apiKeyFor(storeId);
    const resolved = await this.resolveTrusted(apiKey, licenseKey);
    if ('status' in resolved) return resolved;

    const activations = await this.client.listActivations(apiKey, resolved.licenseId);
    let removed = 0;
    for (const activation of activations.filter((a) => a.identity === identity)) {
      if (await this.client.deleteActivation(apiKey, resolved.licenseId, activation.id)) removed++;
      await this.audit.remove(storeId, resolved.licenseId, activation.id);
    }

    // records whose activation was already deleted upstream
    const records = await this.audit.listForLicense(storeId, resolved.licenseId);
    for (const record of records.filter((r) => r.identity === identity)) {
      await this.audit.remove(storeId, resolved.licenseId, record.activationId);
    }

    console.log(`[Activation] removed ${removed} activation(s) of ${identity} from license ${resolved.licenseId}`);
    return { status: 'deactivated', licenseId: resolved.licenseId, removed };
  }

  /** Idempotent: an existing lock activation is reused. */
  async lockLicense(storeId: string, licenseKey: string): Promise<LockResult> {
    const apiKey = await this.apiKeyFor(storeId);
    const resolved = await this.resolveTrusted(apiKey, licenseKey);
    if ('status' in resolved) return resolved;
    const { licenseId } = resolved;

    const activations = await this.client.listActivations(apiKey, licenseId);
    const existing = lowestActivation(activations.filter(isLock));
    const lock = existing ?? (await this.client.createActivation(apiKey, licenseId, LOCK_IDENTITY));

    await this.audit.record({
      storeId,
      licenseId,
      activationId: lock.id,
      identity: LOCK_IDENTITY,
      createdAt: this.now(),
    });
    console.log(`[Activation] license ${licenseId} locked`);
    return { status: 'locked', licenseId, created: existing === null };
  }

  async unlockLicense(storeId: string, licenseKey: string): Promise<UnlockResult> {
    const apiKey = await this.apiKeyFor(storeId);
    const resolved = await this.resolveTrusted(apiKey, licenseKey);
    if ('status' in resolved) return resolved;
    const { licenseId } = resolved;

    let removed = false;
    const activations = await this.client.listActivations(apiKey, licenseId);
    for (const lock of activations.filter(isLock)) {
      removed = (await this.client.deleteActivation(apiKey, licenseId, lock.id)) || removed;
      await this.audit.remove(storeId, licenseId, lock.id);
    }
    const records = await this.audit.listForLicense(storeId, licenseId);
    for (const record of records.filter((r) => r.identity === LOCK_IDENTITY)) {
      await this.audit.remove(storeId, licenseId, record.activationId);
      removed = true;
    }

    if (removed) console.log(`[Activation] license ${licenseId} unlocked`);
    return { status: 'unlocked', licenseId, removed };
  }

  /** Identities with a local audit record on the license, plus its lock state. */
  async licenseUsers(storeId: string, licenseKey: string): Promise<LicenseUsersResult> {
    const apiKey = await this.apiKeyFor(storeId);
    const resolved = await this.resolveTrusted(apiKey, licenseKey);
    if ('status' in resolved) return resolved;

    const license = await this.client.getLicense(apiKey, resolved.licenseId);
    if (!license) return invalid(resolved.kind);

    const records = await this.audit.listForLicense(storeId, license.id);
    let locked = records.some((r) => r.identity === LOCK_IDENTITY);
    if (!locked && license.activationCount >= 1) {
      const activations = await this.client.listActivations(apiKey, license.id);
      locked = activations.some(isLock);
    }

    const identities = [
      ...new Set(records.filter((r) => r.identity !== LOCK_IDENTITY).map((r) => r.identity)),
    ];
    return { status: 'found', license: { ...license, locked }, identities };
  }

  // ============================================
  // Helpers
  // ============================================

  private async apiKeyFor(storeId: string): Promise<string> {
    const credential = await this.cache.getCredential(storeId);
    if (!credential) throw new StoreNotConfigured(storeId);
    return credential.apiKey;
  }

  private async resolveTrusted(
    apiKey: string,
    licenseKey: string,
  ): Promise<{ licenseId: string; kind: LicenseKind } | InvalidLicenseResult> {
    const { kind, key } = toTrustedKey(licenseKey);
    if (!key) return invalid(kind);
    const licenseId = await this.lookup(apiKey, key);
    return licenseId ? { licenseId, kind } : invalid(kind);
  }

  private async lookup(apiKey: string, key: LicenseKey): Promise<string | null> {
    if (key.kind !== 'id') return this.client.lookupLicense(apiKey, key);
    const license = await this.client.getLicense(apiKey, key.value);
    return license?.id ?? null;
  }

  /**
   * Delete an activation that lost reconciliation. The outcome is settled by
   * `winner` either way, so a failed delete is only logged.
   */
  private async rollback(storeId: string, apiKey: string, activation: Activation, winner: Activation): Promise<void> {
    try {
      await this.client.deleteActivation(apiKey, activation.licenseId, activation.id);
    } catch (err) {
      console.error(
        `[Activation] could not remove activation ${activation.id} on license ${activation.licenseId} (kept ${winner.id}):`,
        err,
      );
      return;
    }
    await this.audit.remove(storeId, activation.licenseId, activation.id);
  }
}
