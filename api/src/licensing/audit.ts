/**
 * Local activation audit records.
 *
 * Each record lives under its own key so concurrent activations never
 * read-modify-write a shared value. Records for the lock identity double as
 * the local lock flag.
 */

import { LOCK_IDENTITY } from '../store/client.js';
import { getJson, listAllKeys, type KVStore } from '../storage/kv.js';
import type { ActivationRecord } from './types.js';

export function auditKey(storeId: string, licenseId: string, activationId: string): string {
  return `activation:${storeId}:${licenseId}:${activationId}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function isActivationRecord(r: unknown): r is ActivationRecord {
  return (
    isRecord(r) &&
    typeof r.storeId === 'string' &&
    typeof r.licenseId === 'string' &&
    typeof r.activationId === 'string' &&
    typeof r.identity === 'string' &&
    typeof r.createdAt === 'number'
  );
}

export class ActivationAudit {
  constructor(private readonly kv: KVStore) {}

  async record(record: ActivationRecord): Promise<void> {
    await this.kv.put(auditKey(record.storeId, record.licenseId, record.activationId), JSON.stringify(record));
  }

  async remove(storeId: string, licenseId: string, activationId: string): Promise<void> {
    await this.kv.delete(auditKey(storeId, licenseId, activationId));
  }

  async listForLicense(storeId: string, licenseId: string): Promise<ActivationRecord[]> {
    const keys = await listAllKeys(this.kv, `activation:${storeId}:${licenseId}:`);
    const values = await Promise.all(keys.map((key) => getJson(this.kv, key)));
    return values.filter(isActivationRecord).sort((a, b) => a.createdAt - b.createdAt);
  }

  async isLocked(storeId: string, licenseId: string): Promise<boolean> {
    const records = await this.listForLicense(storeId, licenseId);
    return records.some((r) => r.identity === LOCK_IDENTITY);
  }

  /** Drop every record for a store. Returns how many were removed. */
  async removeStore(storeId: string): Promise<number> {
    const keys = await listAllKeys(this.kv, `activation:${storeId}:`);
    await Promise.all(keys.map((key) => this.kv.delete(key)));
    return keys.length;
  }
}
