import type { Product, Version } from '../store/types.js';

/** Cached read model for one store. Frozen once built; only ever replaced whole. */
export interface CacheEntry {
  readonly products: readonly Product[];
  readonly versions: readonly Version[];
  /** epoch ms */
  readonly lastRefreshed: number;
}

export interface StoreCredential {
  readonly apiKey: string;
  /** Set when the store rejected the key; cleared by a successful priority warm. */
  readonly invalid: boolean;
  readonly username: string | null;
  readonly updatedAt: number;
}

export type StoreState = 'fresh' | 'stale' | 'refreshing' | 'invalid';

export type RefreshMode = 'sweep' | 'warm' | 'force';

export type RefreshOutcome = 'success' | 'auth_invalid' | 'transient' | 'unexpected' | 'aborted';

export type RefreshObserver = (storeId: string, mode: RefreshMode, outcome: RefreshOutcome, durationMs: number) => void;
