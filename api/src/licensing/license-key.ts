/**
 * License key classification and normalization.
 *
 * Users paste all sorts of things into the activation box: keys from other
 * storefronts, order numbers, payment ids. We identify the flavor so the
 * response can tell them what they sent instead of a bare "invalid".
 */

export type LicenseKind =
  | 'short'
  | 'long'
  | 'gumroad'
  | 'integer'
  | 'payhip'
  | 'transaction_id'
  | 'unknown'
  | 'ambiguous';

/** A key form the store API can look up. `id` is only ever built from operator input. */
export type LicenseKey =
  | { kind: 'short'; value: string }
  | { kind: 'long'; value: string }
  | { kind: 'id'; value: string };

export type UntrustedKey = Exclude<LicenseKey, { kind: 'id' }>;

// Order matters only for logging; any second match makes the value ambiguous.
const PATTERNS: ReadonlyArray<readonly [Exclude<LicenseKind, 'unknown' | 'ambiguous'>, RegExp]> = [
  ['short', /^[A-Z]{4}-[a-f0-9]{12}$/i],
  ['long', /^[a-f0-9]{8}-[a-f0-9]{4}-4[a-f0-9]{3}-[89ab][a-f0-9]{3}-[a-f0-9]{12}$/i],
  ['gumroad', /^[A-F0-9]{8}-[A-F0-9]{8}-[A-F0-9]{8}-[A-F0-9]{8}$/],
  ['integer', /^[0-9]+$/],
  ['payhip', /^[A-Z0-9]{5}-[A-Z0-9]{5}-[A-Z0-9]{5}-[A-Z0-9]{5}$/],
  ['transaction_id', /^pi_[A-Za-z0-9]{24}$/],
];

export function identifyLicense(value: string): LicenseKind {
  const matches = PATTERNS.filter(([, pattern]) => pattern.test(value)).map(([kind]) => kind);
  if (matches.length === 0) return 'unknown';
  if (matches.length > 1) {
    console.debug(`[LicenseKey] ${matches.length} ambiguous matches: ${matches.join(', ')}`);
    return 'ambiguous';
  }
  return matches[0];
}

/** Short keys are always shaped like `XXXX-cd071c534191`. */
export function normalizeShortKey(value: string): string {
  return `XXXX-${value.slice(5).toLowerCase()}`;
}

export function normalizeLongKey(value: string): string {
  return value.toLowerCase();
}

/**
 * Build a lookup key from end-user input. Only short and long keys are
 * accepted: license ids may show up in operator-facing output, so they must
 * never be enough to claim a license.
 */
export function toUntrustedKey(input: string): { kind: LicenseKind; key: UntrustedKey | null } {
  const value = input.trim();
  const kind = identifyLicense(value);
  switch (kind) {
    case 'short':
      return { kind, key: { kind: 'short', value: normalizeShortKey(value) } };
    case 'long':
      return { kind, key: { kind: 'long', value: normalizeLongKey(value) } };
    default:
      return { kind, key: null };
  }
}

/** Build a lookup key from operator input. Numeric license ids are allowed here. */
export function toTrustedKey(input: string): { kind: LicenseKind; key: LicenseKey | null } {
  const value = input.trim();
  const kind = identifyLicense(value);
  if (kind === 'integer') return { kind, key: { kind: 'id', value } };
  return toUntrustedKey(value);
}

/** User-facing description of what was presented. */
export function describeLicenseKind(kind: LicenseKind): string {
  switch (kind) {
    case 'short':
      return 'a short license key';
    case 'long':
      return 'a long license key';
    case 'gumroad':
      return 'a Gumroad key';
    case 'payhip':
      return 'a Payhip key';
    case 'transaction_id':
      return 'a transaction ID';
    // "integer" reads as an order number to most users, so don't call it out
    case 'integer':
    case 'unknown':
      return 'an unknown value';
    case 'ambiguous':
      return 'an ambiguous value';
  }
}

/**
 * Hint shown alongside an invalid-license result. Null when the key had the
 * right shape and simply was not found.
 */
export function licenseHint(kind: LicenseKind): string | null {
  if (kind === 'short' || kind === 'long') return null;
  return `The value you provided looks like ${describeLicenseKind(kind)}, not a license key from this store.`;
}

/** Redacted form for logs: keeps the first four characters. */
export function redactKey(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 4) return '****';
  return `${trimmed.slice(0, 4)}****`;
}
