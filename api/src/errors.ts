/**
 * Upstream error taxonomy.
 *
 * Every failure of a store API call is mapped into one of three classes so
 * callers can branch on remediation: the operator fixes credentials, the
 * scheduler retries transients on its next cycle, and unexpected responses
 * are logged with a nonce for diagnosis.
 */

export abstract class UpstreamError extends Error {
  abstract readonly retryable: boolean;
  readonly endpoint: string;
  readonly status: number | null;

  constructor(message: string, endpoint: string, status: number | null = null) {
    super(message);
    this.endpoint = endpoint;
    this.status = status;
  }
}

/** The store rejected the API key (401/403, or a 5xx body that says so). */
export class UpstreamAuthInvalid extends UpstreamError {
  readonly retryable = false;

  constructor(endpoint: string, status: number | null = null) {
    super(`${endpoint} rejected the store API key`, endpoint, status);
    this.name = 'UpstreamAuthInvalid';
  }
}

/** Network failure, timeout, 429 or 5xx. */
export class UpstreamTransient extends UpstreamError {
  readonly retryable = true;

  constructor(message: string, endpoint: string, status: number | null = null) {
    super(message, endpoint, status);
    this.name = 'UpstreamTransient';
  }
}

/** Unmapped status or response shape. */
export class UpstreamUnexpected extends UpstreamError {
  readonly retryable = false;
  readonly nonce: string;

  constructor(message: string, endpoint: string, status: number | null = null) {
    const nonce = generateNonce();
    super(`${message} (ref ${nonce})`, endpoint, status);
    this.name = 'UpstreamUnexpected';
    this.nonce = nonce;
  }
}

/** No credential has been registered for the store. */
export class StoreNotConfigured extends Error {
  readonly storeId: string;

  constructor(storeId: string) {
    super(`Store ${storeId} has no API key configured`);
    this.name = 'StoreNotConfigured';
    this.storeId = storeId;
  }
}

function generateNonce(): string {
  const chars = 'abcdefghijklmnopqrstuvwxyz0123456789';
  let id = '';
  for (let i = 0; i < 8; i++) {
    id += chars.charAt(Math.floor(Math.random() * chars.length));
  }
  return id;
}

export function isUpstreamError(err: unknown): err is UpstreamError {
  return err instanceof UpstreamError;
}
