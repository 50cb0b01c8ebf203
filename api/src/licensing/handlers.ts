/**
 * License route handlers.
 *
 * POST   /v1/stores/:storeId/activations                              (public)
 * GET    /v1/stores/:storeId/licenses/:license                        (admin)
 * POST   /v1/stores/:storeId/licenses/:license/lock                   (admin)
 * POST   /v1/stores/:storeId/licenses/:license/unlock                 (admin)
 * DELETE /v1/stores/:storeId/licenses/:license/activations/:identity  (admin)
 */

import {
  GENERIC_LICENSE_MESSAGE,
  errorResponse,
  jsonResponse,
  readJsonBody,
  upstreamErrorResponse,
} from '../http.js';
import type { LicenseDetail } from '../store/types.js';
import { isValidIdentity, type ActivationResolver } from './activation.js';
import { redactKey } from './license-key.js';
import type { ActivationResult, InvalidLicenseResult } from './types.js';

export type ActivationObserver = (storeId: string, status: ActivationResult['status']) => void;

function licenseView(license: LicenseDetail) {
  return {
    id: license.id,
    product_id: license.productId,
    product_name: license.productName,
    version_id: license.versionId,
    activation_count: license.activationCount,
    locked: license.locked,
  };
}

function invalidLicenseResponse(result: InvalidLicenseResult): Response {
  return errorResponse(GENERIC_LICENSE_MESSAGE, 404, 'invalid_license', {
    kind: result.kind,
    hint: result.hint,
  });
}

export function activationResponse(result: ActivationResult): Response {
  switch (result.status) {
    case 'activated':
      return jsonResponse(
        {
          status: 'activated',
          created: result.created,
          activation: {
            id: result.activation.id,
            license_id: result.activation.licenseId,
            identity: result.activation.identity,
          },
          license: licenseView(result.license),
        },
        result.created ? 201 : 200,
      );
    case 'already_activated':
      return errorResponse(GENERIC_LICENSE_MESSAGE, 409, 'already_activated');
    case 'invalid_license':
      return invalidLicenseResponse(result);
    case 'license_locked':
      return errorResponse('This license has been locked by the store owner', 423, 'license_locked');
  }
}

export async function handleActivate(
  resolver: ActivationResolver,
  request: Request,
  storeId: string,
  observe?: ActivationObserver,
): Promise<Response> {
  const body = await readJsonBody(request);
  const licenseKey = body?.license_key;
  const identity = body?.identity;
  if (typeof licenseKey !== 'string' || licenseKey.trim().length === 0) {
    return errorResponse('license_key is required', 400, 'bad_request');
  }
  if (typeof identity !== 'string' || !isValidIdentity(identity)) {
    return errorResponse('identity must be a non-empty string without whitespace', 400, 'bad_request');
  }

  try {
    const result = await resolver.activate(storeId, licenseKey, identity);
    observe?.(storeId, result.status);
    return activationResponse(result);
  } catch (err) {
    console.error(`[API] activation of ${redactKey(licenseKey)} on ${storeId} failed:`, err instanceof Error ? err.message : err);
    return upstreamErrorResponse(err);
  }
}

export async function handleLicenseInfo(
  resolver: ActivationResolver,
  storeId: string,
  license: string,
): Promise<Response> {
  try {
    const result = await resolver.licenseUsers(storeId, license);
    if (result.status === 'invalid_license') return invalidLicenseResponse(result);
    return jsonResponse({ license: licenseView(result.license), identities: result.identities });
  } catch (err) {
    return upstreamErrorResponse(err);
  }
}

export async function handleLock(resolver: ActivationResolver, storeId: string, license: string): Promise<Response> {
  try {
    const result = await resolver.lockLicense(storeId, license);
    if (result.status === 'invalid_license') return invalidLicenseResponse(result);
    return jsonResponse({ license_id: result.licenseId, locked: true, created: result.created });
  } catch (err) {
    return upstreamErrorResponse(err);
  }
}

export async function handleUnlock(resolver: ActivationResolver, storeId: string, license: string): Promise<Response> {
  try {
    const result = await resolver.unlockLicense(storeId, license);
    if (result.status === 'invalid_license') return invalidLicenseResponse(result);
    return jsonResponse({ license_id: result.licenseId, locked: false, removed: result.removed });
  } catch (err) {
    return upstreamErrorResponse(err);
  }
}

export async function handleDeactivate(
  resolver: ActivationResolver,
  storeId: string,
  license: string,
  identity: string,
): Promise<Response> {
  try {
    const result = await resolver.deactivate(storeId, license, identity);
    if (result.status === 'invalid_license') return invalidLicenseResponse(result);
    return jsonResponse({ license_id: result.licenseId, identity, removed: result.removed });
  } catch (err) {
    return upstreamErrorResponse(err);
  }
}
