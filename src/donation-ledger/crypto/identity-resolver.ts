/**
 * Donation Ledger - Signature Identity Resolver
 *
 * Resolves a signed request to the identity derived from the signer's
 * public key. A request signed by one key can never resolve to another
 * key's identity.
 */

import { Clock, IdentityId, SecretKey, systemClock } from '../types/common';
import {
  IdentityError,
  IdentityErrorCode,
  IIdentityResolver,
  SignedRequest,
} from '../types/identity';
import { Result, ok, err, mapErr } from '../utils/result';
import { CryptoAdapter, CryptoError } from './crypto-adapter';

/** Default accepted clock skew between signer and ledger: 5 minutes */
export const DEFAULT_MAX_REQUEST_AGE_MS = 5 * 60 * 1000;

/** Canonical string that is signed and verified */
export function createRequestSigningData(
  request: Omit<SignedRequest, 'signature'>
): string {
  return JSON.stringify({
    publicKey: request.publicKey,
    operation: request.operation,
    payload: request.payload,
    issuedAt: request.issuedAt,
  });
}

/** Sign a request on the caller side */
export function signRequest(
  crypto: CryptoAdapter,
  request: Omit<SignedRequest, 'signature'>,
  secretKey: SecretKey
): Result<SignedRequest, CryptoError> {
  const signature = crypto.sign(createRequestSigningData(request), secretKey);
  if (!signature.ok) {
    return signature;
  }
  return ok({ ...request, signature: signature.value });
}

export class SignatureIdentityResolver implements IIdentityResolver {
  private crypto: CryptoAdapter;
  private clock: Clock;
  private maxRequestAgeMs: number;

  constructor(
    crypto: CryptoAdapter,
    clock: Clock = systemClock,
    maxRequestAgeMs: number = DEFAULT_MAX_REQUEST_AGE_MS
  ) {
    this.crypto = crypto;
    this.clock = clock;
    this.maxRequestAgeMs = maxRequestAgeMs;
  }

  resolve(request: SignedRequest): Result<IdentityId, IdentityError> {
    if (!Number.isFinite(request.issuedAt)) {
      return err({
        code: IdentityErrorCode.STALE_REQUEST,
        message: `Request has no valid issue time (${request.issuedAt})`,
      });
    }

    const age = Math.abs(this.clock.now() - request.issuedAt);
    if (age > this.maxRequestAgeMs) {
      return err({
        code: IdentityErrorCode.STALE_REQUEST,
        message: `Request issued ${age}ms away from ledger time (max ${this.maxRequestAgeMs}ms)`,
      });
    }

    const verified = mapErr(
      this.crypto.verify(createRequestSigningData(request), request.signature, request.publicKey),
      (e): IdentityError => ({ code: IdentityErrorCode.CRYPTO_ERROR, message: e.message })
    );
    if (!verified.ok) {
      return verified;
    }
    if (!verified.value) {
      return err({
        code: IdentityErrorCode.INVALID_SIGNATURE,
        message: `Signature does not match request for ${request.operation}`,
      });
    }

    return ok(this.crypto.deriveIdentityId(request.publicKey));
  }
}

export function createSignatureIdentityResolver(
  crypto: CryptoAdapter,
  clock?: Clock,
  maxRequestAgeMs?: number
): SignatureIdentityResolver {
  return new SignatureIdentityResolver(crypto, clock, maxRequestAgeMs);
}
