/**
 * Donation Ledger - Identity Types
 *
 * The ledger itself only sees opaque caller identities. These types
 * describe how a surrounding service turns a signed request into one.
 */

import { IdentityId, PublicKey, Signature, Timestamp } from './common';
import { Result } from '../utils/result';

/** A request signed by the caller's Ed25519 key */
export interface SignedRequest {
  /** Signer's public key (base64) */
  publicKey: PublicKey;

  /** Logical operation name, e.g. "claimDonation" */
  operation: string;

  /** Operation arguments */
  payload: Record<string, unknown>;

  /** When the caller signed the request */
  issuedAt: Timestamp;

  /** Detached signature over the signing data (base64) */
  signature: Signature;
}

export enum IdentityErrorCode {
  /** Signature does not match the request */
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',

  /** issuedAt is outside the accepted skew */
  STALE_REQUEST = 'STALE_REQUEST',

  /** Crypto library failed */
  CRYPTO_ERROR = 'CRYPTO_ERROR',
}

export interface IdentityError {
  code: IdentityErrorCode;
  message: string;
}

/** Turns an inbound request into a stable caller identity */
export interface IIdentityResolver {
  resolve(request: SignedRequest): Result<IdentityId, IdentityError>;
}
