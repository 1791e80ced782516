/**
 * Donation Ledger - Crypto Adapter
 *
 * Thin wrapper around TweetNaCl: Ed25519 signing for caller identities
 * and SHA-512 for the event log hash chain.
 */

import nacl from 'tweetnacl';
import { IdentityId, PublicKey, SecretKey, Signature } from '../types/common';
import { Result, ok, err, tryCatch } from '../utils/result';

// ============================================
// TYPES
// ============================================

export interface KeyPair {
  publicKey: PublicKey;
  secretKey: SecretKey;
}

export interface CryptoError {
  code: 'KEY_GENERATION_FAILED' | 'SIGNING_FAILED' | 'VERIFICATION_FAILED' | 'INVALID_KEY';
  message: string;
}

// ============================================
// ENCODING UTILITIES
// ============================================

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

export function decodeBase64(str: string): Uint8Array {
  return new Uint8Array(Buffer.from(str, 'base64'));
}

export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function encodeUtf8(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

// ============================================
// CRYPTO ADAPTER CLASS
// ============================================

export class CryptoAdapter {
  /**
   * Generate a new Ed25519 keypair
   */
  generateKeyPair(): Result<KeyPair, CryptoError> {
    return tryCatch(
      () => {
        const keypair = nacl.sign.keyPair();
        return {
          publicKey: encodeBase64(keypair.publicKey),
          secretKey: encodeBase64(keypair.secretKey),
        };
      },
      (e): CryptoError => ({ code: 'KEY_GENERATION_FAILED', message: `Key generation failed: ${e}` })
    );
  }

  /**
   * Deterministic keypair from a 32-byte seed
   */
  keyPairFromSeed(seed: Uint8Array): Result<KeyPair, CryptoError> {
    if (seed.length !== nacl.sign.seedLength) {
      return err({
        code: 'INVALID_KEY',
        message: `Seed must be ${nacl.sign.seedLength} bytes, got ${seed.length}`,
      });
    }
    const keypair = nacl.sign.keyPair.fromSeed(seed);
    return ok({
      publicKey: encodeBase64(keypair.publicKey),
      secretKey: encodeBase64(keypair.secretKey),
    });
  }

  /**
   * Derive identity ID from public key.
   * Uses the first 16 bytes of the key as a hex string.
   */
  deriveIdentityId(publicKey: PublicKey): IdentityId {
    const bytes = decodeBase64(publicKey);
    return encodeHex(bytes.slice(0, 16));
  }

  /**
   * Sign a message with a secret key
   */
  sign(message: string, secretKey: SecretKey): Result<Signature, CryptoError> {
    const secretKeyBytes = decodeBase64(secretKey);
    if (secretKeyBytes.length !== nacl.sign.secretKeyLength) {
      return err({ code: 'INVALID_KEY', message: 'Secret key has the wrong length' });
    }

    return tryCatch(
      () => encodeBase64(nacl.sign.detached(encodeUtf8(message), secretKeyBytes)),
      (e): CryptoError => ({ code: 'SIGNING_FAILED', message: `Signing failed: ${e}` })
    );
  }

  /**
   * Verify a detached signature
   */
  verify(message: string, signature: Signature, publicKey: PublicKey): Result<boolean, CryptoError> {
    const publicKeyBytes = decodeBase64(publicKey);
    const signatureBytes = decodeBase64(signature);
    if (publicKeyBytes.length !== nacl.sign.publicKeyLength) {
      return err({ code: 'INVALID_KEY', message: 'Public key has the wrong length' });
    }
    if (signatureBytes.length !== nacl.sign.signatureLength) {
      return ok(false);
    }

    return tryCatch(
      () => nacl.sign.detached.verify(encodeUtf8(message), signatureBytes, publicKeyBytes),
      (e): CryptoError => ({ code: 'VERIFICATION_FAILED', message: `Verification failed: ${e}` })
    );
  }

  /**
   * SHA-512 of a UTF-8 string, hex encoded
   */
  hash(message: string): string {
    return encodeHex(nacl.hash(encodeUtf8(message)));
  }
}

/** Shared adapter instance */
export const cryptoAdapter = new CryptoAdapter();
