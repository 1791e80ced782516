/**
 * Donation Ledger - Crypto Tests
 *
 * Signing adapter, signed-request identity resolution and the event hash chain.
 */

import { CryptoAdapter, decodeBase64 } from '../crypto/crypto-adapter';
import {
  DEFAULT_MAX_REQUEST_AGE_MS,
  SignatureIdentityResolver,
  signRequest,
} from '../crypto/identity-resolver';
import { computeEventHash, verifyEventChain } from '../crypto/event-chain';
import { ManualClock } from '../types/common';
import { EventLogEntry, LedgerEventType } from '../types/events';
import { IdentityErrorCode } from '../types/identity';
import { isErr, isOk, unwrap } from '../utils/result';

const T0 = Date.UTC(2024, 0, 1);

describe('CryptoAdapter', () => {
  const crypto = new CryptoAdapter();

  test('generates Ed25519 key pairs', () => {
    const pair = unwrap(crypto.generateKeyPair());

    expect(decodeBase64(pair.publicKey)).toHaveLength(32);
    expect(decodeBase64(pair.secretKey)).toHaveLength(64);
  });

  test('derives the same key pair from the same seed', () => {
    const seed = new Uint8Array(32).fill(7);

    expect(unwrap(crypto.keyPairFromSeed(seed))).toEqual(unwrap(crypto.keyPairFromSeed(seed)));
  });

  test('rejects a seed of the wrong length', () => {
    const result = crypto.keyPairFromSeed(new Uint8Array(16));

    expect(isErr(result)).toBe(true);
    expect(result).toEqual({
      ok: false,
      error: { code: 'INVALID_KEY', message: 'Seed must be 32 bytes, got 16' },
    });
  });

  test('identity id is the first 16 key bytes in hex', () => {
    const publicKey = Buffer.from(Array.from({ length: 32 }, (_, i) => i)).toString('base64');

    expect(crypto.deriveIdentityId(publicKey)).toBe('000102030405060708090a0b0c0d0e0f');
  });

  test('signatures verify only for the signed message and key', () => {
    const alice = unwrap(crypto.generateKeyPair());
    const bob = unwrap(crypto.generateKeyPair());
    const signature = unwrap(crypto.sign('claim 1', alice.secretKey));

    expect(crypto.verify('claim 1', signature, alice.publicKey)).toEqual({ ok: true, value: true });
    expect(crypto.verify('claim 2', signature, alice.publicKey)).toEqual({ ok: true, value: false });
    expect(crypto.verify('claim 1', signature, bob.publicKey)).toEqual({ ok: true, value: false });
  });

  test('reports malformed keys', () => {
    expect(crypto.sign('x', 'c2hvcnQ=')).toEqual({
      ok: false,
      error: { code: 'INVALID_KEY', message: 'Secret key has the wrong length' },
    });

    const pair = unwrap(crypto.generateKeyPair());
    const signature = unwrap(crypto.sign('x', pair.secretKey));
    expect(crypto.verify('x', signature, 'c2hvcnQ=')).toEqual({
      ok: false,
      error: { code: 'INVALID_KEY', message: 'Public key has the wrong length' },
    });
  });

  test('a truncated signature simply fails to verify', () => {
    const pair = unwrap(crypto.generateKeyPair());

    expect(crypto.verify('x', 'c2hvcnQ=', pair.publicKey)).toEqual({ ok: true, value: false });
  });

  test('hashes with SHA-512', () => {
    expect(crypto.hash('')).toBe(
      'cf83e1357eefb8bdf1542850d66d8007d620e4050b5715dc83f4a921d36ce9ce' +
        '47d0d13c5d85f2b0ff8318d2877eec2f63b931bd47417a81a538327af927da3e'
    );
  });
});

describe('SignatureIdentityResolver', () => {
  const crypto = new CryptoAdapter();
  let clock: ManualClock;
  let resolver: SignatureIdentityResolver;

  beforeEach(() => {
    clock = new ManualClock(T0);
    resolver = new SignatureIdentityResolver(crypto, clock);
  });

  function signedBy(secretKey: string, publicKey: string, issuedAt: number = T0) {
    return unwrap(
      signRequest(
        crypto,
        { publicKey, operation: 'claimDonation', payload: { donationId: 3 }, issuedAt },
        secretKey
      )
    );
  }

  test('resolves the identity of the signing key', () => {
    const pair = unwrap(crypto.generateKeyPair());

    const resolved = resolver.resolve(signedBy(pair.secretKey, pair.publicKey));

    expect(isOk(resolved)).toBe(true);
    expect(resolved).toEqual({ ok: true, value: crypto.deriveIdentityId(pair.publicKey) });
  });

  test('a tampered payload does not resolve', () => {
    const pair = unwrap(crypto.generateKeyPair());
    const request = signedBy(pair.secretKey, pair.publicKey);

    const resolved = resolver.resolve({ ...request, payload: { donationId: 4 } });

    expect(resolved).toMatchObject({ ok: false, error: { code: IdentityErrorCode.INVALID_SIGNATURE } });
  });

  test('cannot claim another key\'s identity', () => {
    const mallory = unwrap(crypto.generateKeyPair());
    const victim = unwrap(crypto.generateKeyPair());

    // Signed by mallory but presenting the victim's public key
    const resolved = resolver.resolve(signedBy(mallory.secretKey, victim.publicKey));

    expect(resolved).toMatchObject({ ok: false, error: { code: IdentityErrorCode.INVALID_SIGNATURE } });
  });

  test('rejects requests outside the accepted age', () => {
    const pair = unwrap(crypto.generateKeyPair());
    const request = signedBy(pair.secretKey, pair.publicKey);

    clock.advance(DEFAULT_MAX_REQUEST_AGE_MS);
    expect(isOk(resolver.resolve(request))).toBe(true);

    clock.advance(1);
    expect(resolver.resolve(request)).toMatchObject({
      ok: false,
      error: { code: IdentityErrorCode.STALE_REQUEST },
    });
  });

  test('rejects a request without a usable issue time', () => {
    const pair = unwrap(crypto.generateKeyPair());
    const request = signedBy(pair.secretKey, pair.publicKey, Number.NaN);

    expect(resolver.resolve(request)).toEqual({
      ok: false,
      error: { code: IdentityErrorCode.STALE_REQUEST, message: 'Request has no valid issue time (NaN)' },
    });
    expect(resolver.resolve({ ...request, issuedAt: Number.POSITIVE_INFINITY })).toMatchObject({
      ok: false,
      error: { code: IdentityErrorCode.STALE_REQUEST },
    });
  });

  test('maps malformed keys to CRYPTO_ERROR', () => {
    const pair = unwrap(crypto.generateKeyPair());
    const request = signedBy(pair.secretKey, pair.publicKey);

    expect(resolver.resolve({ ...request, publicKey: 'c2hvcnQ=' })).toEqual({
      ok: false,
      error: { code: IdentityErrorCode.CRYPTO_ERROR, message: 'Public key has the wrong length' },
    });
  });
});

describe('verifyEventChain', () => {
  const crypto = new CryptoAdapter();

  function buildChain(count: number): EventLogEntry[] {
    const entries: EventLogEntry[] = [];
    let previousHash = '';
    for (let i = 1; i <= count; i++) {
      const unhashed = {
        type: LedgerEventType.DONOR_UNREGISTERED,
        data: { identity: `donor-${i}` },
        id: `event-${i}`,
        ledgerId: 'chain-ledger',
        timestamp: T0 + i,
        sequenceNumber: i,
        previousHash,
      } as const;
      const entry: EventLogEntry = { ...unhashed, hash: computeEventHash(crypto, unhashed) };
      entries.push(entry);
      previousHash = entry.hash;
    }
    return entries;
  }

  test('accepts an intact chain and an empty one', () => {
    expect(verifyEventChain(crypto, buildChain(3))).toEqual({ valid: true, length: 3 });
    expect(verifyEventChain(crypto, [])).toEqual({ valid: true, length: 0 });
  });

  test('verifies a tail against the hash that precedes it', () => {
    const chain = buildChain(4);

    expect(verifyEventChain(crypto, chain.slice(2), chain[1].hash)).toEqual({ valid: true, length: 2 });
    expect(verifyEventChain(crypto, chain.slice(2))).toEqual({
      valid: false,
      sequenceNumber: 3,
      reason: 'previousHash does not match the preceding entry',
    });
  });

  test('detects a dropped entry', () => {
    const chain = buildChain(3);

    expect(verifyEventChain(crypto, [chain[0], chain[2]])).toEqual({
      valid: false,
      sequenceNumber: 3,
      reason: 'Expected sequence 2, found 3',
    });
  });

  test('detects edited content even when the hash field is left alone', () => {
    const chain = buildChain(2);
    const edited: EventLogEntry = { ...chain[1], timestamp: chain[1].timestamp + 1000 };

    expect(verifyEventChain(crypto, [chain[0], edited])).toEqual({
      valid: false,
      sequenceNumber: 2,
      reason: 'Entry content does not match its hash',
    });
  });
});
