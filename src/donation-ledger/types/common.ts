/**
 * Donation Ledger - Common Types
 *
 * Fundamental type aliases and shared types used across the ledger.
 */

// ============================================
// CORE TYPE ALIASES
// ============================================

/** Stable identifier of a caller (donor, recipient or administrator) */
export type IdentityId = string;

/** Unique identifier for a ledger instance */
export type LedgerId = string;

/** Sequential donation identifier (1, 2, 3, ...; 0 is never assigned) */
export type DonationId = number;

/** Unix timestamp in milliseconds */
export type Timestamp = number;

/** Base64-encoded public key */
export type PublicKey = string;

/** Base64-encoded signature */
export type Signature = string;

/** Base64-encoded secret key */
export type SecretKey = string;

// ============================================
// CLOCK
// ============================================

/** Source of the current time, supplied by the caller context */
export interface Clock {
  now(): Timestamp;
}

/** Wall clock */
export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock that only moves when told to.
 * Used by tests and simulations that need to cross availability windows.
 */
export class ManualClock implements Clock {
  private current: Timestamp;

  constructor(start: Timestamp = Date.UTC(2024, 0, 1)) {
    this.current = start;
  }

  now(): Timestamp {
    return this.current;
  }

  advance(ms: number): Timestamp {
    this.current += ms;
    return this.current;
  }
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

/** Generate a unique ID using timestamp and random bytes */
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return `${timestamp}-${random}`;
}

/** Identities are opaque, but must be non-empty */
export function isValidIdentity(identity: unknown): identity is IdentityId {
  return typeof identity === 'string' && identity.trim().length > 0;
}
