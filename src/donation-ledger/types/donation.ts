/**
 * Donation Ledger - Donation Types
 *
 * Donation records, their lifecycle states and the transition table
 * that decides which operation may move a donation where.
 */

import { DonationId, IdentityId, Timestamp } from './common';

// ============================================
// ENUMS
// ============================================

/** Lifecycle state of a donation */
export enum DonationStatus {
  /** Offered and open to claims */
  AVAILABLE = 'AVAILABLE',
  /** A recipient has declared they will take it */
  CLAIMED = 'CLAIMED',
  /** Handed over, awaiting confirmation */
  PICKED_UP = 'PICKED_UP',
  /** Terminal: done */
  COMPLETED = 'COMPLETED',
  /** Terminal: withdrawn */
  CANCELLED = 'CANCELLED',
}

/**
 * Allowed predecessor states per target state.
 * Administrative overrides bypass this table.
 */
export const ALLOWED_PREDECESSORS: Readonly<Record<DonationStatus, readonly DonationStatus[]>> = {
  [DonationStatus.AVAILABLE]: [],
  [DonationStatus.CLAIMED]: [DonationStatus.AVAILABLE],
  [DonationStatus.PICKED_UP]: [DonationStatus.CLAIMED],
  [DonationStatus.COMPLETED]: [DonationStatus.CLAIMED, DonationStatus.PICKED_UP],
  [DonationStatus.CANCELLED]: [DonationStatus.AVAILABLE, DonationStatus.CLAIMED],
};

export const TERMINAL_STATUSES: readonly DonationStatus[] = [
  DonationStatus.COMPLETED,
  DonationStatus.CANCELLED,
];

export function canTransition(from: DonationStatus, to: DonationStatus): boolean {
  return ALLOWED_PREDECESSORS[to].includes(from);
}

export function isTerminal(status: DonationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// ============================================
// CORE INTERFACES
// ============================================

/** A single donation offer and its lifecycle record */
export interface Donation {
  /** Sequential identifier, never reused */
  id: DonationId;

  /** Creator; immutable */
  donor: IdentityId;

  /** Claimant; unset until claimed, immutable once set */
  recipient?: IdentityId;

  title: string;
  description: string;

  /** Abstract non-negative count */
  quantity: number;

  /** Claims rejected before this time (unbounded when absent) */
  availableFrom?: Timestamp;

  /** Claims rejected after this time (unbounded when absent) */
  availableUntil?: Timestamp;

  /** Where to collect */
  locationNote: string;

  status: DonationStatus;

  /** Reason given when the donation was cancelled */
  cancellationReason?: string;

  createdAt: Timestamp;
  updatedAt: Timestamp;
}

// ============================================
// INPUT TYPES
// ============================================

export interface CreateDonationInput {
  title: string;
  description: string;
  quantity: number;

  /** 0 or absent means no lower bound */
  availableFrom?: Timestamp;

  /** 0 or absent means no upper bound */
  availableUntil?: Timestamp;

  locationNote: string;
}

// ============================================
// ERROR TYPES
// ============================================

export enum DonationErrorCode {
  /** Caller is not a registered donor */
  NOT_REGISTERED_DONOR = 'NOT_REGISTERED_DONOR',

  /** Caller is not a registered recipient */
  NOT_REGISTERED_RECIPIENT = 'NOT_REGISTERED_RECIPIENT',

  /** availableUntil <= availableFrom with both set */
  INVALID_AVAILABILITY_WINDOW = 'INVALID_AVAILABILITY_WINDOW',

  /** Quantity is negative or fractional */
  INVALID_QUANTITY = 'INVALID_QUANTITY',

  /** Id absent or zero */
  DONATION_NOT_FOUND = 'DONATION_NOT_FOUND',

  /** Claim attempted on a donation that is not Available */
  NOT_AVAILABLE = 'NOT_AVAILABLE',

  /** Claim attempted before availableFrom */
  NOT_YET_AVAILABLE = 'NOT_YET_AVAILABLE',

  /** Claim attempted after availableUntil */
  OFFER_EXPIRED = 'OFFER_EXPIRED',

  /** Status not in the allowed predecessor set */
  INVALID_TRANSITION = 'INVALID_TRANSITION',

  /** Caller is none of the permitted actors */
  UNAUTHORIZED = 'UNAUTHORIZED',
}

export interface DonationError {
  code: DonationErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================
// INTERFACE
// ============================================

export interface IDonationEngine {
  createDonation(caller: IdentityId, input: CreateDonationInput): Promise<Donation>;
  claimDonation(caller: IdentityId, id: DonationId): Promise<Donation>;
  markPickedUp(caller: IdentityId, id: DonationId): Promise<Donation>;
  completeDonation(caller: IdentityId, id: DonationId): Promise<Donation>;
  cancelDonation(caller: IdentityId, id: DonationId, reason: string): Promise<Donation>;
}
