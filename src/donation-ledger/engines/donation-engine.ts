/**
 * Donation Ledger - Donation Engine
 *
 * The donation lifecycle state machine:
 *
 *   AVAILABLE -> CLAIMED -> PICKED_UP -> COMPLETED
 *   AVAILABLE | CLAIMED -> CANCELLED
 *   CLAIMED -> COMPLETED (pickup and completion reported together)
 *
 * Each operation checks every precondition, in a fixed order, before
 * any change is made. Indexes are appended in place, in the same commit
 * as the change that puts a donation into them.
 */

import { DonationId, IdentityId, Timestamp } from '../types/common';
import {
  CreateDonationInput,
  Donation,
  DonationError,
  DonationErrorCode,
  DonationStatus,
  IDonationEngine,
  canTransition,
} from '../types/donation';
import { LedgerEventType } from '../types/events';
import { LedgerView, MutationOutcome } from '../types/ledger';
import { LedgerEngine } from './ledger-engine';
import { LedgerTransaction } from './ledger-transaction';
import { RegistryEngine } from './registry-engine';

// ============================================
// RECORD HELPERS
// ============================================

/** Look up a donation; ids that are not positive integers never match */
export function findDonation(state: LedgerView, id: DonationId): Readonly<Donation> | undefined {
  if (!Number.isInteger(id) || id <= 0) {
    return undefined;
  }
  return state.donations.get(id);
}

/** Replace a donation record with an updated copy */
export function updateDonation(
  tx: LedgerTransaction,
  donation: Readonly<Donation>,
  changes: Partial<Pick<Donation, 'status' | 'recipient' | 'cancellationReason'>>,
  timestamp: Timestamp
): Donation {
  const updated: Donation = { ...donation, ...changes, updatedAt: timestamp };
  tx.putDonation(updated);
  return updated;
}

/** Who may report progress on a donation */
type Actor = 'donor' | 'recipient' | 'admin';

const PROGRESS_ACTORS: readonly Actor[] = ['donor', 'recipient', 'admin'];
const CANCEL_ACTORS: readonly Actor[] = ['donor', 'admin'];

// ============================================
// DONATION ENGINE IMPLEMENTATION
// ============================================

export class DonationEngine implements IDonationEngine {
  private ledger: LedgerEngine;
  private registry: RegistryEngine;

  constructor(ledger: LedgerEngine, registry: RegistryEngine) {
    this.ledger = ledger;
    this.registry = registry;
  }

  // ============================================
  // CREATION
  // ============================================

  /**
   * Offer a new donation. Availability bounds of 0 are treated as unset.
   */
  createDonation(caller: IdentityId, input: CreateDonationInput): Promise<Donation> {
    return this.ledger.commit('createDonation', (tx, timestamp): MutationOutcome<Donation> => {
      if (!this.registry.isRegisteredDonor(caller)) {
        throw new DonationValidationError({
          code: DonationErrorCode.NOT_REGISTERED_DONOR,
          message: `${caller} is not a registered donor`,
          details: { caller },
        });
      }

      if (!Number.isInteger(input.quantity) || input.quantity < 0) {
        throw new DonationValidationError({
          code: DonationErrorCode.INVALID_QUANTITY,
          message: `Quantity must be a non-negative integer, got ${input.quantity}`,
          details: { quantity: input.quantity },
        });
      }

      const availableFrom = input.availableFrom || undefined;
      const availableUntil = input.availableUntil || undefined;
      if (availableUntil !== undefined && availableUntil <= (availableFrom ?? 0)) {
        throw new DonationValidationError({
          code: DonationErrorCode.INVALID_AVAILABILITY_WINDOW,
          message: `availableUntil (${availableUntil}) must be after availableFrom (${availableFrom ?? 0})`,
          details: { availableFrom, availableUntil },
        });
      }

      const donation: Donation = {
        id: tx.view.recentDonations.length + 1,
        donor: caller,
        title: input.title,
        description: input.description,
        quantity: input.quantity,
        availableFrom,
        availableUntil,
        locationNote: input.locationNote,
        status: DonationStatus.AVAILABLE,
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      tx.putDonation(donation);
      tx.appendRecent(donation.id);
      tx.appendToIndex('donationsByDonor', caller, donation.id);

      return {
        value: { ...donation },
        notification: {
          type: LedgerEventType.DONATION_CREATED,
          data: {
            donationId: donation.id,
            donor: caller,
            title: donation.title,
            quantity: donation.quantity,
          },
        },
      };
    });
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /**
   * Claim an available donation inside its availability window
   */
  claimDonation(caller: IdentityId, id: DonationId): Promise<Donation> {
    return this.ledger.commit('claimDonation', (tx, timestamp): MutationOutcome<Donation> => {
      if (!this.registry.isRegisteredRecipient(caller)) {
        throw new DonationValidationError({
          code: DonationErrorCode.NOT_REGISTERED_RECIPIENT,
          message: `${caller} is not a registered recipient`,
          details: { caller },
        });
      }

      const donation = this.requireDonation(tx.view, id);

      if (donation.status !== DonationStatus.AVAILABLE) {
        throw new DonationValidationError({
          code: DonationErrorCode.NOT_AVAILABLE,
          message: `Donation ${id} is ${donation.status}, not AVAILABLE`,
          details: { donationId: id, status: donation.status },
        });
      }

      if (donation.availableFrom !== undefined && timestamp < donation.availableFrom) {
        throw new DonationValidationError({
          code: DonationErrorCode.NOT_YET_AVAILABLE,
          message: `Donation ${id} cannot be claimed before ${donation.availableFrom}`,
          details: { donationId: id, availableFrom: donation.availableFrom, now: timestamp },
        });
      }

      if (donation.availableUntil !== undefined && timestamp > donation.availableUntil) {
        throw new DonationValidationError({
          code: DonationErrorCode.OFFER_EXPIRED,
          message: `Donation ${id} expired at ${donation.availableUntil}`,
          details: { donationId: id, availableUntil: donation.availableUntil, now: timestamp },
        });
      }

      const updated = updateDonation(
        tx,
        donation,
        { status: DonationStatus.CLAIMED, recipient: caller },
        timestamp
      );
      tx.appendToIndex('donationsByRecipient', caller, id);

      return {
        value: { ...updated },
        notification: {
          type: LedgerEventType.DONATION_CLAIMED,
          data: { donationId: id, recipient: caller },
        },
      };
    });
  }

  /**
   * Record that a claimed donation was handed over
   */
  markPickedUp(caller: IdentityId, id: DonationId): Promise<Donation> {
    return this.ledger.commit('markPickedUp', (tx, timestamp): MutationOutcome<Donation> => {
      const donation = this.requireDonation(tx.view, id);
      this.requireTransition(donation, DonationStatus.PICKED_UP);
      this.requireActor(caller, donation, PROGRESS_ACTORS, 'mark pickup of');

      const updated = updateDonation(tx, donation, { status: DonationStatus.PICKED_UP }, timestamp);

      return {
        value: { ...updated },
        notification: {
          type: LedgerEventType.DONATION_PICKED_UP,
          data: { donationId: id, by: caller },
        },
      };
    });
  }

  /**
   * Complete a claimed or picked-up donation
   */
  completeDonation(caller: IdentityId, id: DonationId): Promise<Donation> {
    return this.ledger.commit('completeDonation', (tx, timestamp): MutationOutcome<Donation> => {
      const donation = this.requireDonation(tx.view, id);
      this.requireTransition(donation, DonationStatus.COMPLETED);
      this.requireActor(caller, donation, PROGRESS_ACTORS, 'complete');

      const updated = updateDonation(tx, donation, { status: DonationStatus.COMPLETED }, timestamp);

      return {
        value: { ...updated },
        notification: {
          type: LedgerEventType.DONATION_COMPLETED,
          data: { donationId: id, by: caller, previousStatus: donation.status, forced: false },
        },
      };
    });
  }

  /**
   * Withdraw a donation that has not been picked up
   */
  cancelDonation(caller: IdentityId, id: DonationId, reason: string): Promise<Donation> {
    return this.ledger.commit('cancelDonation', (tx, timestamp): MutationOutcome<Donation> => {
      const donation = this.requireDonation(tx.view, id);
      this.requireActor(caller, donation, CANCEL_ACTORS, 'cancel');
      this.requireTransition(donation, DonationStatus.CANCELLED);

      const updated = updateDonation(
        tx,
        donation,
        { status: DonationStatus.CANCELLED, cancellationReason: reason },
        timestamp
      );

      return {
        value: { ...updated },
        notification: {
          type: LedgerEventType.DONATION_CANCELLED,
          data: { donationId: id, by: caller, reason, previousStatus: donation.status, forced: false },
        },
      };
    });
  }

  // ============================================
  // PRECONDITIONS
  // ============================================

  private requireDonation(state: LedgerView, id: DonationId): Readonly<Donation> {
    const donation = findDonation(state, id);
    if (!donation) {
      throw new DonationValidationError({
        code: DonationErrorCode.DONATION_NOT_FOUND,
        message: `Donation ${id} not found`,
        details: { donationId: id },
      });
    }
    return donation;
  }

  private requireTransition(donation: Readonly<Donation>, to: DonationStatus): void {
    if (!canTransition(donation.status, to)) {
      throw new DonationValidationError({
        code: DonationErrorCode.INVALID_TRANSITION,
        message: `Cannot move donation ${donation.id} from ${donation.status} to ${to}`,
        details: { donationId: donation.id, from: donation.status, to },
      });
    }
  }

  private requireActor(
    caller: IdentityId,
    donation: Readonly<Donation>,
    actors: readonly Actor[],
    action: string
  ): void {
    const permitted = actors.some((actor) => {
      switch (actor) {
        case 'donor':
          return caller === donation.donor;
        case 'recipient':
          return donation.recipient !== undefined && caller === donation.recipient;
        case 'admin':
          return this.ledger.isAdmin(caller);
      }
    });

    if (!permitted) {
      throw new DonationValidationError({
        code: DonationErrorCode.UNAUTHORIZED,
        message: `${caller} may not ${action} donation ${donation.id}`,
        details: { donationId: donation.id, caller, permitted: actors },
      });
    }
  }
}

// ============================================
// CUSTOM ERROR CLASS
// ============================================

export class DonationValidationError extends Error {
  public readonly code: DonationErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(error: DonationError) {
    super(error.message);
    this.name = 'DonationValidationError';
    this.code = error.code;
    this.details = error.details;
  }

  toJSON(): DonationError {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================
// FACTORY
// ============================================

export function createDonationEngine(ledger: LedgerEngine, registry: RegistryEngine): DonationEngine {
  return new DonationEngine(ledger, registry);
}
