/**
 * Donation Ledger - Admin Engine
 *
 * Administrative override for disputes and stuck donations. Exactly one
 * identity holds authority at a time; it can force any donation into a
 * terminal state and hand authority to someone else.
 */

import { DonationId, IdentityId, isValidIdentity } from '../types/common';
import { AdminError, AdminErrorCode, IAdminEngine } from '../types/admin';
import { Donation, DonationStatus } from '../types/donation';
import { LedgerEventType } from '../types/events';
import { LedgerView, MutationOutcome } from '../types/ledger';
import { LedgerEngine } from './ledger-engine';
import { findDonation, updateDonation } from './donation-engine';

export class AdminEngine implements IAdminEngine {
  private ledger: LedgerEngine;

  constructor(ledger: LedgerEngine) {
    this.ledger = ledger;
  }

  getAdmin(): IdentityId {
    return this.ledger.getAdmin();
  }

  isAdmin(identity: IdentityId): boolean {
    return this.ledger.isAdmin(identity);
  }

  /**
   * Hand administrative authority to another identity
   */
  transferAdministration(caller: IdentityId, newAdmin: IdentityId): Promise<IdentityId> {
    return this.ledger.commit('transferAdministration', (tx): MutationOutcome<IdentityId> => {
      this.requireAdmin(tx.view, caller);

      if (!isValidIdentity(newAdmin)) {
        throw new AdminValidationError({
          code: AdminErrorCode.INVALID_ADMIN_TARGET,
          message: 'New admin must be a non-empty identity',
        });
      }

      const previousAdmin = tx.view.admin;
      tx.setAdmin(newAdmin);

      return {
        value: newAdmin,
        notification: {
          type: LedgerEventType.ADMINISTRATION_TRANSFERRED,
          data: { previousAdmin, newAdmin },
        },
      };
    });
  }

  /**
   * Force a donation to COMPLETED from any state, including terminal ones.
   * A cancellation reason from an earlier cancel is cleared.
   */
  adminForceComplete(caller: IdentityId, id: DonationId): Promise<Donation> {
    return this.ledger.commit('adminForceComplete', (tx, timestamp): MutationOutcome<Donation> => {
      this.requireAdmin(tx.view, caller);
      const donation = this.requireDonation(tx.view, id);

      const updated = updateDonation(
        tx,
        donation,
        { status: DonationStatus.COMPLETED, cancellationReason: undefined },
        timestamp
      );

      return {
        value: { ...updated },
        notification: {
          type: LedgerEventType.DONATION_COMPLETED,
          data: { donationId: id, by: caller, previousStatus: donation.status, forced: true },
        },
      };
    });
  }

  /**
   * Force a donation to CANCELLED from any state, including terminal ones
   */
  adminForceCancel(caller: IdentityId, id: DonationId, reason: string): Promise<Donation> {
    return this.ledger.commit('adminForceCancel', (tx, timestamp): MutationOutcome<Donation> => {
      this.requireAdmin(tx.view, caller);
      const donation = this.requireDonation(tx.view, id);

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
          data: { donationId: id, by: caller, reason, previousStatus: donation.status, forced: true },
        },
      };
    });
  }

  private requireAdmin(view: LedgerView, caller: IdentityId): void {
    if (caller !== view.admin) {
      throw new AdminValidationError({
        code: AdminErrorCode.UNAUTHORIZED,
        message: `${caller} does not hold administrative authority`,
        details: { caller },
      });
    }
  }

  private requireDonation(view: LedgerView, id: DonationId): Readonly<Donation> {
    const donation = findDonation(view, id);
    if (!donation) {
      throw new AdminValidationError({
        code: AdminErrorCode.DONATION_NOT_FOUND,
        message: `Donation ${id} not found`,
        details: { donationId: id },
      });
    }
    return donation;
  }
}

// ============================================
// CUSTOM ERROR CLASS
// ============================================

export class AdminValidationError extends Error {
  public readonly code: AdminErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(error: AdminError) {
    super(error.message);
    this.name = 'AdminValidationError';
    this.code = error.code;
    this.details = error.details;
  }

  toJSON(): AdminError {
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

export function createAdminEngine(ledger: LedgerEngine): AdminEngine {
  return new AdminEngine(ledger);
}
