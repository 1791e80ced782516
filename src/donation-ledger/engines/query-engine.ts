/**
 * Donation Ledger - Query Engine
 *
 * Reads donations through the indexes the donation engine maintains.
 * Every query is a pure function of the last committed state and
 * returns copies.
 */

import { DonationId, IdentityId } from '../types/common';
import { Donation, DonationStatus } from '../types/donation';
import { LedgerStatistics } from '../types/ledger';
import { LedgerEngine } from './ledger-engine';
import { findDonation } from './donation-engine';

export class QueryEngine {
  private ledger: LedgerEngine;

  constructor(ledger: LedgerEngine) {
    this.ledger = ledger;
  }

  getDonation(id: DonationId): Donation | undefined {
    const donation = findDonation(this.ledger.view(), id);
    return donation ? { ...donation } : undefined;
  }

  /**
   * Most recently created first. A limit of 0 returns every donation.
   */
  latestDonations(limit: number = 0): Donation[] {
    const recent = this.ledger.view().recentDonations;
    const count = limit > 0 ? Math.min(Math.floor(limit), recent.length) : recent.length;

    const result: Donation[] = [];
    for (let i = recent.length - 1; i >= recent.length - count; i--) {
      result.push(this.load(recent[i]));
    }
    return result;
  }

  /** In creation order; kept after the donor unregisters */
  donationsForDonor(identity: IdentityId): Donation[] {
    const ids = this.ledger.view().donationsByDonor.get(identity) ?? [];
    return ids.map((id) => this.load(id));
  }

  /** In claim order; kept after the recipient unregisters */
  donationsForRecipient(identity: IdentityId): Donation[] {
    const ids = this.ledger.view().donationsByRecipient.get(identity) ?? [];
    return ids.map((id) => this.load(id));
  }

  /** Total ever created */
  donationCount(): number {
    return this.ledger.view().recentDonations.length;
  }

  /** Donations currently in `status`, newest first */
  donationsByStatus(status: DonationStatus): Donation[] {
    return this.latestDonations(0).filter((d) => d.status === status);
  }

  getLedgerStatistics(): LedgerStatistics {
    const view = this.ledger.view();
    const byStatus: Record<DonationStatus, number> = {
      [DonationStatus.AVAILABLE]: 0,
      [DonationStatus.CLAIMED]: 0,
      [DonationStatus.PICKED_UP]: 0,
      [DonationStatus.COMPLETED]: 0,
      [DonationStatus.CANCELLED]: 0,
    };
    for (const donation of view.donations.values()) {
      byStatus[donation.status]++;
    }

    return {
      totalDonations: view.recentDonations.length,
      byStatus,
      registeredDonors: view.donors.size,
      registeredRecipients: view.recipients.size,
      sequenceNumber: view.sequenceNumber,
    };
  }

  private load(id: DonationId): Donation {
    const donation = this.ledger.view().donations.get(id);
    if (!donation) {
      // Indexes only ever receive ids of committed records.
      throw new Error(`Index references missing donation ${id}`);
    }
    return { ...donation };
  }
}

export function createQueryEngine(ledger: LedgerEngine): QueryEngine {
  return new QueryEngine(ledger);
}
