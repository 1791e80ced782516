/**
 * Donation Ledger - Ledger Transaction
 *
 * Write access to the live ledger state for one mutation. Every write
 * records how to reverse it, so the commit boundary can restore the
 * state if the change cannot be persisted. Appends go onto the existing
 * index arrays; nothing is copied.
 */

import { DonationId, IdentityId } from '../types/common';
import { Donation } from '../types/donation';
import { DonationLedgerState, LedgerView } from '../types/ledger';
import { ParticipantProfile, ParticipantRole } from '../types/registry';

/** Keyed secondary indexes */
export type DonationIndex = 'donationsByDonor' | 'donationsByRecipient';

export class LedgerTransaction {
  private state: DonationLedgerState;
  private undo: Array<() => void> = [];

  constructor(state: DonationLedgerState) {
    this.state = state;
  }

  /** Current state, including writes made so far in this transaction */
  get view(): LedgerView {
    return this.state;
  }

  /** Number of writes recorded */
  get size(): number {
    return this.undo.length;
  }

  putDonation(donation: Donation): void {
    const donations = this.state.donations;
    const previous = donations.get(donation.id);
    donations.set(donation.id, donation);
    this.undo.push(() => {
      if (previous) {
        donations.set(donation.id, previous);
      } else {
        donations.delete(donation.id);
      }
    });
  }

  appendRecent(id: DonationId): void {
    const recent = this.state.recentDonations;
    const length = recent.length;
    recent.push(id);
    this.undo.push(() => {
      recent.length = length;
    });
  }

  appendToIndex(index: DonationIndex, key: IdentityId, id: DonationId): void {
    const map = this.state[index];
    const ids = map.get(key);
    if (ids) {
      const length = ids.length;
      ids.push(id);
      this.undo.push(() => {
        ids.length = length;
      });
    } else {
      map.set(key, [id]);
      this.undo.push(() => {
        map.delete(key);
      });
    }
  }

  putProfile(role: ParticipantRole, profile: ParticipantProfile): void {
    const profiles = this.profiles(role);
    const previous = profiles.get(profile.identity);
    profiles.set(profile.identity, profile);
    this.undo.push(() => {
      if (previous) {
        profiles.set(profile.identity, previous);
      } else {
        profiles.delete(profile.identity);
      }
    });
  }

  removeProfile(role: ParticipantRole, identity: IdentityId): void {
    const profiles = this.profiles(role);
    const previous = profiles.get(identity);
    if (!previous) return;
    profiles.delete(identity);
    this.undo.push(() => {
      profiles.set(identity, previous);
    });
  }

  setAdmin(admin: IdentityId): void {
    const previous = this.state.admin;
    this.state.admin = admin;
    this.undo.push(() => {
      this.state.admin = previous;
    });
  }

  /** Reverse every recorded write, newest first */
  rollback(): void {
    for (let i = this.undo.length - 1; i >= 0; i--) {
      this.undo[i]();
    }
    this.undo = [];
  }

  private profiles(role: ParticipantRole): Map<IdentityId, ParticipantProfile> {
    return role === ParticipantRole.DONOR ? this.state.donors : this.state.recipients;
  }
}
