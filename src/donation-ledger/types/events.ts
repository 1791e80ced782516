/**
 * Donation Ledger - Notification Types
 *
 * Every accepted mutation produces exactly one notification. Observers
 * outside the ledger may have no other way to reconstruct history, so
 * each payload carries the ids and identities involved.
 */

import { DonationId, IdentityId, LedgerId, Timestamp } from './common';
import { DonationStatus } from './donation';

// ============================================
// EVENT TYPES
// ============================================

export enum LedgerEventType {
  DONOR_REGISTERED = 'DONOR_REGISTERED',
  DONOR_UNREGISTERED = 'DONOR_UNREGISTERED',
  RECIPIENT_REGISTERED = 'RECIPIENT_REGISTERED',
  RECIPIENT_UNREGISTERED = 'RECIPIENT_UNREGISTERED',
  DONATION_CREATED = 'DONATION_CREATED',
  DONATION_CLAIMED = 'DONATION_CLAIMED',
  DONATION_PICKED_UP = 'DONATION_PICKED_UP',
  DONATION_COMPLETED = 'DONATION_COMPLETED',
  DONATION_CANCELLED = 'DONATION_CANCELLED',
  ADMINISTRATION_TRANSFERRED = 'ADMINISTRATION_TRANSFERRED',
}

/** Payload carried by each notification type */
export interface LedgerEventPayloads {
  [LedgerEventType.DONOR_REGISTERED]: { identity: IdentityId; name: string; contact: string };
  [LedgerEventType.DONOR_UNREGISTERED]: { identity: IdentityId };
  [LedgerEventType.RECIPIENT_REGISTERED]: { identity: IdentityId; name: string; contact: string };
  [LedgerEventType.RECIPIENT_UNREGISTERED]: { identity: IdentityId };
  [LedgerEventType.DONATION_CREATED]: {
    donationId: DonationId;
    donor: IdentityId;
    title: string;
    quantity: number;
  };
  [LedgerEventType.DONATION_CLAIMED]: { donationId: DonationId; recipient: IdentityId };
  [LedgerEventType.DONATION_PICKED_UP]: { donationId: DonationId; by: IdentityId };
  [LedgerEventType.DONATION_COMPLETED]: {
    donationId: DonationId;
    by: IdentityId;
    previousStatus: DonationStatus;
    forced: boolean;
  };
  [LedgerEventType.DONATION_CANCELLED]: {
    donationId: DonationId;
    by: IdentityId;
    reason: string;
    previousStatus: DonationStatus;
    forced: boolean;
  };
  [LedgerEventType.ADMINISTRATION_TRANSFERRED]: { previousAdmin: IdentityId; newAdmin: IdentityId };
}

/** A notification before it is sequenced into the log */
export type LedgerNotification = {
  [K in LedgerEventType]: { type: K; data: LedgerEventPayloads[K] };
}[LedgerEventType];

/** Sequencing and tamper-evidence fields added by the event log */
export interface EventLogMeta {
  id: string;
  ledgerId: LedgerId;
  timestamp: Timestamp;
  sequenceNumber: number;

  /** Hash of the previous entry (empty for the first entry) */
  previousHash: string;

  /** Hash over previousHash and this entry's content */
  hash: string;
}

/** A notification as stored in the event log */
export type EventLogEntry = LedgerNotification & EventLogMeta;

/** Callback registered by an in-process observer */
export type LedgerEventListener = (event: EventLogEntry) => void;
