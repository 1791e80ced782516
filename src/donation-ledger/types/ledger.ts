/**
 * Donation Ledger - Ledger State Types
 *
 * The single in-memory state every engine reads and writes through
 * the ledger engine's commit boundary, plus its persisted form.
 */

import { DonationId, IdentityId, LedgerId, Timestamp } from './common';
import { Donation, DonationStatus } from './donation';
import { LedgerNotification } from './events';
import { ParticipantProfile } from './registry';

// ============================================
// LEDGER STATE
// ============================================

/** Parameters a ledger is created with */
export interface LedgerParameters {
  ledgerId: LedgerId;

  /** Identity holding administrative authority until transferred */
  admin: IdentityId;
}

/** Complete state of a donation ledger */
export interface DonationLedgerState {
  ledgerId: LedgerId;

  /** Current administrative authority */
  admin: IdentityId;

  /** Primary record store */
  donations: Map<DonationId, Donation>;

  donors: Map<IdentityId, ParticipantProfile>;
  recipients: Map<IdentityId, ParticipantProfile>;

  /** Append-only ids per donor, in creation order */
  donationsByDonor: Map<IdentityId, DonationId[]>;

  /** Append-only ids per recipient, in claim order */
  donationsByRecipient: Map<IdentityId, DonationId[]>;

  /** Append-only ids in creation order (newest last) */
  recentDonations: DonationId[];

  /** Number of committed mutations (equals the last event's sequence number) */
  sequenceNumber: number;

  /** Hash of the last event appended to the log */
  lastEventHash: string;

  lastUpdated: Timestamp;
}

/** Read-only view handed to queries */
export interface LedgerView {
  readonly ledgerId: LedgerId;
  readonly admin: IdentityId;
  readonly donations: ReadonlyMap<DonationId, Readonly<Donation>>;
  readonly donors: ReadonlyMap<IdentityId, Readonly<ParticipantProfile>>;
  readonly recipients: ReadonlyMap<IdentityId, Readonly<ParticipantProfile>>;
  readonly donationsByDonor: ReadonlyMap<IdentityId, readonly DonationId[]>;
  readonly donationsByRecipient: ReadonlyMap<IdentityId, readonly DonationId[]>;
  readonly recentDonations: readonly DonationId[];
  readonly sequenceNumber: number;
  readonly lastUpdated: Timestamp;
}

/** Persisted form of the ledger state (Maps flattened to entry lists) */
export interface SerializedLedgerState {
  ledgerId: LedgerId;
  admin: IdentityId;
  donations: Array<[DonationId, Donation]>;
  donors: Array<[IdentityId, ParticipantProfile]>;
  recipients: Array<[IdentityId, ParticipantProfile]>;
  donationsByDonor: Array<[IdentityId, DonationId[]]>;
  donationsByRecipient: Array<[IdentityId, DonationId[]]>;
  recentDonations: DonationId[];
  sequenceNumber: number;
  lastEventHash: string;
  lastUpdated: Timestamp;
}

export function serializeLedgerState(state: DonationLedgerState): SerializedLedgerState {
  return {
    ledgerId: state.ledgerId,
    admin: state.admin,
    donations: Array.from(state.donations.entries()),
    donors: Array.from(state.donors.entries()),
    recipients: Array.from(state.recipients.entries()),
    donationsByDonor: Array.from(state.donationsByDonor.entries()),
    donationsByRecipient: Array.from(state.donationsByRecipient.entries()),
    recentDonations: [...state.recentDonations],
    sequenceNumber: state.sequenceNumber,
    lastEventHash: state.lastEventHash,
    lastUpdated: state.lastUpdated,
  };
}

export function deserializeLedgerState(data: SerializedLedgerState): DonationLedgerState {
  return {
    ledgerId: data.ledgerId,
    admin: data.admin,
    donations: new Map(data.donations),
    donors: new Map(data.donors),
    recipients: new Map(data.recipients),
    donationsByDonor: new Map(data.donationsByDonor),
    donationsByRecipient: new Map(data.donationsByRecipient),
    recentDonations: [...data.recentDonations],
    sequenceNumber: data.sequenceNumber,
    lastEventHash: data.lastEventHash,
    lastUpdated: data.lastUpdated,
  };
}

// ============================================
// COMMIT
// ============================================

/**
 * What a mutation hands back to the commit boundary:
 * the caller-facing value and the notification to publish.
 */
export interface MutationOutcome<T> {
  value: T;
  notification: LedgerNotification;
}

// ============================================
// ERROR TYPES
// ============================================

export enum LedgerErrorCode {
  /** Ledger created without a usable admin or id */
  INVALID_PARAMETERS = 'INVALID_PARAMETERS',

  /** Persisting state or events failed */
  STORAGE_ERROR = 'STORAGE_ERROR',
}

export interface LedgerError {
  code: LedgerErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================
// STATISTICS
// ============================================

export interface LedgerStatistics {
  totalDonations: number;
  byStatus: Record<DonationStatus, number>;
  registeredDonors: number;
  registeredRecipients: number;
  sequenceNumber: number;
}
