/**
 * Donation Ledger - Registry Types
 *
 * Donor and recipient profiles. The two registries are independent:
 * one identity may hold either role, both, or neither.
 */

import { IdentityId, Timestamp } from './common';

// ============================================
// ENUMS
// ============================================

/** Role a profile is registered under */
export enum ParticipantRole {
  DONOR = 'DONOR',
  RECIPIENT = 'RECIPIENT',
}

// ============================================
// CORE INTERFACES
// ============================================

/** Lightweight profile held for a registered participant */
export interface ParticipantProfile {
  /** Identity the profile is keyed by */
  identity: IdentityId;

  /** Display name */
  name: string;

  /** Free-text contact details */
  contact: string;

  /** When this identity first registered under the role */
  registeredAt: Timestamp;

  /** When the profile was last overwritten */
  updatedAt: Timestamp;
}

// ============================================
// ERROR TYPES
// ============================================

export enum RegistryErrorCode {
  /** No profile to remove */
  NOT_REGISTERED = 'NOT_REGISTERED',

  /** Identity is empty or not a string */
  INVALID_IDENTITY = 'INVALID_IDENTITY',
}

export interface RegistryError {
  code: RegistryErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================
// INTERFACE
// ============================================

export interface IRegistryEngine {
  // Mutations
  registerDonor(identity: IdentityId, name: string, contact: string): Promise<ParticipantProfile>;
  registerRecipient(identity: IdentityId, name: string, contact: string): Promise<ParticipantProfile>;
  unregisterDonor(identity: IdentityId): Promise<void>;
  unregisterRecipient(identity: IdentityId): Promise<void>;

  // Lookups
  isRegisteredDonor(identity: IdentityId): boolean;
  isRegisteredRecipient(identity: IdentityId): boolean;
  getDonorProfile(identity: IdentityId): ParticipantProfile | undefined;
  getRecipientProfile(identity: IdentityId): ParticipantProfile | undefined;
  getDonorCount(): number;
  getRecipientCount(): number;
}
