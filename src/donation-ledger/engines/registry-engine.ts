/**
 * Donation Ledger - Registry Engine
 *
 * Donor and recipient registries. Holds profiles only; whether a role
 * allows an operation is decided by the donation engine.
 */

import { IdentityId, isValidIdentity } from '../types/common';
import { LedgerEventType, LedgerNotification } from '../types/events';
import { LedgerView, MutationOutcome } from '../types/ledger';
import {
  IRegistryEngine,
  ParticipantProfile,
  ParticipantRole,
  RegistryError,
  RegistryErrorCode,
} from '../types/registry';
import { LedgerEngine } from './ledger-engine';

// ============================================
// REGISTRY ENGINE IMPLEMENTATION
// ============================================

export class RegistryEngine implements IRegistryEngine {
  private ledger: LedgerEngine;

  constructor(ledger: LedgerEngine) {
    this.ledger = ledger;
  }

  // ============================================
  // REGISTRATION
  // ============================================

  registerDonor(identity: IdentityId, name: string, contact: string): Promise<ParticipantProfile> {
    return this.register(ParticipantRole.DONOR, identity, name, contact);
  }

  registerRecipient(identity: IdentityId, name: string, contact: string): Promise<ParticipantProfile> {
    return this.register(ParticipantRole.RECIPIENT, identity, name, contact);
  }

  unregisterDonor(identity: IdentityId): Promise<void> {
    return this.unregister(ParticipantRole.DONOR, identity);
  }

  unregisterRecipient(identity: IdentityId): Promise<void> {
    return this.unregister(ParticipantRole.RECIPIENT, identity);
  }

  /**
   * Upsert a profile. Re-registering keeps the original registeredAt.
   */
  private register(
    role: ParticipantRole,
    identity: IdentityId,
    name: string,
    contact: string
  ): Promise<ParticipantProfile> {
    return this.ledger.commit(
      `register${roleLabel(role)}`,
      (tx, timestamp): MutationOutcome<ParticipantProfile> => {
        if (!isValidIdentity(identity)) {
          throw new RegistryValidationError({
            code: RegistryErrorCode.INVALID_IDENTITY,
            message: 'Identity must be a non-empty string',
          });
        }

        const existing = profilesFor(tx.view, role).get(identity);
        const profile: ParticipantProfile = {
          identity,
          name,
          contact,
          registeredAt: existing?.registeredAt ?? timestamp,
          updatedAt: timestamp,
        };
        tx.putProfile(role, profile);

        const notification: LedgerNotification =
          role === ParticipantRole.DONOR
            ? { type: LedgerEventType.DONOR_REGISTERED, data: { identity, name, contact } }
            : { type: LedgerEventType.RECIPIENT_REGISTERED, data: { identity, name, contact } };

        return { value: { ...profile }, notification };
      }
    );
  }

  /**
   * Remove a profile. Donations and indexes that reference the identity
   * are left as they are.
   */
  private unregister(role: ParticipantRole, identity: IdentityId): Promise<void> {
    return this.ledger.commit(
      `unregister${roleLabel(role)}`,
      (tx): MutationOutcome<void> => {
        if (!profilesFor(tx.view, role).has(identity)) {
          throw new RegistryValidationError({
            code: RegistryErrorCode.NOT_REGISTERED,
            message: `${roleLabel(role)} ${identity} is not registered`,
            details: { identity, role },
          });
        }

        tx.removeProfile(role, identity);

        const notification: LedgerNotification =
          role === ParticipantRole.DONOR
            ? { type: LedgerEventType.DONOR_UNREGISTERED, data: { identity } }
            : { type: LedgerEventType.RECIPIENT_UNREGISTERED, data: { identity } };

        return { value: undefined, notification };
      }
    );
  }

  // ============================================
  // LOOKUPS
  // ============================================

  isRegisteredDonor(identity: IdentityId): boolean {
    return this.ledger.view().donors.has(identity);
  }

  isRegisteredRecipient(identity: IdentityId): boolean {
    return this.ledger.view().recipients.has(identity);
  }

  getDonorProfile(identity: IdentityId): ParticipantProfile | undefined {
    const profile = this.ledger.view().donors.get(identity);
    return profile ? { ...profile } : undefined;
  }

  getRecipientProfile(identity: IdentityId): ParticipantProfile | undefined {
    const profile = this.ledger.view().recipients.get(identity);
    return profile ? { ...profile } : undefined;
  }

  getDonorCount(): number {
    return this.ledger.view().donors.size;
  }

  getRecipientCount(): number {
    return this.ledger.view().recipients.size;
  }
}

function profilesFor(
  view: LedgerView,
  role: ParticipantRole
): ReadonlyMap<IdentityId, Readonly<ParticipantProfile>> {
  return role === ParticipantRole.DONOR ? view.donors : view.recipients;
}

function roleLabel(role: ParticipantRole): string {
  return role === ParticipantRole.DONOR ? 'Donor' : 'Recipient';
}

// ============================================
// CUSTOM ERROR CLASS
// ============================================

export class RegistryValidationError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(error: RegistryError) {
    super(error.message);
    this.name = 'RegistryValidationError';
    this.code = error.code;
    this.details = error.details;
  }

  toJSON(): RegistryError {
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

export function createRegistryEngine(ledger: LedgerEngine): RegistryEngine {
  return new RegistryEngine(ledger);
}
