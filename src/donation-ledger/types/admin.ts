/**
 * Donation Ledger - Administrative Override Types
 */

import { DonationId, IdentityId } from './common';
import { Donation } from './donation';

export enum AdminErrorCode {
  /** Caller does not hold administrative authority */
  UNAUTHORIZED = 'UNAUTHORIZED',

  /** Id absent or zero */
  DONATION_NOT_FOUND = 'DONATION_NOT_FOUND',

  /** Transfer target is empty */
  INVALID_ADMIN_TARGET = 'INVALID_ADMIN_TARGET',
}

export interface AdminError {
  code: AdminErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface IAdminEngine {
  getAdmin(): IdentityId;
  isAdmin(identity: IdentityId): boolean;
  transferAdministration(caller: IdentityId, newAdmin: IdentityId): Promise<IdentityId>;
  adminForceComplete(caller: IdentityId, id: DonationId): Promise<Donation>;
  adminForceCancel(caller: IdentityId, id: DonationId, reason: string): Promise<Donation>;
}
