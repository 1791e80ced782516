/**
 * Donation Ledger - Public API
 *
 * - Registry (donors and recipients)
 * - Donation lifecycle
 * - Administrative override
 * - Index & query
 */

// ============================================
// TYPE EXPORTS
// ============================================

export {
  IdentityId,
  LedgerId,
  DonationId,
  Timestamp,
  PublicKey,
  Signature,
  SecretKey,
  Clock,
  ManualClock,
  systemClock,
  generateId,
  isValidIdentity,
} from './types/common';

export {
  ParticipantRole,
  ParticipantProfile,
  RegistryError,
  RegistryErrorCode,
  IRegistryEngine,
} from './types/registry';

export {
  DonationStatus,
  Donation,
  CreateDonationInput,
  DonationError,
  DonationErrorCode,
  IDonationEngine,
  ALLOWED_PREDECESSORS,
  TERMINAL_STATUSES,
  canTransition,
  isTerminal,
} from './types/donation';

export { AdminError, AdminErrorCode, IAdminEngine } from './types/admin';

export {
  LedgerEventType,
  LedgerEventPayloads,
  LedgerNotification,
  EventLogEntry,
  LedgerEventListener,
} from './types/events';

export {
  LedgerParameters,
  LedgerView,
  LedgerError,
  LedgerErrorCode,
  LedgerStatistics,
} from './types/ledger';

export { SignedRequest, IdentityError, IdentityErrorCode, IIdentityResolver } from './types/identity';

// ============================================
// RESULT TYPE EXPORTS
// ============================================

export { Result, Ok, Err, ok, err, isOk, isErr, unwrap } from './utils/result';

// ============================================
// ENGINE EXPORTS
// ============================================

export { LedgerEngine, LedgerViolationError, createLedgerEngine } from './engines/ledger-engine';
export { RegistryEngine, RegistryValidationError, createRegistryEngine } from './engines/registry-engine';
export { DonationEngine, DonationValidationError, createDonationEngine } from './engines/donation-engine';
export { AdminEngine, AdminValidationError, createAdminEngine } from './engines/admin-engine';
export { QueryEngine, createQueryEngine } from './engines/query-engine';

// ============================================
// STORAGE / CRYPTO / CONFIG EXPORTS
// ============================================

export {
  IStorage,
  StorageError,
  StorageDocument,
  PouchDBLike,
  InMemoryStorage,
  PouchDBStorage,
  createInMemoryStorage,
  createPouchDBStorage,
} from './storage/pouchdb-adapter';

export { CryptoAdapter, KeyPair, CryptoError, cryptoAdapter } from './crypto/crypto-adapter';
export { ChainVerification, verifyEventChain } from './crypto/event-chain';
export {
  SignatureIdentityResolver,
  createSignatureIdentityResolver,
  signRequest,
} from './crypto/identity-resolver';

export { LedgerConfig, ConfigError, loadLedgerConfig } from './config';
export { Logger, LogLevel, createLogger, silentLogger } from './utils/logger';

// ============================================
// FOOD LEDGER FACTORY
// ============================================

import { Clock, IdentityId, LedgerId, systemClock } from './types/common';
import { LedgerEngine, createLedgerEngine } from './engines/ledger-engine';
import { RegistryEngine, createRegistryEngine } from './engines/registry-engine';
import { DonationEngine, createDonationEngine } from './engines/donation-engine';
import { AdminEngine, createAdminEngine } from './engines/admin-engine';
import { QueryEngine, createQueryEngine } from './engines/query-engine';
import { IStorage, createInMemoryStorage } from './storage/pouchdb-adapter';
import { CryptoAdapter, cryptoAdapter } from './crypto/crypto-adapter';
import { SignatureIdentityResolver, createSignatureIdentityResolver } from './crypto/identity-resolver';
import { LedgerConfig } from './config';
import { LogLevel, Logger, createLogger } from './utils/logger';

/**
 * Complete donation ledger instance
 */
export interface FoodLedger {
  ledgerId: LedgerId;
  ledger: LedgerEngine;
  registry: RegistryEngine;
  donations: DonationEngine;
  admin: AdminEngine;
  queries: QueryEngine;
  identity: SignatureIdentityResolver;
  storage: IStorage;
  crypto: CryptoAdapter;
}

/**
 * Options for creating a donation ledger
 */
export interface FoodLedgerOptions {
  ledgerId: LedgerId;

  /** Initial admin; ignored when the ledger is reloaded from storage */
  admin: IdentityId;

  storage?: IStorage;
  crypto?: CryptoAdapter;
  clock?: Clock;
  logger?: Logger;
  logLevel?: LogLevel;
}

/**
 * Create a complete donation ledger, loading any persisted state
 */
export async function createFoodLedger(options: FoodLedgerOptions): Promise<FoodLedger> {
  const { ledgerId, admin } = options;

  const storage = options.storage ?? createInMemoryStorage();
  const crypto = options.crypto ?? cryptoAdapter;
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? createLogger(`ledger:${ledgerId}`, options.logLevel ?? 'info');

  const ledger = await createLedgerEngine({ ledgerId, admin }, storage, { clock, crypto, logger });
  const registry = createRegistryEngine(ledger);
  const donations = createDonationEngine(ledger, registry);

  return {
    ledgerId,
    ledger,
    registry,
    donations,
    admin: createAdminEngine(ledger),
    queries: createQueryEngine(ledger),
    identity: createSignatureIdentityResolver(crypto, clock),
    storage,
    crypto,
  };
}

/**
 * Create a donation ledger from loaded configuration
 */
export function createFoodLedgerFromConfig(
  config: LedgerConfig,
  options: Omit<FoodLedgerOptions, 'ledgerId' | 'admin' | 'logLevel'> = {}
): Promise<FoodLedger> {
  return createFoodLedger({
    ...options,
    ledgerId: config.ledgerId,
    admin: config.admin,
    logLevel: config.logLevel,
  });
}

// ============================================
// VERSION
// ============================================

export const VERSION = '0.1.0';
