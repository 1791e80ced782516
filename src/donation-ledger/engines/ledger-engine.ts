/**
 * Donation Ledger - Ledger Engine
 *
 * Owns the ledger state and the only path that changes it. Every
 * mutation from the registry, donation and admin engines goes through
 * commit(), which:
 * - runs mutations one at a time, in arrival order
 * - applies the mutation to the live state through a LedgerTransaction,
 *   rolling it back if the mutation throws or persistence fails
 * - persists the new snapshot with its notification in one storage call
 * - publishes the notification to subscribers after it is durable
 */

import {
  Clock,
  IdentityId,
  LedgerId,
  Timestamp,
  generateId,
  isValidIdentity,
  systemClock,
} from '../types/common';
import { EventLogEntry, LedgerEventListener } from '../types/events';
import {
  DonationLedgerState,
  LedgerError,
  LedgerErrorCode,
  LedgerParameters,
  LedgerView,
  MutationOutcome,
} from '../types/ledger';
import { Result, ok, err } from '../utils/result';
import { SerialQueue } from '../utils/serial-queue';
import { Logger, silentLogger } from '../utils/logger';
import { IStorage } from '../storage/pouchdb-adapter';
import { CryptoAdapter, cryptoAdapter } from '../crypto/crypto-adapter';
import { ChainVerification, computeEventHash, verifyEventChain } from '../crypto/event-chain';
import { LedgerTransaction } from './ledger-transaction';

// ============================================
// OPTIONS
// ============================================

export interface LedgerEngineOptions {
  clock?: Clock;
  crypto?: CryptoAdapter;
  logger?: Logger;
}

/** Signature of a state change run inside commit() */
export type Mutation<T> = (tx: LedgerTransaction, timestamp: Timestamp) => MutationOutcome<T>;

// ============================================
// LEDGER ENGINE IMPLEMENTATION
// ============================================

export class LedgerEngine {
  private state: DonationLedgerState;
  private storage: IStorage;
  private clock: Clock;
  private crypto: CryptoAdapter;
  private logger: Logger;
  private queue = new SerialQueue();
  private listeners = new Set<LedgerEventListener>();

  constructor(parameters: LedgerParameters, storage: IStorage, options: LedgerEngineOptions = {}) {
    if (!isValidIdentity(parameters.ledgerId)) {
      throw new LedgerViolationError({
        code: LedgerErrorCode.INVALID_PARAMETERS,
        message: 'Ledger id must be a non-empty string',
      });
    }
    if (!isValidIdentity(parameters.admin)) {
      throw new LedgerViolationError({
        code: LedgerErrorCode.INVALID_PARAMETERS,
        message: 'Ledger must be created with an admin identity',
      });
    }

    this.storage = storage;
    this.clock = options.clock ?? systemClock;
    this.crypto = options.crypto ?? cryptoAdapter;
    this.logger = options.logger ?? silentLogger;

    this.state = {
      ledgerId: parameters.ledgerId,
      admin: parameters.admin,
      donations: new Map(),
      donors: new Map(),
      recipients: new Map(),
      donationsByDonor: new Map(),
      donationsByRecipient: new Map(),
      recentDonations: [],
      sequenceNumber: 0,
      lastEventHash: '',
      lastUpdated: this.clock.now(),
    };
  }

  /**
   * Initialize from storage (load existing state).
   * A persisted admin wins over the configured one, since transfers are durable.
   */
  async initialize(): Promise<Result<void, LedgerError>> {
    const result = await this.storage.getLedgerState(this.state.ledgerId);
    if (!result.ok) {
      this.logger.error(`Failed to load ledger ${this.state.ledgerId}: ${result.error.message}`);
      return err({
        code: LedgerErrorCode.STORAGE_ERROR,
        message: result.error.message,
      });
    }

    if (result.value) {
      this.state = result.value;
      this.logger.info(
        `Loaded ledger ${this.state.ledgerId} at sequence ${this.state.sequenceNumber} ` +
          `(${this.state.recentDonations.length} donations)`
      );
    }

    return ok(undefined);
  }

  // ============================================
  // QUERY METHODS
  // ============================================

  getLedgerId(): LedgerId {
    return this.state.ledgerId;
  }

  getAdmin(): IdentityId {
    return this.state.admin;
  }

  isAdmin(identity: IdentityId): boolean {
    return identity === this.state.admin;
  }

  getSequenceNumber(): number {
    return this.state.sequenceNumber;
  }

  /** Current time from the ledger's clock */
  now(): Timestamp {
    return this.clock.now();
  }

  /** The live state; records are replaced, index arrays only grow */
  view(): LedgerView {
    return this.state;
  }

  /** Mutations submitted but not yet committed or rejected */
  pendingMutations(): number {
    return this.queue.size;
  }

  // ============================================
  // COMMIT BOUNDARY
  // ============================================

  /**
   * Run a mutation atomically.
   *
   * The mutation must check every precondition before its first write.
   * Writes go to the live state; if the mutation throws or the storage
   * call fails they are rolled back before the next mutation runs.
   * Queries made while the storage call is in flight see the new state.
   */
  commit<T>(operation: string, mutate: Mutation<T>): Promise<T> {
    return this.queue.run(async () => {
      const timestamp = this.clock.now();
      const tx = new LedgerTransaction(this.state);

      let outcome: MutationOutcome<T>;
      try {
        outcome = mutate(tx, timestamp);
      } catch (e) {
        tx.rollback();
        this.logger.warn(`${operation} rejected: ${e instanceof Error ? e.message : String(e)}`);
        throw e;
      }

      const { sequenceNumber, lastEventHash, lastUpdated } = this.state;
      const unhashed = {
        ...outcome.notification,
        id: generateId(),
        ledgerId: this.state.ledgerId,
        timestamp,
        sequenceNumber: sequenceNumber + 1,
        previousHash: lastEventHash,
      };
      const entry: EventLogEntry = { ...unhashed, hash: computeEventHash(this.crypto, unhashed) };

      this.state.sequenceNumber = entry.sequenceNumber;
      this.state.lastEventHash = entry.hash;
      this.state.lastUpdated = timestamp;

      const persisted = await this.storage.commitLedger(this.state, [entry]);
      if (!persisted.ok) {
        tx.rollback();
        this.state.sequenceNumber = sequenceNumber;
        this.state.lastEventHash = lastEventHash;
        this.state.lastUpdated = lastUpdated;
        this.logger.error(`${operation} could not be persisted: ${persisted.error.message}`);
        throw new LedgerViolationError({
          code: LedgerErrorCode.STORAGE_ERROR,
          message: persisted.error.message,
          details: { operation },
        });
      }

      this.logger.debug(`${operation} wrote ${tx.size} change(s)`);
      this.logger.info(`${operation} committed as #${entry.sequenceNumber} (${entry.type})`);
      this.publish(entry);

      return outcome.value;
    });
  }

  // ============================================
  // NOTIFICATIONS
  // ============================================

  /** Register an observer; returns the function that removes it */
  subscribe(listener: LedgerEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private publish(entry: EventLogEntry): void {
    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (e) {
        // The mutation is already durable; a failing observer cannot undo it.
        this.logger.error(
          `Listener failed on event #${entry.sequenceNumber}: ${e instanceof Error ? e.message : String(e)}`
        );
      }
    }
  }

  /**
   * Events with sequenceNumber > since, from storage.
   * Entries past the committed head are leftovers of a failed write.
   */
  async getEvents(since: number = 0): Promise<EventLogEntry[]> {
    const result = await this.storage.getEvents(this.state.ledgerId, since);
    if (!result.ok) {
      throw new LedgerViolationError({
        code: LedgerErrorCode.STORAGE_ERROR,
        message: result.error.message,
      });
    }
    return result.value.filter((e) => e.sequenceNumber <= this.state.sequenceNumber);
  }

  /** Re-hash the full stored log and compare it with the live chain head */
  async verifyEventLog(): Promise<ChainVerification> {
    const events = await this.getEvents();
    const verification = verifyEventChain(this.crypto, events);
    if (!verification.valid) {
      return verification;
    }

    const head = events.length > 0 ? events[events.length - 1].hash : '';
    if (head !== this.state.lastEventHash || events.length !== this.state.sequenceNumber) {
      return {
        valid: false,
        sequenceNumber: events.length,
        reason: 'Stored log does not end at the ledger head',
      };
    }
    return verification;
  }
}

// ============================================
// CUSTOM ERROR CLASS
// ============================================

export class LedgerViolationError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(error: LedgerError) {
    super(error.message);
    this.name = 'LedgerViolationError';
    this.code = error.code;
    this.details = error.details;
  }

  toJSON(): LedgerError {
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

/**
 * Create and initialize a ledger engine
 */
export async function createLedgerEngine(
  parameters: LedgerParameters,
  storage: IStorage,
  options: LedgerEngineOptions = {}
): Promise<LedgerEngine> {
  const engine = new LedgerEngine(parameters, storage, options);
  const result = await engine.initialize();
  if (!result.ok) {
    throw new LedgerViolationError(result.error);
  }
  return engine;
}
