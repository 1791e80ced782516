/**
 * Donation Ledger - PouchDB Storage Adapter
 *
 * Persists the ledger snapshot together with the notifications produced
 * by the same mutation. Supports in-memory storage for testing.
 */

import { LedgerId, Timestamp } from '../types/common';
import { EventLogEntry } from '../types/events';
import {
  DonationLedgerState,
  SerializedLedgerState,
  deserializeLedgerState,
  serializeLedgerState,
} from '../types/ledger';
import { Result, ok, err, tryCatchAsync } from '../utils/result';

// ============================================
// STORAGE TYPES
// ============================================

export interface StorageError {
  code: 'WRITE_FAILED' | 'READ_FAILED';
  message: string;
}

export interface StorageDocument<T> {
  _id: string;
  _rev?: string;
  type: string;
  data: T;
  createdAt: Timestamp;
  updatedAt: Timestamp;
}

// ============================================
// STORAGE INTERFACE
// ============================================

export interface IStorage {
  /**
   * Persist a ledger snapshot and the events it produced in one call.
   * Events must already carry sequence numbers and hashes.
   */
  commitLedger(state: DonationLedgerState, events: EventLogEntry[]): Promise<Result<void, StorageError>>;

  getLedgerState(ledgerId: LedgerId): Promise<Result<DonationLedgerState | null, StorageError>>;

  /** Events with sequenceNumber > since, ascending */
  getEvents(ledgerId: LedgerId, since?: number): Promise<Result<EventLogEntry[], StorageError>>;
}

// ============================================
// IN-MEMORY STORAGE (for testing)
// ============================================

export class InMemoryStorage implements IStorage {
  private ledgerStates = new Map<LedgerId, SerializedLedgerState>();
  private events = new Map<LedgerId, EventLogEntry[]>();

  /** When set, the next commit fails with this message */
  private pendingFailure: string | undefined;

  async commitLedger(
    state: DonationLedgerState,
    events: EventLogEntry[]
  ): Promise<Result<void, StorageError>> {
    if (this.pendingFailure !== undefined) {
      const message = this.pendingFailure;
      this.pendingFailure = undefined;
      return err({ code: 'WRITE_FAILED', message });
    }

    // Deep clone to prevent mutation issues
    this.ledgerStates.set(state.ledgerId, structuredClone(serializeLedgerState(state)));

    const log = this.events.get(state.ledgerId) ?? [];
    log.push(...events.map((e) => structuredClone(e)));
    this.events.set(state.ledgerId, log);

    return ok(undefined);
  }

  async getLedgerState(ledgerId: LedgerId): Promise<Result<DonationLedgerState | null, StorageError>> {
    const snapshot = this.ledgerStates.get(ledgerId);
    if (!snapshot) {
      return ok(null);
    }
    return ok(deserializeLedgerState(structuredClone(snapshot)));
  }

  async getEvents(ledgerId: LedgerId, since: number = 0): Promise<Result<EventLogEntry[], StorageError>> {
    const events = (this.events.get(ledgerId) ?? [])
      .filter((e) => e.sequenceNumber > since)
      .map((e) => structuredClone(e));
    return ok(events);
  }

  // Utility methods for testing

  /** Make the next commit fail */
  failNextCommit(message: string = 'Simulated write failure'): void {
    this.pendingFailure = message;
  }

  /** Overwrite a stored event (tamper simulation) */
  replaceEvent(ledgerId: LedgerId, entry: EventLogEntry): void {
    const log = this.events.get(ledgerId) ?? [];
    const index = log.findIndex((e) => e.sequenceNumber === entry.sequenceNumber);
    if (index >= 0) {
      log[index] = structuredClone(entry);
    }
  }
}

// ============================================
// POUCHDB STORAGE (for production)
// ============================================

type LedgerDocData = SerializedLedgerState | EventLogEntry;

export interface BulkDocsResponse {
  ok?: boolean;
  id?: string;
  rev?: string;
  error?: string | boolean;
  message?: string;
}

export interface FindRequest {
  selector: Record<string, unknown>;
}

/** The subset of a PouchDB database the adapter relies on */
export interface PouchDBLike {
  get<T>(id: string): Promise<StorageDocument<T> & { _rev: string }>;
  bulkDocs<T>(docs: StorageDocument<T>[]): Promise<BulkDocsResponse[]>;
  find<T>(request: FindRequest): Promise<{ docs: StorageDocument<T>[] }>;
  createIndex(index: { index: { fields: string[] } }): Promise<unknown>;
}

function isNotFound(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'status' in e && e.status === 404;
}

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class PouchDBStorage implements IStorage {
  private db: PouchDBLike;
  private clock: () => Timestamp;
  private initialized = false;

  constructor(db: PouchDBLike, clock: () => Timestamp = Date.now) {
    this.db = db;
    this.clock = clock;
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    await this.db.createIndex({
      index: { fields: ['type', 'data.ledgerId', 'data.sequenceNumber'] },
    });

    this.initialized = true;
  }

  async commitLedger(
    state: DonationLedgerState,
    events: EventLogEntry[]
  ): Promise<Result<void, StorageError>> {
    const docId = `ledger:${state.ledgerId}`;
    const timestamp = this.clock();

    const written = await tryCatchAsync(
      async () => {
        const ledgerDoc: StorageDocument<LedgerDocData> = {
          _id: docId,
          type: 'ledger',
          data: serializeLedgerState(state),
          createdAt: timestamp,
          updatedAt: timestamp,
        };

        const existing = await this.currentRevision<SerializedLedgerState>(docId);
        if (existing) {
          ledgerDoc._rev = existing._rev;
          ledgerDoc.createdAt = existing.createdAt;
        }

        // bulkDocs is not atomic: an event left behind by a failed commit
        // is overwritten when the same sequence number is committed again.
        const eventDocs: StorageDocument<LedgerDocData>[] = [];
        for (const event of events) {
          const eventDoc: StorageDocument<LedgerDocData> = {
            _id: `event:${event.ledgerId}:${String(event.sequenceNumber).padStart(12, '0')}`,
            type: 'event',
            data: event,
            createdAt: timestamp,
            updatedAt: timestamp,
          };
          const orphan = await this.currentRevision<EventLogEntry>(eventDoc._id);
          if (orphan) {
            eventDoc._rev = orphan._rev;
          }
          eventDocs.push(eventDoc);
        }

        return this.db.bulkDocs<LedgerDocData>([ledgerDoc, ...eventDocs]);
      },
      (e): StorageError => ({ code: 'WRITE_FAILED', message: `Failed to commit ledger: ${describeError(e)}` })
    );

    if (!written.ok) {
      return written;
    }

    const failed = written.value.find((r) => r.error);
    if (failed) {
      return err({
        code: 'WRITE_FAILED',
        message: `Failed to commit ledger: ${failed.id ?? docId} ${failed.message ?? String(failed.error)}`,
      });
    }

    return ok(undefined);
  }

  private async currentRevision<T>(id: string): Promise<(StorageDocument<T> & { _rev: string }) | undefined> {
    try {
      return await this.db.get<T>(id);
    } catch (e) {
      if (isNotFound(e)) return undefined;
      throw e;
    }
  }

  async getLedgerState(ledgerId: LedgerId): Promise<Result<DonationLedgerState | null, StorageError>> {
    try {
      const doc = await this.db.get<SerializedLedgerState>(`ledger:${ledgerId}`);
      return ok(deserializeLedgerState(doc.data));
    } catch (e) {
      if (isNotFound(e)) {
        return ok(null);
      }
      return err({ code: 'READ_FAILED', message: `Failed to get ledger state: ${describeError(e)}` });
    }
  }

  async getEvents(ledgerId: LedgerId, since: number = 0): Promise<Result<EventLogEntry[], StorageError>> {
    try {
      const result = await this.db.find<EventLogEntry>({
        selector: {
          type: 'event',
          'data.ledgerId': ledgerId,
          'data.sequenceNumber': { $gt: since },
        },
      });
      const events = result.docs
        .map((d) => d.data)
        .sort((a, b) => a.sequenceNumber - b.sequenceNumber);
      return ok(events);
    } catch (e) {
      return err({ code: 'READ_FAILED', message: `Failed to get events: ${describeError(e)}` });
    }
  }
}

// ============================================
// FACTORY
// ============================================

/** Create an in-memory storage instance (for testing) */
export function createInMemoryStorage(): InMemoryStorage {
  return new InMemoryStorage();
}

/** Create a PouchDB storage instance (for production) */
export function createPouchDBStorage(db: PouchDBLike, clock?: () => Timestamp): PouchDBStorage {
  return new PouchDBStorage(db, clock);
}
