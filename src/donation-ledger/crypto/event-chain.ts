/**
 * Donation Ledger - Event Hash Chain
 *
 * Each log entry commits to the previous entry's hash, so editing,
 * dropping or reordering any entry breaks every hash after it.
 */

import { EventLogEntry } from '../types/events';
import { CryptoAdapter } from './crypto-adapter';

export type UnhashedEvent = Omit<EventLogEntry, 'hash'>;

export type ChainVerification =
  | { valid: true; length: number }
  | { valid: false; sequenceNumber: number; reason: string };

export function computeEventHash(crypto: CryptoAdapter, entry: UnhashedEvent): string {
  const content = JSON.stringify([
    entry.previousHash,
    entry.id,
    entry.ledgerId,
    entry.sequenceNumber,
    entry.timestamp,
    entry.type,
    entry.data,
  ]);
  return crypto.hash(content);
}

/**
 * Verify a contiguous run of entries.
 * `previousHash` is the hash preceding the first entry ('' for a full log).
 */
export function verifyEventChain(
  crypto: CryptoAdapter,
  entries: EventLogEntry[],
  previousHash: string = ''
): ChainVerification {
  let expectedPrevious = previousHash;
  let expectedSequence = entries.length > 0 ? entries[0].sequenceNumber : 0;

  for (const entry of entries) {
    if (entry.sequenceNumber !== expectedSequence) {
      return {
        valid: false,
        sequenceNumber: entry.sequenceNumber,
        reason: `Expected sequence ${expectedSequence}, found ${entry.sequenceNumber}`,
      };
    }
    if (entry.previousHash !== expectedPrevious) {
      return {
        valid: false,
        sequenceNumber: entry.sequenceNumber,
        reason: 'previousHash does not match the preceding entry',
      };
    }
    if (computeEventHash(crypto, entry) !== entry.hash) {
      return {
        valid: false,
        sequenceNumber: entry.sequenceNumber,
        reason: 'Entry content does not match its hash',
      };
    }
    expectedPrevious = entry.hash;
    expectedSequence++;
  }

  return { valid: true, length: entries.length };
}
