/**
 * Hash-chained journal of committed protocol events.
 *
 * Each entry's hash covers the previous entry's hash, so editing any
 * historical record (an amount, a recipient, the order of settlements)
 * breaks the chain at that point and is reported by `verify()`.
 *
 * @packageDocumentation
 */

import { canonicalizeJson, generateId, sha256Object, timestamp } from '@backstop/crypto';
import type { HashHex } from '@backstop/crypto';
import { BackstopErrorCode, ValidationError, isPlainObject } from '@backstop/types';

import { BACKSTOP_EVENTS } from './events';
import type { BackstopEventEmitter, BackstopEventName } from './events';

/** A single journal entry. */
export interface JournalEntry {
  /** Position in the journal, starting at 0. */
  sequence: number;
  id: string;
  /** ISO 8601 timestamp when the entry was appended. */
  recordedAt: string;
  event: BackstopEventName;
  /** Canonical JSON of the event payload (amounts as decimal strings). */
  payload: string;
  /** Hash of the previous entry (genesis uses all zeros). */
  previousHash: HashHex;
  hash: HashHex;
}

const GENESIS_HASH: HashHex = '0000000000000000000000000000000000000000000000000000000000000000';

function computeEntryHash(entry: Omit<JournalEntry, 'hash'>): HashHex {
  return sha256Object({
    sequence: entry.sequence,
    id: entry.id,
    recordedAt: entry.recordedAt,
    event: entry.event,
    payload: entry.payload,
    previousHash: entry.previousHash,
  });
}

function isEventName(value: unknown): value is BackstopEventName {
  return BACKSTOP_EVENTS.some((name) => name === value);
}

function isJournalEntry(value: unknown): value is JournalEntry {
  return (
    isPlainObject(value) &&
    typeof value.sequence === 'number' &&
    typeof value.id === 'string' &&
    typeof value.recordedAt === 'string' &&
    isEventName(value.event) &&
    typeof value.payload === 'string' &&
    typeof value.previousHash === 'string' &&
    typeof value.hash === 'string'
  );
}

/**
 * Append-only, tamper-evident record of what the protocol committed.
 *
 * ```ts
 * const journal = new SettlementJournal();
 * const detach = journal.attach(events);
 * // ... protocol activity ...
 * journal.verify().valid; // true
 * ```
 */
export class SettlementJournal {
  private chain: JournalEntry[] = [];

  append(event: BackstopEventName, payload: unknown): JournalEntry {
    const last = this.chain[this.chain.length - 1];
    const partial: Omit<JournalEntry, 'hash'> = {
      sequence: this.chain.length,
      id: generateId(),
      recordedAt: timestamp(),
      event,
      payload: canonicalizeJson(payload),
      previousHash: last ? last.hash : GENESIS_HASH,
    };
    const entry: JournalEntry = { ...partial, hash: computeEntryHash(partial) };
    this.chain.push(entry);
    return entry;
  }

  /**
   * Record every event published on `events`.
   *
   * @returns A function that detaches the journal again.
   */
  attach(events: BackstopEventEmitter): () => void {
    const detachers: Array<() => void> = [];
    for (const name of BACKSTOP_EVENTS) {
      const listener = (data: unknown): void => {
        this.append(name, data);
      };
      events.on(name, listener);
      detachers.push(() => {
        events.off(name, listener);
      });
    }
    return () => {
      for (const detach of detachers) detach();
    };
  }

  /**
   * Check the linkage and content hash of every entry.
   *
   * @returns `valid`, the entry count, and the first broken index if any.
   */
  verify(): { valid: boolean; brokenAt?: number; entries: number } {
    for (let i = 0; i < this.chain.length; i++) {
      const entry = this.chain[i];
      if (!entry) break;
      const previous = this.chain[i - 1];
      const expectedPrevious = previous ? previous.hash : GENESIS_HASH;
      if (entry.sequence !== i || entry.previousHash !== expectedPrevious || entry.hash !== computeEntryHash(entry)) {
        return { valid: false, brokenAt: i, entries: this.chain.length };
      }
    }
    return { valid: true, entries: this.chain.length };
  }

  entries(): readonly JournalEntry[] {
    return Object.freeze([...this.chain]);
  }

  /** Entries for one event name, in order. */
  filter(event: BackstopEventName): JournalEntry[] {
    return this.chain.filter((entry) => entry.event === event);
  }

  latest(): JournalEntry | undefined {
    return this.chain[this.chain.length - 1];
  }

  get size(): number {
    return this.chain.length;
  }

  export(): string {
    return JSON.stringify(this.chain);
  }

  /**
   * Rebuild a journal from {@link export} output.
   *
   * @throws {ValidationError} If the JSON is malformed or the chain does not verify.
   */
  static import(json: string): SettlementJournal {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch {
      throw new ValidationError('Journal export is not valid JSON', 'json', BackstopErrorCode.INVALID_INPUT);
    }
    if (!Array.isArray(parsed) || !parsed.every(isJournalEntry)) {
      throw new ValidationError('Journal export must be an array of entries', 'json', BackstopErrorCode.INVALID_INPUT);
    }

    const journal = new SettlementJournal();
    journal.chain = parsed;
    const result = journal.verify();
    if (!result.valid) {
      throw new ValidationError(
        `Journal integrity check failed at entry ${String(result.brokenAt)}`,
        'json',
        BackstopErrorCode.INVALID_INPUT,
      );
    }
    return journal;
  }
}
