/**
 * Typed event bus for committed protocol activity.
 *
 * Components publish through `Transactor.afterCommit`, so listeners only
 * ever see movements that actually happened, and a failing listener cannot
 * undo or fail the operation that published.
 *
 * @packageDocumentation
 */

import type { AccountId, Amount, UnixSeconds, VenueId } from '@backstop/types';

// ─── Event map ──────────────────────────────────────────────────────────────────

/** A payout to, or forfeit from, one underwriter. */
export interface UnderwriterAmount {
  underwriter: AccountId;
  amount: Amount;
}

/** Map of event names to their payloads. */
export type BackstopEventMap = {
  'venue:registered': { venueId: VenueId; owner: AccountId; vault: AccountId; engine: AccountId };
  'stake:registered': { underwriter: AccountId; amount: Amount; totalStake: Amount };
  'stake:withdrawn': { underwriter: AccountId; amount: Amount; totalStake: Amount };
  'venue:assigned': {
    venueId: VenueId;
    commitments: UnderwriterAmount[];
    totalStakeCommitted: Amount;
    fee: Amount;
    endDate: UnixSeconds;
  };
  'liability:settled': {
    venueId: VenueId;
    vault: AccountId;
    missingAmount: Amount;
    shares: UnderwriterAmount[];
    residual: Amount;
  };
  'pool:fee-claimed': {
    venueId: VenueId;
    underwriter: AccountId;
    released: Amount;
    payout: Amount;
    protocolCut: Amount;
  };
  'engine:report-submitted': {
    venueId: VenueId;
    month: number;
    expectedRevenue: Amount;
    actualRevenue: Amount;
    missingRevenue: Amount;
  };
  'engine:liability-processed': { venueId: VenueId; month: number; amount: Amount };
  'engine:fee-deposited': { venueId: VenueId; amount: Amount };
  'engine:fee-paid': { venueId: VenueId; underwriter: AccountId; payout: Amount; protocolCut: Amount };
  'engine:fees-distributed': { venueId: VenueId; recipients: number };
  'engine:revenue-deposited': { venueId: VenueId; month: number; amount: Amount };
};

/** Every event name, in declaration order. */
export const BACKSTOP_EVENTS = [
  'venue:registered',
  'stake:registered',
  'stake:withdrawn',
  'venue:assigned',
  'liability:settled',
  'pool:fee-claimed',
  'engine:report-submitted',
  'engine:liability-processed',
  'engine:fee-deposited',
  'engine:fee-paid',
  'engine:fees-distributed',
  'engine:revenue-deposited',
] as const satisfies readonly (keyof BackstopEventMap)[];

export type BackstopEventName = keyof BackstopEventMap;

// ─── Listener type ──────────────────────────────────────────────────────────────

type Listener<T> = (data: T) => void;

interface ListenerEntry<T> {
  fn: Listener<T>;
  once: boolean;
}

type ListenerTable = { [K in BackstopEventName]?: ListenerEntry<BackstopEventMap[K]>[] };

// ─── Emitter ────────────────────────────────────────────────────────────────────

/**
 * A strongly-typed, synchronous event emitter.
 *
 * @example
 * ```typescript
 * const events = new BackstopEventEmitter();
 * events.on('liability:settled', ({ venueId, shares }) => {
 *   console.log(venueId, shares.length);
 * });
 * ```
 */
export class BackstopEventEmitter {
  private readonly listeners: ListenerTable = {};

  /** Register a listener called on every emission until removed. */
  on<K extends BackstopEventName>(event: K, listener: Listener<BackstopEventMap[K]>): this {
    this.entriesFor(event).push({ fn: listener, once: false });
    return this;
  }

  /** Register a listener that fires at most once. */
  once<K extends BackstopEventName>(event: K, listener: Listener<BackstopEventMap[K]>): this {
    this.entriesFor(event).push({ fn: listener, once: true });
    return this;
  }

  /**
   * Remove the first registration of `listener` for `event`.
   */
  off<K extends BackstopEventName>(event: K, listener: Listener<BackstopEventMap[K]>): this {
    const entries = this.listeners[event];
    if (!entries) return this;

    const idx = entries.findIndex((e) => e.fn === listener);
    if (idx !== -1) {
      entries.splice(idx, 1);
    }
    return this;
  }

  /**
   * Invoke all listeners for `event` in registration order. Every listener
   * runs even when an earlier one throws; the failures are rethrown once
   * all have run, as the error itself or as an `AggregateError`.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<K extends BackstopEventName>(event: K, data: BackstopEventMap[K]): boolean {
    const entries = this.listeners[event];
    if (!entries || entries.length === 0) return false;

    // Snapshot so a once-listener removing itself does not skip others.
    const snapshot = [...entries];
    const failures: unknown[] = [];
    for (const entry of snapshot) {
      if (entry.once) {
        const idx = entries.indexOf(entry);
        if (idx !== -1) {
          entries.splice(idx, 1);
        }
      }
      try {
        entry.fn(data);
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) throw new AggregateError(failures, `${failures.length} listeners of ${event} failed`);
    return true;
  }

  listenerCount(event: BackstopEventName): number {
    return this.listeners[event]?.length ?? 0;
  }

  /** Remove listeners for one event, or for every event when omitted. */
  removeAllListeners(event?: BackstopEventName): this {
    if (event === undefined) {
      for (const name of BACKSTOP_EVENTS) {
        delete this.listeners[name];
      }
    } else {
      delete this.listeners[event];
    }
    return this;
  }

  private entriesFor<K extends BackstopEventName>(event: K): ListenerEntry<BackstopEventMap[K]>[] {
    const existing = this.listeners[event];
    if (existing) return existing;
    const created: ListenerEntry<BackstopEventMap[K]>[] = [];
    const table: { [P in K]?: ListenerEntry<BackstopEventMap[P]>[] } = this.listeners;
    table[event] = created;
    return created;
  }
}
