/**
 * Atomic units of work spanning several stateful components.
 *
 * Components enlist as participants and call {@link Transactor.touch}
 * before they first change state inside a unit. Only touched participants
 * are captured; if the unit throws, their captured states are restored
 * before the error is rethrown, so a failed call chain (engine → pool →
 * asset) leaves no partial balance change behind. Nested `run()` calls
 * join the enclosing unit.
 *
 * @packageDocumentation
 */

import { silentLogger } from '@backstop/types';
import type { Logger } from '@backstop/types';

// ─── Types ──────────────────────────────────────────────────────────────────────

/** Restores a participant to the state it had when captured. */
export type Restore = () => void;

/** A stateful component that can take part in an atomic unit of work. */
export interface Participant {
  /** Snapshot current state and return a function that reinstates it. */
  capture(): Restore;
}

export interface TransactorOptions {
  /** Receives failures of post-commit callbacks. */
  logger?: Logger;
}

// ─── Transactor ─────────────────────────────────────────────────────────────────

/**
 * Runs operations as all-or-nothing units across enlisted participants.
 *
 * ```ts
 * const tx = new Transactor();
 * const ledger = snapshotParticipant(() => state, (s) => { state = s; });
 * tx.enlist(ledger);
 * tx.run(() => {
 *   tx.touch(ledger);
 *   state.locked -= 60n;
 *   token.transfer('pool', 'vault', 60n); // throws → locked is restored
 * });
 * ```
 */
export class Transactor {
  private readonly participants = new Set<Participant>();
  private readonly logger: Logger;
  private depth = 0;
  private captured = new Map<Participant, Restore>();
  private pending: Array<() => void> = [];
  private commits = 0;
  private rollbacks = 0;
  private failedCallbacks = 0;

  constructor(options: TransactorOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child('transactor');
  }

  /**
   * Add a participant. Returns a function that removes it again.
   *
   * Participants enlisted while a unit is open are dropped if that unit
   * rolls back.
   */
  enlist(participant: Participant): () => void {
    this.participants.add(participant);
    return () => {
      this.participants.delete(participant);
    };
  }

  /**
   * Capture `participant` for the open unit unless it already was.
   * Outside a unit, and for participants that are not enlisted, this does
   * nothing.
   */
  touch(participant: Participant): void {
    if (this.depth === 0 || this.captured.has(participant)) return;
    if (!this.participants.has(participant)) return;
    this.captured.set(participant, participant.capture());
  }

  /** Whether a unit of work is currently open. */
  get active(): boolean {
    return this.depth > 0;
  }

  stats(): { commits: number; rollbacks: number; participants: number; failedCallbacks: number } {
    return {
      commits: this.commits,
      rollbacks: this.rollbacks,
      participants: this.participants.size,
      failedCallbacks: this.failedCallbacks,
    };
  }

  /**
   * Run `fn` atomically.
   *
   * Callbacks registered through {@link afterCommit} run once the
   * outermost unit has committed and closed, in registration order. A
   * callback that throws is logged and does not stop the others, nor
   * does it turn the committed unit into a failure.
   */
  run<T>(fn: () => T): T {
    if (this.depth > 0) {
      this.depth++;
      try {
        return fn();
      } finally {
        this.depth--;
      }
    }

    const enlistedBefore = new Set(this.participants);
    this.depth = 1;
    this.captured = new Map();
    this.pending = [];
    let result: T;
    try {
      result = fn();
    } catch (error) {
      this.depth = 0;
      this.pending = [];
      const restores = [...this.captured.values()];
      this.captured = new Map();
      for (let i = restores.length - 1; i >= 0; i--) {
        const restore = restores[i];
        if (restore) restore();
      }
      for (const participant of [...this.participants]) {
        if (!enlistedBefore.has(participant)) {
          this.participants.delete(participant);
        }
      }
      this.rollbacks++;
      throw error;
    }

    this.depth = 0;
    this.captured = new Map();
    this.commits++;
    const callbacks = this.pending;
    this.pending = [];
    for (const callback of callbacks) {
      this.deliver(callback);
    }
    return result;
  }

  /**
   * Defer `callback` until the current unit commits. Outside a unit the
   * callback runs immediately; if the unit rolls back it never runs.
   */
  afterCommit(callback: () => void): void {
    if (this.depth === 0) {
      this.deliver(callback);
      return;
    }
    this.pending.push(callback);
  }

  private deliver(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.failedCallbacks++;
      this.logger.error('post-commit callback failed', { error });
    }
  }
}

/**
 * Build a {@link Participant} over a field of plain data.
 *
 * `read` returns the live state and `write` replaces it. The snapshot is a
 * structured clone, so Maps, Sets and bigints survive the round trip.
 */
export function snapshotParticipant<S>(read: () => S, write: (state: S) => void): Participant {
  return {
    capture: () => {
      const saved = structuredClone(read());
      return () => {
        write(saved);
      };
    },
  };
}
