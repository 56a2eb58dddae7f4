import { describe, it, expect, beforeEach } from 'vitest';
import { LogLevel, createLogger } from '@backstop/types';
import type { LogEntry } from '@backstop/types';
import { Transactor, snapshotParticipant } from './transactor';
import type { Participant } from './transactor';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A minimal stateful component enlisted through snapshotParticipant. */
class Counter {
  state: { value: bigint; log: Map<string, bigint> } = { value: 0n, log: new Map() };
  captures = 0;
  private readonly participant: Participant;

  constructor(private readonly tx: Transactor) {
    const inner = snapshotParticipant(
      () => this.state,
      (s) => {
        this.state = s;
      },
    );
    this.participant = {
      capture: () => {
        this.captures++;
        return inner.capture();
      },
    };
    tx.enlist(this.participant);
  }

  add(key: string, amount: bigint): void {
    this.tx.touch(this.participant);
    this.state.value += amount;
    this.state.log.set(key, amount);
  }
}

describe('Transactor', () => {
  let tx: Transactor;
  let a: Counter;
  let b: Counter;

  beforeEach(() => {
    tx = new Transactor();
    a = new Counter(tx);
    b = new Counter(tx);
  });

  it('returns the value of a committed unit', () => {
    const result = tx.run(() => {
      a.add('x', 5n);
      return 'done';
    });
    expect(result).toBe('done');
    expect(a.state.value).toBe(5n);
    expect(tx.stats()).toEqual({ commits: 1, rollbacks: 0, participants: 2, failedCallbacks: 0 });
  });

  it('restores every participant when the unit throws', () => {
    a.add('seed', 10n);
    expect(() =>
      tx.run(() => {
        a.add('x', 5n);
        b.add('y', 7n);
        throw new Error('leg failed');
      }),
    ).toThrow('leg failed');

    expect(a.state.value).toBe(10n);
    expect([...a.state.log.keys()]).toEqual(['seed']);
    expect(b.state.value).toBe(0n);
    expect(b.state.log.size).toBe(0);
    expect(tx.stats().rollbacks).toBe(1);
  });

  it('nested runs join the outer unit and roll back with it', () => {
    expect(() =>
      tx.run(() => {
        tx.run(() => a.add('inner', 3n));
        expect(a.state.value).toBe(3n);
        throw new Error('outer failed');
      }),
    ).toThrow('outer failed');
    expect(a.state.value).toBe(0n);
  });

  it('an inner failure caught by the outer unit keeps the outer changes', () => {
    tx.run(() => {
      a.add('outer', 1n);
      try {
        tx.run(() => {
          throw new Error('inner');
        });
      } catch {
        b.add('recovered', 2n);
      }
    });
    expect(a.state.value).toBe(1n);
    expect(b.state.value).toBe(2n);
    expect(tx.stats().commits).toBe(1);
  });

  it('captures only the participants touched in the unit, once each', () => {
    tx.run(() => {
      a.add('x', 1n);
      a.add('y', 2n);
    });
    expect(a.captures).toBe(1);
    expect(b.captures).toBe(0);
  });

  it('touching outside a unit captures nothing', () => {
    a.add('x', 1n);
    expect(a.captures).toBe(0);
  });

  it('ignores touches of participants that are not enlisted', () => {
    let captured = false;
    const stray: Participant = {
      capture: () => {
        captured = true;
        return () => undefined;
      },
    };
    tx.run(() => tx.touch(stray));
    expect(captured).toBe(false);
  });

  it('captures again in the next unit', () => {
    tx.run(() => a.add('x', 1n));
    tx.run(() => a.add('y', 1n));
    expect(a.captures).toBe(2);
  });

  it('restores a participant touched only in a nested run', () => {
    expect(() =>
      tx.run(() => {
        tx.run(() => b.add('inner', 4n));
        throw new Error('outer failed');
      }),
    ).toThrow('outer failed');
    expect(b.state.value).toBe(0n);
  });

  it('active reflects whether a unit is open', () => {
    expect(tx.active).toBe(false);
    tx.run(() => {
      expect(tx.active).toBe(true);
    });
    expect(tx.active).toBe(false);
  });

  it('drops participants enlisted inside a rolled-back unit', () => {
    expect(() =>
      tx.run(() => {
        new Counter(tx);
        throw new Error('abort');
      }),
    ).toThrow('abort');
    expect(tx.stats().participants).toBe(2);
  });

  it('keeps participants enlisted inside a committed unit', () => {
    tx.run(() => {
      new Counter(tx);
    });
    expect(tx.stats().participants).toBe(3);
  });

  it('enlist returns a function that removes the participant', () => {
    const remove = tx.enlist({ capture: () => () => undefined });
    expect(tx.stats().participants).toBe(3);
    remove();
    expect(tx.stats().participants).toBe(2);
  });
});

describe('Transactor.afterCommit', () => {
  it('runs callbacks after the outermost unit commits, in order', () => {
    const tx = new Transactor();
    const seen: string[] = [];
    tx.run(() => {
      tx.afterCommit(() => seen.push('first'));
      tx.run(() => tx.afterCommit(() => seen.push('nested')));
      seen.push('body');
    });
    expect(seen).toEqual(['body', 'first', 'nested']);
  });

  it('discards callbacks of a rolled-back unit', () => {
    const tx = new Transactor();
    const seen: string[] = [];
    expect(() =>
      tx.run(() => {
        tx.afterCommit(() => seen.push('never'));
        throw new Error('abort');
      }),
    ).toThrow('abort');
    tx.run(() => undefined);
    expect(seen).toEqual([]);
  });

  it('runs immediately outside a unit', () => {
    const tx = new Transactor();
    const seen: string[] = [];
    tx.afterCommit(() => seen.push('now'));
    expect(seen).toEqual(['now']);
  });

  it('runs callbacks once the unit has closed', () => {
    const tx = new Transactor();
    const seen: boolean[] = [];
    tx.run(() => tx.afterCommit(() => seen.push(tx.active)));
    expect(seen).toEqual([false]);
  });

  it('logs a failing callback, runs the rest and still returns the result', () => {
    const entries: LogEntry[] = [];
    const tx = new Transactor({ logger: createLogger({ component: 'backstop', output: (e) => entries.push(e) }) });
    const seen: string[] = [];

    const result = tx.run(() => {
      tx.afterCommit(() => {
        throw new Error('listener failed');
      });
      tx.afterCommit(() => seen.push('second'));
      return 42;
    });

    expect(result).toBe(42);
    expect(seen).toEqual(['second']);
    expect(tx.stats()).toMatchObject({ commits: 1, rollbacks: 0, failedCallbacks: 1 });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'ERROR',
      message: 'post-commit callback failed',
      component: 'backstop.transactor',
      error: { name: 'Error', message: 'listener failed' },
    });
  });

  it('isolates a failing callback outside a unit too', () => {
    const tx = new Transactor({ logger: createLogger({ level: LogLevel.SILENT }) });
    expect(() =>
      tx.afterCommit(() => {
        throw new Error('listener failed');
      }),
    ).not.toThrow();
    expect(tx.stats().failedCallbacks).toBe(1);
  });

  it('lets a callback open a unit of its own', () => {
    const tx = new Transactor();
    const counter = new Counter(tx);
    tx.run(() => {
      counter.add('first', 1n);
      tx.afterCommit(() => {
        tx.run(() => counter.add('follow-up', 2n));
      });
    });
    expect(counter.state.value).toBe(3n);
    expect(tx.stats().commits).toBe(2);
  });
});
