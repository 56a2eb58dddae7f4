import type { UnixSeconds } from '@backstop/types';

/** Source of the current time. Maturity is always evaluated against it at call time. */
export interface Clock {
  now(): UnixSeconds;
}

/** Wall-clock time in whole seconds. */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  private current: UnixSeconds;

  constructor(start: UnixSeconds = 0) {
    this.current = start;
  }

  now(): UnixSeconds {
    return this.current;
  }

  advance(seconds: number): UnixSeconds {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new RangeError(`Cannot advance clock by ${seconds}`);
    }
    this.current += seconds;
    return this.current;
  }

  set(time: UnixSeconds): void {
    if (time < this.current) {
      throw new RangeError(`Clock cannot move backwards from ${this.current} to ${time}`);
    }
    this.current = time;
  }
}
