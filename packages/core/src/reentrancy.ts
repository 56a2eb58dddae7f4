import { BackstopErrorCode, StateError } from '@backstop/types';

/**
 * Rejects nested entry into any guarded operation of one component
 * instance. A transfer hook that calls back into the pool while the pool
 * is settling liability is refused rather than allowed to spend the same
 * locked stake twice.
 */
export class ReentrancyGuard {
  private readonly owner: string;
  private entered: string | undefined;

  constructor(owner: string) {
    this.owner = owner;
  }

  /** Name of the operation currently executing, if any. */
  get current(): string | undefined {
    return this.entered;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.entered !== undefined) {
      throw new StateError(
        BackstopErrorCode.REENTRANT_CALL,
        `${operation} re-entered ${this.owner} while ${this.entered} was executing`,
        { context: { owner: this.owner, operation, executing: this.entered } },
      );
    }
    this.entered = operation;
    try {
      return fn();
    } finally {
      this.entered = undefined;
    }
  }
}
