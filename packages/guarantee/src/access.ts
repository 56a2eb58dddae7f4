import { snapshotParticipant } from '@backstop/core';
import type { Participant, Transactor } from '@backstop/core';
import { AuthorizationError, BackstopErrorCode, ValidationError, validateIdentity } from '@backstop/types';
import type { AccountId } from '@backstop/types';

/** Who may administer and operate one guarantee engine. */
export interface RoleConfig {
  /** Fixed for the engine's lifetime; always holds the operator role. */
  readonly admin: AccountId;
  readonly operators: readonly AccountId[];
}

/**
 * Operator membership for one engine. The admin is fixed at construction
 * and is always an operator.
 */
export class RoleBook {
  readonly admin: AccountId;
  private operators: Set<AccountId>;
  private readonly transactor: Transactor;
  private readonly participant: Participant;

  constructor(roles: RoleConfig, transactor: Transactor) {
    validateIdentity(roles.admin, 'admin');
    for (const op of roles.operators) validateIdentity(op, 'operator');
    this.admin = roles.admin;
    this.operators = new Set([roles.admin, ...roles.operators]);
    this.transactor = transactor;
    this.participant = snapshotParticipant(
      () => this.operators,
      (saved) => {
        this.operators = saved;
      },
    );
    transactor.enlist(this.participant);
  }

  isOperator(id: AccountId): boolean {
    return this.operators.has(id);
  }

  list(): AccountId[] {
    return [...this.operators];
  }

  /** @throws {AuthorizationError} Unless `caller` is the admin. */
  requireAdmin(caller: AccountId, action: string): void {
    if (caller !== this.admin) {
      throw new AuthorizationError(`${caller} is not the admin and cannot ${action}`, { context: { caller, action } });
    }
  }

  /** @throws {AuthorizationError} Unless `caller` holds the operator role. */
  requireOperator(caller: AccountId, action: string): void {
    if (!this.operators.has(caller)) {
      throw new AuthorizationError(`${caller} is not an operator and cannot ${action}`, {
        context: { caller, action },
      });
    }
  }

  /** Returns `false` when `op` already was an operator. */
  add(op: AccountId): boolean {
    validateIdentity(op, 'operator');
    if (this.operators.has(op)) return false;
    this.transactor.touch(this.participant);
    this.operators.add(op);
    return true;
  }

  /**
   * Returns `false` when `op` was not an operator.
   *
   * @throws {ValidationError} When asked to remove the admin.
   */
  remove(op: AccountId): boolean {
    if (op === this.admin) {
      throw new ValidationError('The admin cannot be removed from the operators', 'operator', BackstopErrorCode.INVALID_INPUT);
    }
    this.transactor.touch(this.participant);
    return this.operators.delete(op);
  }
}
