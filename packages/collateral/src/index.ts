/**
 * @backstop/collateral -- the fungible collateral asset.
 *
 * The protocol only sees the {@link CollateralAsset} interface. Every
 * transfer reports success as a boolean and callers must check it through
 * {@link requireTransfer}. {@link InMemoryCollateralToken} is the in-process
 * implementation used by the composition root and the tests.
 *
 * @packageDocumentation
 */

import { snapshotParticipant } from '@backstop/core';
import type { Participant, Transactor } from '@backstop/core';
import { TransferError, validateIdentity, validateNonNegativeAmount } from '@backstop/types';
import type { AccountId, Amount } from '@backstop/types';

// ─── Interface ──────────────────────────────────────────────────────────────────

/** Transfer primitive of the collateral asset. */
export interface CollateralAsset {
  balanceOf(account: AccountId): Amount;
  allowance(owner: AccountId, spender: AccountId): Amount;
  /** Let `spender` move up to `amount` of `owner`'s balance. */
  approve(owner: AccountId, spender: AccountId, amount: Amount): boolean;
  /** Move `amount` from `from` (the caller) to `to`. */
  transfer(from: AccountId, to: AccountId, amount: Amount): boolean;
  /** Move `amount` from `from` to `to` on `spender`'s allowance. */
  transferFrom(spender: AccountId, from: AccountId, to: AccountId, amount: Amount): boolean;
}

/** A completed transfer, as seen by transfer hooks. */
export interface TransferRecord {
  from: AccountId;
  to: AccountId;
  amount: Amount;
}

/** Called after every successful transfer; may call back into the protocol. */
export type TransferHook = (transfer: TransferRecord) => void;

/**
 * Throw a {@link TransferError} unless the asset reported success.
 *
 * @example
 * ```typescript
 * requireTransfer(asset.transfer(pool, vault, share), { from: pool, to: vault, amount: share });
 * ```
 */
export function requireTransfer(ok: boolean, transfer: TransferRecord): void {
  if (!ok) {
    throw new TransferError(
      `Transfer of ${transfer.amount} from ${transfer.from} to ${transfer.to} failed`,
      { context: { from: transfer.from, to: transfer.to, amount: transfer.amount.toString() } },
    );
  }
}

// ─── In-memory token ────────────────────────────────────────────────────────────

interface TokenState {
  balances: Map<AccountId, Amount>;
  allowances: Map<AccountId, Map<AccountId, Amount>>;
  frozen: Set<AccountId>;
  totalSupply: Amount;
}

/**
 * Minimal fungible token. Failed transfers return `false` and change
 * nothing. Frozen accounts can neither send nor receive, which lets tests
 * force a transfer failure at any leg of a call chain.
 */
export class InMemoryCollateralToken implements CollateralAsset {
  private state: TokenState = {
    balances: new Map(),
    allowances: new Map(),
    frozen: new Set(),
    totalSupply: 0n,
  };
  private readonly hooks: TransferHook[] = [];
  private readonly transactor: Transactor | undefined;
  private readonly participant: Participant = snapshotParticipant(
    () => this.state,
    (saved) => {
      this.state = saved;
    },
  );

  constructor(transactor?: Transactor) {
    this.transactor = transactor;
    transactor?.enlist(this.participant);
  }

  get totalSupply(): Amount {
    return this.state.totalSupply;
  }

  mint(to: AccountId, amount: Amount): void {
    validateIdentity(to, 'to');
    validateNonNegativeAmount(amount, 'amount');
    this.touch();
    this.state.balances.set(to, this.balanceOf(to) + amount);
    this.state.totalSupply += amount;
  }

  balanceOf(account: AccountId): Amount {
    return this.state.balances.get(account) ?? 0n;
  }

  allowance(owner: AccountId, spender: AccountId): Amount {
    return this.state.allowances.get(owner)?.get(spender) ?? 0n;
  }

  approve(owner: AccountId, spender: AccountId, amount: Amount): boolean {
    if (amount < 0n) return false;
    this.touch();
    let byOwner = this.state.allowances.get(owner);
    if (!byOwner) {
      byOwner = new Map();
      this.state.allowances.set(owner, byOwner);
    }
    byOwner.set(spender, amount);
    return true;
  }

  transfer(from: AccountId, to: AccountId, amount: Amount): boolean {
    return this.move(from, to, amount);
  }

  transferFrom(spender: AccountId, from: AccountId, to: AccountId, amount: Amount): boolean {
    const allowed = this.allowance(from, spender);
    if (spender !== from && allowed < amount) return false;
    if (!this.move(from, to, amount)) return false;
    if (spender !== from) {
      this.approve(from, spender, allowed - amount);
    }
    return true;
  }

  /** Block all transfers into or out of `account`. */
  freeze(account: AccountId): void {
    this.touch();
    this.state.frozen.add(account);
  }

  unfreeze(account: AccountId): void {
    this.touch();
    this.state.frozen.delete(account);
  }

  /** Register a hook run after each successful transfer. Returns a remover. */
  onTransfer(hook: TransferHook): () => void {
    this.hooks.push(hook);
    return () => {
      const idx = this.hooks.indexOf(hook);
      if (idx !== -1) this.hooks.splice(idx, 1);
    };
  }

  private move(from: AccountId, to: AccountId, amount: Amount): boolean {
    if (amount < 0n || from === '' || to === '') return false;
    if (this.state.frozen.has(from) || this.state.frozen.has(to)) return false;
    const balance = this.balanceOf(from);
    if (balance < amount) return false;

    this.touch();
    this.state.balances.set(from, balance - amount);
    this.state.balances.set(to, this.balanceOf(to) + amount);

    for (const hook of [...this.hooks]) {
      hook({ from, to, amount });
    }
    return true;
  }

  private touch(): void {
    this.transactor?.touch(this.participant);
  }
}
