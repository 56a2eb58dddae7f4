/**
 * Per-venue guarantee engine: monthly revenue reports, the liability
 * trigger into the underwriter pool, and escrow of the underwriting fee.
 *
 * @packageDocumentation
 */

import { ReentrancyGuard, snapshotParticipant } from '@backstop/core';
import type { BackstopEventEmitter, Clock, Participant, Transactor } from '@backstop/core';
import { requireTransfer } from '@backstop/collateral';
import type { CollateralAsset } from '@backstop/collateral';
import type { ProtocolConfig } from '@backstop/config';
import type { SettlementResult, UnderwriterPool } from '@backstop/pool';
import type { RevenueVault, VenueRegistry } from '@backstop/venue';
import {
  AuthorizationError,
  BPS_DENOMINATOR,
  BackstopErrorCode,
  InsufficientResourceError,
  NoShortfallError,
  NotFoundError,
  NotVenueOwnerError,
  StateError,
  ValidationError,
  isBackstopError,
  silentLogger,
  validateIdentity,
  validateIntegerRange,
  validatePositiveAmount,
} from '@backstop/types';
import type { AccountId, Amount, Logger, UnixSeconds, VenueId } from '@backstop/types';

import { RoleBook } from './access';
import type { RoleConfig } from './access';
import { EngineStatus } from './types';
import type { EngineUnderwriter, FeePayment, MonthlyReport, PerformanceSummary } from './types';

/** What the engine needs from the pool. */
export type LiabilityPool = Pick<UnderwriterPool, 'settleLiability' | 'isRegistered'>;

export interface VenueGuaranteeEngineOptions {
  venueId: VenueId;
  /** The engine's own account: holds the fee escrow and is bound in the pool. */
  address: AccountId;
  roles: RoleConfig;
  registry: VenueRegistry;
  vault: RevenueVault;
  pool: LiabilityPool;
  asset: CollateralAsset;
  transactor: Transactor;
  clock: Clock;
  config: ProtocolConfig;
  events?: BackstopEventEmitter;
  logger?: Logger;
}

interface EngineState {
  currentMonth: number;
  reports: Map<number, MonthlyReport>;
  totalExpected: Amount;
  totalCollected: Amount;
  totalLiabilityPaid: Amount;
  ownerDeposits: Map<number, Amount>;
  /** Insertion order is roster order. */
  underwriters: Map<AccountId, EngineUnderwriter>;
  totalStake: Amount;
  fee: Amount;
  escrowDeposited: Amount;
  escrowBalance: Amount;
  feesDistributed: boolean;
  startedAt: UnixSeconds | undefined;
}

const MAX_MONTH = 1_200;

export class VenueGuaranteeEngine {
  readonly venueId: VenueId;
  readonly address: AccountId;

  private readonly roles: RoleBook;
  private readonly registry: VenueRegistry;
  private readonly vault: RevenueVault;
  private readonly pool: LiabilityPool;
  private readonly asset: CollateralAsset;
  private readonly transactor: Transactor;
  private readonly clock: Clock;
  private readonly config: ProtocolConfig;
  private readonly events: BackstopEventEmitter | undefined;
  private readonly logger: Logger;
  private readonly guard: ReentrancyGuard;
  private readonly participant: Participant;
  private state: EngineState = {
    currentMonth: 1,
    reports: new Map(),
    totalExpected: 0n,
    totalCollected: 0n,
    totalLiabilityPaid: 0n,
    ownerDeposits: new Map(),
    underwriters: new Map(),
    totalStake: 0n,
    fee: 0n,
    escrowDeposited: 0n,
    escrowBalance: 0n,
    feesDistributed: false,
    startedAt: undefined,
  };

  constructor(options: VenueGuaranteeEngineOptions) {
    validateIdentity(options.venueId, 'venueId');
    validateIdentity(options.address, 'address');
    this.venueId = options.venueId;
    this.address = options.address;
    this.roles = new RoleBook(options.roles, options.transactor);
    this.registry = options.registry;
    this.vault = options.vault;
    this.pool = options.pool;
    this.asset = options.asset;
    this.transactor = options.transactor;
    this.clock = options.clock;
    this.config = options.config;
    this.events = options.events;
    this.logger = (options.logger ?? silentLogger).child(`engine.${options.venueId}`, { venueId: options.venueId });
    this.guard = new ReentrancyGuard(`engine ${options.address}`);

    this.participant = snapshotParticipant(
      () => this.state,
      (saved) => {
        this.state = saved;
      },
    );
    options.transactor.enlist(this.participant);
  }

  // ── Roles ───────────────────────────────────────────────────────────────────

  addOperator(caller: AccountId, op: AccountId): boolean {
    return this.execute('addOperator', () => {
      this.roles.requireAdmin(caller, 'add operators');
      return this.roles.add(op);
    });
  }

  removeOperator(caller: AccountId, op: AccountId): boolean {
    return this.execute('removeOperator', () => {
      this.roles.requireAdmin(caller, 'remove operators');
      return this.roles.remove(op);
    });
  }

  // ── Roster and escrow ───────────────────────────────────────────────────────

  setFeeAmount(caller: AccountId, amount: Amount): void {
    this.execute('setFeeAmount', () => {
      this.requireOwner(caller);
      validatePositiveAmount(amount, 'amount');
      if (this.state.escrowDeposited > 0n) {
        throw new StateError(BackstopErrorCode.INVALID_STATE, 'The fee cannot change once escrow is deposited', {
          context: { venueId: this.venueId },
        });
      }
      this.state.fee = amount;
      this.transactor.afterCommit(() => {
        this.logger.debug('fee set', { amount });
      });
    });
  }

  addUnderwriter(caller: AccountId, underwriter: AccountId, stake: Amount): EngineUnderwriter {
    return this.execute('addUnderwriter', () => {
      this.roles.requireOperator(caller, 'add underwriters');
      validateIdentity(underwriter, 'underwriter');
      validatePositiveAmount(stake, 'stake');
      if (this.state.escrowDeposited > 0n) {
        throw new StateError(BackstopErrorCode.INVALID_STATE, 'The roster is frozen once escrow is deposited', {
          context: { venueId: this.venueId },
        });
      }
      if (!this.pool.isRegistered(underwriter)) {
        throw new AuthorizationError(
          `${underwriter} is not registered in the underwriter pool`,
          { context: { underwriter } },
          BackstopErrorCode.NOT_REGISTERED,
        );
      }
      if (this.state.underwriters.has(underwriter)) {
        throw new StateError(BackstopErrorCode.ALREADY_ON_ROSTER, `${underwriter} is already on the roster`, {
          context: { venueId: this.venueId, underwriter },
        });
      }

      const entry: EngineUnderwriter = { address: underwriter, stake, approved: true, feeClaimed: false };
      this.state.underwriters.set(underwriter, entry);
      this.state.totalStake += stake;
      this.transactor.afterCommit(() => {
        this.logger.debug('underwriter added', { underwriter, stake });
      });
      return { ...entry };
    });
  }

  /** Approve or suspend a roster member's fee entitlement. */
  setApproval(caller: AccountId, underwriter: AccountId, approved: boolean): void {
    this.execute('setApproval', () => {
      this.roles.requireOperator(caller, 'approve underwriters');
      this.requireNotDistributed();
      const entry = this.requireRosterEntry(underwriter);
      entry.approved = approved;
    });
  }

  depositFee(caller: AccountId): Amount {
    return this.execute('depositFee', () => {
      const owner = this.requireOwner(caller);
      const fee = this.state.fee;
      if (fee === 0n) {
        throw new ValidationError('Set the fee amount before depositing it', 'fee', BackstopErrorCode.ZERO_AMOUNT);
      }
      if (this.state.underwriters.size === 0) {
        throw new StateError(BackstopErrorCode.INVALID_STATE, 'The underwriter roster is empty', {
          context: { venueId: this.venueId },
        });
      }
      if (this.state.escrowDeposited > 0n) {
        throw new StateError(BackstopErrorCode.INVALID_STATE, 'Escrow has already been deposited', {
          context: { venueId: this.venueId },
        });
      }

      this.state.escrowDeposited = fee;
      this.state.escrowBalance = fee;
      this.state.startedAt = this.clock.now();
      requireTransfer(this.asset.transferFrom(this.address, owner, this.address, fee), {
        from: owner,
        to: this.address,
        amount: fee,
      });

      this.transactor.afterCommit(() => {
        this.logger.info('fee deposited', { amount: fee });
        this.events?.emit('engine:fee-deposited', { venueId: this.venueId, amount: fee });
      });
      return fee;
    });
  }

  // ── Reporting and liability ─────────────────────────────────────────────────

  submitMonthlyReport(caller: AccountId, actualRevenue: Amount): MonthlyReport {
    return this.execute('submitMonthlyReport', () => {
      this.roles.requireOperator(caller, 'submit reports');
      if (actualRevenue < 0n) {
        throw new ValidationError('actualRevenue must be a non-negative integer amount', 'actualRevenue', BackstopErrorCode.INVALID_AMOUNT);
      }
      this.requireNotDistributed();

      const expectedRevenue = this.vault.promisedRevenue();
      const missingRevenue = expectedRevenue > actualRevenue ? expectedRevenue - actualRevenue : 0n;
      const report: MonthlyReport = {
        month: this.state.currentMonth,
        expectedRevenue,
        actualRevenue,
        missingRevenue,
        liabilityPaid: false,
        timestamp: this.clock.now(),
      };
      this.state.reports.set(report.month, report);
      this.state.totalExpected += expectedRevenue;
      this.state.totalCollected += actualRevenue;
      this.state.currentMonth += 1;

      const event = { venueId: this.venueId, month: report.month, expectedRevenue, actualRevenue, missingRevenue };
      this.transactor.afterCommit(() => {
        this.logger.info('report submitted', event);
        this.events?.emit('engine:report-submitted', event);
      });
      return { ...report };
    });
  }

  /** Settle the shortfall of one reported month against the pool. */
  processLiability(caller: AccountId, month: number): SettlementResult {
    return this.execute('processLiability', () => {
      this.roles.requireOperator(caller, 'process liability');
      const report = this.state.reports.get(month);
      if (!report) {
        throw new NotFoundError(BackstopErrorCode.REPORT_NOT_FOUND, `No report for month ${month}`, {
          context: { venueId: this.venueId, month },
        });
      }
      this.requireNotDistributed();
      if (report.missingRevenue === 0n) {
        throw new NoShortfallError(month);
      }
      if (report.liabilityPaid) {
        throw new StateError(BackstopErrorCode.ALREADY_SETTLED, `Liability for month ${month} was already paid`, {
          context: { venueId: this.venueId, month },
        });
      }

      report.liabilityPaid = true;
      this.state.totalLiabilityPaid += report.missingRevenue;
      const settlement = this.pool.settleLiability(this.address, this.venueId, report.missingRevenue);

      const amount = report.missingRevenue;
      this.transactor.afterCommit(() => {
        this.logger.info('liability processed', { month, amount, residual: settlement.residual });
        this.events?.emit('engine:liability-processed', { venueId: this.venueId, month, amount });
      });
      return settlement;
    });
  }

  /**
   * Move revenue from the owner into the vault. Deposits are kept per month
   * and are not reconciled against reports.
   */
  ownerDepositRevenue(caller: AccountId, month: number, amount: Amount): void {
    this.execute('ownerDepositRevenue', () => {
      const owner = this.requireOwner(caller);
      validateIntegerRange(month, 1, MAX_MONTH, 'month');
      validatePositiveAmount(amount, 'amount');

      this.state.ownerDeposits.set(month, (this.state.ownerDeposits.get(month) ?? 0n) + amount);
      requireTransfer(this.asset.transferFrom(this.address, owner, this.vault.address, amount), {
        from: owner,
        to: this.vault.address,
        amount,
      });

      this.transactor.afterCommit(() => {
        this.logger.info('revenue deposited', { month, amount });
        this.events?.emit('engine:revenue-deposited', { venueId: this.venueId, month, amount });
      });
    });
  }

  // ── Fees ────────────────────────────────────────────────────────────────────

  /** Pay every approved, unpaid roster member. One-shot. */
  distributeFees(caller: AccountId): FeePayment[] {
    return this.execute('distributeFees', () => {
      this.roles.requireOperator(caller, 'distribute fees');
      this.requireNotDistributed();
      if (this.state.escrowBalance === 0n) {
        throw new InsufficientResourceError(BackstopErrorCode.EMPTY_ESCROW, 'The fee escrow is empty', {
          context: { venueId: this.venueId },
        });
      }

      const payments: FeePayment[] = [];
      for (const entry of this.state.underwriters.values()) {
        if (entry.approved && !entry.feeClaimed) {
          payments.push(this.payFee(entry));
        }
      }
      this.state.feesDistributed = true;

      const recipients = payments.length;
      this.transactor.afterCommit(() => {
        this.logger.info('fees distributed', { recipients, escrowBalance: this.state.escrowBalance });
        this.events?.emit('engine:fees-distributed', { venueId: this.venueId, recipients });
      });
      return payments;
    });
  }

  /** Self-service fee claim for an approved roster member after maturity. */
  claimFee(caller: AccountId): FeePayment {
    return this.execute('claimFee', () => {
      const entry = this.state.underwriters.get(caller);
      if (!entry || !entry.approved) {
        throw new AuthorizationError(`${caller} is not an approved underwriter of venue ${this.venueId}`, {
          context: { venueId: this.venueId, caller },
        });
      }
      if (!this.hasMatured()) {
        throw new StateError(BackstopErrorCode.NOT_MATURED, `Venue ${this.venueId} has not matured`, {
          context: { venueId: this.venueId, now: this.clock.now() },
        });
      }
      if (entry.feeClaimed) {
        throw new StateError(BackstopErrorCode.ALREADY_CLAIMED, `${caller} already claimed the fee`, {
          context: { venueId: this.venueId, underwriter: caller },
        });
      }

      const payment = this.payFee(entry);
      const remaining = [...this.state.underwriters.values()].some((u) => u.approved && !u.feeClaimed);
      if (!remaining) {
        this.state.feesDistributed = true;
      }
      return payment;
    });
  }

  // ── Queries ─────────────────────────────────────────────────────────────────

  getPerformanceSummary(): PerformanceSummary {
    const { totalExpected, totalCollected, totalLiabilityPaid } = this.state;
    return { totalExpected, totalCollected, shortfall: totalExpected - totalCollected, totalLiabilityPaid };
  }

  getReport(month: number): MonthlyReport | undefined {
    const report = this.state.reports.get(month);
    return report ? { ...report } : undefined;
  }

  getReports(): MonthlyReport[] {
    return [...this.state.reports.values()].map((r) => ({ ...r }));
  }

  getUnderwriters(): EngineUnderwriter[] {
    return [...this.state.underwriters.values()].map((u) => ({ ...u }));
  }

  getStatus(): EngineStatus {
    if (this.state.feesDistributed) return EngineStatus.FeesDistributed;
    if (this.state.startedAt === undefined) return EngineStatus.Assembling;
    return this.hasMatured() ? EngineStatus.Matured : EngineStatus.Reporting;
  }

  /** Whether the contract period, counted from the escrow deposit, has elapsed. */
  hasMatured(): boolean {
    const startedAt = this.state.startedAt;
    if (startedAt === undefined) return false;
    return this.clock.now() >= startedAt + this.duration();
  }

  /** Contract length in seconds. */
  duration(): number {
    return this.vault.totalMonths() * this.config.periodSeconds;
  }

  isOperator(id: AccountId): boolean {
    return this.roles.isOperator(id);
  }

  get admin(): AccountId {
    return this.roles.admin;
  }

  get currentMonth(): number {
    return this.state.currentMonth;
  }

  get fee(): Amount {
    return this.state.fee;
  }

  get feesDistributed(): boolean {
    return this.state.feesDistributed;
  }

  get totalStake(): Amount {
    return this.state.totalStake;
  }

  getEscrowBalance(): Amount {
    return this.state.escrowBalance;
  }

  getEscrowDeposited(): Amount {
    return this.state.escrowDeposited;
  }

  getOwnerDeposits(): Map<number, Amount> {
    return new Map(this.state.ownerDeposits);
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private payFee(entry: EngineUnderwriter): FeePayment {
    const gross = (this.state.escrowDeposited * entry.stake) / this.state.totalStake;
    const protocolCut = (gross * BigInt(this.config.protocolFeeBps)) / BPS_DENOMINATOR;
    const payout = gross - protocolCut;
    if (gross > this.state.escrowBalance) {
      throw new InsufficientResourceError(
        BackstopErrorCode.EMPTY_ESCROW,
        `Escrow holds ${this.state.escrowBalance} but ${gross} is owed to ${entry.address}`,
        { context: { venueId: this.venueId, underwriter: entry.address } },
      );
    }

    entry.feeClaimed = true;
    this.state.escrowBalance -= gross;

    const treasury = this.config.treasury;
    if (protocolCut > 0n) {
      requireTransfer(this.asset.transfer(this.address, treasury, protocolCut), {
        from: this.address,
        to: treasury,
        amount: protocolCut,
      });
    }
    if (payout > 0n) {
      requireTransfer(this.asset.transfer(this.address, entry.address, payout), {
        from: this.address,
        to: entry.address,
        amount: payout,
      });
    }

    const underwriter = entry.address;
    this.transactor.afterCommit(() => {
      this.logger.info('fee paid', { underwriter, payout, protocolCut });
      this.events?.emit('engine:fee-paid', { venueId: this.venueId, underwriter, payout, protocolCut });
    });
    return { underwriter, gross, protocolCut, payout };
  }

  private execute<T>(operation: string, fn: () => T): T {
    try {
      return this.transactor.run(() => {
        this.transactor.touch(this.participant);
        return this.guard.run(operation, fn);
      });
    } catch (error) {
      if (isBackstopError(error)) {
        this.logger.warn('operation rejected', { operation, error });
      }
      throw error;
    }
  }

  private requireOwner(caller: AccountId): AccountId {
    const owner = this.registry.ownerOf(this.venueId);
    if (caller !== owner) {
      throw new NotVenueOwnerError(this.venueId, caller);
    }
    return owner;
  }

  private requireNotDistributed(): void {
    if (this.state.feesDistributed) {
      throw new StateError(BackstopErrorCode.ALREADY_DISTRIBUTED, `Fees of venue ${this.venueId} were already distributed`, {
        context: { venueId: this.venueId },
      });
    }
  }

  private requireRosterEntry(underwriter: AccountId): EngineUnderwriter {
    const entry = this.state.underwriters.get(underwriter);
    if (!entry) {
      throw new NotFoundError(BackstopErrorCode.UNDERWRITER_NOT_FOUND, `${underwriter} is not on the roster`, {
        context: { venueId: this.venueId, underwriter },
      });
    }
    return entry;
  }
}
