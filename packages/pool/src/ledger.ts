/**
 * The underwriter pool: custody of all stake, per-venue locking, liability
 * settlement into venue vaults and release of stake with the assignment fee
 * at maturity.
 *
 * Every state-changing operation runs inside the pool's re-entrancy guard
 * and one unit of work; a failed transfer anywhere in the chain leaves
 * balances, stakes and assignments exactly as they were.
 *
 * @packageDocumentation
 */

import { ReentrancyGuard, snapshotParticipant } from '@backstop/core';
import type { BackstopEventEmitter, Clock, Participant, Transactor, UnderwriterAmount } from '@backstop/core';
import { requireTransfer } from '@backstop/collateral';
import type { CollateralAsset } from '@backstop/collateral';
import type { ProtocolConfig } from '@backstop/config';
import type { VenueRegistry } from '@backstop/venue';
import {
  AuthorizationError,
  BPS_DENOMINATOR,
  BackstopErrorCode,
  InsufficientResourceError,
  NotFoundError,
  NotVenueOwnerError,
  StateError,
  ValidationError,
  isBackstopError,
  silentLogger,
  validateIdentity,
  validateNonNegativeAmount,
  validatePositiveAmount,
} from '@backstop/types';
import type { AccountId, Amount, Logger, VenueId } from '@backstop/types';

import { AssignmentTable } from './assignment';
import type {
  Commitment,
  FeeClaimResult,
  SettlementResult,
  StakeRequest,
  UnderwriterRecord,
  VenueAssignment,
} from './types';

export interface UnderwriterPoolOptions {
  /** The pool's own account on the collateral asset. */
  address: AccountId;
  asset: CollateralAsset;
  registry: VenueRegistry;
  transactor: Transactor;
  config: ProtocolConfig;
  clock: Clock;
  events?: BackstopEventEmitter;
  logger?: Logger;
}

interface LedgerState {
  underwriters: Map<AccountId, UnderwriterRecord>;
  engines: Map<VenueId, AccountId>;
}

export class UnderwriterPool {
  readonly address: AccountId;

  private readonly asset: CollateralAsset;
  private readonly registry: VenueRegistry;
  private readonly transactor: Transactor;
  private readonly config: ProtocolConfig;
  private readonly clock: Clock;
  private readonly events: BackstopEventEmitter | undefined;
  private readonly logger: Logger;
  private readonly guard: ReentrancyGuard;
  private readonly assignments: AssignmentTable;
  private readonly participant: Participant;
  private state: LedgerState = { underwriters: new Map(), engines: new Map() };

  constructor(options: UnderwriterPoolOptions) {
    validateIdentity(options.address, 'address');
    this.address = options.address;
    this.asset = options.asset;
    this.registry = options.registry;
    this.transactor = options.transactor;
    this.config = options.config;
    this.clock = options.clock;
    this.events = options.events;
    this.logger = (options.logger ?? silentLogger).child('pool');
    this.guard = new ReentrancyGuard(`pool ${options.address}`);
    this.assignments = new AssignmentTable(options.transactor);

    this.participant = snapshotParticipant(
      () => this.state,
      (saved) => {
        this.state = saved;
      },
    );
    options.transactor.enlist(this.participant);
  }

  // ── Stake ───────────────────────────────────────────────────────────────────

  /**
   * Deposit stake. The pool pulls `amount` from `caller`, which must have
   * approved the pool on the collateral asset.
   */
  register(caller: AccountId, amount: Amount): UnderwriterRecord {
    return this.execute('register', () => {
      validateIdentity(caller, 'caller');
      validatePositiveAmount(amount, 'amount');

      const record = this.state.underwriters.get(caller) ?? { totalStake: 0n, availableStake: 0n, lockedStake: 0n };
      record.totalStake += amount;
      record.availableStake += amount;
      this.state.underwriters.set(caller, record);

      requireTransfer(this.asset.transferFrom(this.address, caller, this.address, amount), {
        from: caller,
        to: this.address,
        amount,
      });

      const totalStake = record.totalStake;
      this.transactor.afterCommit(() => {
        this.logger.info('stake registered', { underwriter: caller, amount, totalStake });
        this.events?.emit('stake:registered', { underwriter: caller, amount, totalStake });
      });
      return { ...record };
    });
  }

  /** Pay available stake back to the underwriter. */
  withdraw(caller: AccountId, amount: Amount): UnderwriterRecord {
    return this.execute('withdraw', () => {
      validatePositiveAmount(amount, 'amount');
      const record = this.requireUnderwriter(caller);
      if (amount > record.availableStake) {
        throw new InsufficientResourceError(
          BackstopErrorCode.INSUFFICIENT_STAKE,
          `${caller} has ${record.availableStake} available but asked to withdraw ${amount}`,
          { context: { underwriter: caller, available: record.availableStake.toString(), requested: amount.toString() } },
        );
      }

      record.totalStake -= amount;
      record.availableStake -= amount;
      requireTransfer(this.asset.transfer(this.address, caller, amount), { from: this.address, to: caller, amount });

      const totalStake = record.totalStake;
      this.transactor.afterCommit(() => {
        this.logger.info('stake withdrawn', { underwriter: caller, amount, totalStake });
        this.events?.emit('stake:withdrawn', { underwriter: caller, amount, totalStake });
      });
      return { ...record };
    });
  }

  // ── Assignment ──────────────────────────────────────────────────────────────

  /**
   * Lock stake from each listed underwriter behind `venueId` and escrow the
   * owner's fee in the pool. A venue is assigned at most once.
   */
  assignToVenue(caller: AccountId, venueId: VenueId, requests: readonly StakeRequest[], fee: Amount): VenueAssignment {
    return this.execute('assignToVenue', () => {
      validateIdentity(caller, 'caller');
      validateIdentity(venueId, 'venueId');
      validateNonNegativeAmount(fee, 'fee');

      if (!this.registry.venueExists(venueId)) {
        throw new NotFoundError(BackstopErrorCode.VENUE_NOT_FOUND, `Venue ${venueId} is not registered`, {
          context: { venueId },
        });
      }
      const owner = this.registry.ownerOf(venueId);
      if (caller !== owner) {
        throw new NotVenueOwnerError(venueId, caller);
      }
      if (this.assignments.has(venueId)) {
        throw new StateError(
          BackstopErrorCode.ALREADY_ASSIGNED,
          `Venue ${venueId} already has an underwriting assignment`,
          { context: { venueId } },
        );
      }
      this.validateRequests(requests);

      let aggregate = 0n;
      for (const request of requests) {
        const record = this.state.underwriters.get(request.underwriter);
        if (!record) {
          throw new AuthorizationError(
            `${request.underwriter} is not a registered underwriter`,
            { context: { underwriter: request.underwriter } },
            BackstopErrorCode.NOT_REGISTERED,
          );
        }
        if (record.availableStake < request.amount) {
          throw new InsufficientResourceError(
            BackstopErrorCode.INSUFFICIENT_STAKE,
            `${request.underwriter} has ${record.availableStake} available but ${request.amount} was requested`,
            {
              context: {
                underwriter: request.underwriter,
                available: record.availableStake.toString(),
                requested: request.amount.toString(),
              },
            },
          );
        }
        aggregate += request.amount;
      }

      const vault = this.registry.vaultOf(venueId);
      const promisedRevenue = vault.promisedRevenue();
      if (aggregate < promisedRevenue) {
        throw new InsufficientResourceError(
          BackstopErrorCode.INSUFFICIENT_COVERAGE,
          `Committed stake ${aggregate} does not cover the promised revenue ${promisedRevenue}`,
          {
            context: { venueId, committed: aggregate.toString(), promisedRevenue: promisedRevenue.toString() },
            hint: 'Add underwriters or raise the requested amounts',
          },
        );
      }

      for (const request of requests) {
        const record = this.requireUnderwriter(request.underwriter);
        record.availableStake -= request.amount;
        record.lockedStake += request.amount;
      }

      const now = this.clock.now();
      const assignment = this.assignments.create({
        venueId,
        requests,
        fee,
        promisedRevenue,
        assignedAt: now,
        endDate: now + vault.totalMonths() * this.config.periodSeconds,
      });

      if (fee > 0n) {
        requireTransfer(this.asset.transferFrom(this.address, owner, this.address, fee), {
          from: owner,
          to: this.address,
          amount: fee,
        });
      }

      const commitments: UnderwriterAmount[] = requests.map((r) => ({ underwriter: r.underwriter, amount: r.amount }));
      const { totalStakeCommitted, endDate } = assignment;
      this.transactor.afterCommit(() => {
        this.logger.info('venue assigned', { venueId, underwriters: commitments.length, totalStakeCommitted, fee });
        this.events?.emit('venue:assigned', { venueId, commitments, totalStakeCommitted, fee, endDate });
      });
      return cloneAssignment(assignment);
    });
  }

  /**
   * Authorise `engine` to settle liability for `venueId`. Each venue is
   * bound once, by the pool admin.
   */
  bindEngine(caller: AccountId, venueId: VenueId, engine: AccountId): void {
    this.execute('bindEngine', () => {
      if (caller !== this.config.poolAdmin) {
        throw new AuthorizationError(`${caller} is not the pool admin`, { context: { caller } });
      }
      validateIdentity(engine, 'engine');
      if (!this.registry.venueExists(venueId)) {
        throw new NotFoundError(BackstopErrorCode.VENUE_NOT_FOUND, `Venue ${venueId} is not registered`, {
          context: { venueId },
        });
      }
      const existing = this.state.engines.get(venueId);
      if (existing !== undefined) {
        throw new StateError(BackstopErrorCode.INVALID_STATE, `Venue ${venueId} is already bound to ${existing}`, {
          context: { venueId, engine: existing },
        });
      }
      this.state.engines.set(venueId, engine);
      this.transactor.afterCommit(() => {
        this.logger.debug('engine bound', { venueId, engine });
      });
    });
  }

  // ── Settlement ──────────────────────────────────────────────────────────────

  /**
   * Forfeit locked stake to the venue's vault in proportion to each
   * underwriter's commitment. Shares are truncated; the residue is recorded
   * on the assignment and not redistributed.
   */
  settleLiability(caller: AccountId, venueId: VenueId, missingAmount: Amount): SettlementResult {
    return this.execute('settleLiability', () => {
      const engine = this.state.engines.get(venueId);
      if (engine === undefined || caller !== engine) {
        throw new AuthorizationError(`${caller} is not the guarantee engine of venue ${venueId}`, {
          context: { venueId, caller },
        });
      }
      validatePositiveAmount(missingAmount, 'missingAmount');
      const assignment = this.assignments.get(venueId);
      if (!assignment.active) {
        throw new StateError(
          BackstopErrorCode.ASSIGNMENT_INACTIVE,
          `Assignment of venue ${venueId} is no longer active`,
          { context: { venueId } },
        );
      }
      this.assignments.track();

      const vault = this.registry.vaultAddressOf(venueId);
      const shares: UnderwriterAmount[] = [];
      let settled = 0n;

      for (const commitment of this.assignments.commitments(venueId)) {
        const share = (missingAmount * commitment.committed) / assignment.totalStakeCommitted;
        const record = this.requireUnderwriter(commitment.underwriter);
        const backing = remainingBacking(commitment);
        if (share > backing || share > record.lockedStake) {
          throw new InsufficientResourceError(
            BackstopErrorCode.INSUFFICIENT_LOCKED,
            `${commitment.underwriter} owes ${share} but has ${backing} locked behind venue ${venueId}`,
            {
              context: {
                venueId,
                underwriter: commitment.underwriter,
                share: share.toString(),
                backing: backing.toString(),
              },
            },
          );
        }

        record.lockedStake -= share;
        record.totalStake -= share;
        commitment.forfeited += share;
        settled += share;
        shares.push({ underwriter: commitment.underwriter, amount: share });

        if (share > 0n) {
          requireTransfer(this.asset.transfer(this.address, vault, share), { from: this.address, to: vault, amount: share });
        }
      }

      const residual = missingAmount - settled;
      assignment.residual += residual;

      this.transactor.afterCommit(() => {
        this.logger.info('liability settled', { venueId, vault, missingAmount, settled, residual });
        this.events?.emit('liability:settled', { venueId, vault, missingAmount, shares, residual });
      });
      return { venueId, vault, missingAmount, shares, settled, residual };
    });
  }

  /**
   * At maturity, release the caller's remaining locked stake and pay their
   * share of the assignment fee, less the protocol cut.
   */
  claimFee(caller: AccountId, venueId: VenueId): FeeClaimResult {
    return this.execute('claimFee', () => {
      const assignment = this.assignments.get(venueId);
      const commitment = this.assignments.commitment(venueId, caller);
      if (!commitment) {
        throw new AuthorizationError(`${caller} does not underwrite venue ${venueId}`, {
          context: { venueId, caller },
        });
      }
      if (commitment.claimed) {
        throw new StateError(
          BackstopErrorCode.ALREADY_CLAIMED,
          `${caller} already claimed the fee of venue ${venueId}`,
          { context: { venueId, underwriter: caller } },
        );
      }
      const now = this.clock.now();
      if (now < assignment.endDate) {
        throw new StateError(BackstopErrorCode.NOT_MATURED, `Venue ${venueId} matures at ${assignment.endDate}`, {
          context: { venueId, now, endDate: assignment.endDate },
        });
      }

      const record = this.requireUnderwriter(caller);
      this.assignments.track();
      const released = remainingBacking(commitment);
      record.lockedStake -= released;
      record.availableStake += released;

      const gross = (assignment.fee * commitment.committed) / assignment.totalStakeCommitted;
      const protocolCut = (gross * BigInt(this.config.protocolFeeBps)) / BPS_DENOMINATOR;
      const payout = gross - protocolCut;

      commitment.committed = 0n;
      commitment.claimed = true;
      if (this.assignments.commitments(venueId).every((c) => c.claimed)) {
        assignment.active = false;
      }

      const treasury = this.config.treasury;
      if (protocolCut > 0n) {
        requireTransfer(this.asset.transfer(this.address, treasury, protocolCut), {
          from: this.address,
          to: treasury,
          amount: protocolCut,
        });
      }
      if (payout > 0n) {
        requireTransfer(this.asset.transfer(this.address, caller, payout), {
          from: this.address,
          to: caller,
          amount: payout,
        });
      }

      this.transactor.afterCommit(() => {
        this.logger.info('fee claimed', { venueId, underwriter: caller, released, payout, protocolCut });
        this.events?.emit('pool:fee-claimed', { venueId, underwriter: caller, released, payout, protocolCut });
      });
      return { venueId, underwriter: caller, released, gross, protocolCut, payout };
    });
  }

  // ── Queries ─────────────────────────────────────────────────────────────────

  getUnderwriter(id: AccountId): UnderwriterRecord | undefined {
    const record = this.state.underwriters.get(id);
    return record ? { ...record } : undefined;
  }

  isRegistered(id: AccountId): boolean {
    return this.state.underwriters.has(id);
  }

  /** Stake `id` currently commits to `venueId`; zero when not on the roster. */
  stakeOf(venueId: VenueId, id: AccountId): Amount {
    return this.assignments.commitment(venueId, id)?.committed ?? 0n;
  }

  rosterOf(venueId: VenueId): AccountId[] {
    return [...(this.assignments.find(venueId)?.roster ?? [])];
  }

  getAssignment(venueId: VenueId): VenueAssignment | undefined {
    const assignment = this.assignments.find(venueId);
    return assignment ? cloneAssignment(assignment) : undefined;
  }

  getCommitment(venueId: VenueId, id: AccountId): Commitment | undefined {
    const commitment = this.assignments.commitment(venueId, id);
    return commitment ? { ...commitment } : undefined;
  }

  hasMatured(venueId: VenueId): boolean {
    const assignment = this.assignments.find(venueId);
    return assignment !== undefined && this.clock.now() >= assignment.endDate;
  }

  engineOf(venueId: VenueId): AccountId | undefined {
    return this.state.engines.get(venueId);
  }

  /** Every underwriter with a copy of their record, in registration order. */
  underwriters(): Array<{ underwriter: AccountId } & UnderwriterRecord> {
    return [...this.state.underwriters].map(([underwriter, record]) => ({ underwriter, ...record }));
  }

  // ── Internals ───────────────────────────────────────────────────────────────

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

  private requireUnderwriter(id: AccountId): UnderwriterRecord {
    const record = this.state.underwriters.get(id);
    if (!record) {
      throw new NotFoundError(BackstopErrorCode.UNDERWRITER_NOT_FOUND, `${id} is not a registered underwriter`, {
        context: { underwriter: id },
      });
    }
    return record;
  }

  private validateRequests(requests: readonly StakeRequest[]): void {
    const min = this.config.minUnderwriters;
    if (requests.length < min) {
      throw new ValidationError(
        `At least ${min} underwriters are required (got ${requests.length})`,
        'underwriters',
        BackstopErrorCode.TOO_FEW_UNDERWRITERS,
      );
    }
    const seen = new Set<AccountId>();
    for (const request of requests) {
      validateIdentity(request.underwriter, 'underwriter');
      validatePositiveAmount(request.amount, 'amount');
      if (seen.has(request.underwriter)) {
        throw new ValidationError(
          `${request.underwriter} appears more than once`,
          'underwriters',
          BackstopErrorCode.DUPLICATE_UNDERWRITER,
        );
      }
      seen.add(request.underwriter);
    }
  }
}

function remainingBacking(commitment: Commitment): Amount {
  if (commitment.claimed) return 0n;
  const remaining = commitment.committed - commitment.forfeited;
  return remaining > 0n ? remaining : 0n;
}

function cloneAssignment(assignment: VenueAssignment): VenueAssignment {
  return { ...assignment, roster: [...assignment.roster] };
}
