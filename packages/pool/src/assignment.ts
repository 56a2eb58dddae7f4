/**
 * Per-venue underwriting assignments.
 *
 * Commitments live in one table keyed by the composite
 * `(venueId, underwriter)` key; each venue keeps its own ordered roster so
 * iteration order is the assignment order, never map insertion order of a
 * nested structure.
 *
 * @packageDocumentation
 */

import { snapshotParticipant } from '@backstop/core';
import type { Participant, Transactor } from '@backstop/core';
import {
  BackstopErrorCode,
  NotFoundError,
  StateError,
  ValidationError,
  validateIdentity,
} from '@backstop/types';
import type { AccountId, Amount, UnixSeconds, VenueId } from '@backstop/types';

import type { Commitment, StakeRequest, VenueAssignment } from './types';

interface AssignmentState {
  assignments: Map<VenueId, VenueAssignment>;
  commitments: Map<string, Commitment>;
}

/** Unambiguous composite key for `(venueId, underwriter)`. */
export function commitmentKey(venueId: VenueId, underwriter: AccountId): string {
  return JSON.stringify([venueId, underwriter]);
}

/**
 * Pair parallel underwriter and amount lists.
 *
 * @throws {ValidationError} If the lists differ in length.
 */
export function zipStakeRequests(underwriters: readonly AccountId[], amounts: readonly Amount[]): StakeRequest[] {
  if (underwriters.length !== amounts.length) {
    throw new ValidationError(
      `Got ${underwriters.length} underwriters but ${amounts.length} amounts`,
      'amounts',
      BackstopErrorCode.INVALID_INPUT,
    );
  }
  return underwriters.map((underwriter, i) => ({ underwriter, amount: amounts[i] ?? 0n }));
}

export interface NewAssignment {
  venueId: VenueId;
  requests: readonly StakeRequest[];
  fee: Amount;
  promisedRevenue: Amount;
  assignedAt: UnixSeconds;
  endDate: UnixSeconds;
}

/**
 * Storage for venue assignments. Holds no policy: the pool ledger decides
 * whether an assignment may be created or a commitment changed.
 */
export class AssignmentTable {
  private state: AssignmentState = { assignments: new Map(), commitments: new Map() };
  private readonly transactor: Transactor;
  private readonly participant: Participant;

  constructor(transactor: Transactor) {
    this.transactor = transactor;
    this.participant = snapshotParticipant(
      () => this.state,
      (saved) => {
        this.state = saved;
      },
    );
    transactor.enlist(this.participant);
  }

  /** Capture the table for the open unit before a live record is changed. */
  track(): void {
    this.transactor.touch(this.participant);
  }

  has(venueId: VenueId): boolean {
    return this.state.assignments.has(venueId);
  }

  /** Live assignment record, or `undefined`. */
  find(venueId: VenueId): VenueAssignment | undefined {
    return this.state.assignments.get(venueId);
  }

  /** @throws {NotFoundError} `ASSIGNMENT_NOT_FOUND` if the venue has none. */
  get(venueId: VenueId): VenueAssignment {
    const assignment = this.state.assignments.get(venueId);
    if (!assignment) {
      throw new NotFoundError(
        BackstopErrorCode.ASSIGNMENT_NOT_FOUND,
        `Venue ${venueId} has no underwriting assignment`,
        { context: { venueId } },
      );
    }
    return assignment;
  }

  /**
   * Store a new assignment and its commitments.
   *
   * @throws {StateError} `ALREADY_ASSIGNED` if the venue already has one.
   */
  create(input: NewAssignment): VenueAssignment {
    validateIdentity(input.venueId, 'venueId');
    if (this.has(input.venueId)) {
      throw new StateError(
        BackstopErrorCode.ALREADY_ASSIGNED,
        `Venue ${input.venueId} already has an underwriting assignment`,
        { context: { venueId: input.venueId } },
      );
    }

    this.track();
    let total = 0n;
    const roster: AccountId[] = [];
    for (const request of input.requests) {
      roster.push(request.underwriter);
      total += request.amount;
      this.state.commitments.set(commitmentKey(input.venueId, request.underwriter), {
        underwriter: request.underwriter,
        committed: request.amount,
        forfeited: 0n,
        claimed: false,
      });
    }

    const assignment: VenueAssignment = {
      venueId: input.venueId,
      roster,
      totalStakeCommitted: total,
      fee: input.fee,
      promisedRevenue: input.promisedRevenue,
      assignedAt: input.assignedAt,
      endDate: input.endDate,
      active: true,
      residual: 0n,
    };
    this.state.assignments.set(input.venueId, assignment);
    return assignment;
  }

  /** Live commitment record, or `undefined` if the underwriter is not on the roster. */
  commitment(venueId: VenueId, underwriter: AccountId): Commitment | undefined {
    return this.state.commitments.get(commitmentKey(venueId, underwriter));
  }

  /** Roster members with their commitments, in assignment order. */
  commitments(venueId: VenueId): Commitment[] {
    const assignment = this.find(venueId);
    if (!assignment) return [];
    const result: Commitment[] = [];
    for (const underwriter of assignment.roster) {
      const commitment = this.commitment(venueId, underwriter);
      if (commitment) result.push(commitment);
    }
    return result;
  }

  /** Every assignment, in creation order. */
  all(): VenueAssignment[] {
    return [...this.state.assignments.values()];
  }
}
