/**
 * @backstop/venue -- venue identity and revenue vault collaborators.
 *
 * Venue registration and the investor vault live outside the settlement
 * engine; the engine only needs to look up owners and vaults and read the
 * vault's promise. The in-memory implementations here back the composition
 * root and the tests.
 *
 * @packageDocumentation
 */

import type { Participant, Transactor } from '@backstop/core';
import {
  BackstopErrorCode,
  NotFoundError,
  StateError,
  validateIdentity,
  validateIntegerRange,
  validatePositiveAmount,
} from '@backstop/types';
import type { AccountId, Amount, VenueId } from '@backstop/types';

// ─── Interfaces ─────────────────────────────────────────────────────────────────

/** Holds investor funds; receives owner deposits and liability payments. */
export interface RevenueVault {
  /** Account on the collateral asset that receives funds. */
  readonly address: AccountId;
  /** Revenue promised to investors for each reporting period. */
  promisedRevenue(): Amount;
  /** Number of reporting periods in the contract. */
  totalMonths(): number;
}

/** Venue identity and vault lookup. */
export interface VenueRegistry {
  venueExists(venueId: VenueId): boolean;
  /** @throws {NotFoundError} For an unknown venue. */
  ownerOf(venueId: VenueId): AccountId;
  /** @throws {NotFoundError} For an unknown venue. */
  vaultAddressOf(venueId: VenueId): AccountId;
  /** @throws {NotFoundError} For an unknown venue. */
  vaultOf(venueId: VenueId): RevenueVault;
}

// ─── In-memory vault ────────────────────────────────────────────────────────────

export interface VaultTerms {
  address: AccountId;
  promisedRevenue: Amount;
  totalMonths: number;
}

/** A vault with fixed terms. */
export class InMemoryRevenueVault implements RevenueVault {
  readonly address: AccountId;
  private readonly promised: Amount;
  private readonly months: number;

  constructor(terms: VaultTerms) {
    validateIdentity(terms.address, 'address');
    validatePositiveAmount(terms.promisedRevenue, 'promisedRevenue');
    validateIntegerRange(terms.totalMonths, 1, 1_200, 'totalMonths');
    this.address = terms.address;
    this.promised = terms.promisedRevenue;
    this.months = terms.totalMonths;
  }

  promisedRevenue(): Amount {
    return this.promised;
  }

  totalMonths(): number {
    return this.months;
  }
}

// ─── In-memory registry ─────────────────────────────────────────────────────────

/** A registered venue. */
export interface VenueRecord {
  readonly venueId: VenueId;
  readonly owner: AccountId;
  readonly vault: RevenueVault;
}

/** Registry kept in a map; registrations roll back with the enclosing unit. */
export class InMemoryVenueRegistry implements VenueRegistry {
  private venues = new Map<VenueId, VenueRecord>();

  private readonly transactor: Transactor | undefined;
  private readonly participant: Participant = {
    capture: () => {
      const saved = new Map(this.venues);
      return () => {
        this.venues = saved;
      };
    },
  };

  constructor(transactor?: Transactor) {
    this.transactor = transactor;
    transactor?.enlist(this.participant);
  }

  /**
   * Record a new venue.
   *
   * @throws {StateError} If the id is already registered.
   */
  register(venueId: VenueId, owner: AccountId, vault: RevenueVault): VenueRecord {
    validateIdentity(venueId, 'venueId');
    validateIdentity(owner, 'owner');
    if (this.venues.has(venueId)) {
      throw new StateError(BackstopErrorCode.INVALID_STATE, `Venue ${venueId} is already registered`, {
        context: { venueId },
      });
    }
    this.transactor?.touch(this.participant);
    const record: VenueRecord = Object.freeze({ venueId, owner, vault });
    this.venues.set(venueId, record);
    return record;
  }

  venueExists(venueId: VenueId): boolean {
    return this.venues.has(venueId);
  }

  ownerOf(venueId: VenueId): AccountId {
    return this.get(venueId).owner;
  }

  vaultAddressOf(venueId: VenueId): AccountId {
    return this.get(venueId).vault.address;
  }

  vaultOf(venueId: VenueId): RevenueVault {
    return this.get(venueId).vault;
  }

  list(): VenueRecord[] {
    return [...this.venues.values()];
  }

  private get(venueId: VenueId): VenueRecord {
    const record = this.venues.get(venueId);
    if (!record) {
      throw new NotFoundError(BackstopErrorCode.VENUE_NOT_FOUND, `Venue ${venueId} is not registered`, {
        context: { venueId },
      });
    }
    return record;
  }
}
