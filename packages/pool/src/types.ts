import type { UnderwriterAmount } from '@backstop/core';
import type { AccountId, Amount, UnixSeconds, VenueId } from '@backstop/types';

/** Collateral position of one underwriter across all venues. */
export interface UnderwriterRecord {
  totalStake: Amount;
  availableStake: Amount;
  lockedStake: Amount;
}

/** One requested (underwriter, stake) pair in an assignment. */
export interface StakeRequest {
  underwriter: AccountId;
  amount: Amount;
}

/** An underwriter's commitment to one venue. */
export interface Commitment {
  underwriter: AccountId;
  /** Stake committed at assignment; zeroed once the fee is claimed. */
  committed: Amount;
  /** Stake forfeited to the vault through liability settlements. */
  forfeited: Amount;
  claimed: boolean;
}

/** The frozen underwriting of one venue. */
export interface VenueAssignment {
  venueId: VenueId;
  /** Underwriters in assignment order. */
  roster: AccountId[];
  totalStakeCommitted: Amount;
  fee: Amount;
  /** Vault promise captured when the assignment was made. */
  promisedRevenue: Amount;
  assignedAt: UnixSeconds;
  endDate: UnixSeconds;
  active: boolean;
  /** Truncation residue accumulated over all settlements, never redistributed. */
  residual: Amount;
}

export interface SettlementResult {
  venueId: VenueId;
  vault: AccountId;
  missingAmount: Amount;
  shares: UnderwriterAmount[];
  /** Sum of all shares moved to the vault. */
  settled: Amount;
  /** `missingAmount - settled`. */
  residual: Amount;
}

export interface FeeClaimResult {
  venueId: VenueId;
  underwriter: AccountId;
  /** Locked stake returned to available. */
  released: Amount;
  /** Fee share before the protocol cut. */
  gross: Amount;
  protocolCut: Amount;
  /** Amount paid to the underwriter. */
  payout: Amount;
}
