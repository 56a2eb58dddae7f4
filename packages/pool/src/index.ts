/**
 * @backstop/pool -- the underwriter collateral pool and the per-venue
 * underwriting assignments it locks stake behind.
 *
 * @packageDocumentation
 */

export { UnderwriterPool } from './ledger';
export type { UnderwriterPoolOptions } from './ledger';

export { AssignmentTable, commitmentKey, zipStakeRequests } from './assignment';
export type { NewAssignment } from './assignment';

export type {
  Commitment,
  FeeClaimResult,
  SettlementResult,
  StakeRequest,
  UnderwriterRecord,
  VenueAssignment,
} from './types';
