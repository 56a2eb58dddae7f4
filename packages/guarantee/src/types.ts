import type { AccountId, Amount, UnixSeconds } from '@backstop/types';

/** Lifecycle of a guarantee engine. */
export enum EngineStatus {
  /** Roster and fee are being set up; no escrow yet. */
  Assembling = 'assembling',
  /** Escrow is funded and the contract period is running. */
  Reporting = 'reporting',
  /** The contract period has elapsed; fees may be claimed. */
  Matured = 'matured',
  /** Every approved underwriter has been paid. Terminal. */
  FeesDistributed = 'fees-distributed',
}

export interface MonthlyReport {
  month: number;
  expectedRevenue: Amount;
  actualRevenue: Amount;
  /** `max(0, expectedRevenue - actualRevenue)`. */
  missingRevenue: Amount;
  liabilityPaid: boolean;
  timestamp: UnixSeconds;
}

/** An underwriter on the engine's local roster. */
export interface EngineUnderwriter {
  address: AccountId;
  stake: Amount;
  approved: boolean;
  feeClaimed: boolean;
}

export interface PerformanceSummary {
  totalExpected: Amount;
  totalCollected: Amount;
  /** `totalExpected - totalCollected`; negative when the venue over-delivered. */
  shortfall: Amount;
  totalLiabilityPaid: Amount;
}

export interface FeePayment {
  underwriter: AccountId;
  gross: Amount;
  protocolCut: Amount;
  payout: Amount;
}
