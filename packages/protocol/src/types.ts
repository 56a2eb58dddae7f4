import type { Clock } from '@backstop/core';
import type { ProtocolConfig } from '@backstop/config';
import type { AccountId, Amount, Logger, VenueId } from '@backstop/types';

export interface ProtocolOptions {
  /** Partial settings merged over the defaults and validated. */
  config?: Partial<ProtocolConfig>;
  /** Defaults to the system clock. */
  clock?: Clock;
  /** Defaults to a JSON logger at the configured level. */
  logger?: Logger;
}

export interface LoadProtocolOptions extends ProtocolOptions {
  /** Directory the config file search starts from. Defaults to the working directory. */
  cwd?: string;
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
}

export interface VenueRegistration {
  venueId: VenueId;
  owner: AccountId;
  /** Revenue promised to investors per reporting period. */
  promisedRevenue: Amount;
  totalMonths: number;
  /** Engine operators besides the registering admin. */
  operators?: readonly AccountId[];
}

/** Account names the protocol derives for a venue. */
export interface VenueAccounts {
  vault: AccountId;
  engine: AccountId;
}
