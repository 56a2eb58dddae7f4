/**
 * Composition root: one transactor, token, registry, pool, event bus and
 * journal, plus one guarantee engine per registered venue.
 *
 * @packageDocumentation
 */

import { BackstopEventEmitter, SettlementJournal, Transactor, systemClock } from '@backstop/core';
import type { Clock } from '@backstop/core';
import { InMemoryCollateralToken } from '@backstop/collateral';
import { loadConfig, resolveConfig } from '@backstop/config';
import type { ProtocolConfig } from '@backstop/config';
import { VenueGuaranteeEngine } from '@backstop/guarantee';
import { UnderwriterPool } from '@backstop/pool';
import { InMemoryRevenueVault, InMemoryVenueRegistry } from '@backstop/venue';
import { BackstopErrorCode, NotFoundError, createLogger, validateIdentity } from '@backstop/types';
import type { AccountId, Logger, VenueId } from '@backstop/types';

import type { LoadProtocolOptions, ProtocolOptions, VenueAccounts, VenueRegistration } from './types';

/** Accounts a venue's vault and engine hold on the collateral asset. */
export function venueAccounts(venueId: VenueId): VenueAccounts {
  return { vault: `vault:${venueId}`, engine: `engine:${venueId}` };
}

/**
 * A running protocol instance.
 *
 * ```ts
 * const protocol = createProtocol({ config: { protocolFeeBps: 250 } });
 * protocol.token.mint('uw-1', 1_000n);
 * protocol.token.approve('uw-1', protocol.pool.address, 1_000n);
 * protocol.pool.register('uw-1', 1_000n);
 * ```
 */
export class BackstopProtocol {
  readonly config: ProtocolConfig;
  readonly clock: Clock;
  readonly logger: Logger;
  readonly transactor: Transactor;
  readonly token: InMemoryCollateralToken;
  readonly registry: InMemoryVenueRegistry;
  readonly events: BackstopEventEmitter;
  readonly journal: SettlementJournal;
  readonly pool: UnderwriterPool;

  private readonly engines = new Map<VenueId, VenueGuaranteeEngine>();

  constructor(options: ProtocolOptions = {}) {
    this.config = resolveConfig(options.config);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger({ level: this.config.logLevel, component: 'backstop' });
    this.transactor = new Transactor({ logger: this.logger });
    this.token = new InMemoryCollateralToken(this.transactor);
    this.registry = new InMemoryVenueRegistry(this.transactor);
    this.events = new BackstopEventEmitter();
    this.journal = new SettlementJournal();
    this.journal.attach(this.events);

    this.pool = new UnderwriterPool({
      address: this.config.poolAddress,
      asset: this.token,
      registry: this.registry,
      transactor: this.transactor,
      config: this.config,
      clock: this.clock,
      events: this.events,
      logger: this.logger,
    });
  }

  /**
   * Create a venue's vault, register it, build its guarantee engine with
   * `caller` as engine admin and bind the engine in the pool. Nothing is
   * kept if any step fails.
   */
  registerVenue(caller: AccountId, registration: VenueRegistration): VenueGuaranteeEngine {
    validateIdentity(caller, 'caller');
    const { venueId, owner } = registration;
    const accounts = venueAccounts(venueId);

    const engine = this.transactor.run(() => {
      const vault = new InMemoryRevenueVault({
        address: accounts.vault,
        promisedRevenue: registration.promisedRevenue,
        totalMonths: registration.totalMonths,
      });
      this.registry.register(venueId, owner, vault);

      const created = new VenueGuaranteeEngine({
        venueId,
        address: accounts.engine,
        roles: { admin: caller, operators: registration.operators ?? [] },
        registry: this.registry,
        vault,
        pool: this.pool,
        asset: this.token,
        transactor: this.transactor,
        clock: this.clock,
        config: this.config,
        events: this.events,
        logger: this.logger,
      });
      this.pool.bindEngine(this.config.poolAdmin, venueId, accounts.engine);

      this.transactor.afterCommit(() => {
        this.logger.info('venue registered', { venueId, owner, vault: accounts.vault, engine: accounts.engine });
        this.events.emit('venue:registered', { venueId, owner, vault: accounts.vault, engine: accounts.engine });
      });
      return created;
    });

    this.engines.set(venueId, engine);
    return engine;
  }

  /** @throws {NotFoundError} `VENUE_NOT_FOUND` for an unknown venue. */
  engineOf(venueId: VenueId): VenueGuaranteeEngine {
    const engine = this.engines.get(venueId);
    if (!engine) {
      throw new NotFoundError(BackstopErrorCode.VENUE_NOT_FOUND, `Venue ${venueId} is not registered`, {
        context: { venueId },
      });
    }
    return engine;
  }

  venues(): VenueId[] {
    return [...this.engines.keys()];
  }

  verifyJournal(): { valid: boolean; brokenAt?: number; entries: number } {
    return this.journal.verify();
  }
}

export function createProtocol(options: ProtocolOptions = {}): BackstopProtocol {
  return new BackstopProtocol(options);
}

/**
 * Build a protocol from `backstop.config.json` (searched upward from
 * `cwd`) and `BACKSTOP_*` environment variables. Settings given in
 * `config` take precedence over both.
 */
export function loadProtocol(options: LoadProtocolOptions = {}): BackstopProtocol {
  const { cwd, env, config, ...rest } = options;
  const loaded = loadConfig({ cwd, env });
  return new BackstopProtocol({ ...rest, config: { ...loaded, ...config } });
}
