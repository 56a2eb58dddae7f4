import { describe, it, expect, beforeEach } from 'vitest';
import { BackstopEventEmitter, ManualClock, Transactor } from '@backstop/core';
import { InMemoryCollateralToken } from '@backstop/collateral';
import { DEFAULT_PERIOD_SECONDS, resolveConfig } from '@backstop/config';
import { InMemoryRevenueVault, InMemoryVenueRegistry } from '@backstop/venue';
import {
  AuthorizationError,
  BackstopErrorCode,
  InsufficientResourceError,
  NotFoundError,
  NotVenueOwnerError,
  StateError,
  TransferError,
  ValidationError,
} from '@backstop/types';
import { UnderwriterPool } from './ledger';
import { zipStakeRequests } from './assignment';
import type { StakeRequest } from './types';

// ---------------------------------------------------------------------------
// Fixture
// ---------------------------------------------------------------------------

const START = 1_700_000_000;
const POOL = 'underwriter-pool';
const ENGINE = 'engine-1';

interface Fixture {
  tx: Transactor;
  token: InMemoryCollateralToken;
  registry: InMemoryVenueRegistry;
  clock: ManualClock;
  events: BackstopEventEmitter;
  pool: UnderwriterPool;
}

function setup(options: { promisedRevenue?: bigint; protocolFeeBps?: number } = {}): Fixture {
  const tx = new Transactor();
  const token = new InMemoryCollateralToken(tx);
  const registry = new InMemoryVenueRegistry(tx);
  const clock = new ManualClock(START);
  const events = new BackstopEventEmitter();
  const config = resolveConfig({ protocolFeeBps: options.protocolFeeBps ?? 0 });
  const pool = new UnderwriterPool({ address: POOL, asset: token, registry, transactor: tx, config, clock, events });

  registry.register(
    'venue-1',
    'owner-1',
    new InMemoryRevenueVault({ address: 'vault-1', promisedRevenue: options.promisedRevenue ?? 900n, totalMonths: 12 }),
  );
  pool.bindEngine('protocol-admin', 'venue-1', ENGINE);
  return { tx, token, registry, clock, events, pool };
}

function fund(f: Fixture, underwriter: string, amount: bigint): void {
  f.token.mint(underwriter, amount);
  f.token.approve(underwriter, POOL, amount);
  f.pool.register(underwriter, amount);
}

function triple(f: Fixture, underwriter: string): [bigint, bigint, bigint] {
  const record = f.pool.getUnderwriter(underwriter);
  if (!record) throw new Error(`${underwriter} not registered`);
  return [record.totalStake, record.availableStake, record.lockedStake];
}

function capture(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

const TWO_TO_ONE: StakeRequest[] = [
  { underwriter: 'uw-a', amount: 600n },
  { underwriter: 'uw-b', amount: 300n },
];

/** Two underwriters holding exactly 600 and 300, fully committed to venue-1. */
function assigned(options: { fee?: bigint; protocolFeeBps?: number } = {}): Fixture {
  const f = setup({ protocolFeeBps: options.protocolFeeBps });
  fund(f, 'uw-a', 600n);
  fund(f, 'uw-b', 300n);
  const fee = options.fee ?? 0n;
  if (fee > 0n) {
    f.token.mint('owner-1', fee);
    f.token.approve('owner-1', POOL, fee);
  }
  f.pool.assignToVenue('owner-1', 'venue-1', TWO_TO_ONE, fee);
  return f;
}

// ---------------------------------------------------------------------------
// Stake registration and withdrawal
// ---------------------------------------------------------------------------

describe('UnderwriterPool stake', () => {
  let f: Fixture;

  beforeEach(() => {
    f = setup();
  });

  it('creates a fully available record on first deposit', () => {
    fund(f, 'uw-a', 1000n);
    expect(triple(f, 'uw-a')).toEqual([1000n, 1000n, 0n]);
    expect(f.token.balanceOf(POOL)).toBe(1000n);
    expect(f.pool.isRegistered('uw-a')).toBe(true);
  });

  it('adds later deposits to total and available', () => {
    fund(f, 'uw-a', 1000n);
    fund(f, 'uw-a', 250n);
    expect(triple(f, 'uw-a')).toEqual([1250n, 1250n, 0n]);
  });

  it('rejects a zero deposit', () => {
    const error = capture(() => f.pool.register('uw-a', 0n));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: BackstopErrorCode.ZERO_AMOUNT });
  });

  it('leaves no record behind when the pull fails', () => {
    f.token.mint('uw-a', 100n);
    expect(() => f.pool.register('uw-a', 100n)).toThrow(TransferError);
    expect(f.pool.isRegistered('uw-a')).toBe(false);
    expect(f.token.balanceOf('uw-a')).toBe(100n);
  });

  it('pays a withdrawal out of available stake', () => {
    fund(f, 'uw-a', 1000n);
    expect(f.pool.withdraw('uw-a', 400n)).toEqual({ totalStake: 600n, availableStake: 600n, lockedStake: 0n });
    expect(f.token.balanceOf('uw-a')).toBe(400n);
  });

  it('rejects a withdrawal beyond available and changes nothing', () => {
    fund(f, 'uw-a', 1000n);
    const error = capture(() => f.pool.withdraw('uw-a', 1001n));
    expect(error).toBeInstanceOf(InsufficientResourceError);
    expect(error).toMatchObject({ code: BackstopErrorCode.INSUFFICIENT_STAKE });
    expect(triple(f, 'uw-a')).toEqual([1000n, 1000n, 0n]);
    expect(f.token.balanceOf('uw-a')).toBe(0n);
  });

  it('cannot withdraw locked stake', () => {
    const g = assigned();
    expect(() => g.pool.withdraw('uw-a', 1n)).toThrow(InsufficientResourceError);
    expect(triple(g, 'uw-a')).toEqual([600n, 0n, 600n]);
  });

  it('rejects withdrawal by an unknown underwriter', () => {
    const error = capture(() => f.pool.withdraw('ghost', 1n));
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ code: BackstopErrorCode.UNDERWRITER_NOT_FOUND });
  });
});

// ---------------------------------------------------------------------------
// Assignment
// ---------------------------------------------------------------------------

describe('UnderwriterPool.assignToVenue', () => {
  let f: Fixture;

  beforeEach(() => {
    f = setup({ promisedRevenue: 1200n });
    fund(f, 'uw-a', 1000n);
    fund(f, 'uw-b', 1000n);
  });

  it('refuses coverage below the promised revenue without touching balances', () => {
    const error = capture(() =>
      f.pool.assignToVenue(
        'owner-1',
        'venue-1',
        [
          { underwriter: 'uw-a', amount: 600n },
          { underwriter: 'uw-b', amount: 500n },
        ],
        0n,
      ),
    );
    expect(error).toBeInstanceOf(InsufficientResourceError);
    expect(error).toMatchObject({ code: BackstopErrorCode.INSUFFICIENT_COVERAGE });
    expect(triple(f, 'uw-a')).toEqual([1000n, 1000n, 0n]);
    expect(triple(f, 'uw-b')).toEqual([1000n, 1000n, 0n]);
    expect(f.pool.getAssignment('venue-1')).toBeUndefined();
  });

  it('locks stake and records the roster when coverage suffices', () => {
    const assignment = f.pool.assignToVenue(
      'owner-1',
      'venue-1',
      [
        { underwriter: 'uw-a', amount: 600n },
        { underwriter: 'uw-b', amount: 700n },
      ],
      0n,
    );

    expect(assignment).toMatchObject({
      venueId: 'venue-1',
      roster: ['uw-a', 'uw-b'],
      totalStakeCommitted: 1300n,
      promisedRevenue: 1200n,
      assignedAt: START,
      endDate: START + 12 * DEFAULT_PERIOD_SECONDS,
      active: true,
      residual: 0n,
    });
    expect(triple(f, 'uw-a')).toEqual([1000n, 400n, 600n]);
    expect(triple(f, 'uw-b')).toEqual([1000n, 300n, 700n]);
    expect(f.pool.stakeOf('venue-1', 'uw-b')).toBe(700n);
    expect(f.pool.stakeOf('venue-1', 'uw-c')).toBe(0n);
    expect(f.pool.rosterOf('venue-1')).toEqual(['uw-a', 'uw-b']);
  });

  it('escrows the owner fee in the pool', () => {
    f.token.mint('owner-1', 50n);
    f.token.approve('owner-1', POOL, 50n);
    f.pool.assignToVenue(
      'owner-1',
      'venue-1',
      [
        { underwriter: 'uw-a', amount: 600n },
        { underwriter: 'uw-b', amount: 600n },
      ],
      50n,
    );
    expect(f.token.balanceOf(POOL)).toBe(2050n);
    expect(f.token.balanceOf('owner-1')).toBe(0n);
  });

  it('rolls the stake lock back when the fee cannot be pulled', () => {
    expect(() =>
      f.pool.assignToVenue(
        'owner-1',
        'venue-1',
        [
          { underwriter: 'uw-a', amount: 600n },
          { underwriter: 'uw-b', amount: 600n },
        ],
        50n,
      ),
    ).toThrow(TransferError);
    expect(triple(f, 'uw-a')).toEqual([1000n, 1000n, 0n]);
    expect(f.pool.getAssignment('venue-1')).toBeUndefined();
  });

  it('rejects a caller who does not own the venue', () => {
    expect(() => f.pool.assignToVenue('mallory', 'venue-1', TWO_TO_ONE, 0n)).toThrow(NotVenueOwnerError);
  });

  it('rejects an unknown venue', () => {
    const error = capture(() => f.pool.assignToVenue('owner-1', 'ghost', TWO_TO_ONE, 0n));
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ code: BackstopErrorCode.VENUE_NOT_FOUND });
  });

  it('requires at least two underwriters', () => {
    const error = capture(() =>
      f.pool.assignToVenue('owner-1', 'venue-1', [{ underwriter: 'uw-a', amount: 1000n }], 0n),
    );
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: BackstopErrorCode.TOO_FEW_UNDERWRITERS });
  });

  it('rejects a duplicated underwriter', () => {
    const error = capture(() =>
      f.pool.assignToVenue(
        'owner-1',
        'venue-1',
        [
          { underwriter: 'uw-a', amount: 600n },
          { underwriter: 'uw-a', amount: 600n },
        ],
        0n,
      ),
    );
    expect(error).toMatchObject({ code: BackstopErrorCode.DUPLICATE_UNDERWRITER });
  });

  it('rejects a zero commitment', () => {
    const error = capture(() =>
      f.pool.assignToVenue(
        'owner-1',
        'venue-1',
        [
          { underwriter: 'uw-a', amount: 1200n },
          { underwriter: 'uw-b', amount: 0n },
        ],
        0n,
      ),
    );
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: BackstopErrorCode.ZERO_AMOUNT });
  });

  it('rejects an unregistered underwriter', () => {
    const error = capture(() =>
      f.pool.assignToVenue(
        'owner-1',
        'venue-1',
        [
          { underwriter: 'uw-a', amount: 1000n },
          { underwriter: 'uw-z', amount: 500n },
        ],
        0n,
      ),
    );
    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error).toMatchObject({ code: BackstopErrorCode.NOT_REGISTERED });
  });

  it('rejects a request above available stake', () => {
    const error = capture(() =>
      f.pool.assignToVenue(
        'owner-1',
        'venue-1',
        [
          { underwriter: 'uw-a', amount: 1001n },
          { underwriter: 'uw-b', amount: 500n },
        ],
        0n,
      ),
    );
    expect(error).toMatchObject({ code: BackstopErrorCode.INSUFFICIENT_STAKE });
    expect(triple(f, 'uw-b')).toEqual([1000n, 1000n, 0n]);
  });

  it('assigns a venue at most once', () => {
    const requests = [
      { underwriter: 'uw-a', amount: 600n },
      { underwriter: 'uw-b', amount: 600n },
    ];
    f.pool.assignToVenue('owner-1', 'venue-1', requests, 0n);
    const error = capture(() => f.pool.assignToVenue('owner-1', 'venue-1', requests, 0n));
    expect(error).toBeInstanceOf(StateError);
    expect(error).toMatchObject({ code: BackstopErrorCode.ALREADY_ASSIGNED });
    expect(triple(f, 'uw-a')).toEqual([1000n, 400n, 600n]);
  });
});

// ---------------------------------------------------------------------------
// Liability settlement
// ---------------------------------------------------------------------------

describe('UnderwriterPool.settleLiability', () => {
  it('forfeits stake in proportion to commitments', () => {
    const f = assigned();
    const result = f.pool.settleLiability(ENGINE, 'venue-1', 90n);

    expect(result.shares).toEqual([
      { underwriter: 'uw-a', amount: 60n },
      { underwriter: 'uw-b', amount: 30n },
    ]);
    expect(result.settled).toBe(90n);
    expect(result.residual).toBe(0n);
    expect(triple(f, 'uw-a')).toEqual([540n, 0n, 540n]);
    expect(triple(f, 'uw-b')).toEqual([270n, 0n, 270n]);
    expect(f.token.balanceOf('vault-1')).toBe(90n);
    expect(f.pool.getCommitment('venue-1', 'uw-a')).toEqual({
      underwriter: 'uw-a',
      committed: 600n,
      forfeited: 60n,
      claimed: false,
    });
  });

  it('truncates shares and records the residual', () => {
    const f = assigned();
    const result = f.pool.settleLiability(ENGINE, 'venue-1', 91n);

    expect(result.shares.map((s) => s.amount)).toEqual([60n, 30n]);
    expect(result.residual).toBe(1n);
    expect(f.token.balanceOf('vault-1')).toBe(90n);
    expect(f.pool.getAssignment('venue-1')?.residual).toBe(1n);
  });

  it('accepts calls only from the bound engine', () => {
    const f = assigned();
    const error = capture(() => f.pool.settleLiability('owner-1', 'venue-1', 90n));
    expect(error).toBeInstanceOf(AuthorizationError);
    expect(f.token.balanceOf('vault-1')).toBe(0n);
  });

  it('rejects an unbound caller before revealing whether the venue is assigned', () => {
    const f = setup();
    const unassigned = capture(() => f.pool.settleLiability('owner-1', 'venue-1', 90n));
    const unknown = capture(() => f.pool.settleLiability('owner-1', 'venue-9', 90n));
    expect(unassigned).toBeInstanceOf(AuthorizationError);
    expect(unknown).toBeInstanceOf(AuthorizationError);
    expect(unassigned).toMatchObject({ code: BackstopErrorCode.UNAUTHORIZED });
  });

  it('requires an assignment', () => {
    const f = setup();
    const error = capture(() => f.pool.settleLiability(ENGINE, 'venue-1', 90n));
    expect(error).toMatchObject({ code: BackstopErrorCode.ASSIGNMENT_NOT_FOUND });
  });

  it('refuses a liability larger than the locked backing', () => {
    const f = assigned();
    const error = capture(() => f.pool.settleLiability(ENGINE, 'venue-1', 1000n));
    expect(error).toBeInstanceOf(InsufficientResourceError);
    expect(error).toMatchObject({ code: BackstopErrorCode.INSUFFICIENT_LOCKED });
    expect(triple(f, 'uw-a')).toEqual([600n, 0n, 600n]);
    expect(triple(f, 'uw-b')).toEqual([300n, 0n, 300n]);
    expect(f.token.balanceOf('vault-1')).toBe(0n);
  });

  it('undoes every debit when a vault transfer fails', () => {
    const f = assigned();
    f.token.freeze('vault-1');
    expect(() => f.pool.settleLiability(ENGINE, 'venue-1', 90n)).toThrow(TransferError);
    expect(triple(f, 'uw-a')).toEqual([600n, 0n, 600n]);
    expect(f.pool.getCommitment('venue-1', 'uw-a')?.forfeited).toBe(0n);
  });

  it('rejects re-entry from a transfer hook and rolls back', () => {
    const f = assigned();
    f.token.onTransfer((t) => {
      if (t.to === 'vault-1') f.pool.withdraw('uw-a', 1n);
    });

    const error = capture(() => f.pool.settleLiability(ENGINE, 'venue-1', 90n));
    expect(error).toBeInstanceOf(StateError);
    expect(error).toMatchObject({ code: BackstopErrorCode.REENTRANT_CALL });
    expect(triple(f, 'uw-a')).toEqual([600n, 0n, 600n]);
    expect(f.token.balanceOf('vault-1')).toBe(0n);
  });

  it('announces the settlement after commit only', () => {
    const f = assigned();
    const seen: bigint[] = [];
    f.events.on('liability:settled', (e) => seen.push(e.residual));

    f.token.freeze('vault-1');
    expect(() => f.pool.settleLiability(ENGINE, 'venue-1', 91n)).toThrow(TransferError);
    f.token.unfreeze('vault-1');
    f.pool.settleLiability(ENGINE, 'venue-1', 91n);
    expect(seen).toEqual([1n]);
  });
});

// ---------------------------------------------------------------------------
// Fee claims
// ---------------------------------------------------------------------------

describe('UnderwriterPool.claimFee', () => {
  it('refuses to pay before maturity', () => {
    const f = assigned({ fee: 100n });
    expect(f.pool.hasMatured('venue-1')).toBe(false);
    const error = capture(() => f.pool.claimFee('uw-a', 'venue-1'));
    expect(error).toBeInstanceOf(StateError);
    expect(error).toMatchObject({ code: BackstopErrorCode.NOT_MATURED });
  });

  it('releases remaining stake and pays the fee share less the protocol cut', () => {
    const f = assigned({ fee: 100n, protocolFeeBps: 1000 });
    f.pool.settleLiability(ENGINE, 'venue-1', 90n);
    f.clock.advance(12 * DEFAULT_PERIOD_SECONDS);
    expect(f.pool.hasMatured('venue-1')).toBe(true);

    expect(f.pool.claimFee('uw-a', 'venue-1')).toEqual({
      venueId: 'venue-1',
      underwriter: 'uw-a',
      released: 540n,
      gross: 66n,
      protocolCut: 6n,
      payout: 60n,
    });
    expect(triple(f, 'uw-a')).toEqual([540n, 540n, 0n]);
    expect(f.pool.stakeOf('venue-1', 'uw-a')).toBe(0n);
    expect(f.pool.getAssignment('venue-1')?.active).toBe(true);

    f.pool.claimFee('uw-b', 'venue-1');
    expect(f.token.balanceOf('uw-a')).toBe(60n);
    expect(f.token.balanceOf('uw-b')).toBe(30n);
    expect(f.token.balanceOf('treasury')).toBe(9n);
    expect(f.token.balanceOf(POOL)).toBe(811n);
    expect(f.pool.getAssignment('venue-1')?.active).toBe(false);
  });

  it('pays each underwriter once', () => {
    const f = assigned({ fee: 100n });
    f.clock.advance(12 * DEFAULT_PERIOD_SECONDS);
    f.pool.claimFee('uw-a', 'venue-1');
    const error = capture(() => f.pool.claimFee('uw-a', 'venue-1'));
    expect(error).toMatchObject({ code: BackstopErrorCode.ALREADY_CLAIMED });
    expect(f.token.balanceOf('uw-a')).toBe(66n);
  });

  it('rejects callers who are not on the roster', () => {
    const f = assigned({ fee: 100n });
    f.clock.advance(12 * DEFAULT_PERIOD_SECONDS);
    expect(() => f.pool.claimFee('uw-z', 'venue-1')).toThrow(AuthorizationError);
  });

  it('stops settlement once every underwriter has claimed', () => {
    const f = assigned();
    f.clock.advance(12 * DEFAULT_PERIOD_SECONDS);
    f.pool.claimFee('uw-a', 'venue-1');
    f.pool.claimFee('uw-b', 'venue-1');
    const error = capture(() => f.pool.settleLiability(ENGINE, 'venue-1', 10n));
    expect(error).toMatchObject({ code: BackstopErrorCode.ASSIGNMENT_INACTIVE });
  });
});

// ---------------------------------------------------------------------------
// Engine binding
// ---------------------------------------------------------------------------

describe('UnderwriterPool.bindEngine', () => {
  it('is reserved for the pool admin', () => {
    const f = setup();
    f.registry.register('venue-2', 'owner-2', new InMemoryRevenueVault({ address: 'vault-2', promisedRevenue: 10n, totalMonths: 1 }));
    expect(() => f.pool.bindEngine('owner-2', 'venue-2', 'engine-2')).toThrow(AuthorizationError);
    f.pool.bindEngine('protocol-admin', 'venue-2', 'engine-2');
    expect(f.pool.engineOf('venue-2')).toBe('engine-2');
  });

  it('binds each venue once', () => {
    const f = setup();
    expect(() => f.pool.bindEngine('protocol-admin', 'venue-1', 'engine-x')).toThrow(StateError);
    expect(f.pool.engineOf('venue-1')).toBe(ENGINE);
  });
});

describe('zipStakeRequests', () => {
  it('pairs parallel lists', () => {
    expect(zipStakeRequests(['a', 'b'], [1n, 2n])).toEqual([
      { underwriter: 'a', amount: 1n },
      { underwriter: 'b', amount: 2n },
    ]);
  });

  it('rejects mismatched lengths', () => {
    expect(() => zipStakeRequests(['a', 'b'], [1n])).toThrow('Got 2 underwriters but 1 amounts');
  });
});
