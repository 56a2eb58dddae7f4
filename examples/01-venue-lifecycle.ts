/**
 * Example 01: Venue Lifecycle
 *
 * One venue from registration to payout. Demonstrates:
 * - Registering a venue with its vault and guarantee engine
 * - Underwriters staking and being assigned to the venue
 * - A monthly shortfall settled against locked stake
 * - Fee distribution and stake release at maturity
 *
 * Run: npm run example
 * Set BACKSTOP_LOG_LEVEL=warn to hide the JSON log lines.
 */

import { ManualClock } from '@backstop/core';
import { DEFAULT_PERIOD_SECONDS } from '@backstop/config';
import { loadProtocol } from '@backstop/protocol';

function main(): void {
  console.log('========================================');
  console.log('  Example 01: Venue Lifecycle');
  console.log('========================================\n');

  const clock = new ManualClock(1_700_000_000);
  // Settings come from backstop.config.json and BACKSTOP_* variables;
  // the fee rate is fixed here so the figures below stay the same.
  const protocol = loadProtocol({ config: { protocolFeeBps: 250 }, clock });
  const { token, pool } = protocol;

  // ── Step 1: Register the venue ─────────────────────────────────────────

  console.log('--- Step 1: Register Venue ---\n');
  const engine = protocol.registerVenue('protocol-admin', {
    venueId: 'harbour-hall',
    owner: 'owner-1',
    promisedRevenue: 1_000n,
    totalMonths: 3,
    operators: ['operator-1'],
  });
  console.log('Engine account:', engine.address);
  console.log('Vault account: ', protocol.registry.vaultAddressOf('harbour-hall'), '\n');

  // ── Step 2: Stake and assign ───────────────────────────────────────────

  console.log('--- Step 2: Stake and Assign ---\n');
  for (const [underwriter, amount] of [
    ['alice', 2_000n],
    ['bob', 1_000n],
  ] as const) {
    token.mint(underwriter, amount);
    token.approve(underwriter, pool.address, amount);
    pool.register(underwriter, amount);
  }
  token.mint('owner-1', 10_000n);
  token.approve('owner-1', pool.address, 120n);
  token.approve('owner-1', engine.address, 5_000n);

  const assignment = pool.assignToVenue(
    'owner-1',
    'harbour-hall',
    [
      { underwriter: 'alice', amount: 800n },
      { underwriter: 'bob', amount: 400n },
    ],
    120n,
  );
  console.log('Committed stake:', assignment.totalStakeCommitted.toString());

  engine.addUnderwriter('operator-1', 'alice', 800n);
  engine.addUnderwriter('operator-1', 'bob', 400n);
  engine.setFeeAmount('owner-1', 60n);
  engine.depositFee('owner-1');
  console.log('Engine status:  ', engine.getStatus(), '\n');

  // ── Step 3: Report and settle ──────────────────────────────────────────

  console.log('--- Step 3: Monthly Reports ---\n');
  for (const actual of [1_000n, 850n, 1_000n]) {
    engine.ownerDepositRevenue('owner-1', engine.currentMonth, actual);
    const report = engine.submitMonthlyReport('operator-1', actual);
    console.log(`Month ${report.month}: actual ${report.actualRevenue}, missing ${report.missingRevenue}`);
    if (report.missingRevenue > 0n) {
      const settlement = engine.processLiability('operator-1', report.month);
      for (const share of settlement.shares) {
        console.log(`  ${share.underwriter} forfeits ${share.amount}`);
      }
    }
    clock.advance(DEFAULT_PERIOD_SECONDS);
  }
  console.log();

  // ── Step 4: Payout ─────────────────────────────────────────────────────

  console.log('--- Step 4: Payout ---\n');
  console.log('Engine status:', engine.getStatus());
  for (const payment of engine.distributeFees('operator-1')) {
    console.log(`Escrow fee to ${payment.underwriter}: ${payment.payout} (cut ${payment.protocolCut})`);
  }
  for (const underwriter of pool.rosterOf('harbour-hall')) {
    const claim = pool.claimFee(underwriter, 'harbour-hall');
    console.log(`Pool fee to ${underwriter}: ${claim.payout}, released ${claim.released}`);
  }

  const summary = engine.getPerformanceSummary();
  console.log('\nExpected:', summary.totalExpected.toString(), 'Collected:', summary.totalCollected.toString());
  console.log('Liability paid:', summary.totalLiabilityPaid.toString());
  console.log('Journal intact:', protocol.verifyJournal().valid);
}

main();
