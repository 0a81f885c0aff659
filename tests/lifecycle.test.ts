/**
 * Strategy lifecycle tests
 *
 * Drives the engine through several framework cycles against the in-memory
 * deployment: deposit, harvest, redeploy, route change, and a full exit.
 *
 * Run: npx vitest run tests/lifecycle.test.ts
 */

import { describe, it, expect } from 'vitest';
import type { Address } from '@sluice/types';
import { createSimulatedDeployment, SIM_ADDRESSES } from '@sluice/simulator';
import { StrategyEngine, type EngineEvent } from '@sluice/strategy-engine';

const OPERATOR: Address = '0x00000000000000000000000000000000000000a1';
const VAULT: Address = '0x00000000000000000000000000000000000000f0';

const { strategy: self, base, venue } = SIM_ADDRESSES;

describe('Strategy lifecycle', () => {
  it('runs deposit, two harvests and an exit', async () => {
    const sim = createSimulatedDeployment();
    sim.seed({ idleBase: 1_000n, totalDebt: 1_000n });

    const engine = new StrategyEngine(sim.deps, { operators: [OPERATOR] });
    const events: EngineEvent[] = [];
    engine.onEvent((event) => events.push(event));

    // Framework lends 1000 and asks the strategy to deploy it
    expect(await engine.adjustPosition(0n)).toBe(1_000n);
    expect(sim.chain.depositOf(venue, self)).toBe(1_000n);

    // First harvest, final hop through the stable-swap pool
    sim.venue.accrue(self, { rewardA: 10n, rewardB: 2n });
    expect(await engine.prepareReturn(0n)).toEqual({ profit: 12n, loss: 0n, debtPayment: 0n });

    const firstCycle = events.filter((e) => e.type === 'conversion_executed');
    expect(firstCycle.map((e) => (e.type === 'conversion_executed' ? e.receipt.kind : null))).toEqual([
      'router-path',
      'router-native',
      'stable-pool',
    ]);

    // Framework collects the profit; the rest goes back to work
    sim.chain.transfer(base, self, VAULT, 12n);
    expect(await engine.adjustPosition(0n)).toBe(1n);
    expect(sim.chain.depositOf(venue, self)).toBe(1_000n);

    // Second harvest through the router
    engine.setRouteSelector(OPERATOR, 'router');
    events.length = 0;
    sim.venue.accrue(self, { rewardA: 5n });
    expect(await engine.prepareReturn(0n)).toEqual({ profit: 5n, loss: 0n, debtPayment: 0n });

    expect(events.map((e) => (e.type === 'conversion_executed' ? e.receipt.kind : e.type))).toEqual([
      'router-path',
      'router-single',
      'harvest_reported',
    ]);

    // Full exit
    expect(await engine.liquidateAllPositions()).toBe(1_005n);
    expect(sim.chain.depositOf(venue, self)).toBe(0n);
    expect(sim.chain.balanceOf(base, self)).toBe(1_005n);
  });
});
