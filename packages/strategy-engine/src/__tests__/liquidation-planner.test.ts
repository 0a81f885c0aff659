import { describe, it, expect } from 'vitest';
import { ZERO_ADDRESS } from '@sluice/types';
import { createSimulatedDeployment, SIM_ADDRESSES, type SeedBalances } from '@sluice/simulator';
import { LiquidationPlanner } from '../liquidation-planner';
import { YieldVenueAdapter } from '../venue';
import { ExternalCallError } from '../errors';

function setup(seed: SeedBalances) {
  const sim = createSimulatedDeployment();
  sim.seed(seed);
  const venue = new YieldVenueAdapter(sim.venue, sim.ledger, SIM_ADDRESSES.strategy, SIM_ADDRESSES.base, ZERO_ADDRESS);
  const planner = new LiquidationPlanner(SIM_ADDRESSES.strategy, SIM_ADDRESSES.base, sim.ledger, venue);
  return { sim, planner };
}

describe('LiquidationPlanner', () => {
  it('serves the request from idle balance without touching the venue', async () => {
    const { sim, planner } = setup({ idleBase: 100n, deposited: 500n });

    const result = await planner.liquidate(60n);

    expect(result).toEqual({ liquidated: 60n, loss: 0n });
    expect(sim.chain.calls('venue.withdrawFromPool')).toHaveLength(0);
  });

  it('withdraws exactly the shortfall when the venue covers it', async () => {
    const { sim, planner } = setup({ idleBase: 40n, deposited: 200n });

    const result = await planner.liquidate(90n);

    expect(result).toEqual({ liquidated: 90n, loss: 0n });
    const withdrawals = sim.chain.calls('venue.withdrawFromPool');
    expect(withdrawals).toHaveLength(1);
    expect(withdrawals[0].args).toEqual([50n]);
    expect(sim.chain.depositOf(SIM_ADDRESSES.venue, SIM_ADDRESSES.strategy)).toBe(150n);
  });

  it('reports what cannot be recovered as loss', async () => {
    const { sim, planner } = setup({ idleBase: 0n, deposited: 100n });

    const result = await planner.liquidate(150n);

    expect(result).toEqual({ liquidated: 100n, loss: 50n });
    expect(sim.chain.calls('venue.withdrawFromPool')[0].args).toEqual([100n]);
    expect(sim.chain.depositOf(SIM_ADDRESSES.venue, SIM_ADDRESSES.strategy)).toBe(0n);
  });

  it('skips the withdrawal when nothing is deposited', async () => {
    const { sim, planner } = setup({ idleBase: 10n });

    const result = await planner.liquidate(30n);

    expect(result).toEqual({ liquidated: 10n, loss: 20n });
    expect(sim.chain.calls('venue.withdrawFromPool')).toHaveLength(0);
  });

  it('treats a zero request as already satisfied', async () => {
    const { sim, planner } = setup({ deposited: 100n });

    expect(await planner.liquidate(0n)).toEqual({ liquidated: 0n, loss: 0n });
    expect(sim.chain.trace).toHaveLength(0);
  });

  it('surfaces a failed withdrawal as an external call error', async () => {
    const { sim, planner } = setup({ idleBase: 0n, deposited: 100n });
    sim.chain.failNext('venue.withdrawFromPool', 'paused');

    await expect(planner.liquidate(50n)).rejects.toThrow(ExternalCallError);
  });
});
