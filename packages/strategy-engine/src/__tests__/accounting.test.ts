import { describe, it, expect } from 'vitest';
import { WAD, ZERO_ADDRESS } from '@sluice/types';
import {
  createSimulatedDeployment,
  SIM_ADDRESSES,
  SIM_ASSETS,
  type SeedBalances,
  type SimulatedMarket,
} from '@sluice/simulator';
import { AccountingModule } from '../accounting';
import { ValuationOracle } from '../valuation';
import { YieldVenueAdapter } from '../venue';
import { PriceUnavailableError } from '../errors';

function setup(seed: SeedBalances, market: Partial<SimulatedMarket> = {}, nativeReserve = 0n) {
  const sim = createSimulatedDeployment(market);
  sim.seed(seed);
  const valuation = new ValuationOracle(sim.nativeOracle);
  if (sim.rewardAOracle) {
    valuation.addFeed(SIM_ADDRESSES.rewardA, sim.rewardAOracle);
  }
  const venue = new YieldVenueAdapter(sim.venue, sim.ledger, SIM_ADDRESSES.strategy, SIM_ADDRESSES.base, ZERO_ADDRESS);
  const accounting = new AccountingModule(SIM_ADDRESSES.strategy, SIM_ASSETS, sim.ledger, venue, valuation, {
    nativeReserve,
    quoteSecondary: (amount) => sim.pool.getDy(1, 0, amount),
  });
  return { sim, accounting };
}

const MIXED: SeedBalances = {
  idleBase: 10n,
  deposited: 100n,
  idleRewardA: 5n,
  pendingRewardA: 7n,
  idleNative: 1n,
  pendingRewardB: 2n,
  idleSecondary: 3n,
};

describe('AccountingModule', () => {
  it('sums idle base, recoverable principal, native and secondary value', async () => {
    const { accounting } = setup(MIXED);

    const holdings = await accounting.holdings();

    expect(holdings).toEqual({
      idleBase: 10n,
      recoverable: 100n,
      rewardA: { idle: 5n, pending: 7n, valueInBase: null },
      native: { idle: 1n, pending: 2n, valueInBase: 6_000n },
      secondary: { idle: 3n, valueInBase: 3n },
      total: 6_113n,
    });
    expect(await accounting.estimatedTotalAssets()).toBe(6_113n);
  });

  it('includes reward A once a feed is configured', async () => {
    const { accounting } = setup(MIXED, { rewardAPrice: 2n * WAD });

    const holdings = await accounting.holdings();

    expect(holdings.rewardA.valueInBase).toBe(24n);
    expect(holdings.total).toBe(6_137n);
  });

  it('leaves the native reserve out of the total', async () => {
    const { accounting } = setup(MIXED, {}, 1n);

    const holdings = await accounting.holdings();

    expect(holdings.native).toEqual({ idle: 1n, pending: 2n, valueInBase: 4_000n });
    expect(holdings.total).toBe(4_113n);
  });

  it('values idle secondary asset at the pool quote', async () => {
    const { sim, accounting } = setup({ idleSecondary: 1_000n }, { secondaryToBasePool: (WAD * 99n) / 100n });

    expect(await accounting.estimatedTotalAssets()).toBe(990n);
    expect(sim.chain.calls('pool.get_dy')).toHaveLength(1);
  });

  it('fails when the native price is zero and there is native value to price', async () => {
    const { sim, accounting } = setup(MIXED);
    sim.nativeOracle.setPrice(0n);

    await expect(accounting.estimatedTotalAssets()).rejects.toThrow(PriceUnavailableError);
  });

  it('does not consult the native feed when there is nothing to price', async () => {
    const { sim, accounting } = setup({ idleBase: 10n, deposited: 100n });
    sim.nativeOracle.setPrice(0n);

    expect(await accounting.estimatedTotalAssets()).toBe(110n);
    expect(sim.nativeOracle.queries).toBe(0);
    expect(sim.chain.calls('pool.get_dy')).toEqual([]);
  });

  it('post-conversion value counts only idle base and recoverable principal', async () => {
    const { accounting } = setup(MIXED);
    expect(await accounting.postConversionValue()).toBe(110n);
  });
});
