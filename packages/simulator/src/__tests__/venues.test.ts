import { describe, it, expect } from 'vitest';
import { WAD } from '@sluice/types';
import { createSimulatedDeployment, SIM_ADDRESSES } from '../scenario';
import { decodePath } from '../router';

const { strategy: self, base, rewardA, bridge, secondary, venue } = SIM_ADDRESSES;

describe('SimulatedStabilityPool', () => {
  it('pays out pending rewards on withdrawal and caps to the deposit', async () => {
    const sim = createSimulatedDeployment();
    sim.seed({ deposited: 100n, pendingRewardA: 4n, pendingRewardB: 2n });

    await sim.venue.withdrawFromPool(1_000n);

    expect(sim.chain.balanceOf(base, self)).toBe(100n);
    expect(sim.chain.balanceOf(rewardA, self)).toBe(4n);
    expect(sim.chain.nativeBalanceOf(self)).toBe(2n);
    expect(await sim.venue.getCompoundedDeposit(self)).toBe(0n);
    expect(await sim.venue.getDepositorRewardAGain(self)).toBe(0n);
  });

  it('refuses a withdrawal without a deposit', async () => {
    const sim = createSimulatedDeployment();
    await expect(sim.venue.withdrawFromPool(1n)).rejects.toThrow('User must have a non-zero deposit');
  });

  it('absorbs liquidations by burning principal and crediting native gains', async () => {
    const sim = createSimulatedDeployment();
    sim.seed({ deposited: 100n });

    sim.venue.absorbLiquidation(self, 30n, 1n);

    expect(await sim.venue.getCompoundedDeposit(self)).toBe(70n);
    expect(await sim.venue.getDepositorRewardBGain(self)).toBe(1n);
    expect(sim.chain.balanceOf(base, venue)).toBe(70n);
  });
});

describe('SimulatedSwapRouter', () => {
  it('round-trips a packed path', () => {
    const sim = createSimulatedDeployment();
    const path = sim.router.encodePath([rewardA, bridge, secondary], [3_000, 500]);

    expect(path).toBe(`0x${rewardA.slice(2)}000bb8${bridge.slice(2)}0001f4${secondary.slice(2)}`);
    expect(decodePath(path)).toEqual({ tokens: [rewardA, bridge, secondary], fees: [3_000, 500] });
  });

  it('rejects swaps past their deadline', async () => {
    const sim = createSimulatedDeployment();
    sim.chain.setTimestamp(100);

    await expect(
      sim.router.exactInputSingle({
        tokenIn: secondary,
        tokenOut: base,
        fee: 500,
        recipient: self,
        deadline: 99n,
        amountIn: 1n,
        minOut: 0n,
      }),
    ).rejects.toThrow('Transaction too old');
  });
});

describe('SimulatedStableSwapPool', () => {
  it('quotes from the configured rate', async () => {
    const sim = createSimulatedDeployment({ secondaryToBasePool: (WAD * 99n) / 100n });
    expect(await sim.pool.getDy(1, 0, 1_000n)).toBe(990n);
    expect(sim.chain.calls('pool.get_dy')).toEqual([{ label: 'pool.get_dy', kind: 'quote', args: [1_000n] }]);
  });
});
