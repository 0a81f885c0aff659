import { describe, it, expect } from 'vitest';
import { WAD, type Address } from '@sluice/types';
import { createSimulatedDeployment, SIM_ADDRESSES, type SeedBalances, type SimulatedMarket } from '@sluice/simulator';
import { ConversionRoute, MAX_ALLOWANCE, type RouteContext, type RouteDefinition } from '../conversion/route';
import { ExternalCallError } from '../errors';

const { strategy: self, base, rewardA, bridge, secondary, pool } = SIM_ADDRESSES;

const POOL_FINAL: RouteDefinition = { kind: 'stable-pool', tokenIn: secondary, tokenOut: base, i: 1, j: 0, slippageBps: 500 };

function setup(seed: SeedBalances, market: Partial<SimulatedMarket> = {}) {
  const sim = createSimulatedDeployment(market);
  sim.seed(seed);
  const ctx: RouteContext = { self, ledger: sim.ledger, router: sim.router, pool: sim.pool, deadline: () => 0n };
  return { sim, route: (definition: RouteDefinition) => new ConversionRoute(definition, ctx) };
}

function balance(sim: ReturnType<typeof createSimulatedDeployment>, asset: Address): bigint {
  return sim.chain.balanceOf(asset, self);
}

describe('ConversionRoute', () => {
  describe('stable-pool', () => {
    it('floors the output at 95% of the quoted amount by default', async () => {
      const { route } = setup({});
      const quote = await route(POOL_FINAL).quote(1_000n);
      expect(quote).toEqual({ amountIn: 1_000n, expectedOut: 1_000n, minOut: 950n });
    });

    it('approves the pool once, with the maximum allowance', async () => {
      const { sim, route } = setup({ idleSecondary: 2_000n });
      const finalHop = route(POOL_FINAL);

      await finalHop.convert(1_000n);
      await finalHop.convert(500n);

      const approvals = sim.chain.calls('ledger.approve');
      expect(approvals).toHaveLength(1);
      expect(approvals[0].args).toEqual([MAX_ALLOWANCE]);
      expect(sim.chain.allowance(secondary, self, pool)).toBe(MAX_ALLOWANCE);
      expect(balance(sim, base)).toBe(1_500n);
    });

    it('skips the approval when the allowance already covers the amount', async () => {
      const { sim, route } = setup({ idleSecondary: 1_000n });
      sim.chain.approve(secondary, self, pool, 5_000n);

      await route(POOL_FINAL).convert(1_000n);

      expect(sim.chain.calls('ledger.approve')).toHaveLength(0);
      expect(sim.chain.allowance(secondary, self, pool)).toBe(4_000n);
    });

    it('reports what actually arrived', async () => {
      const { sim, route } = setup({ idleSecondary: 1_000n });
      sim.pool.executionShortfallBps = 400;

      const receipt = await route(POOL_FINAL).convert(1_000n);

      expect(receipt).toEqual({
        kind: 'stable-pool',
        assetIn: secondary,
        assetOut: base,
        venue: pool,
        amountIn: 1_000n,
        amountOut: 960n,
        quote: { amountIn: 1_000n, expectedOut: 1_000n, minOut: 950n },
      });
    });

    it('fails when execution lands below the floor', async () => {
      const { sim, route } = setup({ idleSecondary: 1_000n });
      sim.pool.executionShortfallBps = 600;

      await expect(route(POOL_FINAL).convert(1_000n)).rejects.toThrow(
        'pool.exchange failed: Exchange resulted in fewer coins than expected',
      );
    });
  });

  it('does nothing for a zero amount', async () => {
    const { sim, route } = setup({});
    expect(await route(POOL_FINAL).convert(0n)).toBeNull();
    expect(sim.chain.trace).toHaveLength(0);
  });

  it('routes reward A through the bridge asset with a zero floor', async () => {
    const { sim, route } = setup(
      { idleRewardA: 100n },
      { rewardAToBridge: WAD / 2n, bridgeToSecondary: 2_000n * WAD },
    );
    const path = route({ kind: 'router-path', tokens: [rewardA, bridge, secondary], fees: [3_000, 500] });

    const receipt = await path.convert(100n);

    expect(receipt?.amountOut).toBe(100_000n);
    expect(receipt?.quote.minOut).toBe(0n);
    expect(sim.chain.calls('router.exactInput')).toHaveLength(1);
    expect(balance(sim, rewardA)).toBe(0n);
  });

  it('spends native currency without an approval', async () => {
    const { sim, route } = setup({ idleNative: 3n });
    const native = route({ kind: 'router-native', wrappedNative: bridge, tokenOut: secondary, fee: 500 });

    const receipt = await native.convert(3n);

    expect(receipt?.assetIn).toBeNull();
    expect(receipt?.amountOut).toBe(3n);
    expect(sim.chain.nativeBalanceOf(self)).toBe(0n);
    expect(sim.chain.calls('ledger.approve')).toHaveLength(0);
  });

  it('enforces a router floor in bps of the input', async () => {
    const { route } = setup({ idleSecondary: 1_000n }, { secondaryToBaseRouter: (WAD * 98n) / 100n });
    const single = route({ kind: 'router-single', tokenIn: secondary, tokenOut: base, fee: 500, minOutBps: 9_900 });

    expect((await single.quote(1_000n)).minOut).toBe(990n);
    const err = await single.convert(1_000n).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalCallError);
    expect((err as ExternalCallError).message).toBe('router.exactInputSingle failed: Too little received');
  });
});
