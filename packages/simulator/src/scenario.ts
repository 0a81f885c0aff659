import type {
  Address,
  Checkpointer,
  PriceOracle,
  StableSwapPool,
  StrategyAssets,
  SwapRouter,
  TokenLedger,
  VaultFramework,
  YieldVenue,
} from '@sluice/types';
import { WAD } from '@sluice/types';
import { SimulatedChain } from './chain.js';
import { SimulatedLedger } from './ledger.js';
import { SimulatedPriceOracle } from './oracle.js';
import { SimulatedStableSwapPool } from './pool.js';
import { SimulatedSwapRouter } from './router.js';
import { SimulatedVault } from './vault.js';
import { SimulatedStabilityPool } from './venue.js';

// ============================================================================
// Addresses
// ============================================================================

export const SIM_ADDRESSES = {
  strategy: '0x5000000000000000000000000000000000000001',
  venue: '0x5000000000000000000000000000000000000002',
  router: '0x5000000000000000000000000000000000000003',
  pool: '0x5000000000000000000000000000000000000004',
  base: '0xa000000000000000000000000000000000000001',
  rewardA: '0xa000000000000000000000000000000000000002',
  bridge: '0xa000000000000000000000000000000000000003',
  secondary: '0xa000000000000000000000000000000000000004',
} as const satisfies Record<string, Address>;

export const SIM_ASSETS: StrategyAssets = {
  base: { symbol: 'LUSD', name: 'LUSD Stablecoin', address: SIM_ADDRESSES.base, decimals: 18 },
  rewardA: { symbol: 'LQTY', name: 'LQTY', address: SIM_ADDRESSES.rewardA, decimals: 18 },
  bridge: { symbol: 'WETH', name: 'Wrapped Ether', address: SIM_ADDRESSES.bridge, decimals: 18 },
  secondary: { symbol: 'DAI', name: 'Dai Stablecoin', address: SIM_ADDRESSES.secondary, decimals: 18 },
};

// ============================================================================
// Deployment
// ============================================================================

/** Market parameters, all WAD-scaled */
export interface SimulatedMarket {
  /** Base-asset price of one unit of native currency */
  nativePrice: bigint;
  /** Base-asset price of one unit of reward A; null leaves reward A unpriced */
  rewardAPrice: bigint | null;
  rewardAToBridge: bigint;
  /** Also the native-currency rate, since the router trades native as its wrapped token */
  bridgeToSecondary: bigint;
  secondaryToBasePool: bigint;
  secondaryToBaseRouter: bigint;
}

export const DEFAULT_MARKET: SimulatedMarket = {
  nativePrice: 2_000n * WAD,
  rewardAPrice: null,
  rewardAToBridge: WAD,
  bridgeToSecondary: WAD,
  secondaryToBasePool: WAD,
  secondaryToBaseRouter: WAD,
};

/** Collaborators in the shape the strategy engine takes */
export interface SimulatedEngineDeps {
  self: Address;
  assets: StrategyAssets;
  ledger: TokenLedger;
  venue: YieldVenue;
  router: SwapRouter;
  pool: StableSwapPool;
  nativeOracle: PriceOracle;
  rewardAOracle?: PriceOracle;
  framework: VaultFramework;
  checkpointer: Checkpointer;
  clock: () => number;
}

export interface SimulatedDeployment {
  chain: SimulatedChain;
  ledger: SimulatedLedger;
  venue: SimulatedStabilityPool;
  router: SimulatedSwapRouter;
  pool: SimulatedStableSwapPool;
  nativeOracle: SimulatedPriceOracle;
  rewardAOracle: SimulatedPriceOracle | null;
  vault: SimulatedVault;
  deps: SimulatedEngineDeps;
  /** Set the strategy's idle, deposited and pending balances in one go */
  seed(balances: SeedBalances): void;
}

export interface SeedBalances {
  idleBase?: bigint;
  deposited?: bigint;
  idleRewardA?: bigint;
  idleNative?: bigint;
  idleSecondary?: bigint;
  pendingRewardA?: bigint;
  pendingRewardB?: bigint;
  totalDebt?: bigint;
}

/**
 * Wire up a complete in-memory deployment: venue, router, pool, oracles and
 * vault sharing one SimulatedChain. The engine's clock follows the chain's
 * timestamp.
 */
export function createSimulatedDeployment(market: Partial<SimulatedMarket> = {}): SimulatedDeployment {
  const m = { ...DEFAULT_MARKET, ...market };
  const self = SIM_ADDRESSES.strategy;
  const { base, rewardA, bridge, secondary } = SIM_ASSETS;

  const chain = new SimulatedChain(self);
  const ledger = new SimulatedLedger(chain);
  const venue = new SimulatedStabilityPool(chain, SIM_ADDRESSES.venue, base.address, rewardA.address);

  const router = new SimulatedSwapRouter(chain, SIM_ADDRESSES.router);
  router.setRate(rewardA.address, bridge.address, m.rewardAToBridge);
  router.setRate(bridge.address, secondary.address, m.bridgeToSecondary);
  router.setRate(secondary.address, base.address, m.secondaryToBaseRouter);

  const pool = new SimulatedStableSwapPool(chain, SIM_ADDRESSES.pool, [base.address, secondary.address]);
  pool.setRate(1, 0, m.secondaryToBasePool);
  pool.setRate(0, 1, m.secondaryToBasePool === 0n ? 0n : (WAD * WAD) / m.secondaryToBasePool);

  const nativeOracle = new SimulatedPriceOracle(m.nativePrice);
  const rewardAOracle = m.rewardAPrice === null ? null : new SimulatedPriceOracle(m.rewardAPrice);
  const vault = new SimulatedVault();

  const deps: SimulatedEngineDeps = {
    self,
    assets: SIM_ASSETS,
    ledger,
    venue,
    router,
    pool,
    nativeOracle,
    framework: vault,
    checkpointer: chain,
    clock: () => chain.timestamp * 1000,
  };
  if (rewardAOracle) {
    deps.rewardAOracle = rewardAOracle;
  }

  const seed = (balances: SeedBalances): void => {
    if (balances.idleBase !== undefined) chain.mint(base.address, self, balances.idleBase);
    if (balances.idleRewardA !== undefined) chain.mint(rewardA.address, self, balances.idleRewardA);
    if (balances.idleSecondary !== undefined) chain.mint(secondary.address, self, balances.idleSecondary);
    if (balances.idleNative !== undefined) chain.setNativeBalance(self, balances.idleNative);
    if (balances.deposited !== undefined) {
      // Principal sits in the venue's own token balance
      chain.mint(base.address, venue.address, balances.deposited);
      chain.setDeposit(venue.address, self, balances.deposited);
    }
    if (balances.pendingRewardA !== undefined || balances.pendingRewardB !== undefined) {
      venue.accrue(self, { rewardA: balances.pendingRewardA, rewardB: balances.pendingRewardB });
    }
    if (balances.totalDebt !== undefined) vault.setDebt(self, balances.totalDebt);
  };

  return { chain, ledger, venue, router, pool, nativeOracle, rewardAOracle, vault, deps, seed };
}
