/**
 * @sluice/simulator - In-process chain for exercising the strategy engine
 *
 * Every venue the engine talks to, backed by one in-memory ledger with
 * snapshot/revert and a call trace.
 */

export { SimulatedChain, type ChainCall, type ChainState } from './chain.js';
export { SimulatedLedger } from './ledger.js';
export { SimulatedStabilityPool } from './venue.js';
export { SimulatedSwapRouter, decodePath } from './router.js';
export { SimulatedStableSwapPool } from './pool.js';
export { SimulatedPriceOracle } from './oracle.js';
export { SimulatedVault } from './vault.js';
export {
  createSimulatedDeployment,
  DEFAULT_MARKET,
  SIM_ADDRESSES,
  SIM_ASSETS,
  type SeedBalances,
  type SimulatedDeployment,
  type SimulatedEngineDeps,
  type SimulatedMarket,
} from './scenario.js';
