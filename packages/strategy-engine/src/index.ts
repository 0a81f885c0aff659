/**
 * @sluice/strategy-engine - Harvest/rebalance state machine for Sluice
 *
 * Deploys a base asset into a yield venue, converts venue rewards back into
 * the base asset, and reports profit, loss and freed liquidity upstream.
 *
 * Components:
 * - StrategyEngine: entry points for the upstream framework and operators
 * - ConversionPipeline / ConversionRoute: claim -> reward A -> native -> final hop
 * - AccountingModule: total estimated value of all holdings
 * - LiquidationPlanner: frees base asset, classifies shortfalls as loss
 * - ValuationOracle: prices non-base balances in base-asset terms
 * - YieldVenueAdapter: pass-through to the yield venue
 */

export { StrategyEngine } from './engine.js';
export { AccountingModule, type AccountingOptions } from './accounting.js';
export { LiquidationPlanner } from './liquidation-planner.js';
export { ValuationOracle } from './valuation.js';
export { YieldVenueAdapter } from './venue.js';
export { OperatorSet } from './operator.js';
export { applyLossNetting, redeployAmount, type ProfitAndLoss } from './policies.js';
export { ConversionPipeline, type PipelineOptions, type ConversionCallback } from './conversion/pipeline.js';
export { ConversionRoute, MAX_ALLOWANCE, type RouteDefinition, type RouteContext } from './conversion/route.js';
export {
  EngineError,
  ExternalCallError,
  PriceUnavailableError,
  StalePriceError,
  UnauthorizedError,
  CycleInProgressError,
  InsufficientBalanceError,
  external,
  type EngineErrorCode,
  type ExternalSource,
} from './errors.js';
export {
  type StrategyEngineConfig,
  type StrategyEngineDeps,
  type ConversionRoutesConfig,
  type EngineEvent,
  type EngineEventCallback,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_ROUTES_CONFIG,
} from './types.js';
