import type {
  Address,
  Checkpointer,
  ConversionReceipt,
  HarvestReport,
  LiquidationResult,
  LossNettingPolicy,
  PipelineReport,
  PriceOracle,
  RedeployPolicy,
  RouteSelector,
  StableSwapPool,
  StrategyAssets,
  SwapRouter,
  TokenLedger,
  VaultFramework,
  YieldVenue,
} from '@sluice/types';

// ============================================================================
// Collaborators
// ============================================================================

/** Everything the engine talks to, resolved at construction time */
export interface StrategyEngineDeps {
  /** The account that holds idle balances and the venue position */
  self: Address;
  assets: StrategyAssets;
  ledger: TokenLedger;
  venue: YieldVenue;
  router: SwapRouter;
  pool: StableSwapPool;
  /** Base-asset price of the native currency */
  nativeOracle: PriceOracle;
  /** Base-asset price of reward A; reward A is left out of valuations without one */
  rewardAOracle?: PriceOracle;
  framework: VaultFramework;
  checkpointer: Checkpointer;
  /** Unix milliseconds; injectable for deterministic deadlines */
  clock?: () => number;
}

// ============================================================================
// Route Configuration
// ============================================================================

/** Fee tiers and pool indices for the fixed conversion routes */
export interface ConversionRoutesConfig {
  /** rewardA -> bridge fee tier */
  rewardAToBridgeFee: number;
  /** bridge -> secondary fee tier */
  bridgeToSecondaryFee: number;
  /** native (as wrapped bridge asset) -> secondary fee tier */
  nativeToSecondaryFee: number;
  /** secondary -> base fee tier on the router */
  secondaryToBaseFee: number;
  /** Pool index of the secondary asset */
  poolSecondaryIndex: number;
  /** Pool index of the base asset */
  poolBaseIndex: number;
}

// ============================================================================
// Engine Configuration
// ============================================================================

export interface StrategyEngineConfig {
  /** Human-readable strategy name reported upstream */
  name: string;
  lossNetting: LossNettingPolicy;
  redeploy: RedeployPolicy;
  /** Initial final-hop venue */
  routeSelector: RouteSelector;
  /** Pool-venue slippage tolerance in bps of the quoted output (500 = accept 95%) */
  poolSlippageBps: number;
  /**
   * Router final-hop floor in bps of amountIn, assuming secondary and base
   * trade near parity. 0 disables the floor.
   */
  routerMinOutBps: number;
  /** Amount withdrawn from the venue to settle rewards before converting */
  claimWithdrawAmount: bigint;
  /** Native currency left unconverted (gas money for EOA deployments) */
  nativeReserve: bigint;
  /** Seconds added to the clock for swap deadlines */
  swapDeadlineSeconds: number;
  /** Referrer passed to the venue on deposit */
  referrer: Address;
  /** Reject oracle readings older than this (when the feed reports a timestamp) */
  maxPriceAgeSeconds: number | null;
  operators: Address[];
  routes: ConversionRoutesConfig;
}

export const DEFAULT_ROUTES_CONFIG: ConversionRoutesConfig = {
  rewardAToBridgeFee: 3_000,
  bridgeToSecondaryFee: 500,
  nativeToSecondaryFee: 500,
  secondaryToBaseFee: 500,
  poolSecondaryIndex: 1,
  poolBaseIndex: 0,
};

export const DEFAULT_ENGINE_CONFIG: StrategyEngineConfig = {
  name: 'StrategyStabilityPool',
  lossNetting: 'net',
  redeploy: 'reserve-debt',
  routeSelector: 'pool',
  poolSlippageBps: 500,
  routerMinOutBps: 0,
  claimWithdrawAmount: 1n,
  nativeReserve: 0n,
  swapDeadlineSeconds: 0,
  referrer: '0x0000000000000000000000000000000000000000',
  maxPriceAgeSeconds: null,
  operators: [],
  routes: DEFAULT_ROUTES_CONFIG,
};

// ============================================================================
// Events
// ============================================================================

/** Events emitted by the engine */
export type EngineEvent =
  | { type: 'harvest_reported'; report: HarvestReport; totalDebt: bigint; pipeline: PipelineReport }
  | { type: 'conversion_executed'; receipt: ConversionReceipt }
  | { type: 'liquidated'; requested: bigint; result: LiquidationResult }
  | { type: 'position_adjusted'; deposited: bigint }
  | { type: 'force_withdrawn'; requested: bigint; received: bigint }
  | { type: 'migrated'; successor: Address; withdrawn: bigint }
  | { type: 'route_changed'; from: RouteSelector; to: RouteSelector; by: Address }
  | { type: 'native_swept'; to: Address; amount: bigint }
  | { type: 'rolled_back'; entryPoint: string; error: string };

/** Callback for engine events */
export type EngineEventCallback = (event: EngineEvent) => void;
