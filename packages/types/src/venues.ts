import type { Address, Hex, PriceReading } from './common.js';

// ============================================================================
// Capability Interfaces
//
// The strategy engine never talks to a chain library directly -- only
// through these interfaces. Chain-backed implementations live in the
// adapter packages; the simulator implements all of them in memory.
// ============================================================================

/** Balances, allowances and native transfers for the engine's account */
export interface TokenLedger {
  balanceOf(asset: Address, holder: Address): Promise<bigint>;
  nativeBalanceOf(holder: Address): Promise<bigint>;
  allowance(asset: Address, owner: Address, spender: Address): Promise<bigint>;
  /** Approve `spender` for `amount` of `asset` on behalf of the engine's account */
  approve(asset: Address, spender: Address, amount: bigint): Promise<void>;
  /** Send native currency from the engine's account */
  transferNative(to: Address, amount: bigint): Promise<void>;
}

/** The external yield source (stability-pool style) */
export interface YieldVenue {
  readonly address: Address;
  provideToPool(amount: bigint, referrer: Address): Promise<void>;
  /** Withdraws up to `amount`; the venue caps to the compounded deposit */
  withdrawFromPool(amount: bigint): Promise<void>;
  getCompoundedDeposit(who: Address): Promise<bigint>;
  getDepositorRewardAGain(who: Address): Promise<bigint>;
  getDepositorRewardBGain(who: Address): Promise<bigint>;
}

/** Multi-hop path swap parameters (router-style) */
export interface ExactInputParams {
  /** Encoded path: token, fee, token, fee, token ... */
  path: Hex;
  recipient: Address;
  /** Unix seconds */
  deadline: bigint;
  amountIn: bigint;
  minOut: bigint;
}

/** Single-pool swap parameters */
export interface ExactInputSingleParams {
  tokenIn: Address;
  tokenOut: Address;
  /** Pool fee tier in hundredths of a bip (500 = 0.05%) */
  fee: number;
  recipient: Address;
  deadline: bigint;
  amountIn: bigint;
  minOut: bigint;
}

/** Router venue (Uniswap v3 style) */
export interface SwapRouter {
  readonly address: Address;
  exactInput(params: ExactInputParams): Promise<void>;
  exactInputSingle(params: ExactInputSingleParams): Promise<void>;
  /**
   * Pay `amountIn` of native currency as call value; `tokenIn` must be the
   * wrapped native token. Unspent native currency is refunded to the caller.
   */
  exactInputSingleNative(params: ExactInputSingleParams): Promise<void>;
  /** Encode a token/fee path the way `exactInput` expects it */
  encodePath(tokens: readonly Address[], fees: readonly number[]): Hex;
}

/** Pool-style venue (Curve stable-swap style) */
export interface StableSwapPool {
  readonly address: Address;
  getDy(i: number, j: number, dx: bigint): Promise<bigint>;
  exchange(i: number, j: number, dx: bigint, minDy: bigint): Promise<void>;
}

/** Price feed for the native currency (or another asset) in base-asset terms */
export interface PriceOracle {
  lastPrice(): Promise<PriceReading>;
}

/** The upstream capital-allocation framework, read-only from the engine */
export interface VaultFramework {
  /** Base-asset amount the framework currently lends to `strategy` */
  totalDebt(strategy: Address): Promise<bigint>;
}

/** Whole-call rollback: snapshot before an entry point, revert on failure */
export interface Checkpointer {
  snapshot(): Promise<Hex>;
  revert(id: Hex): Promise<void>;
}
