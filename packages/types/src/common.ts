import type { Address, Hex } from 'viem';

export type { Address, Hex };

// ============================================================================
// Core Primitives
// ============================================================================

/** Supported chains for the bundled adapters */
export type ChainName = 'mainnet' | 'anvil';

/** Final-hop conversion venue choice (operator-controlled) */
export type RouteSelector = 'pool' | 'router';

/** Roles an asset plays for the engine */
export type AssetRole = 'base' | 'rewardA' | 'bridge' | 'secondary';

/** 1e18, the fixed-point scale used by prices */
export const WAD = 1_000_000_000_000_000_000n;

/** Basis-point denominator */
export const BPS_DENOMINATOR = 10_000n;

/** Sentinel referrer / recipient */
export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

// ============================================================================
// Asset Types
// ============================================================================

/** Known ERC-20 asset */
export interface AssetInfo {
  symbol: string;
  name: string;
  address: Address;
  decimals: number;
}

/** The set of assets a strategy touches, keyed by role */
export type StrategyAssets = Record<AssetRole, AssetInfo>;

/** Price returned by an oracle, 18-decimal fixed point */
export interface PriceReading {
  /** Base-asset units per whole unit of the priced asset, scaled by 1e18 */
  price: bigint;
  /** Unix timestamp in seconds, when the feed reports one */
  updatedAt?: number;
  source: 'liquity' | 'chainlink' | 'simulated';
}

// ============================================================================
// Configuration
// ============================================================================

/** Sluice global configuration (CLI) */
export interface SluiceConfig {
  chain: ChainName;
  rpcUrl: string;
  /** Hex private key of the engine's signing account */
  privateKey?: Hex;
  /** Upstream vault whose debt figures drive harvests */
  vaultAddress?: Address;
  operators: Address[];
  /** Path of the JSON file that persists the route selector */
  stateFile: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}
