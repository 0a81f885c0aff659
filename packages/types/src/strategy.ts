import type { Address, RouteSelector } from './common.js';

// ============================================================================
// Strategy Reports
// ============================================================================

/** Result of one harvest cycle, as reported to the upstream framework */
export interface HarvestReport {
  profit: bigint;
  loss: bigint;
  debtPayment: bigint;
}

/** Result of a liquidation request */
export interface LiquidationResult {
  /** Base asset now idle and available to the caller */
  liquidated: bigint;
  /** Portion of the request that could not be produced */
  loss: bigint;
}

/** Expected output and slippage floor for one conversion attempt */
export interface ConversionQuote {
  amountIn: bigint;
  /** Venue-quoted output; null when the venue is not queried */
  expectedOut: bigint | null;
  minOut: bigint;
}

/** Kinds of conversion legs */
export type ConversionKind = 'router-path' | 'router-native' | 'router-single' | 'stable-pool';

/** Record of an executed conversion */
export interface ConversionReceipt {
  kind: ConversionKind;
  /** Input asset, or null for native currency */
  assetIn: Address | null;
  assetOut: Address;
  venue: Address;
  amountIn: bigint;
  amountOut: bigint;
  quote: ConversionQuote;
}

/** Outcome of one claim-and-convert pass */
export interface PipelineReport {
  /** Whether a minimal venue withdrawal was made to settle rewards */
  claimed: boolean;
  selector: RouteSelector;
  conversions: ConversionReceipt[];
}

/** Breakdown of everything the engine holds, in native units and base value */
export interface Holdings {
  idleBase: bigint;
  recoverable: bigint;
  rewardA: {
    idle: bigint;
    pending: bigint;
    /** Base value, or null when no feed is configured for reward A */
    valueInBase: bigint | null;
  };
  native: {
    idle: bigint;
    pending: bigint;
    valueInBase: bigint;
  };
  secondary: {
    idle: bigint;
    /** Base value at the stable-swap pool's quote */
    valueInBase: bigint;
  };
  total: bigint;
}

// ============================================================================
// Policies
// ============================================================================

/**
 * How a loss realised while liquidating is combined with the profit computed
 * before liquidation.
 * - net: offset against profit first, remainder becomes loss
 * - separate: added to loss in full; profit is forfeited when both would be nonzero
 */
export type LossNettingPolicy = 'net' | 'separate';

/**
 * How much idle base asset `adjustPosition` deposits.
 * - reserve-debt: everything above debtOutstanding
 * - deposit-all: the whole idle balance
 */
export type RedeployPolicy = 'reserve-debt' | 'deposit-all';
