import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { getAddress, isAddress, isHex } from 'viem';
import { parseAmount } from './amount.js';
import type {
  Address,
  ChainName,
  Hex,
  LossNettingPolicy,
  RedeployPolicy,
  RouteSelector,
  SluiceConfig,
} from '@sluice/types';
import type { StrategyEngineConfig } from '@sluice/strategy-engine';

export const ROUTE_SELECTORS: readonly RouteSelector[] = ['pool', 'router'];
const CHAIN_NAMES: readonly ChainName[] = ['mainnet', 'anvil'];
const LOG_LEVELS: readonly SluiceConfig['logLevel'][] = ['debug', 'info', 'warn', 'error'];
export const LOSS_NETTING: readonly LossNettingPolicy[] = ['net', 'separate'];
export const REDEPLOY: readonly RedeployPolicy[] = ['reserve-debt', 'deposit-all'];

/** Venue addresses that override the known deployment */
export interface VenueOverrides {
  stabilityPool?: Address;
  swapRouter?: Address;
  curvePool?: Address;
  priceFeed?: Address;
  /** Chainlink aggregator pricing reward A in base-asset terms */
  rewardAFeed?: Address;
}

export interface CliConfig extends SluiceConfig {
  venues: VenueOverrides;
  engine: Partial<StrategyEngineConfig>;
}

/**
 * Load Sluice configuration from environment variables and .env file.
 *
 * The .env file is only read when `env` is the process environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  if (env === process.env) {
    loadDotenv({ path: resolve(process.cwd(), '.env') });
  }

  const chain = oneOf('SLUICE_CHAIN', env.SLUICE_CHAIN || 'anvil', CHAIN_NAMES);
  if (env.SLUICE_STRATEGY_ADDRESS) {
    throw new Error('SLUICE_STRATEGY_ADDRESS is not supported: the engine acts as the SLUICE_PRIVATE_KEY account');
  }

  return {
    chain,
    rpcUrl: env.SLUICE_RPC_URL || '',
    privateKey: optionalPrivateKey(env.SLUICE_PRIVATE_KEY),
    vaultAddress: optionalAddress('SLUICE_VAULT_ADDRESS', env.SLUICE_VAULT_ADDRESS),
    operators: addressList('SLUICE_OPERATORS', env.SLUICE_OPERATORS),
    stateFile: env.SLUICE_STATE_FILE || resolve(process.cwd(), '.sluice-state.json'),
    logLevel: oneOf('SLUICE_LOG_LEVEL', env.SLUICE_LOG_LEVEL || 'info', LOG_LEVELS),
    venues: {
      stabilityPool: optionalAddress('SLUICE_STABILITY_POOL', env.SLUICE_STABILITY_POOL),
      swapRouter: optionalAddress('SLUICE_SWAP_ROUTER', env.SLUICE_SWAP_ROUTER),
      curvePool: optionalAddress('SLUICE_CURVE_POOL', env.SLUICE_CURVE_POOL),
      priceFeed: optionalAddress('SLUICE_PRICE_FEED', env.SLUICE_PRICE_FEED),
      rewardAFeed: optionalAddress('SLUICE_REWARD_A_FEED', env.SLUICE_REWARD_A_FEED),
    },
    engine: engineOverrides(env),
  };
}

// ---- Parsing helpers ----

function engineOverrides(env: NodeJS.ProcessEnv): Partial<StrategyEngineConfig> {
  const overrides: Partial<StrategyEngineConfig> = {};
  if (env.SLUICE_LOSS_NETTING) {
    overrides.lossNetting = oneOf('SLUICE_LOSS_NETTING', env.SLUICE_LOSS_NETTING, LOSS_NETTING);
  }
  if (env.SLUICE_REDEPLOY) {
    overrides.redeploy = oneOf('SLUICE_REDEPLOY', env.SLUICE_REDEPLOY, REDEPLOY);
  }
  if (env.SLUICE_POOL_SLIPPAGE_BPS) {
    overrides.poolSlippageBps = bps('SLUICE_POOL_SLIPPAGE_BPS', env.SLUICE_POOL_SLIPPAGE_BPS);
  }
  if (env.SLUICE_ROUTER_MIN_OUT_BPS) {
    overrides.routerMinOutBps = bps('SLUICE_ROUTER_MIN_OUT_BPS', env.SLUICE_ROUTER_MIN_OUT_BPS);
  }
  if (env.SLUICE_SWAP_DEADLINE_SECONDS) {
    overrides.swapDeadlineSeconds = wholeNumber('SLUICE_SWAP_DEADLINE_SECONDS', env.SLUICE_SWAP_DEADLINE_SECONDS);
  }
  if (env.SLUICE_NATIVE_RESERVE) {
    overrides.nativeReserve = nativeAmount('SLUICE_NATIVE_RESERVE', env.SLUICE_NATIVE_RESERVE);
  }
  if (env.SLUICE_MAX_PRICE_AGE_SECONDS) {
    overrides.maxPriceAgeSeconds = wholeNumber('SLUICE_MAX_PRICE_AGE_SECONDS', env.SLUICE_MAX_PRICE_AGE_SECONDS);
  }
  return overrides;
}

/** Narrow `value` to one of `allowed`, or throw naming the setting */
export function oneOf<T extends string>(name: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`${name} must be one of ${allowed.join(', ')} (got "${value}")`);
  }
  return match;
}

function optionalAddress(name: string, value: string | undefined): Address | undefined {
  if (!value) return undefined;
  if (!isAddress(value, { strict: false })) {
    throw new Error(`${name} is not a valid address: ${value}`);
  }
  return getAddress(value);
}

function addressList(name: string, value: string | undefined): Address[] {
  if (!value) return [];
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const address = optionalAddress(name, entry);
      if (!address) throw new Error(`${name} contains an empty entry`);
      return address;
    });
}

function optionalPrivateKey(value: string | undefined): Hex | undefined {
  if (!value) return undefined;
  const key = value.startsWith('0x') ? value : `0x${value}`;
  if (!isHex(key) || key.length !== 66) {
    throw new Error('SLUICE_PRIVATE_KEY must be a 32-byte hex string');
  }
  return key;
}

function nativeAmount(name: string, value: string): bigint {
  try {
    return parseAmount(value);
  } catch (err) {
    throw new Error(`${name}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function bps(name: string, value: string): number {
  const parsed = wholeNumber(name, value);
  if (parsed > 10_000) {
    throw new Error(`${name} must be at most 10000 (got ${parsed})`);
  }
  return parsed;
}

function wholeNumber(name: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${name} must be a non-negative integer (got "${value}")`);
  }
  return Number(value);
}
