/**
 * @sluice/adapters-stability-pool - Liquity Stability Pool yield venue
 *
 * Supports:
 * - Depositing LUSD (provideToSP)
 * - Withdrawing LUSD, which also pays out LQTY and ETH gains
 * - Reading the compounded deposit and pending gains
 */

export { StabilityPoolAdapter } from './adapter.js';
export { STABILITY_POOL_ABI } from './constants.js';
