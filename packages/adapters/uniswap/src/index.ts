/**
 * @sluice/adapters-uniswap - Uniswap v3 SwapRouter adapter
 *
 * Supports:
 * - Multi-hop exact-input swaps over a packed path
 * - Single-pool exact-input swaps
 * - Native-currency input with refund of unspent value
 */

export { UniswapRouterAdapter } from './adapter.js';
export { SWAP_ROUTER_ABI } from './constants.js';
