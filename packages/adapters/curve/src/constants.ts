import { parseAbi } from 'viem';

/** Curve stable-swap pools; the LUSD/3CRV metapool's underlying coins are LUSD, DAI, USDC, USDT */
export const STABLE_SWAP_ABI = parseAbi([
  'function get_dy(int128 i, int128 j, uint256 dx) view returns (uint256)',
  'function exchange(int128 i, int128 j, uint256 dx, uint256 min_dy) returns (uint256)',
  'function get_dy_underlying(int128 i, int128 j, uint256 dx) view returns (uint256)',
  'function exchange_underlying(int128 i, int128 j, uint256 dx, uint256 min_dy) returns (uint256)',
]);
