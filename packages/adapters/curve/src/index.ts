/**
 * @sluice/adapters-curve - Curve stable-swap pool adapter
 */

export { CurvePoolAdapter, type CurvePoolOptions } from './adapter.js';
export { STABLE_SWAP_ABI } from './constants.js';
