import { parseUnits } from 'viem';

/**
 * Parse a human-readable token amount ("1.5") into raw units.
 */
export function parseAmount(value: string, decimals: number = 18): bigint {
  if (!/^\d+(\.\d+)?$/.test(value.trim())) {
    throw new Error(`Invalid amount: "${value}"`);
  }
  return parseUnits(value.trim(), decimals);
}
