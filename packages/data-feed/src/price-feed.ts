import { parseAbi, type Address } from 'viem';
import type { PriceOracle, PriceReading } from '@sluice/types';
import type { SluicePublicClient } from './connection.js';

const LIQUITY_PRICE_FEED_ABI = parseAbi(['function lastGoodPrice() view returns (uint256)']);

const CHAINLINK_AGGREGATOR_ABI = parseAbi([
  'function decimals() view returns (uint8)',
  'function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)',
]);

/**
 * Reads the native-currency price from a Liquity PriceFeed.
 *
 * `lastGoodPrice` is the view the protocol itself falls back to; it is already
 * 18-decimal and carries no timestamp.
 */
export class LiquityPriceFeed implements PriceOracle {
  constructor(
    private readonly client: SluicePublicClient,
    readonly address: Address,
  ) {}

  async lastPrice(): Promise<PriceReading> {
    const price = await this.client.readContract({
      address: this.address,
      abi: LIQUITY_PRICE_FEED_ABI,
      functionName: 'lastGoodPrice',
    });
    return { price, source: 'liquity' };
  }
}

/**
 * Reads a Chainlink aggregator and rescales the answer to 18 decimals.
 * A negative answer is reported as a zero price.
 */
export class ChainlinkPriceFeed implements PriceOracle {
  private decimals: number | null = null;

  constructor(
    private readonly client: SluicePublicClient,
    readonly address: Address,
  ) {}

  async lastPrice(): Promise<PriceReading> {
    const decimals = await this.getDecimals();
    const [, answer, , updatedAt] = await this.client.readContract({
      address: this.address,
      abi: CHAINLINK_AGGREGATOR_ABI,
      functionName: 'latestRoundData',
    });

    return {
      price: answer > 0n ? scaleTo18(answer, decimals) : 0n,
      updatedAt: Number(updatedAt),
      source: 'chainlink',
    };
  }

  private async getDecimals(): Promise<number> {
    if (this.decimals === null) {
      this.decimals = await this.client.readContract({
        address: this.address,
        abi: CHAINLINK_AGGREGATOR_ABI,
        functionName: 'decimals',
      });
    }
    return this.decimals;
  }
}

/** Rescale a fixed-point value with `decimals` places to 18 */
export function scaleTo18(value: bigint, decimals: number): bigint {
  if (decimals === 18) return value;
  return decimals < 18 ? value * 10n ** BigInt(18 - decimals) : value / 10n ** BigInt(decimals - 18);
}
