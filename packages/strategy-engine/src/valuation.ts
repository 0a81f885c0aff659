import { WAD, type Address, type PriceOracle, type PriceReading } from '@sluice/types';
import { PriceUnavailableError, StalePriceError, external } from './errors.js';

/** A priced asset: the feed and a label for error messages */
interface PricedAsset {
  oracle: PriceOracle;
  label: string;
}

/**
 * Valuation Oracle Adapter
 *
 * Converts non-base balances into base-asset value using the most recent
 * price from the configured feeds. A zero price, a failed read, or a reading
 * older than `maxPriceAgeSeconds` is a hard failure; no fallback value is
 * ever substituted here.
 */
export class ValuationOracle {
  private feeds = new Map<string, PricedAsset>();

  constructor(
    private readonly nativeOracle: PriceOracle,
    private readonly maxPriceAgeSeconds: number | null = null,
    private readonly clock: () => number = Date.now,
  ) {}

  /** Register a feed for an ERC-20 asset */
  addFeed(asset: Address, oracle: PriceOracle, label: string = asset): void {
    this.feeds.set(asset.toLowerCase(), { oracle, label });
  }

  canValue(asset: Address): boolean {
    return this.feeds.has(asset.toLowerCase());
  }

  /** Base-asset value of `amount` native units (the `ethToWant` helper) */
  async nativeToBase(amount: bigint): Promise<bigint> {
    if (amount === 0n) return 0n;
    const reading = await this.read(this.nativeOracle, 'native price feed');
    return (amount * reading.price) / WAD;
  }

  /** Base-asset value of `amount` of an asset with a registered feed */
  async valueInBase(asset: Address, amount: bigint): Promise<bigint> {
    const feed = this.feeds.get(asset.toLowerCase());
    if (!feed) {
      throw new PriceUnavailableError(`${asset} (no feed configured)`);
    }
    if (amount === 0n) return 0n;
    const reading = await this.read(feed.oracle, feed.label);
    return (amount * reading.price) / WAD;
  }

  private async read(oracle: PriceOracle, label: string): Promise<PriceReading> {
    const reading = await external('oracle', `lastPrice(${label})`, () => oracle.lastPrice());

    if (reading.price <= 0n) {
      throw new PriceUnavailableError(label);
    }

    if (this.maxPriceAgeSeconds !== null && reading.updatedAt !== undefined) {
      const ageSeconds = Math.floor(this.clock() / 1000) - reading.updatedAt;
      if (ageSeconds > this.maxPriceAgeSeconds) {
        throw new StalePriceError(label, ageSeconds, this.maxPriceAgeSeconds);
      }
    }

    return reading;
  }
}
