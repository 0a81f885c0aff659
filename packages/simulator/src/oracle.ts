import type { PriceOracle, PriceReading } from '@sluice/types';

/** Price feed whose reading is set by the scenario */
export class SimulatedPriceOracle implements PriceOracle {
  private updatedAt?: number;
  queries = 0;

  constructor(private price: bigint) {}

  setPrice(price: bigint, updatedAt?: number): void {
    this.price = price;
    this.updatedAt = updatedAt;
  }

  async lastPrice(): Promise<PriceReading> {
    this.queries++;
    return { price: this.price, updatedAt: this.updatedAt, source: 'simulated' };
  }
}
