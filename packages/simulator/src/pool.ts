import { BPS_DENOMINATOR, WAD, type Address, type StableSwapPool } from '@sluice/types';
import type { SimulatedChain } from './chain.js';

/**
 * Simulated Curve-style stable-swap pool.
 *
 * Coins trade at fixed WAD-scaled rates. `executionShortfallBps` makes
 * `exchange` deliver less than `get_dy` quoted, to exercise the min-out check.
 */
export class SimulatedStableSwapPool implements StableSwapPool {
  private rates = new Map<string, bigint>();

  /** Shortfall between quote and execution, in bps */
  executionShortfallBps = 0;

  constructor(
    private readonly chain: SimulatedChain,
    readonly address: Address,
    readonly coins: readonly Address[],
  ) {}

  /** Output per 1e18 input when swapping coin `i` for coin `j` */
  setRate(i: number, j: number, rate: bigint): void {
    this.rates.set(`${i}:${j}`, rate);
  }

  async getDy(i: number, j: number, dx: bigint): Promise<bigint> {
    this.chain.record('pool.get_dy', 'quote', [dx]);
    return this.dy(i, j, dx);
  }

  async exchange(i: number, j: number, dx: bigint, minDy: bigint): Promise<void> {
    this.chain.record('pool.exchange', 'write', [dx, minDy]);
    const quoted = this.dy(i, j, dx);
    const delivered = (quoted * (BPS_DENOMINATOR - BigInt(this.executionShortfallBps))) / BPS_DENOMINATOR;
    if (delivered < minDy) {
      throw new Error('Exchange resulted in fewer coins than expected');
    }
    const who = this.chain.sender;
    this.chain.transferFrom(this.coin(i), this.address, who, this.address, dx);
    this.chain.mint(this.coin(j), who, delivered);
  }

  private dy(i: number, j: number, dx: bigint): bigint {
    const rate = this.rates.get(`${i}:${j}`);
    if (rate === undefined) {
      throw new Error(`no rate for coins ${i} -> ${j}`);
    }
    return (dx * rate) / WAD;
  }

  private coin(index: number): Address {
    const coin = this.coins[index];
    if (coin === undefined) {
      throw new Error(`coin index ${index} out of range`);
    }
    return coin;
  }
}
