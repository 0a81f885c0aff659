import type { Address, LiquidationResult, TokenLedger } from '@sluice/types';
import { external } from './errors.js';
import type { YieldVenueAdapter } from './venue.js';

/**
 * Liquidation Planner
 *
 * Frees base asset to satisfy a withdrawal request:
 * 1. Idle balance covers the request -> done, no venue call
 * 2. Otherwise withdraw the shortfall, clamped to the venue's recoverable balance
 * 3. Whatever is still missing after the withdrawal is a realized loss
 *
 * Conversions are never triggered here; a shortfall is a business outcome,
 * not an error.
 */
export class LiquidationPlanner {
  constructor(
    private readonly self: Address,
    private readonly baseAsset: Address,
    private readonly ledger: TokenLedger,
    private readonly venue: YieldVenueAdapter,
  ) {}

  async liquidate(amountNeeded: bigint): Promise<LiquidationResult> {
    const idle = await this.idleBase();
    if (idle >= amountNeeded) {
      return { liquidated: amountNeeded, loss: 0n };
    }

    const shortfall = amountNeeded - idle;
    const recoverable = await this.venue.recoverableBalance();
    const request = shortfall < recoverable ? shortfall : recoverable;

    if (request > 0n) {
      await this.venue.withdraw(request);
    }

    const idleAfter = await this.idleBase();
    if (idleAfter < amountNeeded) {
      return { liquidated: idleAfter, loss: amountNeeded - idleAfter };
    }
    return { liquidated: amountNeeded, loss: 0n };
  }

  private idleBase(): Promise<bigint> {
    return external('ledger', 'balanceOf(base)', () => this.ledger.balanceOf(this.baseAsset, this.self));
  }
}
