import type { Address, TokenLedger, YieldVenue } from '@sluice/types';
import { InsufficientBalanceError, external } from './errors.js';

/**
 * Yield Venue Adapter
 *
 * Thin pass-through over the external yield venue for the engine's account.
 * Marshals parameters and reads balances; holds no business logic.
 */
export class YieldVenueAdapter {
  constructor(
    private readonly venue: YieldVenue,
    private readonly ledger: TokenLedger,
    private readonly self: Address,
    private readonly baseAsset: Address,
    private readonly referrer: Address,
  ) {}

  get address(): Address {
    return this.venue.address;
  }

  /**
   * Deposit idle base asset into the venue.
   * Fails when `amount` exceeds the idle balance; venue-side caps surface as
   * external-call failures.
   */
  async deposit(amount: bigint): Promise<void> {
    if (amount === 0n) return;
    const idle = await this.idleBase();
    if (amount > idle) {
      throw new InsufficientBalanceError('base asset', amount, idle);
    }
    await external('venue', 'provideToPool', () => this.venue.provideToPool(amount, this.referrer));
  }

  /**
   * Withdraw up to `amount` from the venue.
   * The request is capped to the recoverable balance; returns the base asset
   * actually received.
   */
  async withdraw(amount: bigint): Promise<bigint> {
    const recoverable = await this.recoverableBalance();
    const request = amount < recoverable ? amount : recoverable;
    if (request === 0n) return 0n;

    const before = await this.idleBase();
    await external('venue', 'withdrawFromPool', () => this.venue.withdrawFromPool(request));
    const after = await this.idleBase();
    return after > before ? after - before : 0n;
  }

  recoverableBalance(): Promise<bigint> {
    return external('venue', 'getCompoundedDeposit', () => this.venue.getCompoundedDeposit(this.self));
  }

  pendingRewardA(): Promise<bigint> {
    return external('venue', 'getDepositorRewardAGain', () => this.venue.getDepositorRewardAGain(this.self));
  }

  pendingRewardB(): Promise<bigint> {
    return external('venue', 'getDepositorRewardBGain', () => this.venue.getDepositorRewardBGain(this.self));
  }

  private idleBase(): Promise<bigint> {
    return external('ledger', 'balanceOf(base)', () => this.ledger.balanceOf(this.baseAsset, this.self));
  }
}
