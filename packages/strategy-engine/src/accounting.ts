import type { Address, Holdings, StrategyAssets, TokenLedger } from '@sluice/types';
import { external } from './errors.js';
import type { ValuationOracle } from './valuation.js';
import type { YieldVenueAdapter } from './venue.js';

export interface AccountingOptions {
  /** Idle native currency held back as gas money; not strategy value */
  nativeReserve: bigint;
  /** Base-asset value of an amount of the secondary asset */
  quoteSecondary: (amount: bigint) => Promise<bigint>;
}

/**
 * Accounting Module
 *
 * Folds every holding of the engine into a single base-asset figure:
 *
 *   idle base
 * + principal recoverable from the venue
 * + reward A (idle + pending), when a reward-A feed is configured
 * + native currency (idle above the reserve + pending reward B), priced by the native feed
 * + idle secondary asset, at the stable-swap pool's quote
 *
 * Pure queries. Price failures propagate to the caller.
 */
export class AccountingModule {
  constructor(
    private readonly self: Address,
    private readonly assets: StrategyAssets,
    private readonly ledger: TokenLedger,
    private readonly venue: YieldVenueAdapter,
    private readonly valuation: ValuationOracle,
    private readonly options: AccountingOptions,
  ) {}

  async estimatedTotalAssets(): Promise<bigint> {
    const holdings = await this.holdings();
    return holdings.total;
  }

  /**
   * Value after a claim-and-convert pass: idle base plus recoverable
   * principal. Rewards are left out; they should be zero at this point.
   */
  async postConversionValue(): Promise<bigint> {
    const [idle, recoverable] = await Promise.all([this.idleBase(), this.venue.recoverableBalance()]);
    return idle + recoverable;
  }

  /** Full breakdown of what the engine holds */
  async holdings(): Promise<Holdings> {
    const { rewardA, secondary } = this.assets;

    const [idleBase, recoverable, rewardAIdle, rewardAPending, nativeIdle, nativePending, secondaryIdle] =
      await Promise.all([
        this.idleBase(),
        this.venue.recoverableBalance(),
        external('ledger', 'balanceOf(rewardA)', () => this.ledger.balanceOf(rewardA.address, this.self)),
        this.venue.pendingRewardA(),
        external('ledger', 'nativeBalanceOf', () => this.ledger.nativeBalanceOf(this.self)),
        this.venue.pendingRewardB(),
        external('ledger', 'balanceOf(secondary)', () => this.ledger.balanceOf(secondary.address, this.self)),
      ]);

    const rewardAValue = this.valuation.canValue(rewardA.address)
      ? await this.valuation.valueInBase(rewardA.address, rewardAIdle + rewardAPending)
      : null;
    const { nativeReserve } = this.options;
    const nativeCounted = (nativeIdle > nativeReserve ? nativeIdle - nativeReserve : 0n) + nativePending;
    const nativeValue = await this.valuation.nativeToBase(nativeCounted);
    const secondaryValue = secondaryIdle > 0n ? await this.options.quoteSecondary(secondaryIdle) : 0n;

    const total = idleBase + recoverable + (rewardAValue ?? 0n) + nativeValue + secondaryValue;

    return {
      idleBase,
      recoverable,
      rewardA: { idle: rewardAIdle, pending: rewardAPending, valueInBase: rewardAValue },
      native: { idle: nativeIdle, pending: nativePending, valueInBase: nativeValue },
      secondary: { idle: secondaryIdle, valueInBase: secondaryValue },
      total: total > 0n ? total : 0n,
    };
  }

  private idleBase(): Promise<bigint> {
    return external('ledger', 'balanceOf(base)', () => this.ledger.balanceOf(this.assets.base.address, this.self));
  }
}
