import type {
  Address,
  ConversionReceipt,
  PipelineReport,
  RouteSelector,
  StrategyAssets,
  TokenLedger,
} from '@sluice/types';
import { external } from '../errors.js';
import type { ConversionRoutesConfig } from '../types.js';
import type { YieldVenueAdapter } from '../venue.js';
import { ConversionRoute, type RouteContext } from './route.js';

/** Pipeline tuning taken from the engine config */
export interface PipelineOptions {
  routes: ConversionRoutesConfig;
  poolSlippageBps: number;
  routerMinOutBps: number;
  claimWithdrawAmount: bigint;
  nativeReserve: bigint;
}

/** Callback invoked after each executed conversion */
export type ConversionCallback = (receipt: ConversionReceipt) => void;

/**
 * Conversion Pipeline
 *
 * Turns venue rewards into the base asset. Steps, in order:
 * 1. Force-claim: a minimal withdrawal from the venue settles pending rewards
 * 2. Reward A -> bridge -> secondary (router path, zero floor)
 * 3. Native -> secondary (router single hop, native in, unspent refunded)
 * 4. Secondary -> base through the venue picked by the route selector
 *
 * Every step is skipped when its input balance is zero, so a second run with
 * no accrual in between makes no swaps.
 */
export class ConversionPipeline {
  readonly rewardARoute: ConversionRoute;
  readonly nativeRoute: ConversionRoute;
  readonly poolFinalRoute: ConversionRoute;
  readonly routerFinalRoute: ConversionRoute;

  constructor(
    private readonly ctx: RouteContext,
    private readonly assets: StrategyAssets,
    private readonly venue: YieldVenueAdapter,
    private readonly options: PipelineOptions,
  ) {
    const { base, rewardA, bridge, secondary } = assets;
    const { routes } = options;

    this.rewardARoute = new ConversionRoute(
      {
        kind: 'router-path',
        tokens: [rewardA.address, bridge.address, secondary.address],
        fees: [routes.rewardAToBridgeFee, routes.bridgeToSecondaryFee],
      },
      ctx,
    );

    this.nativeRoute = new ConversionRoute(
      {
        kind: 'router-native',
        wrappedNative: bridge.address,
        tokenOut: secondary.address,
        fee: routes.nativeToSecondaryFee,
      },
      ctx,
    );

    this.poolFinalRoute = new ConversionRoute(
      {
        kind: 'stable-pool',
        tokenIn: secondary.address,
        tokenOut: base.address,
        i: routes.poolSecondaryIndex,
        j: routes.poolBaseIndex,
        slippageBps: options.poolSlippageBps,
      },
      ctx,
    );

    this.routerFinalRoute = new ConversionRoute(
      {
        kind: 'router-single',
        tokenIn: secondary.address,
        tokenOut: base.address,
        fee: routes.secondaryToBaseFee,
        minOutBps: options.routerMinOutBps,
      },
      ctx,
    );
  }

  /** The final-hop route for a selector */
  finalRoute(selector: RouteSelector): ConversionRoute {
    return selector === 'pool' ? this.poolFinalRoute : this.routerFinalRoute;
  }

  /**
   * Claim venue rewards and convert everything to the base asset.
   *
   * @param selector - final-hop venue, fixed for the whole run
   * @param onConversion - called after each executed conversion
   */
  async claimAndConvert(selector: RouteSelector, onConversion?: ConversionCallback): Promise<PipelineReport> {
    const conversions: ConversionReceipt[] = [];
    const record = (receipt: ConversionReceipt | null): void => {
      if (!receipt) return;
      conversions.push(receipt);
      onConversion?.(receipt);
    };

    // Step 1: settle rewards
    const claimed = await this.forceClaim();

    // Step 2: reward A via the two-hop path
    const rewardABalance = await this.balanceOf(this.assets.rewardA.address);
    record(await this.rewardARoute.convert(rewardABalance));

    // Step 3: native currency gained from venue liquidations
    const nativeBalance = await external('ledger', 'nativeBalanceOf', () =>
      this.ctx.ledger.nativeBalanceOf(this.ctx.self),
    );
    const nativeToConvert = nativeBalance > this.options.nativeReserve ? nativeBalance - this.options.nativeReserve : 0n;
    record(await this.nativeRoute.convert(nativeToConvert));

    // Step 4: secondary -> base
    const secondaryBalance = await this.balanceOf(this.assets.secondary.address);
    record(await this.finalRoute(selector).convert(secondaryBalance));

    return { claimed, selector, conversions };
  }

  // ---- Private helpers ----

  private async forceClaim(): Promise<boolean> {
    const deposited = await this.venue.recoverableBalance();
    if (deposited === 0n) return false;
    await this.venue.withdraw(this.options.claimWithdrawAmount);
    return true;
  }

  private balanceOf(asset: Address): Promise<bigint> {
    const ledger: TokenLedger = this.ctx.ledger;
    return external('ledger', 'balanceOf', () => ledger.balanceOf(asset, this.ctx.self));
  }
}
