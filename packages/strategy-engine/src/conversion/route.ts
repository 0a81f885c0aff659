import {
  BPS_DENOMINATOR,
  type Address,
  type ConversionKind,
  type ConversionQuote,
  type ConversionReceipt,
  type StableSwapPool,
  type SwapRouter,
  type TokenLedger,
} from '@sluice/types';
import { external } from '../errors.js';

/** Allowance granted when a top-up is needed */
export const MAX_ALLOWANCE = 2n ** 256n - 1n;

/** Shape of one conversion leg */
export type RouteDefinition =
  | {
      kind: 'router-path';
      /** rewardA -> bridge -> secondary, in order */
      tokens: Address[];
      fees: number[];
    }
  | {
      kind: 'router-native';
      /** Wrapped native token the router pairs native currency as */
      wrappedNative: Address;
      tokenOut: Address;
      fee: number;
    }
  | {
      kind: 'router-single';
      tokenIn: Address;
      tokenOut: Address;
      fee: number;
      /** Floor in bps of amountIn, 0 for none */
      minOutBps: number;
    }
  | {
      kind: 'stable-pool';
      tokenIn: Address;
      tokenOut: Address;
      i: number;
      j: number;
      /** Accepted shortfall from the quoted output, in bps */
      slippageBps: number;
    };

/** Collaborators a route executes against */
export interface RouteContext {
  self: Address;
  ledger: TokenLedger;
  router: SwapRouter;
  pool: StableSwapPool;
  /** Swap deadline in unix seconds */
  deadline: () => bigint;
}

/**
 * Conversion Route
 *
 * One asset-to-asset leg through one venue. Handles the allowance for the
 * venue (approve only when the current allowance is insufficient), builds
 * the quote and slippage floor, executes, and measures what arrived.
 */
export class ConversionRoute {
  constructor(
    readonly definition: RouteDefinition,
    private readonly ctx: RouteContext,
  ) {}

  get kind(): ConversionKind {
    return this.definition.kind;
  }

  /** Input asset, or null for native currency */
  get assetIn(): Address | null {
    switch (this.definition.kind) {
      case 'router-path':
        return this.definition.tokens[0];
      case 'router-native':
        return null;
      case 'router-single':
      case 'stable-pool':
        return this.definition.tokenIn;
    }
  }

  get assetOut(): Address {
    switch (this.definition.kind) {
      case 'router-path':
        return this.definition.tokens[this.definition.tokens.length - 1];
      case 'router-native':
      case 'router-single':
      case 'stable-pool':
        return this.definition.tokenOut;
    }
  }

  /** Venue that pulls the input */
  get venue(): Address {
    return this.definition.kind === 'stable-pool' ? this.ctx.pool.address : this.ctx.router.address;
  }

  /**
   * Convert `amountIn` of the input asset.
   * Returns null without touching any venue when `amountIn` is zero.
   */
  async convert(amountIn: bigint): Promise<ConversionReceipt | null> {
    if (amountIn === 0n) return null;

    const assetIn = this.assetIn;
    if (assetIn !== null) {
      await this.ensureAllowance(assetIn, amountIn);
    }

    const before = await this.balanceOut();
    const quote = await this.quote(amountIn);
    await this.execute(quote);
    const after = await this.balanceOut();

    return {
      kind: this.definition.kind,
      assetIn,
      assetOut: this.assetOut,
      venue: this.venue,
      amountIn,
      amountOut: after > before ? after - before : 0n,
      quote,
    };
  }

  /** Expected output and minimum-acceptable output for `amountIn` */
  async quote(amountIn: bigint): Promise<ConversionQuote> {
    const definition = this.definition;
    switch (definition.kind) {
      case 'router-path':
      case 'router-native':
        return { amountIn, expectedOut: null, minOut: 0n };
      case 'router-single':
        return {
          amountIn,
          expectedOut: null,
          minOut: (amountIn * BigInt(definition.minOutBps)) / BPS_DENOMINATOR,
        };
      case 'stable-pool': {
        const expectedOut = await external('pool', 'get_dy', () => this.ctx.pool.getDy(definition.i, definition.j, amountIn));
        const minOut = (expectedOut * (BPS_DENOMINATOR - BigInt(definition.slippageBps))) / BPS_DENOMINATOR;
        return { amountIn, expectedOut, minOut };
      }
    }
  }

  // ---- Private helpers ----

  private async execute(quote: ConversionQuote): Promise<void> {
    const definition = this.definition;
    const { router, pool, self } = this.ctx;

    switch (definition.kind) {
      case 'router-path': {
        const path = router.encodePath(definition.tokens, definition.fees);
        await external('router', 'exactInput', () =>
          router.exactInput({
            path,
            recipient: self,
            deadline: this.ctx.deadline(),
            amountIn: quote.amountIn,
            minOut: quote.minOut,
          }),
        );
        return;
      }
      case 'router-native':
        await external('router', 'exactInputSingle(native)', () =>
          router.exactInputSingleNative({
            tokenIn: definition.wrappedNative,
            tokenOut: definition.tokenOut,
            fee: definition.fee,
            recipient: self,
            deadline: this.ctx.deadline(),
            amountIn: quote.amountIn,
            minOut: quote.minOut,
          }),
        );
        return;
      case 'router-single':
        await external('router', 'exactInputSingle', () =>
          router.exactInputSingle({
            tokenIn: definition.tokenIn,
            tokenOut: definition.tokenOut,
            fee: definition.fee,
            recipient: self,
            deadline: this.ctx.deadline(),
            amountIn: quote.amountIn,
            minOut: quote.minOut,
          }),
        );
        return;
      case 'stable-pool':
        await external('pool', 'exchange', () => pool.exchange(definition.i, definition.j, quote.amountIn, quote.minOut));
        return;
    }
  }

  private async ensureAllowance(asset: Address, amount: bigint): Promise<void> {
    const { ledger, self } = this.ctx;
    const spender = this.venue;
    const current = await external('ledger', 'allowance', () => ledger.allowance(asset, self, spender));
    if (current >= amount) return;
    await external('ledger', 'approve', () => ledger.approve(asset, spender, MAX_ALLOWANCE));
  }

  private balanceOut(): Promise<bigint> {
    const { ledger, self } = this.ctx;
    const assetOut = this.assetOut;
    return external('ledger', 'balanceOf', () => ledger.balanceOf(assetOut, self));
  }
}
