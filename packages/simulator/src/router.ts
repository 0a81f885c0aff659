import {
  WAD,
  type Address,
  type ExactInputParams,
  type ExactInputSingleParams,
  type Hex,
  type SwapRouter,
} from '@sluice/types';
import type { SimulatedChain } from './chain.js';

const ADDRESS_HEX_LENGTH = 40;
const FEE_HEX_LENGTH = 6;

/** Split a packed token/fee path back into its hops */
export function decodePath(path: Hex): { tokens: Address[]; fees: number[] } {
  const body = path.slice(2);
  const tokens: Address[] = [];
  const fees: number[] = [];

  let offset = 0;
  for (;;) {
    tokens.push(`0x${body.slice(offset, offset + ADDRESS_HEX_LENGTH)}`);
    offset += ADDRESS_HEX_LENGTH;
    if (offset >= body.length) break;
    fees.push(parseInt(body.slice(offset, offset + FEE_HEX_LENGTH), 16));
    offset += FEE_HEX_LENGTH;
  }
  return { tokens, fees };
}

/**
 * Simulated Uniswap-v3 style router.
 *
 * Each directed pair trades at a fixed WAD-scaled rate set with `setRate`;
 * fee tiers are recorded but not charged.
 */
export class SimulatedSwapRouter implements SwapRouter {
  private rates = new Map<string, bigint>();

  constructor(
    private readonly chain: SimulatedChain,
    readonly address: Address,
  ) {}

  /** Output per 1e18 input for `tokenIn` -> `tokenOut` */
  setRate(tokenIn: Address, tokenOut: Address, rate: bigint): void {
    this.rates.set(this.pairKey(tokenIn, tokenOut), rate);
  }

  encodePath(tokens: readonly Address[], fees: readonly number[]): Hex {
    if (tokens.length !== fees.length + 1) {
      throw new Error(`path needs ${tokens.length - 1} fees, got ${fees.length}`);
    }
    let body = '';
    tokens.forEach((token, index) => {
      body += token.slice(2).toLowerCase();
      if (index < fees.length) {
        body += fees[index].toString(16).padStart(FEE_HEX_LENGTH, '0');
      }
    });
    return `0x${body}`;
  }

  async exactInput(params: ExactInputParams): Promise<void> {
    this.chain.record('router.exactInput', 'write', [params.amountIn, params.minOut]);
    this.checkDeadline(params.deadline);

    const { tokens } = decodePath(params.path);
    let amount = params.amountIn;
    for (let hop = 0; hop < tokens.length - 1; hop++) {
      amount = this.amountOut(tokens[hop], tokens[hop + 1], amount);
    }
    this.settle(tokens[0], tokens[tokens.length - 1], params.amountIn, amount, params);
  }

  async exactInputSingle(params: ExactInputSingleParams): Promise<void> {
    this.chain.record('router.exactInputSingle', 'write', [params.amountIn, params.minOut]);
    this.checkDeadline(params.deadline);

    const out = this.amountOut(params.tokenIn, params.tokenOut, params.amountIn);
    this.settle(params.tokenIn, params.tokenOut, params.amountIn, out, params);
  }

  async exactInputSingleNative(params: ExactInputSingleParams): Promise<void> {
    this.chain.record('router.exactInputSingleNative', 'write', [params.amountIn, params.minOut]);
    this.checkDeadline(params.deadline);

    const out = this.amountOut(params.tokenIn, params.tokenOut, params.amountIn);
    if (out < params.minOut) {
      throw new Error('Too little received');
    }
    this.chain.transferNative(this.chain.sender, this.address, params.amountIn);
    this.chain.mint(params.tokenOut, params.recipient, out);
  }

  // ---- Private helpers ----

  private settle(
    tokenIn: Address,
    tokenOut: Address,
    amountIn: bigint,
    amountOut: bigint,
    params: { recipient: Address; minOut: bigint },
  ): void {
    if (amountOut < params.minOut) {
      throw new Error('Too little received');
    }
    this.chain.transferFrom(tokenIn, this.address, this.chain.sender, this.address, amountIn);
    this.chain.mint(tokenOut, params.recipient, amountOut);
  }

  private amountOut(tokenIn: Address, tokenOut: Address, amountIn: bigint): bigint {
    const rate = this.rates.get(this.pairKey(tokenIn, tokenOut));
    if (rate === undefined) {
      throw new Error(`no pool for ${tokenIn} -> ${tokenOut}`);
    }
    return (amountIn * rate) / WAD;
  }

  private checkDeadline(deadline: bigint): void {
    if (deadline < BigInt(this.chain.timestamp)) {
      throw new Error('Transaction too old');
    }
  }

  private pairKey(tokenIn: Address, tokenOut: Address): string {
    return `${tokenIn.toLowerCase()}:${tokenOut.toLowerCase()}`;
  }
}
