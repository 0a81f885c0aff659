import { encodeFunctionData, encodePacked, type Hex } from 'viem';
import type { Address, ExactInputParams, ExactInputSingleParams, SwapRouter } from '@sluice/types';
import type { TransactionSender } from '@sluice/data-feed';
import { SWAP_ROUTER_ABI } from './constants.js';

/**
 * Uniswap v3 SwapRouter Adapter
 *
 * Swaps execute with `sqrtPriceLimitX96 = 0` (no price limit); the only
 * protection is the caller's `amountOutMinimum`.
 */
export class UniswapRouterAdapter implements SwapRouter {
  constructor(
    private readonly sender: TransactionSender,
    readonly address: Address,
  ) {}

  /** Packed path: token (20 bytes), fee (3 bytes), token, ... */
  encodePath(tokens: readonly Address[], fees: readonly number[]): Hex {
    if (tokens.length !== fees.length + 1) {
      throw new Error(`path needs ${tokens.length - 1} fees, got ${fees.length}`);
    }
    const types: ('address' | 'uint24')[] = [];
    const values: (Address | number)[] = [];
    tokens.forEach((token, index) => {
      types.push('address');
      values.push(token);
      if (index < fees.length) {
        types.push('uint24');
        values.push(fees[index]);
      }
    });
    return encodePacked(types, values);
  }

  async exactInput(params: ExactInputParams): Promise<void> {
    await this.sender.send('exactInput', (wallet) =>
      wallet.writeContract({
        address: this.address,
        abi: SWAP_ROUTER_ABI,
        functionName: 'exactInput',
        args: [
          {
            path: params.path,
            recipient: params.recipient,
            deadline: params.deadline,
            amountIn: params.amountIn,
            amountOutMinimum: params.minOut,
          },
        ],
      }),
    );
  }

  async exactInputSingle(params: ExactInputSingleParams): Promise<void> {
    await this.sender.send('exactInputSingle', (wallet) =>
      wallet.writeContract({
        address: this.address,
        abi: SWAP_ROUTER_ABI,
        functionName: 'exactInputSingle',
        args: [toSingleArgs(params)],
      }),
    );
  }

  /**
   * Native in: the router wraps `msg.value`; `refundETH` in the same multicall
   * returns whatever the swap did not spend.
   */
  async exactInputSingleNative(params: ExactInputSingleParams): Promise<void> {
    const calls: Hex[] = [
      encodeFunctionData({ abi: SWAP_ROUTER_ABI, functionName: 'exactInputSingle', args: [toSingleArgs(params)] }),
      encodeFunctionData({ abi: SWAP_ROUTER_ABI, functionName: 'refundETH' }),
    ];

    await this.sender.send('multicall(exactInputSingle,refundETH)', (wallet) =>
      wallet.writeContract({
        address: this.address,
        abi: SWAP_ROUTER_ABI,
        functionName: 'multicall',
        args: [calls],
        value: params.amountIn,
      }),
    );
  }
}

function toSingleArgs(params: ExactInputSingleParams) {
  return {
    tokenIn: params.tokenIn,
    tokenOut: params.tokenOut,
    fee: params.fee,
    recipient: params.recipient,
    deadline: params.deadline,
    amountIn: params.amountIn,
    amountOutMinimum: params.minOut,
    sqrtPriceLimitX96: 0n,
  };
}
