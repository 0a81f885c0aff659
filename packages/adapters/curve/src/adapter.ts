import type { Address, StableSwapPool } from '@sluice/types';
import type { SluicePublicClient, TransactionSender } from '@sluice/data-feed';
import { STABLE_SWAP_ABI } from './constants.js';

export interface CurvePoolOptions {
  /**
   * Quote and trade the metapool's underlying coins
   * (get_dy_underlying / exchange_underlying)
   */
  underlying: boolean;
}

/**
 * Curve Stable-Swap Pool Adapter
 *
 * Coin indices are the pool's own; with `underlying` they index the
 * underlying coin list instead.
 */
export class CurvePoolAdapter implements StableSwapPool {
  constructor(
    private readonly client: SluicePublicClient,
    private readonly sender: TransactionSender,
    readonly address: Address,
    private readonly options: CurvePoolOptions = { underlying: false },
  ) {}

  getDy(i: number, j: number, dx: bigint): Promise<bigint> {
    return this.client.readContract({
      address: this.address,
      abi: STABLE_SWAP_ABI,
      functionName: this.options.underlying ? 'get_dy_underlying' : 'get_dy',
      args: [BigInt(i), BigInt(j), dx],
    });
  }

  async exchange(i: number, j: number, dx: bigint, minDy: bigint): Promise<void> {
    const functionName = this.options.underlying ? 'exchange_underlying' : 'exchange';
    await this.sender.send(functionName, (wallet) =>
      wallet.writeContract({
        address: this.address,
        abi: STABLE_SWAP_ABI,
        functionName,
        args: [BigInt(i), BigInt(j), dx, minDy],
      }),
    );
  }
}
