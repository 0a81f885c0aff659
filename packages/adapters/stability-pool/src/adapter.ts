import type { Address, YieldVenue } from '@sluice/types';
import type { SluicePublicClient, TransactionSender } from '@sluice/data-feed';
import { STABILITY_POOL_ABI } from './constants.js';

/**
 * Liquity Stability Pool Adapter
 *
 * Deposits and withdrawals both pay out pending LQTY and ETH gains to the
 * depositor. `withdrawFromSP` caps the amount to the compounded deposit.
 */
export class StabilityPoolAdapter implements YieldVenue {
  constructor(
    private readonly client: SluicePublicClient,
    private readonly sender: TransactionSender,
    readonly address: Address,
  ) {}

  async provideToPool(amount: bigint, referrer: Address): Promise<void> {
    await this.sender.send('provideToSP', (wallet) =>
      wallet.writeContract({
        address: this.address,
        abi: STABILITY_POOL_ABI,
        functionName: 'provideToSP',
        args: [amount, referrer],
      }),
    );
  }

  async withdrawFromPool(amount: bigint): Promise<void> {
    await this.sender.send('withdrawFromSP', (wallet) =>
      wallet.writeContract({
        address: this.address,
        abi: STABILITY_POOL_ABI,
        functionName: 'withdrawFromSP',
        args: [amount],
      }),
    );
  }

  getCompoundedDeposit(who: Address): Promise<bigint> {
    return this.read('getCompoundedLUSDDeposit', who);
  }

  getDepositorRewardAGain(who: Address): Promise<bigint> {
    return this.read('getDepositorLQTYGain', who);
  }

  getDepositorRewardBGain(who: Address): Promise<bigint> {
    return this.read('getDepositorETHGain', who);
  }

  private read(
    functionName: 'getCompoundedLUSDDeposit' | 'getDepositorLQTYGain' | 'getDepositorETHGain',
    who: Address,
  ): Promise<bigint> {
    return this.client.readContract({ address: this.address, abi: STABILITY_POOL_ABI, functionName, args: [who] });
  }
}
