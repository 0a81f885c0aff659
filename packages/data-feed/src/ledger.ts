import { erc20Abi, type Address } from 'viem';
import type { TokenLedger } from '@sluice/types';
import type { SluicePublicClient } from './connection.js';
import type { TransactionSender } from './transactions.js';

/**
 * ERC-20 balances and allowances over viem.
 * Writes go through the sender's account, which is the account the engine acts for.
 */
export class ChainLedger implements TokenLedger {
  constructor(
    private readonly client: SluicePublicClient,
    private readonly sender: TransactionSender,
  ) {}

  balanceOf(asset: Address, holder: Address): Promise<bigint> {
    return this.client.readContract({ address: asset, abi: erc20Abi, functionName: 'balanceOf', args: [holder] });
  }

  nativeBalanceOf(holder: Address): Promise<bigint> {
    return this.client.getBalance({ address: holder });
  }

  allowance(asset: Address, owner: Address, spender: Address): Promise<bigint> {
    return this.client.readContract({
      address: asset,
      abi: erc20Abi,
      functionName: 'allowance',
      args: [owner, spender],
    });
  }

  async approve(asset: Address, spender: Address, amount: bigint): Promise<void> {
    await this.sender.send('approve', (wallet) =>
      wallet.writeContract({ address: asset, abi: erc20Abi, functionName: 'approve', args: [spender, amount] }),
    );
  }

  async transferNative(to: Address, amount: bigint): Promise<void> {
    await this.sender.send('transferNative', (wallet) => wallet.sendTransaction({ to, value: amount }));
  }
}
