import type { Address, TokenLedger } from '@sluice/types';
import type { SimulatedChain } from './chain.js';

/** TokenLedger over the simulated chain, acting for `chain.sender` */
export class SimulatedLedger implements TokenLedger {
  constructor(private readonly chain: SimulatedChain) {}

  async balanceOf(asset: Address, holder: Address): Promise<bigint> {
    return this.chain.balanceOf(asset, holder);
  }

  async nativeBalanceOf(holder: Address): Promise<bigint> {
    return this.chain.nativeBalanceOf(holder);
  }

  async allowance(asset: Address, owner: Address, spender: Address): Promise<bigint> {
    return this.chain.allowance(asset, owner, spender);
  }

  async approve(asset: Address, spender: Address, amount: bigint): Promise<void> {
    this.chain.record('ledger.approve', 'write', [amount]);
    this.chain.approve(asset, this.chain.sender, spender, amount);
  }

  async transferNative(to: Address, amount: bigint): Promise<void> {
    this.chain.record('ledger.transferNative', 'write', [amount]);
    this.chain.transferNative(this.chain.sender, to, amount);
  }
}
