import type { Address, VaultFramework } from '@sluice/types';

/** Upstream framework stand-in holding one debt figure per strategy */
export class SimulatedVault implements VaultFramework {
  private debts = new Map<string, bigint>();

  setDebt(strategy: Address, amount: bigint): void {
    this.debts.set(strategy.toLowerCase(), amount);
  }

  async totalDebt(strategy: Address): Promise<bigint> {
    return this.debts.get(strategy.toLowerCase()) ?? 0n;
  }
}
