import { parseAbi, type Address } from 'viem';
import type { VaultFramework } from '@sluice/types';
import type { SluicePublicClient } from './connection.js';

const VAULT_ABI = parseAbi([
  'function strategies(address strategy) view returns (uint256 performanceFee, uint256 activation, uint256 debtRatio, uint256 minDebtPerHarvest, uint256 maxDebtPerHarvest, uint256 lastReport, uint256 totalDebt, uint256 totalGain, uint256 totalLoss)',
]);

/** Reads a strategy's totalDebt from a Yearn v2 style vault */
export class VaultDebtReader implements VaultFramework {
  constructor(
    private readonly client: SluicePublicClient,
    readonly address: Address,
  ) {}

  async totalDebt(strategy: Address): Promise<bigint> {
    const params = await this.client.readContract({
      address: this.address,
      abi: VAULT_ABI,
      functionName: 'strategies',
      args: [strategy],
    });
    return params[6];
  }
}
