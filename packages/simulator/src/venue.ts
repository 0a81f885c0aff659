import type { Address, YieldVenue } from '@sluice/types';
import type { SimulatedChain } from './chain.js';

/**
 * Simulated stability-pool style venue.
 *
 * Deposits and withdrawals both pay out pending rewards (reward A minted as a
 * token, reward B as native currency). Withdrawals are silently capped to the
 * compounded deposit.
 */
export class SimulatedStabilityPool implements YieldVenue {
  /** Cap on a single deposit; null for none */
  depositCap: bigint | null = null;

  constructor(
    private readonly chain: SimulatedChain,
    readonly address: Address,
    private readonly baseAsset: Address,
    private readonly rewardAsset: Address,
  ) {}

  async provideToPool(amount: bigint, _referrer: Address): Promise<void> {
    this.chain.record('venue.provideToPool', 'write', [amount]);
    if (amount === 0n) {
      throw new Error('StabilityPool: Amount must be non-zero');
    }
    if (this.depositCap !== null && amount > this.depositCap) {
      throw new Error(`StabilityPool: deposit above cap (${amount} > ${this.depositCap})`);
    }
    const who = this.chain.sender;
    this.payOutRewards(who);
    this.chain.transfer(this.baseAsset, who, this.address, amount);
    this.chain.setDeposit(this.address, who, this.chain.depositOf(this.address, who) + amount);
  }

  async withdrawFromPool(amount: bigint): Promise<void> {
    this.chain.record('venue.withdrawFromPool', 'write', [amount]);
    const who = this.chain.sender;
    const deposit = this.chain.depositOf(this.address, who);
    if (deposit === 0n) {
      throw new Error('StabilityPool: User must have a non-zero deposit');
    }
    this.payOutRewards(who);
    const withdrawn = amount < deposit ? amount : deposit;
    this.chain.setDeposit(this.address, who, deposit - withdrawn);
    this.chain.transfer(this.baseAsset, this.address, who, withdrawn);
  }

  async getCompoundedDeposit(who: Address): Promise<bigint> {
    return this.chain.depositOf(this.address, who);
  }

  async getDepositorRewardAGain(who: Address): Promise<bigint> {
    return this.chain.pendingReward('A', this.address, who);
  }

  async getDepositorRewardBGain(who: Address): Promise<bigint> {
    return this.chain.pendingReward('B', this.address, who);
  }

  // ---- Scenario controls ----

  /** Accrue rewards for a depositor */
  accrue(who: Address, rewards: { rewardA?: bigint; rewardB?: bigint }): void {
    const { rewardA = 0n, rewardB = 0n } = rewards;
    this.chain.setPendingReward('A', this.address, who, this.chain.pendingReward('A', this.address, who) + rewardA);
    this.chain.setPendingReward('B', this.address, who, this.chain.pendingReward('B', this.address, who) + rewardB);
    this.chain.setNativeBalance(this.address, this.chain.nativeBalanceOf(this.address) + rewardB);
  }

  /**
   * A venue-side liquidation: `absorbed` of the depositor's base asset is
   * burned to offset debt and `nativeGain` of collateral is credited as
   * reward B.
   */
  absorbLiquidation(who: Address, absorbed: bigint, nativeGain: bigint): void {
    const deposit = this.chain.depositOf(this.address, who);
    const burned = absorbed < deposit ? absorbed : deposit;
    this.chain.setDeposit(this.address, who, deposit - burned);
    this.chain.burn(this.baseAsset, this.address, burned);
    this.accrue(who, { rewardB: nativeGain });
  }

  private payOutRewards(who: Address): void {
    const rewardA = this.chain.pendingReward('A', this.address, who);
    const rewardB = this.chain.pendingReward('B', this.address, who);
    if (rewardA > 0n) {
      this.chain.mint(this.rewardAsset, who, rewardA);
      this.chain.setPendingReward('A', this.address, who, 0n);
    }
    if (rewardB > 0n) {
      this.chain.transferNative(this.address, who, rewardB);
      this.chain.setPendingReward('B', this.address, who, 0n);
    }
  }
}
