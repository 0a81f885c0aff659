import type { Address, Checkpointer, Hex } from '@sluice/types';

/** ERC-20 convention: an allowance of 2^256-1 is never decremented */
const INFINITE_ALLOWANCE = 2n ** 256n - 1n;

/** Everything a snapshot captures */
export interface ChainState {
  balances: Map<string, bigint>;
  native: Map<string, bigint>;
  allowances: Map<string, bigint>;
  deposits: Map<string, bigint>;
  pendingRewardA: Map<string, bigint>;
  pendingRewardB: Map<string, bigint>;
  timestamp: number;
}

/** One recorded state-changing call (or venue quote) */
export interface ChainCall {
  label: string;
  kind: 'write' | 'quote';
  args: bigint[];
}

function key(...parts: string[]): string {
  return parts.map((part) => part.toLowerCase()).join(':');
}

function cloneState(state: ChainState): ChainState {
  return {
    balances: new Map(state.balances),
    native: new Map(state.native),
    allowances: new Map(state.allowances),
    deposits: new Map(state.deposits),
    pendingRewardA: new Map(state.pendingRewardA),
    pendingRewardB: new Map(state.pendingRewardB),
    timestamp: state.timestamp,
  };
}

/**
 * Simulated Chain
 *
 * In-memory ledger shared by the simulated venue, router, pool and token
 * ledger. Every call made against it executes as `sender` (the strategy
 * account). Supports snapshot/revert, so it also serves as the engine's
 * Checkpointer, and keeps a trace of state-changing calls for assertions.
 */
export class SimulatedChain implements Checkpointer {
  private state: ChainState = {
    balances: new Map(),
    native: new Map(),
    allowances: new Map(),
    deposits: new Map(),
    pendingRewardA: new Map(),
    pendingRewardB: new Map(),
    timestamp: 0,
  };
  private snapshots = new Map<Hex, ChainState>();
  private nextSnapshotId = 1;
  private armedFailures = new Map<string, string>();

  /** Calls recorded since construction or the last clearTrace() */
  readonly trace: ChainCall[] = [];

  constructor(readonly sender: Address) {}

  // ---- Checkpointer ----

  async snapshot(): Promise<Hex> {
    const id: Hex = `0x${(this.nextSnapshotId++).toString(16)}`;
    this.snapshots.set(id, cloneState(this.state));
    return id;
  }

  async revert(id: Hex): Promise<void> {
    const saved = this.snapshots.get(id);
    if (!saved) {
      throw new Error(`Unknown snapshot ${id}`);
    }
    this.state = cloneState(saved);
    this.snapshots.delete(id);
  }

  // ---- Call tracing & failure injection ----

  /**
   * Make the next call recorded under `label` throw `message`.
   * Used to exercise rollback paths.
   */
  failNext(label: string, message: string = `${label} reverted`): void {
    this.armedFailures.set(label, message);
  }

  /** Record a call; throws if a failure is armed for it */
  record(label: string, kind: ChainCall['kind'], args: bigint[] = []): void {
    const failure = this.armedFailures.get(label);
    if (failure !== undefined) {
      this.armedFailures.delete(label);
      throw new Error(failure);
    }
    this.trace.push({ label, kind, args });
  }

  /** Recorded calls, optionally filtered by label */
  calls(label?: string): ChainCall[] {
    return label === undefined ? [...this.trace] : this.trace.filter((call) => call.label === label);
  }

  clearTrace(): void {
    this.trace.length = 0;
  }

  // ---- Tokens ----

  balanceOf(asset: Address, holder: Address): bigint {
    return this.state.balances.get(key(asset, holder)) ?? 0n;
  }

  mint(asset: Address, holder: Address, amount: bigint): void {
    this.state.balances.set(key(asset, holder), this.balanceOf(asset, holder) + amount);
  }

  burn(asset: Address, holder: Address, amount: bigint): void {
    const balance = this.balanceOf(asset, holder);
    if (balance < amount) {
      throw new Error(`burn amount exceeds balance (${balance} < ${amount})`);
    }
    this.state.balances.set(key(asset, holder), balance - amount);
  }

  transfer(asset: Address, from: Address, to: Address, amount: bigint): void {
    this.burn(asset, from, amount);
    this.mint(asset, to, amount);
  }

  allowance(asset: Address, owner: Address, spender: Address): bigint {
    return this.state.allowances.get(key(asset, owner, spender)) ?? 0n;
  }

  approve(asset: Address, owner: Address, spender: Address, amount: bigint): void {
    this.state.allowances.set(key(asset, owner, spender), amount);
  }

  /** Pull `amount` from `owner` on behalf of `spender`, consuming allowance */
  transferFrom(asset: Address, spender: Address, owner: Address, to: Address, amount: bigint): void {
    const allowed = this.allowance(asset, owner, spender);
    if (allowed < amount) {
      throw new Error(`transfer amount exceeds allowance (${allowed} < ${amount})`);
    }
    this.transfer(asset, owner, to, amount);
    if (allowed !== INFINITE_ALLOWANCE) {
      this.approve(asset, owner, spender, allowed - amount);
    }
  }

  // ---- Native currency ----

  nativeBalanceOf(holder: Address): bigint {
    return this.state.native.get(key(holder)) ?? 0n;
  }

  setNativeBalance(holder: Address, amount: bigint): void {
    this.state.native.set(key(holder), amount);
  }

  transferNative(from: Address, to: Address, amount: bigint): void {
    const balance = this.nativeBalanceOf(from);
    if (balance < amount) {
      throw new Error(`insufficient native balance (${balance} < ${amount})`);
    }
    this.setNativeBalance(from, balance - amount);
    this.setNativeBalance(to, this.nativeBalanceOf(to) + amount);
  }

  // ---- Venue bookkeeping ----

  depositOf(venue: Address, who: Address): bigint {
    return this.state.deposits.get(key(venue, who)) ?? 0n;
  }

  setDeposit(venue: Address, who: Address, amount: bigint): void {
    this.state.deposits.set(key(venue, who), amount);
  }

  pendingReward(which: 'A' | 'B', venue: Address, who: Address): bigint {
    const map = which === 'A' ? this.state.pendingRewardA : this.state.pendingRewardB;
    return map.get(key(venue, who)) ?? 0n;
  }

  setPendingReward(which: 'A' | 'B', venue: Address, who: Address, amount: bigint): void {
    const map = which === 'A' ? this.state.pendingRewardA : this.state.pendingRewardB;
    map.set(key(venue, who), amount);
  }

  // ---- Time ----

  get timestamp(): number {
    return this.state.timestamp;
  }

  setTimestamp(seconds: number): void {
    this.state.timestamp = seconds;
  }
}
