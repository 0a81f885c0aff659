import { createTestClient, http, numberToHex, hexToNumber, type Chain, type Hex } from 'viem';
import type { Checkpointer } from '@sluice/types';
import type { TransactionSender } from './transactions.js';

function createAnvilClient(chain: Chain, rpcUrl: string) {
  return createTestClient({ mode: 'anvil', chain, transport: http(rpcUrl) });
}

/**
 * Whole-state rollback on an anvil (or other dev-node) fork via
 * evm_snapshot / evm_revert.
 */
export class ForkCheckpointer implements Checkpointer {
  private readonly client: ReturnType<typeof createAnvilClient>;

  constructor(chain: Chain, rpcUrl: string) {
    this.client = createAnvilClient(chain, rpcUrl);
  }

  snapshot(): Promise<Hex> {
    return this.client.snapshot();
  }

  revert(id: Hex): Promise<void> {
    return this.client.revert({ id });
  }
}

/**
 * Checkpointer for a live chain, where confirmed transactions cannot be
 * undone. A revert reports every transaction sent since the checkpoint so an
 * operator can reconcile by hand.
 */
export class JournalCheckpointer implements Checkpointer {
  constructor(private readonly sender: TransactionSender) {}

  async snapshot(): Promise<Hex> {
    return numberToHex(this.sender.sent.length);
  }

  async revert(id: Hex): Promise<void> {
    const since = this.sender.sent.slice(hexToNumber(id));
    if (since.length === 0) return;

    console.error(`[CHECKPOINT] ${since.length} confirmed transaction(s) cannot be rolled back:`);
    for (const tx of since) {
      console.error(`  ${tx.label} ${tx.hash} (block ${tx.blockNumber})`);
    }
  }
}
