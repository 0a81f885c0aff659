import type { Hex, TransactionReceipt } from 'viem';
import type { SluicePublicClient, SluiceWalletClient } from './connection.js';

/** A confirmed transaction, as recorded by the sender */
export interface SentTransaction {
  label: string;
  hash: Hex;
  blockNumber: bigint;
}

/**
 * Submits transactions through the wallet client and waits for each receipt.
 *
 * A receipt with status `reverted` is turned into an error, so callers see a
 * failed write the same way as a failed RPC call. Every confirmed
 * transaction is appended to `sent`.
 */
export class TransactionSender {
  readonly sent: SentTransaction[] = [];

  constructor(
    readonly publicClient: SluicePublicClient,
    readonly walletClient: SluiceWalletClient,
  ) {}

  get account(): SluiceWalletClient['account'] {
    return this.walletClient.account;
  }

  async send(label: string, submit: (wallet: SluiceWalletClient) => Promise<Hex>): Promise<TransactionReceipt> {
    const hash = await submit(this.walletClient);
    const receipt = await this.publicClient.waitForTransactionReceipt({ hash });

    if (receipt.status === 'reverted') {
      throw new Error(`${label} reverted (tx ${hash})`);
    }

    this.sent.push({ label, hash, blockNumber: receipt.blockNumber });
    return receipt;
  }
}
