import { describe, it, expect, vi } from 'vitest';
import { TransactionSender } from '@sluice/data-feed';
import { CurvePoolAdapter } from '../adapter';

const POOL = '0x00000000000000000000000000000000000000d1';

function setup(underlying: boolean) {
  const publicClient = {
    readContract: vi.fn().mockResolvedValue(990n),
    waitForTransactionReceipt: vi.fn().mockResolvedValue({ status: 'success', blockNumber: 1n }),
  } as any;
  const walletClient = { writeContract: vi.fn().mockResolvedValue('0x01') } as any;
  const sender = new TransactionSender(publicClient, walletClient);
  return { publicClient, walletClient, sender, adapter: new CurvePoolAdapter(publicClient, sender, POOL, { underlying }) };
}

describe('CurvePoolAdapter', () => {
  it('quotes with get_dy and int128 indices', async () => {
    const { publicClient, adapter } = setup(false);

    expect(await adapter.getDy(1, 0, 1_000n)).toBe(990n);
    expect(publicClient.readContract.mock.calls[0][0]).toMatchObject({ functionName: 'get_dy', args: [1n, 0n, 1_000n] });
  });

  it('uses the underlying variants for a metapool', async () => {
    const { publicClient, walletClient, sender, adapter } = setup(true);

    await adapter.getDy(1, 0, 1n);
    await adapter.exchange(1, 0, 1_000n, 985n);

    expect(publicClient.readContract.mock.calls[0][0].functionName).toBe('get_dy_underlying');
    expect(walletClient.writeContract.mock.calls[0][0]).toMatchObject({
      address: POOL,
      functionName: 'exchange_underlying',
      args: [1n, 0n, 1_000n, 985n],
    });
    expect(sender.sent[0].label).toBe('exchange_underlying');
  });
});
