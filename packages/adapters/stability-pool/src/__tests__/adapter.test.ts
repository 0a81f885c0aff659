import { describe, it, expect, vi } from 'vitest';
import { TransactionSender } from '@sluice/data-feed';
import { StabilityPoolAdapter } from '../adapter';
import { STABILITY_POOL_ABI } from '../constants';

const POOL = '0x00000000000000000000000000000000000000b1';
const DEPOSITOR = '0x00000000000000000000000000000000000000b2';
const REFERRER = '0x0000000000000000000000000000000000000000';

function setup() {
  const publicClient = {
    readContract: vi.fn().mockResolvedValue(5n),
    waitForTransactionReceipt: vi.fn().mockResolvedValue({ status: 'success', blockNumber: 1n }),
  } as any;
  const walletClient = { writeContract: vi.fn().mockResolvedValue('0x01') } as any;
  const sender = new TransactionSender(publicClient, walletClient);
  return { publicClient, walletClient, sender, adapter: new StabilityPoolAdapter(publicClient, sender, POOL) };
}

describe('StabilityPoolAdapter', () => {
  it('deposits through provideToSP with the referrer tag', async () => {
    const { walletClient, sender, adapter } = setup();

    await adapter.provideToPool(100n, REFERRER);

    expect(walletClient.writeContract).toHaveBeenCalledWith({
      address: POOL,
      abi: STABILITY_POOL_ABI,
      functionName: 'provideToSP',
      args: [100n, REFERRER],
    });
    expect(sender.sent.map((tx) => tx.label)).toEqual(['provideToSP']);
  });

  it('withdraws through withdrawFromSP', async () => {
    const { walletClient, adapter } = setup();

    await adapter.withdrawFromPool(1n);

    expect(walletClient.writeContract.mock.calls[0][0]).toMatchObject({ functionName: 'withdrawFromSP', args: [1n] });
  });

  it('maps the gain readers onto the pool views', async () => {
    const { publicClient, adapter } = setup();

    expect(await adapter.getCompoundedDeposit(DEPOSITOR)).toBe(5n);
    await adapter.getDepositorRewardAGain(DEPOSITOR);
    await adapter.getDepositorRewardBGain(DEPOSITOR);

    expect(publicClient.readContract.mock.calls.map((call: [{ functionName: string }]) => call[0].functionName)).toEqual([
      'getCompoundedLUSDDeposit',
      'getDepositorLQTYGain',
      'getDepositorETHGain',
    ]);
  });
});
