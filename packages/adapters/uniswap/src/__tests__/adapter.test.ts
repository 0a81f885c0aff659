import { describe, it, expect, vi } from 'vitest';
import { encodeFunctionData } from 'viem';
import { TransactionSender } from '@sluice/data-feed';
import type { ExactInputSingleParams } from '@sluice/types';
import { UniswapRouterAdapter } from '../adapter';
import { SWAP_ROUTER_ABI } from '../constants';

const ROUTER = '0x00000000000000000000000000000000000000c1';
const RECIPIENT = '0x00000000000000000000000000000000000000c2';
const TOKEN_A = '0x1111111111111111111111111111111111111111';
const TOKEN_B = '0x2222222222222222222222222222222222222222';
const TOKEN_C = '0x3333333333333333333333333333333333333333';

function setup() {
  const publicClient = {
    waitForTransactionReceipt: vi.fn().mockResolvedValue({ status: 'success', blockNumber: 1n }),
  } as any;
  const walletClient = { writeContract: vi.fn().mockResolvedValue('0x01') } as any;
  const adapter = new UniswapRouterAdapter(new TransactionSender(publicClient, walletClient), ROUTER);
  return { walletClient, adapter };
}

describe('UniswapRouterAdapter', () => {
  it('packs a path as token, 3-byte fee, token', () => {
    const { adapter } = setup();

    expect(adapter.encodePath([TOKEN_A, TOKEN_B, TOKEN_C], [3_000, 500])).toBe(
      `0x${'11'.repeat(20)}000bb8${'22'.repeat(20)}0001f4${'33'.repeat(20)}`,
    );
  });

  it('rejects a path whose fee count does not match', () => {
    const { adapter } = setup();
    expect(() => adapter.encodePath([TOKEN_A, TOKEN_B], [])).toThrow('path needs 1 fees, got 0');
  });

  it('sends exactInput with amountOutMinimum taken from minOut', async () => {
    const { walletClient, adapter } = setup();

    await adapter.exactInput({ path: '0xabcd', recipient: RECIPIENT, deadline: 99n, amountIn: 10n, minOut: 9n });

    expect(walletClient.writeContract.mock.calls[0][0]).toMatchObject({
      functionName: 'exactInput',
      args: [{ path: '0xabcd', recipient: RECIPIENT, deadline: 99n, amountIn: 10n, amountOutMinimum: 9n }],
    });
  });

  it('sends a native swap as a paid multicall with refundETH', async () => {
    const { walletClient, adapter } = setup();
    const params: ExactInputSingleParams = {
      tokenIn: TOKEN_A,
      tokenOut: TOKEN_B,
      fee: 500,
      recipient: RECIPIENT,
      deadline: 99n,
      amountIn: 3n,
      minOut: 0n,
    };

    await adapter.exactInputSingleNative(params);

    const request = walletClient.writeContract.mock.calls[0][0];
    expect(request.functionName).toBe('multicall');
    expect(request.value).toBe(3n);
    expect(request.args[0]).toHaveLength(2);
    expect(request.args[0][1]).toBe(encodeFunctionData({ abi: SWAP_ROUTER_ABI, functionName: 'refundETH' }));
  });
});
