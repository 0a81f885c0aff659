import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadConfig, oneOf } from '../utils/config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.chain).toBe('anvil');
    expect(config.rpcUrl).toBe('');
    expect(config.privateKey).toBeUndefined();
    expect(config.vaultAddress).toBeUndefined();
    expect(config.operators).toEqual([]);
    expect(config.logLevel).toBe('info');
    expect(config.stateFile).toBe(resolve(process.cwd(), '.sluice-state.json'));
    expect(config.engine).toEqual({});
  });

  it('prefixes a bare private key with 0x', () => {
    expect(loadConfig({ SLUICE_PRIVATE_KEY: '11'.repeat(32) }).privateKey).toBe(`0x${'11'.repeat(32)}`);
  });

  it('rejects a short private key', () => {
    expect(() => loadConfig({ SLUICE_PRIVATE_KEY: '0x1234' })).toThrow('SLUICE_PRIVATE_KEY must be a 32-byte hex string');
  });

  it('rejects an unknown chain', () => {
    expect(() => loadConfig({ SLUICE_CHAIN: 'polygon' })).toThrow(
      'SLUICE_CHAIN must be one of mainnet, anvil (got "polygon")',
    );
  });

  it('checksums operator addresses', () => {
    const config = loadConfig({ SLUICE_OPERATORS: ' 0x6b175474e89094c44da98b954eedeac495271d0f , ' });
    expect(config.operators).toEqual(['0x6B175474E89094C44Da98b954EedeAC495271d0F']);
  });

  it('rejects a malformed address', () => {
    expect(() => loadConfig({ SLUICE_VAULT_ADDRESS: '0x123' })).toThrow('SLUICE_VAULT_ADDRESS is not a valid address: 0x123');
  });

  it('collects engine overrides', () => {
    const config = loadConfig({
      SLUICE_LOSS_NETTING: 'separate',
      SLUICE_REDEPLOY: 'deposit-all',
      SLUICE_ROUTER_MIN_OUT_BPS: '9500',
      SLUICE_SWAP_DEADLINE_SECONDS: '600',
    });

    expect(config.engine).toEqual({
      lossNetting: 'separate',
      redeploy: 'deposit-all',
      routerMinOutBps: 9500,
      swapDeadlineSeconds: 600,
    });
  });

  it('parses the native reserve in whole native units', () => {
    expect(loadConfig({ SLUICE_NATIVE_RESERVE: '0.2' }).engine).toEqual({ nativeReserve: 200_000_000_000_000_000n });
    expect(() => loadConfig({ SLUICE_NATIVE_RESERVE: 'lots' })).toThrow('SLUICE_NATIVE_RESERVE: Invalid amount: "lots"');
  });

  it('reads the reward A feed address', () => {
    const config = loadConfig({ SLUICE_REWARD_A_FEED: '0x6b175474e89094c44da98b954eedeac495271d0f' });
    expect(config.venues.rewardAFeed).toBe('0x6B175474E89094C44Da98b954EedeAC495271d0F');
  });

  it('rejects chains without a known deployment', () => {
    expect(() => loadConfig({ SLUICE_CHAIN: 'sepolia' })).toThrow('SLUICE_CHAIN must be one of mainnet, anvil (got "sepolia")');
  });

  it('rejects a strategy account other than the signer', () => {
    expect(() => loadConfig({ SLUICE_STRATEGY_ADDRESS: '0x6b175474e89094c44da98b954eedeac495271d0f' })).toThrow(
      'SLUICE_STRATEGY_ADDRESS is not supported: the engine acts as the SLUICE_PRIVATE_KEY account',
    );
  });

  it('bounds basis-point settings', () => {
    expect(() => loadConfig({ SLUICE_POOL_SLIPPAGE_BPS: '20000' })).toThrow(
      'SLUICE_POOL_SLIPPAGE_BPS must be at most 10000 (got 20000)',
    );
    expect(() => loadConfig({ SLUICE_MAX_PRICE_AGE_SECONDS: '1.5' })).toThrow(
      'SLUICE_MAX_PRICE_AGE_SECONDS must be a non-negative integer (got "1.5")',
    );
  });
});

describe('oneOf', () => {
  it('returns the matching value', () => {
    expect(oneOf('ROUTE', 'router', ['pool', 'router'])).toBe('router');
  });
});
