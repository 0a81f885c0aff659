import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { privateKeyToAccount } from 'viem/accounts';
import { ChainlinkPriceFeed } from '@sluice/data-feed';
import { loadConfig } from '../utils/config';
import { DEFAULT_LIVE_NATIVE_RESERVE, createLiveEngine } from '../utils/engine-factory';
import { writeState } from '../utils/state';

const TEST_KEY = `0x${'11'.repeat(32)}` as const;
const FEED = '0x0000000000000000000000000000000000000091';

describe('createLiveEngine', () => {
  let dir: string;
  let stateFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sluice-factory-'));
    stateFile = join(dir, 'state.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function build(env: Record<string, string> = {}) {
    return createLiveEngine(loadConfig({ SLUICE_PRIVATE_KEY: TEST_KEY, SLUICE_STATE_FILE: stateFile, ...env }));
  }

  it('requires a signing key', () => {
    expect(() => createLiveEngine(loadConfig({ SLUICE_STATE_FILE: stateFile }))).toThrow(
      'No signing key configured. Set SLUICE_PRIVATE_KEY in the environment or .env file.',
    );
  });

  it('acts as the signing account and makes it the default operator', () => {
    const live = build();
    const signer = privateKeyToAccount(TEST_KEY).address;

    expect(live.signer).toBe(signer);
    expect(live.engine.isOperator(signer)).toBe(true);
  });

  it('keeps gas money back from conversion by default', () => {
    expect(DEFAULT_LIVE_NATIVE_RESERVE).toBe(50_000_000_000_000_000n);
    expect(build().engine.getConfig().nativeReserve).toBe(DEFAULT_LIVE_NATIVE_RESERVE);
  });

  it('takes the native reserve and deadline from the environment', () => {
    const config = build({ SLUICE_NATIVE_RESERVE: '0.2', SLUICE_SWAP_DEADLINE_SECONDS: '60' }).engine.getConfig();

    expect(config.nativeReserve).toBe(200_000_000_000_000_000n);
    expect(config.swapDeadlineSeconds).toBe(60);
  });

  it('prices reward A only when a feed is configured', () => {
    expect(build().rewardAOracle).toBeNull();

    const oracle = build({ SLUICE_REWARD_A_FEED: FEED }).rewardAOracle;
    expect(oracle).toBeInstanceOf(ChainlinkPriceFeed);
    expect(oracle instanceof ChainlinkPriceFeed ? oracle.address : null).toBe(FEED);
  });

  it('restores the persisted route selector', () => {
    writeState(stateFile, 'router', null);
    expect(build().engine.getRouteSelector()).toBe('router');
  });
});
