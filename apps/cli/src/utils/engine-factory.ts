import { parseEther } from 'viem';
import type { Address, Checkpointer, PriceOracle, VaultFramework } from '@sluice/types';
import {
  ChainLedger,
  ChainlinkPriceFeed,
  ForkCheckpointer,
  JournalCheckpointer,
  LiquityPriceFeed,
  TransactionSender,
  VaultDebtReader,
  createChainClients,
  getDeployment,
  type ChainClients,
  type VenueDeployment,
} from '@sluice/data-feed';
import { StabilityPoolAdapter } from '@sluice/adapters-stability-pool';
import { UniswapRouterAdapter } from '@sluice/adapters-uniswap';
import { CurvePoolAdapter } from '@sluice/adapters-curve';
import { StrategyEngine } from '@sluice/strategy-engine';
import type { CliConfig } from './config.js';
import { readState } from './state.js';

export interface LiveEngine {
  engine: StrategyEngine;
  clients: ChainClients;
  deployment: VenueDeployment;
  /** Signing account; the engine holds funds and acts as this account */
  signer: Address;
  sender: TransactionSender;
  rewardAOracle: PriceOracle | null;
}

/** Native currency an EOA keeps back from conversion to pay for gas */
export const DEFAULT_LIVE_NATIVE_RESERVE = parseEther('0.05');

/** Framework stand-in for commands that never read debt */
class MissingVault implements VaultFramework {
  async totalDebt(): Promise<bigint> {
    throw new Error('SLUICE_VAULT_ADDRESS is not set');
  }
}

/**
 * Create the strategy engine with all chain adapters wired up.
 *
 * This is the central factory used by all CLI commands that talk to a chain.
 * The engine acts as the signing account: every write is sent from it, so its
 * balances and deposit are the ones the engine reads.
 * On anvil the engine rolls back through evm_snapshot/evm_revert; elsewhere a
 * failed entry point can only report the transactions it already sent.
 */
export function createLiveEngine(config: CliConfig): LiveEngine {
  const clients = createChainClients({ chain: config.chain, rpcUrl: config.rpcUrl, privateKey: config.privateKey });
  const { publicClient, walletClient } = clients;
  if (!walletClient) {
    throw new Error('No signing key configured. Set SLUICE_PRIVATE_KEY in the environment or .env file.');
  }

  const deployment = getDeployment(config.chain);
  const signer = walletClient.account.address;
  const sender = new TransactionSender(publicClient, walletClient);

  const checkpointer: Checkpointer =
    config.chain === 'anvil' ? new ForkCheckpointer(clients.chain, clients.rpcUrl) : new JournalCheckpointer(sender);

  const framework: VaultFramework = config.vaultAddress
    ? new VaultDebtReader(publicClient, config.vaultAddress)
    : new MissingVault();

  const rewardAOracle = config.venues.rewardAFeed ? new ChainlinkPriceFeed(publicClient, config.venues.rewardAFeed) : null;

  const persisted = readState(config.stateFile);

  const engine = new StrategyEngine(
    {
      self: signer,
      assets: deployment.assets,
      ledger: new ChainLedger(publicClient, sender),
      venue: new StabilityPoolAdapter(publicClient, sender, config.venues.stabilityPool ?? deployment.stabilityPool),
      router: new UniswapRouterAdapter(sender, config.venues.swapRouter ?? deployment.swapRouter),
      pool: new CurvePoolAdapter(publicClient, sender, config.venues.curvePool ?? deployment.curvePool, {
        underlying: true,
      }),
      nativeOracle: new LiquityPriceFeed(publicClient, config.venues.priceFeed ?? deployment.priceFeed),
      rewardAOracle: rewardAOracle ?? undefined,
      framework,
      checkpointer,
    },
    {
      ...config.engine,
      operators: config.operators.length > 0 ? config.operators : [signer],
      routeSelector: persisted?.routeSelector ?? 'pool',
      // Deadlines a few minutes out on a live chain
      swapDeadlineSeconds: config.engine.swapDeadlineSeconds ?? 300,
      nativeReserve: config.engine.nativeReserve ?? DEFAULT_LIVE_NATIVE_RESERVE,
    },
  );

  return { engine, clients, deployment, signer, sender, rewardAOracle };
}
