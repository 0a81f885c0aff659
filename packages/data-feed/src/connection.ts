import {
  createPublicClient,
  createWalletClient,
  http,
  type Account,
  type Chain,
  type PublicClient,
  type Transport,
  type WalletClient,
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { foundry, mainnet } from 'viem/chains';
import type { ChainName, Hex } from '@sluice/types';

/** viem chain definitions by name */
export const CHAINS: Record<ChainName, Chain> = {
  mainnet,
  anvil: foundry,
};

/** Public fallback endpoints, used when no RPC URL is configured */
const DEFAULT_RPC_URLS: Record<ChainName, string> = {
  mainnet: 'https://eth.llamarpc.com',
  anvil: 'http://127.0.0.1:8545',
};

export type SluicePublicClient = PublicClient<Transport, Chain>;
export type SluiceWalletClient = WalletClient<Transport, Chain, Account>;

export interface ConnectionConfig {
  chain: ChainName;
  rpcUrl?: string;
  /** Signing key; without one only reads are possible */
  privateKey?: Hex;
}

export interface ChainClients {
  chain: Chain;
  rpcUrl: string;
  publicClient: SluicePublicClient;
  walletClient: SluiceWalletClient | null;
}

/**
 * Creates the viem clients for a chain.
 *
 * Priority order for the endpoint:
 * 1. Custom RPC URL (if provided)
 * 2. The chain's public default
 */
export function createChainClients(config: ConnectionConfig): ChainClients {
  const chain = CHAINS[config.chain];
  const rpcUrl = config.rpcUrl || DEFAULT_RPC_URLS[config.chain];
  const transport = http(rpcUrl, { timeout: 60_000 });

  const publicClient: SluicePublicClient = createPublicClient({ chain, transport });

  const walletClient: SluiceWalletClient | null = config.privateKey
    ? createWalletClient({ chain, transport, account: privateKeyToAccount(config.privateKey) })
    : null;

  return { chain, rpcUrl, publicClient, walletClient };
}

/**
 * Get the RPC URL that would be used for a given config, with API keys masked.
 * Useful for display/logging.
 */
export function getRpcDisplayUrl(config: ConnectionConfig): string {
  const rpcUrl = config.rpcUrl || DEFAULT_RPC_URLS[config.chain];
  return rpcUrl
    .replace(/([?&](?:api-?key|apikey|key)=)[^&]+/gi, '$1***')
    .replace(/\/[A-Za-z0-9_-]{24,}$/, '/***');
}
