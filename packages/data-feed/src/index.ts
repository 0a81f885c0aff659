/**
 * @sluice/data-feed - Chain access for Sluice
 *
 * viem clients per chain, the known deployment registry, on-chain price
 * feeds, the ERC-20 token ledger and checkpointers.
 */

export {
  CHAINS,
  createChainClients,
  getRpcDisplayUrl,
  type ChainClients,
  type ConnectionConfig,
  type SluicePublicClient,
  type SluiceWalletClient,
} from './connection.js';
export { TransactionSender, type SentTransaction } from './transactions.js';
export { ChainLedger } from './ledger.js';
export { LiquityPriceFeed, ChainlinkPriceFeed, scaleTo18 } from './price-feed.js';
export { VaultDebtReader } from './vault.js';
export { ForkCheckpointer, JournalCheckpointer } from './checkpoint.js';
export { getDeployment, type VenueDeployment } from './tokens.js';
