import { Command } from 'commander';
import chalk from 'chalk';
import { getRpcDisplayUrl } from '@sluice/data-feed';
import { createLiveEngine } from '../utils/engine-factory.js';
import { printBanner, printHoldings, printInfo } from '../utils/display.js';
import { loadSettings, step } from '../utils/run.js';

/**
 * Register the `sluice status` command.
 *
 * Reads idle balances, the venue deposit and pending gains, values them in
 * the base asset, and prints the breakdown.
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show holdings, pending rewards and estimated total assets')
    .action(async () => {
      printBanner();

      const config = await loadSettings();
      const rpcDisplay = getRpcDisplayUrl({ chain: config.chain, rpcUrl: config.rpcUrl });

      const live = await step(`Connecting to ${config.chain} (${rpcDisplay})...`, async () => {
        const created = createLiveEngine(config);
        const block = await created.clients.publicClient.getBlockNumber();
        return { ...created, block };
      }, (result) => `Connected to ${config.chain} (block: ${result.block})`);

      const holdings = await step('Reading holdings...', () => live.engine.holdings(), () => 'Holdings loaded');

      console.log('');
      printHoldings(holdings, live.deployment.assets);
      console.log('');
      printInfo(`Strategy: ${chalk.white(live.engine.name())} (${chalk.white(live.signer)})`);
      printInfo(`Route selector: ${chalk.white(live.engine.getRouteSelector())}`);
      printInfo(`Network: ${chalk.white(config.chain)}`);
      printInfo(`RPC: ${chalk.white(rpcDisplay)}`);
    });
}
