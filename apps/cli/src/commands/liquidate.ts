import { Command } from 'commander';
import { createLiveEngine } from '../utils/engine-factory.js';
import { parseAmount } from '../utils/amount.js';
import { formatAmount, printBanner, printError, printSuccess, printWarning } from '../utils/display.js';
import { loadSettings, step } from '../utils/run.js';

/**
 * Register the `sluice liquidate` command.
 *
 * Frees base asset from the venue. A shortfall is reported as loss, not as
 * an error.
 */
export function registerLiquidateCommand(program: Command): void {
  program
    .command('liquidate')
    .description('Free base asset from the venue (liquidatePosition / liquidateAllPositions)')
    .argument('[amount]', 'Base asset amount to free')
    .option('--all', 'Exit the whole position')
    .action(async (amount: string | undefined, options: { all?: boolean }) => {
      printBanner();

      if (!options.all && amount === undefined) {
        printError('Provide an amount or --all');
        process.exit(1);
      }

      const config = await loadSettings();
      const live = await step('Preparing engine...', async () => createLiveEngine(config));
      const { base } = live.deployment.assets;

      if (options.all || amount === undefined) {
        const freed = await step('Liquidating all positions...', () => live.engine.liquidateAllPositions());
        printSuccess(`Freed ${formatAmount(freed, base.decimals)} ${base.symbol}`);
        return;
      }

      const requested = amount;
      const result = await step('Liquidating...', () => live.engine.liquidatePosition(parseAmount(requested, base.decimals)));
      printSuccess(`Freed ${formatAmount(result.liquidated, base.decimals)} ${base.symbol}`);
      if (result.loss > 0n) {
        printWarning(`Shortfall reported as loss: ${formatAmount(result.loss, base.decimals)} ${base.symbol}`);
      }
    });
}
