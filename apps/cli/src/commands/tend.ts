import { Command } from 'commander';
import { createLiveEngine } from '../utils/engine-factory.js';
import { parseAmount } from '../utils/amount.js';
import { formatAmount, printBanner, printSuccess } from '../utils/display.js';
import { loadSettings, step } from '../utils/run.js';

/**
 * Register the `sluice tend` command (adjustPosition only).
 */
export function registerTendCommand(program: Command): void {
  program
    .command('tend')
    .description('Deploy idle base asset into the venue without harvesting')
    .option('-d, --debt-outstanding <amount>', 'Base asset to keep idle for the vault', '0')
    .action(async (options: { debtOutstanding: string }) => {
      printBanner();

      const config = await loadSettings();
      const { live, debtOutstanding } = await step('Preparing engine...', async () => {
        const live = createLiveEngine(config);
        return { live, debtOutstanding: parseAmount(options.debtOutstanding, live.deployment.assets.base.decimals) };
      });
      const { base } = live.deployment.assets;

      const deposited = await step('Adjusting position...', () => live.engine.adjustPosition(debtOutstanding));
      printSuccess(
        deposited === 0n ? 'Nothing to deploy' : `Deposited ${formatAmount(deposited, base.decimals)} ${base.symbol}`,
      );
    });
}
