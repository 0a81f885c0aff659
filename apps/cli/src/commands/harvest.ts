import { Command } from 'commander';
import { createLiveEngine } from '../utils/engine-factory.js';
import { parseAmount } from '../utils/amount.js';
import { printBanner, printDebug, printEvent, printReport, printSuccess, formatAmount } from '../utils/display.js';
import { loadSettings, step } from '../utils/run.js';

/**
 * Register the `sluice harvest` command.
 *
 * One full cycle: prepareReturn (claim, convert, value, liquidate, report)
 * followed by adjustPosition to redeploy idle base asset.
 */
export function registerHarvestCommand(program: Command): void {
  program
    .command('harvest')
    .description('Claim and convert rewards, report profit/loss, then redeploy')
    .option('-d, --debt-outstanding <amount>', 'Base asset the vault wants back this cycle', '0')
    .option('--no-adjust', 'Skip redeploying idle base asset after the report')
    .action(async (options: { debtOutstanding: string; adjust: boolean }) => {
      printBanner();

      const config = await loadSettings();
      const { live, debtOutstanding } = await step('Preparing engine...', async () => {
        const live = createLiveEngine(config);
        return { live, debtOutstanding: parseAmount(options.debtOutstanding, live.deployment.assets.base.decimals) };
      });
      const { base } = live.deployment.assets;
      live.engine.onEvent((event) => printEvent(event, base.symbol));

      const report = await step('Harvesting...', () => live.engine.prepareReturn(debtOutstanding), () => 'Harvest complete');
      console.log('');
      printReport(report, base.symbol);

      if (options.adjust) {
        const deposited = await step('Redeploying...', () => live.engine.adjustPosition(debtOutstanding));
        printSuccess(`Deposited ${formatAmount(deposited, base.decimals)} ${base.symbol}`);
      }

      for (const tx of live.sender.sent) {
        printDebug(`${tx.label} ${tx.hash} (block ${tx.blockNumber})`);
      }
    });
}
