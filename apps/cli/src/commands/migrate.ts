import { Command } from 'commander';
import { getAddress, isAddress } from 'viem';
import { createLiveEngine } from '../utils/engine-factory.js';
import { formatAmount, printBanner, printConfirmation, printError, printSuccess, printWarning } from '../utils/display.js';
import { loadSettings, step } from '../utils/run.js';

/**
 * Register the `sluice migrate` command.
 *
 * Withdraws all principal so the vault can move the base asset to a new
 * strategy. Rewards are left unclaimed and unconverted.
 */
export function registerMigrateCommand(program: Command): void {
  program
    .command('migrate')
    .description('Withdraw all principal ahead of a migration (prepareMigration)')
    .argument('<successor>', 'Address of the successor strategy')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (successor: string, options: { yes?: boolean }) => {
      printBanner();

      if (!isAddress(successor, { strict: false })) {
        printError(`Not an address: ${successor}`);
        process.exit(1);
      }

      if (!options.yes) {
        printWarning('Pending rewards are not claimed or converted by a migration.');
        const confirmed = await printConfirmation(`Withdraw all principal for ${successor}?`);
        if (!confirmed) return;
      }

      const config = await loadSettings();
      const live = await step('Preparing engine...', async () => createLiveEngine(config));
      const { base } = live.deployment.assets;

      const withdrawn = await step('Withdrawing principal...', () => live.engine.prepareMigration(getAddress(successor)));
      printSuccess(`Withdrew ${formatAmount(withdrawn, base.decimals)} ${base.symbol}`);
    });
}
