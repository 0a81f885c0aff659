import { Command } from 'commander';
import chalk from 'chalk';
import { createSimulatedDeployment, SIM_ASSETS } from '@sluice/simulator';
import { StrategyEngine } from '@sluice/strategy-engine';
import { parseAmount } from '../utils/amount.js';
import { LOSS_NETTING, REDEPLOY, ROUTE_SELECTORS, oneOf } from '../utils/config.js';
import { formatAmount, printBanner, printEvent, printHoldings, printInfo, printReport, printSuccess } from '../utils/display.js';
import { step } from '../utils/run.js';

interface SimulateOptions {
  idle: string;
  deposited: string;
  rewardA: string;
  rewardB: string;
  debt: string;
  debtOutstanding: string;
  ethPrice: string;
  route: string;
  lossNetting: string;
  redeploy: string;
}

/**
 * Register the `sluice simulate` command.
 *
 * Runs one harvest cycle (prepareReturn + adjustPosition) against the
 * in-process simulated chain. Every conversion trades at parity, so the
 * numbers are easy to follow.
 */
export function registerSimulateCommand(program: Command): void {
  program
    .command('simulate')
    .description('Run a harvest cycle against an in-memory chain')
    .option('--idle <amount>', 'Idle base asset', '0')
    .option('--deposited <amount>', 'Base asset deposited in the venue', '1000')
    .option('--reward-a <amount>', 'Pending reward A', '10')
    .option('--reward-b <amount>', 'Pending native gain', '0.01')
    .option('--debt <amount>', 'Vault totalDebt for the strategy', '1000')
    .option('-d, --debt-outstanding <amount>', 'Base asset the vault wants back', '0')
    .option('--eth-price <amount>', 'Base-asset price of one unit of native currency', '2000')
    .option('--route <selector>', 'Final-hop venue: pool or router', 'pool')
    .option('--loss-netting <policy>', 'net or separate', 'net')
    .option('--redeploy <policy>', 'reserve-debt or deposit-all', 'reserve-debt')
    .action(async (options: SimulateOptions) => {
      printBanner();

      const { sim, engine, debtOutstanding } = await step('Building simulated chain...', async () => {
        const sim = createSimulatedDeployment({ nativePrice: parseAmount(options.ethPrice) });
        sim.seed({
          idleBase: parseAmount(options.idle),
          deposited: parseAmount(options.deposited),
          pendingRewardA: parseAmount(options.rewardA),
          pendingRewardB: parseAmount(options.rewardB),
          totalDebt: parseAmount(options.debt),
        });

        const engine = new StrategyEngine(sim.deps, {
          routeSelector: oneOf('--route', options.route, ROUTE_SELECTORS),
          lossNetting: oneOf('--loss-netting', options.lossNetting, LOSS_NETTING),
          redeploy: oneOf('--redeploy', options.redeploy, REDEPLOY),
        });
        return { sim, engine, debtOutstanding: parseAmount(options.debtOutstanding) };
      });
      const symbol = SIM_ASSETS.base.symbol;
      engine.onEvent((event) => printEvent(event, symbol));

      const before = await step('Valuing holdings...', () => engine.holdings());
      printInfo(chalk.bold('Before'));
      printHoldings(before, SIM_ASSETS);
      console.log('');

      const report = await step('Harvesting...', () => engine.prepareReturn(debtOutstanding), () => 'Harvest complete');
      printReport(report, symbol);

      const deposited = await step('Redeploying...', () => engine.adjustPosition(debtOutstanding));
      printSuccess(`Deposited ${formatAmount(deposited)} ${symbol}`);

      const after = await step('Valuing holdings...', () => engine.holdings());
      console.log('');
      printInfo(chalk.bold('After'));
      printHoldings(after, SIM_ASSETS);
      printInfo(`Venue calls: ${sim.chain.calls().filter((call) => call.kind === 'write').length}`);
    });
}
