import { Command } from 'commander';
import chalk from 'chalk';
import type { RouteSelector } from '@sluice/types';
import { createLiveEngine } from '../utils/engine-factory.js';
import { writeState } from '../utils/state.js';
import { printBanner, printError, printInfo, printSuccess } from '../utils/display.js';
import { loadSettings, step } from '../utils/run.js';

function parseSelector(value: string): RouteSelector | null {
  return value === 'pool' || value === 'router' ? value : null;
}

/**
 * Register the `sluice route` command.
 *
 * Without an argument, prints the current final-hop venue. With one, the
 * signer (who must be an operator) switches it and the choice is persisted
 * in the state file.
 */
export function registerRouteCommand(program: Command): void {
  program
    .command('route')
    .description('Show or set the final-hop conversion venue (pool | router)')
    .argument('[selector]', 'pool or router')
    .action(async (value: string | undefined) => {
      printBanner();

      const config = await loadSettings();
      const live = await step('Preparing engine...', async () => createLiveEngine(config));

      if (value === undefined) {
        printInfo(`Route selector: ${chalk.white(live.engine.getRouteSelector())}`);
        return;
      }

      const selector = parseSelector(value);
      if (!selector) {
        printError(`Unknown route selector "${value}" (expected pool or router)`);
        process.exit(1);
      }

      try {
        live.engine.setRouteSelector(live.signer, selector);
        writeState(config.stateFile, selector, live.signer);
      } catch (err) {
        printError(err instanceof Error ? err.message : String(err));
        process.exit(1);
      }
      printSuccess(`Route selector set to ${selector} (applies from the next harvest)`);
    });
}
