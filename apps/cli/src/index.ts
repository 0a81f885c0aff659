import { Command } from 'commander';
import { registerStatusCommand } from './commands/status.js';
import { registerHarvestCommand } from './commands/harvest.js';
import { registerTendCommand } from './commands/tend.js';
import { registerLiquidateCommand } from './commands/liquidate.js';
import { registerMigrateCommand } from './commands/migrate.js';
import { registerRouteCommand } from './commands/route.js';
import { registerSimulateCommand } from './commands/simulate.js';

const program = new Command();

program
  .name('sluice')
  .description('Sluice - Stability pool yield strategy operator')
  .version('0.1.0');

// Register commands
registerStatusCommand(program);
registerHarvestCommand(program);
registerTendCommand(program);
registerLiquidateCommand(program);
registerMigrateCommand(program);
registerRouteCommand(program);
registerSimulateCommand(program);

// Parse and execute
program.parse();
