import chalk from 'chalk';
import Table from 'cli-table3';
import * as readline from 'readline';
import { formatUnits } from 'viem';
import type { HarvestReport, Holdings, SluiceConfig, StrategyAssets } from '@sluice/types';
import type { EngineEvent } from '@sluice/strategy-engine';

// Sluice colors
const BRAND = {
  primary: chalk.hex('#0ea5e9'), // Sky
  secondary: chalk.hex('#38bdf8'), // Light sky
  success: chalk.hex('#10b981'), // Green
  warning: chalk.hex('#f59e0b'), // Amber
  error: chalk.hex('#ef4444'), // Red
  muted: chalk.gray,
};

export type LogLevel = SluiceConfig['logLevel'];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let threshold: LogLevel = 'info';

/**
 * Set the lowest level of message lines that get printed.
 * Banners, tables and spinners are always shown.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

/**
 * Print the Sluice banner/header.
 */
export function printBanner(): void {
  console.log('');
  console.log(BRAND.primary('  ╔══════════════════════════════════════╗'));
  console.log(BRAND.primary('  ║') + BRAND.secondary('    SLUICE - Stability Pool Strategy  ') + BRAND.primary('║'));
  console.log(BRAND.primary('  ╚══════════════════════════════════════╝'));
  console.log('');
}

/**
 * Format a raw token amount with a fixed number of fraction digits (truncated).
 */
export function formatAmount(amount: bigint, decimals: number = 18, fractionDigits: number = 4): string {
  const negative = amount < 0n;
  const [whole, fraction = ''] = formatUnits(negative ? -amount : amount, decimals).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const trimmed = fraction.slice(0, fractionDigits).padEnd(fractionDigits, '0');
  const body = fractionDigits > 0 ? `${grouped}.${trimmed}` : grouped;
  return negative ? `-${body}` : body;
}

/**
 * Print the strategy's holdings as a formatted table.
 */
export function printHoldings(holdings: Holdings, assets: StrategyAssets): void {
  const base = assets.base.symbol;
  const table = new Table({
    head: [chalk.bold('Holding'), chalk.bold('Amount'), chalk.bold(`Value (${base})`)],
    colWidths: [28, 22, 22],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  const unpriced = BRAND.muted('not priced');
  table.push(
    [BRAND.secondary(`Idle ${base}`), formatAmount(holdings.idleBase), formatAmount(holdings.idleBase)],
    [BRAND.secondary(`Deposited ${base}`), formatAmount(holdings.recoverable), formatAmount(holdings.recoverable)],
    [
      BRAND.secondary(`${assets.rewardA.symbol} (idle + pending)`),
      formatAmount(holdings.rewardA.idle + holdings.rewardA.pending),
      holdings.rewardA.valueInBase === null ? unpriced : formatAmount(holdings.rewardA.valueInBase),
    ],
    [
      BRAND.secondary('ETH (idle + pending)'),
      formatAmount(holdings.native.idle + holdings.native.pending),
      formatAmount(holdings.native.valueInBase),
    ],
    [
      BRAND.secondary(`Idle ${assets.secondary.symbol}`),
      formatAmount(holdings.secondary.idle),
      formatAmount(holdings.secondary.valueInBase),
    ],
  );

  console.log(table.toString());
  console.log(BRAND.primary('  Estimated total: ') + chalk.bold.white(`${formatAmount(holdings.total)} ${base}`));
}

/**
 * Print a harvest report.
 */
export function printReport(report: HarvestReport, symbol: string): void {
  printTable(
    ['Profit', 'Loss', 'Debt payment'],
    [[formatAmount(report.profit), formatAmount(report.loss), formatAmount(report.debtPayment)].map((v) => `${v} ${symbol}`)],
  );
}

/**
 * Render one engine event as a single line.
 */
export function describeEvent(event: EngineEvent, symbol: string): string {
  switch (event.type) {
    case 'conversion_executed': {
      const { receipt } = event;
      return `Converted ${formatAmount(receipt.amountIn)} via ${receipt.kind} -> ${formatAmount(receipt.amountOut)} (min ${formatAmount(receipt.quote.minOut)})`;
    }
    case 'harvest_reported':
      return `Harvest reported: profit ${formatAmount(event.report.profit)}, loss ${formatAmount(event.report.loss)}, debt payment ${formatAmount(event.report.debtPayment)} ${symbol}`;
    case 'liquidated':
      return `Liquidated ${formatAmount(event.result.liquidated)} of ${formatAmount(event.requested)} ${symbol} (loss ${formatAmount(event.result.loss)})`;
    case 'position_adjusted':
      return `Deposited ${formatAmount(event.deposited)} ${symbol}`;
    case 'force_withdrawn':
      return `Withdrew ${formatAmount(event.received)} of ${formatAmount(event.requested)} ${symbol}`;
    case 'migrated':
      return `Withdrew ${formatAmount(event.withdrawn)} ${symbol} for migration to ${event.successor}`;
    case 'route_changed':
      return `Route selector ${event.from} -> ${event.to} (by ${event.by})`;
    case 'native_swept':
      return `Swept ${formatAmount(event.amount)} ETH to ${event.to}`;
    case 'rolled_back':
      return `${event.entryPoint} rolled back: ${event.error}`;
  }
}

/**
 * Print an engine event with a status prefix.
 */
export function printEvent(event: EngineEvent, symbol: string): void {
  const line = describeEvent(event, symbol);
  if (event.type === 'rolled_back') {
    printError(line);
  } else {
    printInfo(line);
  }
}

/**
 * Print a debug message.
 */
export function printDebug(message: string): void {
  if (!enabled('debug')) return;
  console.log(BRAND.muted('  . ' + message));
}

/**
 * Print an info message.
 */
export function printInfo(message: string): void {
  if (!enabled('info')) return;
  console.log(BRAND.secondary('  i ') + message);
}

/**
 * Print a success message.
 */
export function printSuccess(message: string): void {
  if (!enabled('info')) return;
  console.log(BRAND.success('  + ') + message);
}

/**
 * Print a warning message.
 */
export function printWarning(message: string): void {
  if (!enabled('warn')) return;
  console.log(BRAND.warning('  ! ') + message);
}

/**
 * Print an error message.
 */
export function printError(message: string): void {
  console.log(BRAND.error('  x ') + message);
}

/**
 * Print a formatted table with headers and rows.
 */
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.bold(h)),
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const row of rows) {
    table.push(row);
  }

  console.log(table.toString());
}

/**
 * Print a confirmation prompt and wait for user input.
 * Returns true if user confirms, false otherwise.
 */
export async function printConfirmation(message: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(BRAND.warning('  ? ') + message + chalk.gray(' (y/n): '), (answer) => {
      rl.close();
      const normalized = answer.toLowerCase().trim();
      resolve(normalized === 'y' || normalized === 'yes');
    });
  });
}
