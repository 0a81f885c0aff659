import ora, { type Ora } from 'ora';
import { loadConfig, type CliConfig } from './config.js';
import { printError, setLogLevel } from './display.js';

/**
 * Run a command step under a spinner. On failure the spinner fails, the
 * message is printed and the process exits with status 1.
 */
export async function step<T>(text: string, work: (spinner: Ora) => Promise<T>, done?: (result: T) => string): Promise<T> {
  const spinner = ora({ text, color: 'cyan' }).start();
  try {
    const result = await work(spinner);
    spinner.succeed(done ? done(result) : text);
    return result;
  } catch (err) {
    spinner.fail(text);
    printError(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

/** Load the configuration and apply its log level to CLI output */
export function loadSettings(): Promise<CliConfig> {
  return step('Loading configuration...', async () => {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    return config;
  });
}
