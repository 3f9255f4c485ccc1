import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { runBatch } from './core/batch.js';
import { SecClient } from './core/sec-client.js';
import { buildUserAgent, loadConfig, parseContactEmail, type AppConfig } from './core/config.js';
import { errorMessage } from './core/errors.js';
import { requireFormDefinition } from './core/forms.js';
import { createConsoleReporter } from './output/console-reporter.js';
import { renderBatchJson, renderBatchSummary } from './output/summary-renderer.js';
import type { BatchSummary, FormDefinition } from './core/types.js';

export const VERSION = '0.1.0';
export const DEFAULT_COUNT = 5;

export interface CliOptions {
  number: number;
  email?: string;
  outDir?: string;
  json?: boolean;
}

export function parseCount(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return Number(trimmed);
}

/**
 * Wire config, client and reporter together and run one batch.
 * An email given on the command line replaces SEC_USER_AGENT as well.
 */
export async function executeDownload(
  form: FormDefinition,
  tickers: string[],
  options: CliOptions,
  config: AppConfig = loadConfig()
): Promise<BatchSummary> {
  const email = parseContactEmail(options.email ?? config.contactEmail);
  const userAgent = buildUserAgent(email, options.email !== undefined ? null : config.userAgent);
  const client = new SecClient({ userAgent, timeoutMs: config.requestTimeoutMs });

  return runBatch(
    {
      tickers,
      form,
      count: options.number,
      outputRoot: resolve(options.outDir ?? config.downloadDir),
    },
    { client, onEvent: createConsoleReporter(form) }
  );
}

export function createProgram(form: FormDefinition): Command {
  const program = new Command();

  program
    .name(form.command)
    .description(`Download recent ${form.display_name} filings from SEC EDGAR`)
    .version(VERSION)
    .argument('<tickers...>', 'Stock ticker symbol(s) (e.g., AAPL MSFT TSLA)')
    .option('-n, --number <count>', `Number of recent ${form.form_type} filings per ticker`, parseCount, DEFAULT_COUNT)
    .option('-e, --email <email>', 'Contact email for the SEC User-Agent header (default: SEC_CONTACT_EMAIL)')
    .option('-o, --out-dir <dir>', 'Root directory for downloads (default: SEC_DOWNLOAD_DIR or the working directory)')
    .option('-j, --json', 'Print the summary as JSON')
    .addHelpText('after', `
Examples:
  ${form.command} AAPL                 # ${DEFAULT_COUNT} most recent ${form.form_type} filings for Apple
  ${form.command} AAPL -n 10           # 10 most recent
  ${form.command} AAPL MSFT TSLA       # several companies
  ${form.command} AAPL -e me@example.com

Files are saved as ${form.directory}/<TICKER>_<FILING DATE>_${form.file_label}.html`)
    .action(async (tickers: string[], options: CliOptions) => {
      try {
        const summary = await executeDownload(form, tickers, options);

        if (options.json) {
          console.log(renderBatchJson(summary));
        } else {
          console.log('');
          console.log(renderBatchSummary(summary));
          console.log('');
        }
      } catch (err) {
        console.error(chalk.red(`Error: ${errorMessage(err)}`));
        process.exit(1);
      }
    });

  return program;
}

export async function runCli(formId: string, argv: string[] = process.argv): Promise<void> {
  const program = createProgram(requireFormDefinition(formId));
  await program.parseAsync(argv);
}
