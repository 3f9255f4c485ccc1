import chalk from 'chalk';
import { basename } from 'node:path';
import type { BatchEvent, FormDefinition } from '../core/types.js';
import { formatBytes } from './format-utils.js';

/**
 * Turns batch events into progress lines. Writes to stderr by default so
 * stdout carries only the summary (and stays clean for --json).
 */
export function createConsoleReporter(
  form: FormDefinition,
  write: (line: string) => void = line => console.error(line)
): (event: BatchEvent) => void {
  return (event) => {
    switch (event.type) {
      case 'ticker_start':
        write('');
        write(chalk.bold(`Downloading ${form.form_type} filings for ${event.ticker} (${event.index + 1}/${event.total})`));
        break;
      case 'resolved':
        write(chalk.dim(`  CIK ${event.company.cik} · ${event.company.name}`));
        break;
      case 'filings_listed':
        write(`  Found ${event.filings.length} ${form.form_type} filing(s)`);
        break;
      case 'downloaded':
        write(chalk.green(`  ✓ ${basename(event.target.path)} (${formatBytes(event.target.bytes)})`));
        break;
      case 'download_failed':
        write(chalk.red(`  ✗ ${event.filing.filing_date} ${event.filing.accession_number}: ${event.message}`));
        break;
      case 'ticker_failed':
        write(chalk.red(`  ✗ ${event.message}`));
        break;
    }
  };
}
