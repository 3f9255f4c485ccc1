import chalk from 'chalk';
import { join } from 'node:path';
import type { BatchSummary, TickerReport } from '../core/types.js';
import { padRight } from './format-utils.js';

export function tickerStatus(report: TickerReport): string {
  if (report.error?.type === 'resolution_error') return 'not found';
  if (report.error?.type === 'listing_error') return 'no filings';
  if (report.failures.length > 0) return report.downloads.length > 0 ? 'partial' : 'failed';
  return 'ok';
}

function colorStatus(status: string): string {
  if (status === 'ok') return chalk.green(status);
  if (status === 'partial') return chalk.yellow(status);
  return chalk.red(status);
}

export function renderBatchSummary(summary: BatchSummary): string {
  const lines: string[] = [];

  const header = `${summary.form.form_type} download summary`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  lines.push(`  ${chalk.underline(padRight('Ticker', 10))}${chalk.underline(padRight('CIK', 12))}${chalk.underline(padRight('Saved', 8))}${chalk.underline(padRight('Failed', 8))}${chalk.underline('Status')}`);

  for (const r of summary.tickers) {
    const saved = `${r.downloads.length}/${r.filings_selected}`;
    lines.push(`  ${padRight(r.ticker, 10)}${padRight(r.company?.cik ?? '-', 12)}${padRight(saved, 8)}${padRight(String(r.failures.length), 8)}${colorStatus(tickerStatus(r))}`);
  }

  const errors = summary.tickers.filter(r => r.error !== null || r.failures.length > 0);
  if (errors.length > 0) {
    lines.push('');
    for (const r of errors) {
      if (r.error) {
        lines.push(chalk.red(`  ${r.ticker}: ${r.error.message}`));
      }
      for (const f of r.failures) {
        lines.push(chalk.red(`  ${r.ticker} ${f.filing.filing_date} ${f.filing.accession_number}: ${f.message}`));
      }
    }
  }

  const { totals } = summary;
  lines.push('');
  lines.push(`  ${totals.filings_downloaded} filing(s) saved to ${join(summary.output_dir, summary.form.directory)}`);
  if (totals.filings_failed > 0) {
    lines.push(chalk.yellow(`  ${totals.filings_failed} filing(s) failed to download`));
  }
  if (totals.tickers_failed > 0) {
    lines.push(chalk.yellow(`  ${totals.tickers_failed} of ${totals.tickers} ticker(s) failed`));
  }

  return lines.join('\n');
}

export function renderBatchJson(summary: BatchSummary): string {
  return JSON.stringify({
    form: summary.form.form_type,
    output_dir: join(summary.output_dir, summary.form.directory),
    requested_count: summary.requested_count,
    totals: summary.totals,
    tickers: summary.tickers.map(r => ({
      ticker: r.ticker,
      cik: r.company?.cik ?? null,
      company_name: r.company?.name ?? null,
      status: tickerStatus(r),
      error: r.error,
      downloaded: r.downloads.map(d => ({
        filing_date: d.filing.filing_date,
        accession_number: d.filing.accession_number,
        path: d.target.path,
        bytes: d.target.bytes,
      })),
      failed: r.failures.map(f => ({
        filing_date: f.filing.filing_date,
        accession_number: f.filing.accession_number,
        message: f.message,
        status_code: f.status_code,
      })),
    })),
  }, null, 2);
}
