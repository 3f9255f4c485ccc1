/**
 * Batch download engine.
 *
 * Runs the whole ticker list and returns a structured summary. Progress is
 * reported through `onEvent`; nothing here prints to the console. Used by
 * every download_* CLI.
 */

import { CompanyResolver, normalizeTicker } from './resolver.js';
import type { SecClient } from './sec-client.js';
import { DownloadError, ListingError, ResolutionError, errorMessage } from './errors.js';
import { listFilings } from '../processing/filing-selector.js';
import { downloadFiling, targetFileName, disambiguatedFileName } from '../processing/filing-downloader.js';
import type { BatchEvent, BatchSummary, CikLookup, FilingRecord, FormDefinition, TickerReport } from './types.js';

export interface BatchParams {
  tickers: string[];
  form: FormDefinition;
  count: number;
  outputRoot: string;
}

export interface BatchDeps {
  client: SecClient;
  resolver?: CompanyResolver;
  onEvent?: (event: BatchEvent) => void;
}

/** Upper-cased tickers, blanks dropped, first occurrence kept. */
export function dedupeTickers(tickers: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tickers) {
    const ticker = raw.trim().toUpperCase();
    if (!ticker) continue;
    const key = normalizeTicker(ticker);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(ticker);
  }
  return result;
}

/**
 * Download the `count` most recent filings of `form` for every ticker.
 *
 * Throws only when the run cannot start (bad params, ticker table
 * unavailable). Per-ticker and per-filing failures land in the summary.
 */
export async function runBatch(params: BatchParams, deps: BatchDeps): Promise<BatchSummary> {
  const { form, count, outputRoot } = params;
  const tickers = dedupeTickers(params.tickers);

  if (tickers.length === 0) {
    throw new Error('At least one ticker symbol is required.');
  }
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`Filing count must be a positive integer, got ${count}.`);
  }

  const { client } = deps;
  const resolver = deps.resolver ?? new CompanyResolver(client);
  const emit = deps.onEvent ?? (() => {});

  await resolver.load();

  const reports: TickerReport[] = [];
  const usedNames = new Set<string>();

  for (const [index, ticker] of tickers.entries()) {
    emit({ type: 'ticker_start', ticker, index, total: tickers.length });

    const report: TickerReport = {
      ticker,
      company: null,
      filings_selected: 0,
      downloads: [],
      failures: [],
      error: null,
    };
    reports.push(report);

    let company: CikLookup;
    try {
      company = await resolver.resolve(ticker);
    } catch (err) {
      if (!(err instanceof ResolutionError)) throw err;
      report.error = { type: 'resolution_error', message: err.message };
      emit({ type: 'ticker_failed', ticker, error_type: 'resolution_error', message: err.message });
      continue;
    }
    report.company = company;
    emit({ type: 'resolved', ticker, company });

    let filings: FilingRecord[];
    try {
      filings = await listFilings(client, company, form.form_type, count);
    } catch (err) {
      if (!(err instanceof ListingError)) throw err;
      report.error = { type: 'listing_error', message: err.message };
      emit({ type: 'ticker_failed', ticker, error_type: 'listing_error', message: err.message });
      continue;
    }
    report.filings_selected = filings.length;
    emit({ type: 'filings_listed', ticker, filings });

    for (const filing of filings) {
      let fileName = targetFileName(filing, form);
      if (usedNames.has(fileName)) {
        fileName = disambiguatedFileName(filing, form);
      }

      try {
        const target = await downloadFiling(client, filing, { outputRoot, form, fileName });
        usedNames.add(fileName);
        report.downloads.push({ filing, target });
        emit({ type: 'downloaded', ticker, filing, target });
      } catch (err) {
        if (!(err instanceof DownloadError)) throw err;
        report.failures.push({ filing, message: errorMessage(err), status_code: err.statusCode });
        emit({ type: 'download_failed', ticker, filing, message: err.message });
      }
    }
  }

  return {
    form,
    output_dir: outputRoot,
    requested_count: count,
    tickers: reports,
    totals: {
      tickers: reports.length,
      tickers_failed: reports.filter(r => r.error !== null).length,
      filings_downloaded: reports.reduce((sum, r) => sum + r.downloads.length, 0),
      filings_failed: reports.reduce((sum, r) => sum + r.failures.length, 0),
    },
  };
}
