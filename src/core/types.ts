/**
 * Core data model for the EDGAR filings downloader.
 *
 * - FilingRecords are read from the submissions API and never mutated
 * - Nothing here is persisted; the only output is the downloaded documents
 */

/** CIK lookup result. `cik` is zero-padded to 10 digits. */
export interface CikLookup {
  cik: string;
  ticker: string;
  name: string;
}

export interface FormDefinition {
  id: string;
  /** Form string as EDGAR lists it in the submissions API */
  form_type: string;
  display_name: string;
  /** Directory the documents are saved under, relative to the output root */
  directory: string;
  /** Form part of the saved file name, e.g. AAPL_2024-11-01_10K.html */
  file_label: string;
  /** Name of the CLI script */
  command: string;
}

export interface FilingRecord {
  cik: string;
  ticker: string;
  company_name: string;
  form_type: string;
  filing_date: string;
  report_date: string | null;
  accession_number: string;
  primary_document: string;
}

export interface DownloadTarget {
  path: string;
  bytes: number;
}

export interface FilingFailure {
  filing: FilingRecord;
  message: string;
  status_code: number | null;
}

export type TickerErrorType = 'resolution_error' | 'listing_error';

export interface TickerReport {
  ticker: string;
  company: CikLookup | null;
  filings_selected: number;
  downloads: Array<{ filing: FilingRecord; target: DownloadTarget }>;
  failures: FilingFailure[];
  error: { type: TickerErrorType; message: string } | null;
}

export interface BatchSummary {
  form: FormDefinition;
  output_dir: string;
  requested_count: number;
  tickers: TickerReport[];
  totals: {
    tickers: number;
    tickers_failed: number;
    filings_downloaded: number;
    filings_failed: number;
  };
}

export type BatchEvent =
  | { type: 'ticker_start'; ticker: string; index: number; total: number }
  | { type: 'resolved'; ticker: string; company: CikLookup }
  | { type: 'filings_listed'; ticker: string; filings: FilingRecord[] }
  | { type: 'downloaded'; ticker: string; filing: FilingRecord; target: DownloadTarget }
  | { type: 'download_failed'; ticker: string; filing: FilingRecord; message: string }
  | { type: 'ticker_failed'; ticker: string; error_type: TickerErrorType; message: string };
