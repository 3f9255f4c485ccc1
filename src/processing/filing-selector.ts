/**
 * Filing selection.
 *
 * Reads a company's filing history from the submissions API and picks the
 * most recent filings of one form type:
 * 1. Scan `filings.recent` for exact form-type matches
 * 2. If fewer than `count` matched, read the older history pages in order
 * 3. Sort by filing date desc, then accession number desc, and keep `count`
 */

import type { CompanySubmissions, FilingColumns, SecClient } from '../core/sec-client.js';
import { ListingError, errorMessage } from '../core/errors.js';
import type { CikLookup, FilingRecord } from '../core/types.js';

/** Pull records of one form out of a column-oriented filing list. */
export function extractFilings(
  columns: FilingColumns,
  company: CikLookup,
  companyName: string,
  formType: string
): FilingRecord[] {
  const records: FilingRecord[] = [];

  for (let i = 0; i < columns.form.length; i++) {
    if (columns.form[i] !== formType) continue;

    const accession = columns.accessionNumber[i];
    const filingDate = columns.filingDate[i];
    // Columns are parallel arrays; skip rows the API left short
    if (accession === undefined || filingDate === undefined) continue;

    const reportDate = columns.reportDate[i];
    records.push({
      cik: company.cik,
      ticker: company.ticker,
      company_name: companyName,
      form_type: formType,
      filing_date: filingDate,
      report_date: reportDate ? reportDate : null,
      accession_number: accession,
      primary_document: columns.primaryDocument[i] ?? '',
    });
  }

  return records;
}

/** Most recent first; same-day filings by accession number, highest first. */
export function compareFilingsByRecency(a: FilingRecord, b: FilingRecord): number {
  return b.filing_date.localeCompare(a.filing_date)
    || b.accession_number.localeCompare(a.accession_number);
}

export function selectRecentFilings(records: FilingRecord[], count: number): FilingRecord[] {
  const seen = new Set<string>();
  const unique = records.filter(r => {
    if (seen.has(r.accession_number)) return false;
    seen.add(r.accession_number);
    return true;
  });
  return unique.sort(compareFilingsByRecency).slice(0, Math.max(0, count));
}

/**
 * List the `count` most recent filings of `formType` for a company.
 *
 * Older history pages are read only while the recent filings hold fewer
 * than `count` matches. A page that cannot be read ends the search with
 * the matches found so far. Throws ListingError when the history cannot be
 * read or holds no match.
 */
export async function listFilings(
  client: SecClient,
  company: CikLookup,
  formType: string,
  count: number
): Promise<FilingRecord[]> {
  const historyError = (err: unknown) => new ListingError(
    company.ticker,
    `Failed to read filing history for ${company.ticker} (CIK ${company.cik}): ${errorMessage(err)}`
  );

  let submissions: CompanySubmissions;
  try {
    submissions = await client.getCompanySubmissions(company.cik);
  } catch (err) {
    throw historyError(err);
  }

  const companyName = submissions.name || company.name;
  const matches = extractFilings(submissions.filings.recent, company, companyName, formType);

  for (const page of submissions.filings.files) {
    if (matches.length >= count) break;
    let columns: FilingColumns;
    try {
      columns = await client.getSubmissionsPage(page.name);
    } catch (err) {
      if (matches.length === 0) throw historyError(err);
      break;
    }
    matches.push(...extractFilings(columns, company, companyName, formType));
  }

  if (matches.length === 0) {
    throw new ListingError(company.ticker, `No ${formType} filings found for ${company.ticker}.`);
  }

  return selectRecentFilings(matches, count);
}
