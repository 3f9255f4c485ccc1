/**
 * Saves a filing's primary document under the output root:
 *
 *   <root>/<form directory>/<TICKER>_<filing date>_<form label>.html
 *
 * The body is written as received. Existing files are overwritten, but only
 * once the new copy is complete on disk.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { filingDocumentUrl, type SecClient } from '../core/sec-client.js';
import { DownloadError, SecApiError, errorMessage } from '../core/errors.js';
import type { DownloadTarget, FilingRecord, FormDefinition } from '../core/types.js';

export function targetFileName(filing: FilingRecord, form: FormDefinition): string {
  return `${filing.ticker}_${filing.filing_date}_${form.file_label}.html`;
}

/** Variant used when another filing in the same run already took the plain name. */
export function disambiguatedFileName(filing: FilingRecord, form: FormDefinition): string {
  return `${filing.ticker}_${filing.filing_date}_${form.file_label}_${filing.accession_number}.html`;
}

export function formDirectory(outputRoot: string, form: FormDefinition): string {
  return join(outputRoot, form.directory);
}

export interface DownloadOptions {
  outputRoot: string;
  form: FormDefinition;
  /** Overrides the conventional file name */
  fileName?: string;
}

export async function downloadFiling(
  client: SecClient,
  filing: FilingRecord,
  options: DownloadOptions
): Promise<DownloadTarget> {
  const url = filingDocumentUrl(filing.cik, filing.accession_number, filing.primary_document);

  if (!filing.primary_document) {
    throw new DownloadError(`Filing ${filing.accession_number} lists no primary document.`, url);
  }

  let body: Uint8Array;
  try {
    body = await client.getFilingDocument(filing.cik, filing.accession_number, filing.primary_document);
  } catch (err) {
    const statusCode = err instanceof SecApiError && err.statusCode > 0 ? err.statusCode : null;
    throw new DownloadError(`Failed to download ${filing.accession_number}: ${errorMessage(err)}`, url, statusCode);
  }

  const dir = formDirectory(options.outputRoot, options.form);
  const path = join(dir, options.fileName ?? targetFileName(filing, options.form));
  const partial = `${path}.part`;
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(partial, body);
    await rename(partial, path);
  } catch (err) {
    await rm(partial, { force: true });
    throw new DownloadError(`Failed to write ${path}: ${errorMessage(err)}`, url);
  }

  return { path, bytes: body.byteLength };
}
