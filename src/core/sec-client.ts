import { z } from 'zod';
import { RateLimiter } from './rate-limiter.js';
import { SecApiError, NotFoundError, RateLimitError, DataParseError, errorMessage } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from './config.js';

/**
 * SEC EDGAR API client.
 *
 * Uses the free EDGAR endpoints:
 * - www.sec.gov/files/company_tickers.json for ticker -> CIK
 * - data.sec.gov/submissions/ for filing history
 * - www.sec.gov/Archives/edgar/data/ for filing documents
 *
 * Every request waits on the shared rate limiter (10 req/s per SEC fair
 * access policy) and is aborted after a fixed timeout. Failed requests are
 * not retried.
 */

export const DATA_BASE_URL = 'https://data.sec.gov';
export const ARCHIVES_BASE_URL = 'https://www.sec.gov/Archives/edgar/data';
export const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json';

const JSON_ACCEPT = 'application/json';
const DOCUMENT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface SecClientOptions {
  userAgent: string;
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
  fetch?: FetchLike;
}

const tickerEntrySchema = z.object({
  cik_str: z.number().int().nonnegative(),
  ticker: z.string(),
  title: z.string(),
});

const companyTickersSchema = z.record(tickerEntrySchema);

/** Column-oriented filing list, as found in `filings.recent` and in the older history pages */
const filingColumnsSchema = z.object({
  accessionNumber: z.array(z.string()),
  filingDate: z.array(z.string()),
  reportDate: z.array(z.string()).default([]),
  form: z.array(z.string()),
  primaryDocument: z.array(z.string()),
});

const submissionsSchema = z.object({
  name: z.string(),
  filings: z.object({
    recent: filingColumnsSchema,
    files: z.array(z.object({
      name: z.string(),
      filingCount: z.number().optional(),
      filingFrom: z.string().optional(),
      filingTo: z.string().optional(),
    })).default([]),
  }),
});

export type CompanyTickers = z.infer<typeof companyTickersSchema>;
export type FilingColumns = z.infer<typeof filingColumnsSchema>;
export type CompanySubmissions = z.infer<typeof submissionsSchema>;

export function padCik(cik: string | number): string {
  return String(cik).padStart(10, '0');
}

export function submissionsUrl(cik: string): string {
  return `${DATA_BASE_URL}/submissions/CIK${padCik(cik)}.json`;
}

/** Archive paths use the CIK without leading zeros and the accession number without dashes. */
export function filingDocumentUrl(cik: string, accessionNumber: string, filename: string): string {
  const cikNumeric = String(Number.parseInt(cik, 10));
  const accessionNoDashes = accessionNumber.replace(/-/g, '');
  return `${ARCHIVES_BASE_URL}/${cikNumeric}/${accessionNoDashes}/${filename}`;
}

export class SecClient {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly rateLimiter: RateLimiter;
  private readonly fetchFn: FetchLike;

  constructor(options: SecClientOptions) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(10);
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /** Full ticker -> CIK table, keyed by row index. */
  async getCompanyTickers(): Promise<CompanyTickers> {
    return this.fetchJson(TICKERS_URL, companyTickersSchema, 'SEC company tickers table');
  }

  /** Company filing history. CIK is padded to 10 digits for the request. */
  async getCompanySubmissions(cik: string): Promise<CompanySubmissions> {
    return this.fetchJson(submissionsUrl(cik), submissionsSchema, `submissions for CIK ${cik}`);
  }

  /** An older history page named in `filings.files`, e.g. CIK0000320193-submissions-001.json */
  async getSubmissionsPage(name: string): Promise<FilingColumns> {
    return this.fetchJson(`${DATA_BASE_URL}/submissions/${name}`, filingColumnsSchema, `submissions page ${name}`);
  }

  /** Raw bytes of one filing document. */
  async getFilingDocument(cik: string, accessionNumber: string, filename: string): Promise<Uint8Array> {
    const url = filingDocumentUrl(cik, accessionNumber, filename);
    return this.request(url, DOCUMENT_ACCEPT, async response => new Uint8Array(await response.arrayBuffer()));
  }

  private async fetchJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
    const body = await this.request(url, JSON_ACCEPT, response => response.text());

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new DataParseError(`Failed to parse ${what}: response is not valid JSON.`, url);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new DataParseError(
        `Unexpected format for ${what}${where}: ${issue?.message ?? 'invalid'}. The API format may have changed.`,
        url
      );
    }
    return parsed.data;
  }

  private async request<T>(url: string, accept: string, read: (response: Response) => Promise<T>): Promise<T> {
    await this.rateLimiter.acquire();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: 'GET',
          headers: {
            'User-Agent': this.userAgent,
            'Accept': accept,
          },
          signal: controller.signal,
        });
      } catch (err) {
        throw this.transportError(url, err);
      }

      if (!response.ok) {
        throw statusError(response, url);
      }

      try {
        return await read(response);
      } catch (err) {
        throw this.transportError(url, err);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private transportError(url: string, err: unknown): SecApiError {
    if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
      return new SecApiError(`Request timed out after ${this.timeoutMs} ms: ${url}`, 0, url);
    }
    return new SecApiError(`Network error fetching ${url}: ${errorMessage(err)}`, 0, url);
  }
}

function statusError(response: Response, url: string): SecApiError {
  if (response.status === 404) {
    return new NotFoundError(url);
  }

  if (response.status === 429) {
    return new RateLimitError(url);
  }

  if (response.status === 403) {
    return new SecApiError(
      'SEC API rejected request (403 Forbidden). SEC requires a User-Agent with contact info: pass -e <email> or set SEC_CONTACT_EMAIL.',
      403,
      url
    );
  }

  const statusText = response.statusText ? ` ${response.statusText}` : '';
  return new SecApiError(`SEC API error: ${response.status}${statusText}`, response.status, url);
}
