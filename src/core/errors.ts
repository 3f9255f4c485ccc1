/**
 * Error types for EDGAR requests and the download batch.
 *
 * The batch recovers from ResolutionError and ListingError per ticker and
 * from DownloadError per filing. Anything else ends the run.
 */

export class SecApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'SecApiError';
  }
}

export class NotFoundError extends SecApiError {
  constructor(url: string, detail: string = '') {
    super(
      `Not found: ${detail || url}`,
      404,
      url
    );
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends SecApiError {
  constructor(url: string) {
    super(
      'SEC API rate limit exceeded (429). Wait a few minutes before running again.',
      429,
      url
    );
    this.name = 'RateLimitError';
  }
}

export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

/** Ticker is not in the registry's ticker table. */
export class ResolutionError extends Error {
  constructor(public readonly ticker: string) {
    super(`Ticker "${ticker}" not found in the SEC company tickers table.`);
    this.name = 'ResolutionError';
  }
}

/** Filing history could not be read, or held no filing of the requested form. */
export class ListingError extends Error {
  constructor(
    public readonly ticker: string,
    message: string
  ) {
    super(message);
    this.name = 'ListingError';
  }
}

export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode: number | null = null
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
