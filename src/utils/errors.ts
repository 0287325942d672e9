/**
 * Thrown errors are reserved for collaborator failures and the fatal
 * missing-target case. Missing data and invalid DCF scenarios are reported
 * as `null` values instead.
 */
export class ValuationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ValuationError';
  }
}

export type UpstreamSource = 'market-data' | 'peer-suggestion';

export class UpstreamError extends ValuationError {
  readonly source: UpstreamSource;
  readonly ticker?: string;
  readonly status?: number;

  constructor(
    message: string,
    details: { source: UpstreamSource; ticker?: string; status?: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = 'UpstreamError';
    this.source = details.source;
    this.ticker = details.ticker;
    this.status = details.status;
  }
}

export class TargetUnavailableError extends ValuationError {
  readonly ticker: string;

  constructor(ticker: string, cause?: unknown) {
    super(`Could not fetch data for target ${ticker}; no valuation is possible`, { cause });
    this.name = 'TargetUnavailableError';
    this.ticker = ticker;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
