import { z } from 'zod';
import type { FinancialSnapshot, MarketDataSource, RawFinancialBundle } from '../types';
import { UpstreamError, describeError } from '../utils/errors';
import { normalizeSnapshot } from '../utils/snapshotNormalizer';

// Backend contract:
// - GET {baseUrl}/api/financials/{TICKER}
// - Responds with the info dict plus statement tables, columns most recent first

const RawCellSchema = z.union([z.number(), z.string(), z.null()]);

const StatementTableSchema = z.object({
  columns: z.array(z.string()),
  rows: z.record(z.string(), z.array(RawCellSchema))
});

export const RawFinancialBundleSchema: z.ZodType<RawFinancialBundle> = z.object({
  info: z.record(z.string(), z.unknown()),
  quarterlyIncome: StatementTableSchema.optional(),
  annualIncome: StatementTableSchema.optional(),
  quarterlyCashflow: StatementTableSchema.optional(),
  quarterlyBalanceSheet: StatementTableSchema.optional()
});

export interface MarketDataClientOptions {
  baseUrl: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 90000;

export class MarketDataClient implements MarketDataSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: MarketDataClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  bundleUrl(ticker: string): string {
    return `${this.baseUrl}/api/financials/${encodeURIComponent(ticker.trim().toUpperCase())}`;
  }

  async fetchBundle(ticker: string): Promise<RawFinancialBundle> {
    const normalizedTicker = ticker.trim().toUpperCase();

    let response: Response;
    try {
      response = await fetch(this.bundleUrl(normalizedTicker), {
        method: 'GET',
        headers: { 'Content-Type': 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new UpstreamError(`Market data request failed for ${normalizedTicker}: ${describeError(error)}`, {
        source: 'market-data',
        ticker: normalizedTicker,
        cause: error
      });
    }

    if (!response.ok) {
      throw new UpstreamError(`Backend error: ${response.status} ${response.statusText}`, {
        source: 'market-data',
        ticker: normalizedTicker,
        status: response.status
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new UpstreamError(`Market data for ${normalizedTicker} is not valid JSON`, {
        source: 'market-data',
        ticker: normalizedTicker,
        status: response.status,
        cause: error
      });
    }

    const parsed = RawFinancialBundleSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamError(`Malformed financial bundle for ${normalizedTicker}: ${parsed.error.message}`, {
        source: 'market-data',
        ticker: normalizedTicker,
        status: response.status,
        cause: parsed.error
      });
    }
    return parsed.data;
  }

  async fetchSnapshot(ticker: string): Promise<FinancialSnapshot> {
    const bundle = await this.fetchBundle(ticker);
    return normalizeSnapshot(ticker, bundle);
  }
}
