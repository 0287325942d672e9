/** A numeric field that may be absent. `null` is the only missing sentinel; present values are finite. */
export type Maybe = number | null;

export type Scenario = 'low' | 'base' | 'high';

export const VALUATION_METHODS = ['EV/Revenue', 'EV/EBITDA', 'DCF (FCFF)'] as const;

export type ValuationMethod = (typeof VALUATION_METHODS)[number];

export type ValuationRange = Record<Scenario, Maybe>;

export type RangesByMethod = Record<ValuationMethod, ValuationRange>;

export interface FinancialSnapshot {
  readonly ticker: string;
  readonly price: Maybe;
  readonly sharesOutstanding: Maybe;
  readonly marketCap: Maybe;
  readonly cash: Maybe;
  readonly debt: Maybe;
  readonly enterpriseValue: Maybe;
  readonly revenueTtm: Maybe;
  readonly ebitdaTtm: Maybe;
  readonly dAndATtm: Maybe; // reported as a positive magnitude
  readonly capexTtm: Maybe; // reported as a positive magnitude
  readonly operatingNwc: Maybe;
  readonly operatingIncomeTtm: Maybe;
  readonly evToRevenue: Maybe;
  readonly evToEbitda: Maybe;
}

export type PeerSet = readonly FinancialSnapshot[];

export type RawCell = number | string | null;

/** One statement table: columns are period labels, most recent first. */
export interface StatementTable {
  columns: string[];
  rows: Record<string, RawCell[]>;
}

export interface RawFinancialBundle {
  info: Record<string, unknown>;
  quarterlyIncome?: StatementTable;
  annualIncome?: StatementTable;
  quarterlyCashflow?: StatementTable;
  quarterlyBalanceSheet?: StatementTable;
}

export interface PercentileStats {
  p25: Maybe;
  p50: Maybe;
  p75: Maybe;
}

export interface GrowthScenario {
  readonly growth: number;
  readonly terminalGrowth: number;
}

export type ScenarioMap = Readonly<Record<Scenario, GrowthScenario>>;

export interface DcfInputs {
  readonly revenueTtm: Maybe;
  readonly ebitMargin: number;
  readonly taxRate: number;
  readonly capexPct: number;
  readonly dAndAPct: number;
  readonly nwcPct: number;
  readonly wacc: number;
  readonly years: number;
  readonly scenarios: ScenarioMap;
}

export interface ProjectedYear {
  year: number;
  revenue: number;
  ebit: number;
  nopat: number;
  dAndA: number;
  capex: number;
  deltaNwc: number;
  freeCashFlow: number;
  presentValue: number;
}

export interface DcfScenarioResult {
  enterpriseValue: Maybe;
  explicitPeriodPV: number;
  terminalFcff: Maybe;
  terminalValuePV: Maybe;
  projectedCashFlows: ProjectedYear[];
}

/** Supplies one normalized snapshot per ticker. */
export interface MarketDataSource {
  fetchSnapshot(ticker: string): Promise<FinancialSnapshot>;
}

/** Proposes comparable tickers for a company; the result is treated as opaque. */
export interface PeerSuggester {
  suggest(companyOrTicker: string, count: number): Promise<string[]>;
}
