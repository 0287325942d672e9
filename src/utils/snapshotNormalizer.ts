import type { FinancialSnapshot, Maybe, RawCell, RawFinancialBundle, StatementTable } from '../types';
import { absMaybe, isPresent, orZero, safeDivide, toMaybe } from './missing';

// Candidate row labels per accounting line, tried in order.
export const REVENUE_LABELS = ['Total Revenue', 'TotalRevenue', 'Revenue'] as const;
export const OPERATING_INCOME_LABELS = ['Operating Income', 'OperatingIncome', 'EBIT'] as const;
export const D_AND_A_LABELS = ['Depreciation', 'Depreciation And Amortization', 'Depreciation & amortization'] as const;
export const CAPEX_LABELS = ['Capital Expenditures', 'CapitalExpenditures', 'Capex'] as const;
export const CURRENT_ASSETS_LABELS = ['Total Current Assets', 'Current Assets', 'TotalCurrentAssets'] as const;
export const CURRENT_LIABILITIES_LABELS = [
  'Total Current Liabilities',
  'Current Liabilities',
  'TotalCurrentLiabilities'
] as const;
export const CASH_LABELS = ['Cash And Cash Equivalents', 'CashAndCashEquivalents', 'Cash'] as const;
export const SHORT_TERM_INVESTMENT_LABELS = ['Short Term Investments', 'ShortTermInvestments'] as const;
export const SHORT_TERM_DEBT_LABELS = [
  'Short Long Term Debt',
  'Short/Current Long Term Debt',
  'Current Debt',
  'ShortTermDebt'
] as const;

const TTM_QUARTERS = 4;

export const lookupRow = (
  table: StatementTable | undefined,
  candidateLabels: readonly string[]
): RawCell[] | null => {
  if (!table) return null;
  for (const label of candidateLabels) {
    if (Object.prototype.hasOwnProperty.call(table.rows, label)) {
      return table.rows[label];
    }
  }
  return null;
};

/** Sums the present values among the most recent `periods` columns of the first matching row. */
export const sumRecent = (
  table: StatementTable | undefined,
  candidateLabels: readonly string[],
  periods: number = TTM_QUARTERS
): Maybe => {
  const row = lookupRow(table, candidateLabels);
  if (!row) return null;
  const values = row.slice(0, periods).map((cell) => toMaybe(cell)).filter(isPresent);
  return values.length > 0 ? values.reduce((total, value) => total + value, 0) : null;
};

export const latestValue = (table: StatementTable | undefined, candidateLabels: readonly string[]): Maybe => {
  const row = lookupRow(table, candidateLabels);
  return row && row.length > 0 ? toMaybe(row[0]) : null;
};

/**
 * Runs one field extraction in isolation so a malformed table cannot take
 * down the rest of the snapshot.
 */
export const safely = (field: string, extract: () => Maybe): Maybe => {
  try {
    return extract();
  } catch (error) {
    console.warn(`Failed to extract ${field}; treating it as missing`, error);
    return null;
  }
};

/** (current assets − cash − short-term investments) − (current liabilities − short-term debt) */
export const operatingNetWorkingCapital = (balanceSheet: StatementTable | undefined): Maybe => {
  const currentAssets = latestValue(balanceSheet, CURRENT_ASSETS_LABELS);
  const currentLiabilities = latestValue(balanceSheet, CURRENT_LIABILITIES_LABELS);
  if (!isPresent(currentAssets) || !isPresent(currentLiabilities)) return null;

  const cash = orZero(latestValue(balanceSheet, CASH_LABELS));
  const shortTermInvestments = orZero(latestValue(balanceSheet, SHORT_TERM_INVESTMENT_LABELS));
  const shortTermDebt = orZero(latestValue(balanceSheet, SHORT_TERM_DEBT_LABELS));

  return (currentAssets - cash - shortTermInvestments) - (currentLiabilities - shortTermDebt);
};

export const computeEnterpriseValue = (marketCap: Maybe, debt: Maybe, cash: Maybe): Maybe => {
  if (!isPresent(marketCap) && !isPresent(debt) && !isPresent(cash)) return null;
  return orZero(marketCap) + orZero(debt) - orZero(cash);
};

export type SnapshotFields = Omit<FinancialSnapshot, 'enterpriseValue' | 'evToRevenue' | 'evToEbitda'>;

/** Fills in the derived fields: enterprise value and both EV multiples. */
export const buildSnapshot = (fields: SnapshotFields): FinancialSnapshot => {
  const enterpriseValue = computeEnterpriseValue(fields.marketCap, fields.debt, fields.cash);
  return {
    ...fields,
    ticker: fields.ticker.trim().toUpperCase(),
    enterpriseValue,
    evToRevenue: safeDivide(enterpriseValue, fields.revenueTtm),
    evToEbitda: safeDivide(enterpriseValue, fields.ebitdaTtm)
  };
};

export const normalizeSnapshot = (ticker: string, bundle: RawFinancialBundle): FinancialSnapshot => {
  const { info } = bundle;

  const quarterlyRevenue = safely('quarterly revenue', () => sumRecent(bundle.quarterlyIncome, REVENUE_LABELS));
  // Fall back to the latest single annual figure, never a multi-year sum.
  const revenueTtm = isPresent(quarterlyRevenue)
    ? quarterlyRevenue
    : safely('annual revenue', () => latestValue(bundle.annualIncome, REVENUE_LABELS));

  return buildSnapshot({
    ticker,
    price: toMaybe(info.currentPrice),
    sharesOutstanding: toMaybe(info.sharesOutstanding),
    marketCap: toMaybe(info.marketCap),
    cash: toMaybe(info.totalCash),
    debt: toMaybe(info.totalDebt),
    revenueTtm,
    ebitdaTtm: toMaybe(info.ebitda),
    dAndATtm: safely('D&A', () => absMaybe(sumRecent(bundle.quarterlyCashflow, D_AND_A_LABELS))),
    capexTtm: safely('CAPEX', () => absMaybe(sumRecent(bundle.quarterlyCashflow, CAPEX_LABELS))),
    operatingNwc: safely('operating NWC', () => operatingNetWorkingCapital(bundle.quarterlyBalanceSheet)),
    operatingIncomeTtm: safely('operating income', () =>
      sumRecent(bundle.quarterlyIncome, OPERATING_INCOME_LABELS)
    )
  });
};
