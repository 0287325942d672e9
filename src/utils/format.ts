import type { Maybe, RangesByMethod, Scenario } from '../types';
import { isPresent } from './missing';

export const formatBillions = (value: Maybe): string => {
  if (!isPresent(value)) return 'n/a';
  const sign = value < 0 ? '-' : '';
  return `${sign}$${(Math.abs(value) / 1e9).toFixed(1)}B`;
};

export const formatPrice = (value: Maybe): string => (isPresent(value) ? `$${value.toFixed(2)}` : 'n/a');

/** Rows for `console.table`, one per valuation method. */
export const formatRangeTable = (
  ranges: RangesByMethod,
  format: (value: Maybe) => string = formatBillions
): Record<string, Record<Scenario, string>> =>
  Object.fromEntries(
    Object.entries(ranges).map(([method, range]) => [
      method,
      { low: format(range.low), base: format(range.base), high: format(range.high) }
    ])
  );
