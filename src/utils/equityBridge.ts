import type { FinancialSnapshot, Maybe, RangesByMethod, ValuationRange } from '../types';
import { isPresent, orZero } from './missing';

type BridgeFields = Pick<FinancialSnapshot, 'cash' | 'debt' | 'sharesOutstanding'>;

/** Equity value per share implied by an enterprise value: (EV − debt + cash) / shares. */
export const impliedSharePrice = (enterpriseValue: Maybe, snapshot: BridgeFields): Maybe => {
  const shares = snapshot.sharesOutstanding;
  if (!isPresent(enterpriseValue) || !isPresent(shares) || shares <= 0) return null;
  return (enterpriseValue - orZero(snapshot.debt) + orZero(snapshot.cash)) / shares;
};

export const priceRange = (range: ValuationRange, snapshot: BridgeFields): ValuationRange => ({
  low: impliedSharePrice(range.low, snapshot),
  base: impliedSharePrice(range.base, snapshot),
  high: impliedSharePrice(range.high, snapshot)
});

export const priceRanges = (ranges: RangesByMethod, snapshot: BridgeFields): RangesByMethod => ({
  'EV/Revenue': priceRange(ranges['EV/Revenue'], snapshot),
  'EV/EBITDA': priceRange(ranges['EV/EBITDA'], snapshot),
  'DCF (FCFF)': priceRange(ranges['DCF (FCFF)'], snapshot)
});
