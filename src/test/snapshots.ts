import type { FinancialSnapshot } from '../types';
import { buildSnapshot, type SnapshotFields } from '../utils/snapshotNormalizer';

const EMPTY_FIELDS: Omit<SnapshotFields, 'ticker'> = {
  price: null,
  sharesOutstanding: null,
  marketCap: null,
  cash: null,
  debt: null,
  revenueTtm: null,
  ebitdaTtm: null,
  dAndATtm: null,
  capexTtm: null,
  operatingNwc: null,
  operatingIncomeTtm: null
};

export const makeSnapshot = (ticker: string, fields: Partial<Omit<SnapshotFields, 'ticker'>> = {}): FinancialSnapshot =>
  buildSnapshot({ ...EMPTY_FIELDS, ...fields, ticker });

/** A peer whose enterprise value equals `enterpriseValue` (no debt or cash). */
export const makePeer = (ticker: string, enterpriseValue: number, revenueTtm: number, ebitdaTtm: number): FinancialSnapshot =>
  makeSnapshot(ticker, { marketCap: enterpriseValue, revenueTtm, ebitdaTtm });
