import type { FinancialSnapshot, Maybe, PeerSet, PercentileStats, ValuationRange } from '../types';
import { isPresent } from './missing';

/** Linear-interpolation percentile over an ascending, non-empty array. */
export const percentile = (sorted: readonly number[], p: number): number => {
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
};

export const presentValues = (values: readonly Maybe[]): number[] => values.filter(isPresent);

export const percentiles = (values: readonly Maybe[]): PercentileStats => {
  const sorted = presentValues(values).sort((a, b) => a - b);
  if (sorted.length === 0) {
    return { p25: null, p50: null, p75: null };
  }
  return {
    p25: percentile(sorted, 25),
    p50: percentile(sorted, 50),
    p75: percentile(sorted, 75)
  };
};

/** Backs out enterprise value (not equity or price) from each percentile multiple. */
export const impliedEv = (driver: Maybe, stats: PercentileStats): ValuationRange => {
  const scale = (multiple: Maybe): Maybe =>
    isPresent(multiple) && isPresent(driver) && driver !== 0 ? multiple * driver : null;

  return {
    low: scale(stats.p25),
    base: scale(stats.p50),
    high: scale(stats.p75)
  };
};

export interface MultipleValuation {
  stats: PercentileStats;
  range: ValuationRange;
}

export interface MultiplesResult {
  evToRevenue: MultipleValuation;
  evToEbitda: MultipleValuation;
}

export const multiplesRanges = (target: FinancialSnapshot, cleanedPeers: PeerSet): MultiplesResult => {
  if (cleanedPeers.length === 0) {
    console.warn(`No usable peers for ${target.ticker}; multiples ranges are empty`);
  }

  const revenueStats = percentiles(cleanedPeers.map((peer) => peer.evToRevenue));
  const ebitdaStats = percentiles(cleanedPeers.map((peer) => peer.evToEbitda));

  return {
    evToRevenue: { stats: revenueStats, range: impliedEv(target.revenueTtm, revenueStats) },
    evToEbitda: { stats: ebitdaStats, range: impliedEv(target.ebitdaTtm, ebitdaStats) }
  };
};
