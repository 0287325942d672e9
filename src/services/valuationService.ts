import type {
  DcfInputs,
  DcfScenarioResult,
  FinancialSnapshot,
  Maybe,
  MarketDataSource,
  PeerSet,
  PeerSuggester,
  RangesByMethod,
  Scenario
} from '../types';
import { inferDcfInputs, runDcf, toValuationRange } from '../utils/dcfEngine';
import { TargetUnavailableError, UpstreamError, describeError } from '../utils/errors';
import { multiplesRanges, type MultiplesResult } from '../utils/multiplesEngine';
import { cleanPeers, type WinsorBounds } from '../utils/peerHygiene';

export interface CompanyValuation {
  target: FinancialSnapshot;
  peers: FinancialSnapshot[];
  bounds: WinsorBounds;
  multiples: MultiplesResult;
  dcfInputs: DcfInputs;
  dcfScenarios: Record<Scenario, DcfScenarioResult>;
  ranges: RangesByMethod;
  spotEnterpriseValue: Maybe;
}

/**
 * Values the target against an uncleaned peer set. Peers feed the multiples
 * only; the DCF reads the target snapshot alone.
 */
export const valueCompany = (target: FinancialSnapshot, rawPeers: PeerSet): CompanyValuation => {
  const { peers, bounds } = cleanPeers(rawPeers.filter((peer) => peer.ticker !== target.ticker));
  const multiples = multiplesRanges(target, peers);
  const dcfInputs = inferDcfInputs(target);
  const dcfScenarios = runDcf(dcfInputs);

  return {
    target,
    peers,
    bounds,
    multiples,
    dcfInputs,
    dcfScenarios,
    ranges: {
      'EV/Revenue': multiples.evToRevenue.range,
      'EV/EBITDA': multiples.evToEbitda.range,
      'DCF (FCFF)': toValuationRange(dcfScenarios)
    },
    spotEnterpriseValue: target.enterpriseValue
  };
};

/** Upper-cased, de-duplicated peer tickers without the target. */
export const uniquePeerTickers = (targetTicker: string, candidates: readonly string[]): string[] => {
  const target = targetTicker.trim().toUpperCase();
  const unique = new Set(candidates.map((ticker) => ticker.trim().toUpperCase()));
  unique.delete(target);
  unique.delete('');
  return [...unique];
};

export interface RunValuationOptions {
  marketData: MarketDataSource;
  peerSuggester: PeerSuggester;
  peerCount: number;
}

export interface ValuationRun extends CompanyValuation {
  suggestedPeers: string[];
  failedTickers: string[];
  peerSuggestionError: UpstreamError | null;
}

interface PeerSuggestion {
  tickers: string[];
  error: UpstreamError | null;
}

const suggestPeers = async (suggester: PeerSuggester, target: string, count: number): Promise<PeerSuggestion> => {
  try {
    return { tickers: await suggester.suggest(target, count), error: null };
  } catch (error) {
    const failure = new UpstreamError(`Peer suggestion failed for ${target}: ${describeError(error)}`, {
      source: 'peer-suggestion',
      ticker: target,
      cause: error
    });
    console.error(failure.message);
    return { tickers: [], error: failure };
  }
};

export const runValuation = async (targetTicker: string, options: RunValuationOptions): Promise<ValuationRun> => {
  const target = targetTicker.trim().toUpperCase();
  const suggestion = await suggestPeers(options.peerSuggester, target, options.peerCount);
  const suggestedPeers = uniquePeerTickers(target, suggestion.tickers);

  const [targetResult, ...peerResults] = await Promise.allSettled(
    [target, ...suggestedPeers].map((ticker) => options.marketData.fetchSnapshot(ticker))
  );

  if (targetResult.status === 'rejected') {
    throw new TargetUnavailableError(target, targetResult.reason);
  }

  const peers: FinancialSnapshot[] = [];
  const failedTickers: string[] = [];
  peerResults.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      peers.push(result.value);
      return;
    }
    const ticker = suggestedPeers[index];
    failedTickers.push(ticker);
    console.error(`Failed to fetch peer ${ticker}; skipping it:`, describeError(result.reason));
  });

  return {
    ...valueCompany(targetResult.value, peers),
    suggestedPeers,
    failedTickers,
    peerSuggestionError: suggestion.error
  };
};
