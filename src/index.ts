export * from './types';
export { loadConfig, type AppConfig } from './config';
export { toMaybe, isPresent, safeDivide } from './utils/missing';
export {
  lookupRow,
  sumRecent,
  latestValue,
  operatingNetWorkingCapital,
  computeEnterpriseValue,
  buildSnapshot,
  normalizeSnapshot
} from './utils/snapshotNormalizer';
export { cleanPeers, clipToBounds, winsorBounds, type CleanedPeers, type ClipBounds } from './utils/peerHygiene';
export { percentile, percentiles, impliedEv, multiplesRanges, type MultiplesResult } from './utils/multiplesEngine';
export { inferDcfInputs, projectScenario, runDcf, dcfEv, DEFAULT_SCENARIOS, DCF_DEFAULTS } from './utils/dcfEngine';
export { impliedSharePrice, priceRanges } from './utils/equityBridge';
export { ValuationError, UpstreamError, TargetUnavailableError } from './utils/errors';
export { MarketDataClient, RawFinancialBundleSchema } from './services/marketDataClient';
export { GeminiPeerSuggester, StaticPeerSuggester, sanitizeTickers } from './services/peerSuggester';
export { valueCompany, runValuation, type CompanyValuation, type ValuationRun } from './services/valuationService';
export { renderFootballField } from './services/chartRenderer';
