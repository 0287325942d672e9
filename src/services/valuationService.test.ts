import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FinancialSnapshot, MarketDataSource, PeerSuggester } from '../types';
import { makePeer, makeSnapshot } from '../test/snapshots';
import { dcfEv, inferDcfInputs } from '../utils/dcfEngine';
import { TargetUnavailableError, UpstreamError } from '../utils/errors';
import { runValuation, uniquePeerTickers, valueCompany } from './valuationService';

const target = makeSnapshot('ACME', {
  marketCap: 300,
  revenueTtm: 100,
  ebitdaTtm: 20,
  operatingIncomeTtm: 15,
  dAndATtm: 5,
  capexTtm: 6,
  operatingNwc: 10
});

const peersBySymbol: Record<string, FinancialSnapshot> = {
  LOW: makePeer('LOW', 200, 100, 20),
  MID: makePeer('MID', 300, 100, 25),
  TOP: makePeer('TOP', 400, 100, 40)
};

describe('valueCompany', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('combines winsorized multiples with the target-only DCF', () => {
    const valuation = valueCompany(target, Object.values(peersBySymbol));

    const revenue = valuation.ranges['EV/Revenue'];
    expect(revenue.low).toBeCloseTo(255, 9);
    expect(revenue.base).toBe(300);
    expect(revenue.high).toBeCloseTo(345, 9);

    const ebitda = valuation.ranges['EV/EBITDA'];
    expect(ebitda.low).toBe(200);
    expect(ebitda.base).toBe(200);
    expect(ebitda.high).toBeCloseTo(218, 9);

    expect(valuation.ranges['DCF (FCFF)']).toEqual(dcfEv(inferDcfInputs(target)));
    expect(valuation.spotEnterpriseValue).toBe(300);
  });

  it('never values the target against itself', () => {
    const valuation = valueCompany(target, [...Object.values(peersBySymbol), makePeer('ACME', 5000, 100, 20)]);
    expect(valuation.peers.map((peer) => peer.ticker)).toEqual(['LOW', 'MID', 'TOP']);
  });

  it('still produces a DCF range without usable peers', () => {
    const valuation = valueCompany(target, []);
    expect(valuation.ranges['EV/Revenue']).toEqual({ low: null, base: null, high: null });
    expect(valuation.ranges['DCF (FCFF)'].base).not.toBeNull();
  });
});

describe('uniquePeerTickers', () => {
  it('normalizes, de-duplicates and removes the target', () => {
    expect(uniquePeerTickers('acme', ['msft', 'ACME', ' MSFT ', '', 'googl'])).toEqual(['MSFT', 'GOOGL']);
  });
});

describe('runValuation', () => {
  const marketData: MarketDataSource = {
    fetchSnapshot: (ticker: string) => {
      if (ticker === 'ACME') return Promise.resolve(target);
      const peer = peersBySymbol[ticker];
      return peer ? Promise.resolve(peer) : Promise.reject(new Error(`no data for ${ticker}`));
    }
  };

  const suggesting = (tickers: string[]): PeerSuggester => ({
    suggest: () => Promise.resolve(tickers)
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('skips peers that fail to load', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const run = await runValuation('acme', {
      marketData,
      peerSuggester: suggesting(['low', 'ACME', 'MID', 'GONE', 'TOP', 'mid']),
      peerCount: 8
    });

    expect(run.suggestedPeers).toEqual(['LOW', 'MID', 'GONE', 'TOP']);
    expect(run.failedTickers).toEqual(['GONE']);
    expect(run.peerSuggestionError).toBeNull();
    expect(run.peers.map((peer) => peer.ticker)).toEqual(['LOW', 'MID', 'TOP']);
    expect(run.ranges['EV/Revenue'].base).toBe(300);
    expect(errorSpy).toHaveBeenCalledWith('Failed to fetch peer GONE; skipping it:', 'no data for GONE');
  });

  it('fails when the target cannot be fetched', async () => {
    const run = runValuation('GONE', { marketData, peerSuggester: suggesting([]), peerCount: 8 });
    await expect(run).rejects.toBeInstanceOf(TargetUnavailableError);
    await expect(run).rejects.toThrow('Could not fetch data for target GONE; no valuation is possible');
  });

  it('continues with no peers when the suggester throws', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failing: PeerSuggester = { suggest: () => Promise.reject(new Error('quota exceeded')) };

    const run = await runValuation('ACME', { marketData, peerSuggester: failing, peerCount: 8 });

    expect(run.suggestedPeers).toEqual([]);
    expect(run.ranges['EV/EBITDA']).toEqual({ low: null, base: null, high: null });
    expect(run.peerSuggestionError).toBeInstanceOf(UpstreamError);
    expect(run.peerSuggestionError).toMatchObject({ source: 'peer-suggestion', ticker: 'ACME' });
    expect(errorSpy).toHaveBeenCalledWith('Peer suggestion failed for ACME: quota exceeded');
  });
});
