import type { FinancialSnapshot, Maybe, PeerSet } from '../types';
import { clamp, isPositive, isPresent, safeDivide } from './missing';
import { percentile } from './multiplesEngine';

export const WINSOR_LOWER_PERCENTILE = 5;
export const WINSOR_UPPER_PERCENTILE = 95;

export interface ClipBounds {
  lower: number;
  upper: number;
}

export interface WinsorBounds {
  evToRevenue: ClipBounds | null;
  evToEbitda: ClipBounds | null;
}

export interface CleanedPeers {
  peers: FinancialSnapshot[];
  bounds: WinsorBounds;
}

type PricedPeer = FinancialSnapshot & { readonly evToRevenue: number; readonly evToEbitda: number };

const hasBothMultiples = (peer: FinancialSnapshot): peer is PricedPeer =>
  isPresent(peer.evToRevenue) && isPresent(peer.evToEbitda);

const hasPositiveDrivers = (peer: FinancialSnapshot): boolean =>
  isPositive(peer.revenueTtm) && isPositive(peer.ebitdaTtm) && isPositive(peer.enterpriseValue);

// Only a missing multiple is recomputed; an infinite one is dropped further down.
const fillMultiple = (multiple: Maybe, enterpriseValue: Maybe, driver: Maybe): Maybe =>
  multiple === null ? safeDivide(enterpriseValue, driver) : multiple;

/** 5th/95th percentile bounds, or null for an empty set. */
export const winsorBounds = (values: readonly number[]): ClipBounds | null => {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  return {
    lower: percentile(sorted, WINSOR_LOWER_PERCENTILE),
    upper: percentile(sorted, WINSOR_UPPER_PERCENTILE)
  };
};

export const clipToBounds = (values: readonly number[], bounds: ClipBounds | null): number[] =>
  bounds ? values.map((value) => clamp(value, bounds.lower, bounds.upper)) : [...values];

/**
 * Cleans a raw peer set for the multiples analysis. The input is left
 * untouched; survivors are returned as new snapshots with winsorized multiples.
 */
export const cleanPeers = (peers: PeerSet): CleanedPeers => {
  const priced = peers
    .filter(hasPositiveDrivers)
    .map((peer) => ({
      ...peer,
      evToRevenue: fillMultiple(peer.evToRevenue, peer.enterpriseValue, peer.revenueTtm),
      evToEbitda: fillMultiple(peer.evToEbitda, peer.enterpriseValue, peer.ebitdaTtm)
    }))
    .filter(hasBothMultiples);

  if (priced.length < 2) {
    console.warn(`Only ${priced.length} peer(s) survived hygiene filtering`);
  }

  const bounds: WinsorBounds = {
    evToRevenue: winsorBounds(priced.map((peer) => peer.evToRevenue)),
    evToEbitda: winsorBounds(priced.map((peer) => peer.evToEbitda))
  };
  const revenueMultiples = clipToBounds(priced.map((peer) => peer.evToRevenue), bounds.evToRevenue);
  const ebitdaMultiples = clipToBounds(priced.map((peer) => peer.evToEbitda), bounds.evToEbitda);

  return {
    peers: priced.map((peer, index) => ({
      ...peer,
      evToRevenue: revenueMultiples[index],
      evToEbitda: ebitdaMultiples[index]
    })),
    bounds
  };
};
