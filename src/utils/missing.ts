import type { Maybe } from '../types';

// Placeholders the data provider uses for "no value".
const MISSING_TOKENS = new Set(['', 'None']);

export const toMaybe = (value: unknown): Maybe => {
  if (value === undefined || value === null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (MISSING_TOKENS.has(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

export const isPresent = (value: Maybe | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value);

export const isPositive = (value: Maybe | undefined): value is number => isPresent(value) && value > 0;

/** Only for the documented substitutions (EV components, NWC adjustments). */
export const orZero = (value: Maybe): number => (isPresent(value) ? value : 0);

export const absMaybe = (value: Maybe): Maybe => (isPresent(value) ? Math.abs(value) : null);

export const safeDivide = (numerator: Maybe, denominator: Maybe): Maybe => {
  if (!isPresent(numerator) || !isPresent(denominator) || denominator === 0) return null;
  return toMaybe(numerator / denominator);
};

export const clamp = (value: number, lower: number, upper: number): number =>
  Math.min(Math.max(value, lower), upper);
