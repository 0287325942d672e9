import { describe, it, expect } from 'vitest';
import { absMaybe, clamp, isPositive, isPresent, orZero, safeDivide, toMaybe } from './missing';

describe('toMaybe', () => {
  it('maps provider placeholders to missing', () => {
    expect(toMaybe('')).toBeNull();
    expect(toMaybe('None')).toBeNull();
    expect(toMaybe(null)).toBeNull();
    expect(toMaybe(undefined)).toBeNull();
  });

  it('parses numeric strings and keeps finite numbers', () => {
    expect(toMaybe('12.5')).toBe(12.5);
    expect(toMaybe(' -3 ')).toBe(-3);
    expect(toMaybe(42)).toBe(42);
    expect(toMaybe(0)).toBe(0);
  });

  it('rejects non-finite and non-numeric input', () => {
    expect(toMaybe(Number.NaN)).toBeNull();
    expect(toMaybe(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toMaybe('Infinity')).toBeNull();
    expect(toMaybe('abc')).toBeNull();
    expect(toMaybe(true)).toBeNull();
    expect(toMaybe({ value: 1 })).toBeNull();
  });
});

describe('missing-value helpers', () => {
  it('isPresent and isPositive only accept finite numbers', () => {
    expect(isPresent(0)).toBe(true);
    expect(isPresent(null)).toBe(false);
    expect(isPresent(Number.NaN)).toBe(false);
    expect(isPositive(0)).toBe(false);
    expect(isPositive(-1)).toBe(false);
    expect(isPositive(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isPositive(2)).toBe(true);
  });

  it('safeDivide propagates missing and refuses zero denominators', () => {
    expect(safeDivide(10, 4)).toBe(2.5);
    expect(safeDivide(10, 0)).toBeNull();
    expect(safeDivide(null, 4)).toBeNull();
    expect(safeDivide(10, null)).toBeNull();
  });

  it('orZero, absMaybe and clamp', () => {
    expect(orZero(null)).toBe(0);
    expect(orZero(7)).toBe(7);
    expect(absMaybe(-5)).toBe(5);
    expect(absMaybe(null)).toBeNull();
    expect(clamp(0.7, 0, 0.5)).toBe(0.5);
    expect(clamp(-0.4, -0.3, 0.5)).toBe(-0.3);
    expect(clamp(0.2, 0, 0.5)).toBe(0.2);
  });
});
