import { describe, expect, it } from 'vitest';

import { isCurrencyCode, isKnownCurrency, parseCurrencyCode } from '../currency.js';

describe('isCurrencyCode', () => {
  it('accepts three letters in any case', () => {
    expect(isCurrencyCode('USD')).toBe(true);
    expect(isCurrencyCode('brl')).toBe(true);
    expect(isCurrencyCode('Eur')).toBe(true);
  });

  it('rejects wrong lengths, digits and non-strings', () => {
    expect(isCurrencyCode('US')).toBe(false);
    expect(isCurrencyCode('USDT')).toBe(false);
    expect(isCurrencyCode('US1')).toBe(false);
    expect(isCurrencyCode(' US')).toBe(false);
    expect(isCurrencyCode('')).toBe(false);
    expect(isCurrencyCode(undefined)).toBe(false);
    expect(isCurrencyCode(840)).toBe(false);
  });
});

describe('isKnownCurrency', () => {
  it('recognizes ISO 4217 codes regardless of case', () => {
    expect(isKnownCurrency('USD')).toBe(true);
    expect(isKnownCurrency('brl')).toBe(true);
  });

  it('rejects well-formed codes that are not in the table', () => {
    expect(isKnownCurrency('XYZ')).toBe(false);
    expect(isKnownCurrency('ABC')).toBe(false);
  });
});

describe('parseCurrencyCode', () => {
  it('normalizes to upper case', () => {
    const result = parseCurrencyCode('eur');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toBe('EUR');
    }
  });

  it('returns an error for malformed codes', () => {
    const result = parseCurrencyCode('EURO');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("Invalid currency code 'EURO': expected 3 letters (e.g. USD, BRL)");
    }
  });
});
