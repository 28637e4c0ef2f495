import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { z } from 'zod';

import isoCurrencyData from './data/iso-currencies.json' with { type: 'json' };

/**
 * Branded string type for ISO-style currency codes (e.g. 'USD', 'BRL')
 * Normalized to uppercase; created via parseCurrencyCode()
 */
export type CurrencyCode = string & { readonly _brand: 'CurrencyCode' };

const CURRENCY_CODE_PATTERN = /^[A-Za-z]{3}$/;

/** ISO 4217 codes the pipeline recognizes */
const KNOWN_CURRENCIES: ReadonlySet<string> = new Set(z.array(z.string().length(3)).parse(isoCurrencyData));

/**
 * True if the value is exactly three alphabetic characters.
 * Case is not significant: 'usd' passes and is upper-cased by parseCurrencyCode().
 */
export function isCurrencyCode(code: unknown): code is string {
  return typeof code === 'string' && CURRENCY_CODE_PATTERN.test(code);
}

/** True if the code is well formed and listed in the ISO 4217 table */
export function isKnownCurrency(code: unknown): boolean {
  return isCurrencyCode(code) && KNOWN_CURRENCIES.has(code.toUpperCase());
}

/**
 * Parse a raw string into a CurrencyCode, normalizing to uppercase.
 * Surrounding whitespace is not trimmed: ' USD' is not a currency code.
 */
export function parseCurrencyCode(code: string): Result<CurrencyCode, Error> {
  if (!isCurrencyCode(code)) {
    return err(new Error(`Invalid currency code '${code}': expected 3 letters (e.g. USD, BRL)`));
  }
  return ok(code.toUpperCase() as CurrencyCode);
}
