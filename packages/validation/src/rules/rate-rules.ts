export const MAX_RATE = 1_000_000;
export const RATE_DECIMALS = 8;

const RATE_SCALE = 10 ** RATE_DECIMALS;

/** Finite, strictly positive and at most MAX_RATE */
export function isValidRate(rate: number): boolean {
  return Number.isFinite(rate) && rate > 0 && rate <= MAX_RATE;
}

/**
 * Round to RATE_DECIMALS places. Idempotent: roundRate(roundRate(x)) === roundRate(x).
 */
export function roundRate(rate: number): number {
  return Math.round(rate * RATE_SCALE) / RATE_SCALE;
}
