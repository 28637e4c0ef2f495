import type { RateObservation, RawSnapshot } from '@fxlake/core';

/**
 * One observation per rate entry, in the mapping's insertion order.
 * Nothing is validated here; an empty mapping yields an empty array.
 */
export function normalizeSnapshot(snapshot: RawSnapshot): RateObservation[] {
  return Object.entries(snapshot.rates).map(([targetCurrency, rate]) => ({
    baseCurrency: snapshot.baseCurrency,
    targetCurrency,
    rate,
    observedAt: snapshot.observedAt,
    collectedAt: snapshot.collectedAt,
    collectionDate: snapshot.collectionDate,
    pipelineVersion: snapshot.pipelineVersion,
  }));
}
