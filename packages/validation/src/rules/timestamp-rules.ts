import { toIsoDate, type IsoDate } from '@fxlake/core';

export const MIN_YEAR = 2000;
export const MAX_YEAR = 2030;

const HOUR_MS = 60 * 60 * 1000;

/** How far collection may precede the provider update */
export const MAX_COLLECTION_LEAD_MS = 7 * 24 * HOUR_MS;
/** How far collection may trail the provider update */
export const MAX_COLLECTION_LAG_MS = 24 * HOUR_MS;

/** Valid date whose UTC year is within [MIN_YEAR, MAX_YEAR] */
export function isTimestampInRange(timestamp: Date): boolean {
  const time = timestamp.getTime();
  if (Number.isNaN(time)) return false;
  const year = timestamp.getUTCFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

/**
 * observedAt - 7 days <= collectedAt <= observedAt + 1 day
 */
export function isWithinCollectionWindow(observedAt: Date, collectedAt: Date): boolean {
  const difference = collectedAt.getTime() - observedAt.getTime();
  return difference >= -MAX_COLLECTION_LEAD_MS && difference <= MAX_COLLECTION_LAG_MS;
}

export function isCollectionDateConsistent(collectionDate: IsoDate, collectedAt: Date): boolean {
  return toIsoDate(collectedAt) === collectionDate;
}
