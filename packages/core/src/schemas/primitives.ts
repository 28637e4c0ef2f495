import { z } from 'zod';

import { isIsoDate } from '../utils/date-utils.js';

// Timestamp schema - accepts epoch milliseconds, ISO 8601 string, or Date instance, transforms to Date
// Used for parsing Parquet rows (TIMESTAMP_MILLIS comes back as Date, older writers as numbers) and JSON documents
export const TimestampSchema = z
  .union([
    z.number().finite(),
    z.bigint().transform((val) => Number(val)),
    z.string().refine((val) => !isNaN(Date.parse(val)), { message: 'Invalid date string' }),
    z.date(),
  ])
  .transform((val) => (val instanceof Date ? val : new Date(val)))
  .refine((val) => !isNaN(val.getTime()), { message: 'Invalid timestamp' });

export const IsoDateSchema = z.string().refine(isIsoDate, { message: 'Expected a YYYY-MM-DD date' });

// Integer counts - Parquet INT32/INT64 columns may surface as bigint depending on the reader
export const CountSchema = z
  .union([z.number(), z.bigint().transform((val) => Number(val))])
  .pipe(z.number().int().nonnegative());

export const CurrencyCodeSchema = z.string().regex(/^[A-Z]{3}$/, 'Expected a 3-letter upper-case currency code');
