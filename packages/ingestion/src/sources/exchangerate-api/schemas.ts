/**
 * Zod schemas for ExchangeRate-API v6 responses
 *
 * API Documentation: https://www.exchangerate-api.com/docs/standard-requests
 */

import { ExchangeRateApiResponseSchema } from '@fxlake/core';
import { z } from 'zod';

/**
 * A usable "latest" response: `result` is 'success' and at least one rate is present.
 * The provider reports some failures with a 200 and `result: 'error'`.
 */
export const LatestRatesResponseSchema = ExchangeRateApiResponseSchema.superRefine((response, ctx) => {
  if (response.result !== 'success') {
    const errorType = response['error-type'];
    const detail = errorType ? ` (${errorType})` : '';
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Provider returned '${response.result}'${detail}`,
      path: ['result'],
    });
  }
  if (Object.keys(response.conversion_rates).length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Response contains no conversion rates',
      path: ['conversion_rates'],
    });
  }
});

export type LatestRatesResponse = z.infer<typeof LatestRatesResponseSchema>;
