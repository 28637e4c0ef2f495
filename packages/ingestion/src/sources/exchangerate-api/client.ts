/**
 * ExchangeRate-API client
 *
 * Fetches the latest conversion rates for one base currency. The API key is part of
 * the request path, so it is handed to the HTTP client for redaction.
 */

import { InvalidInputError, parseCurrencyCode } from '@fxlake/core';
import { HttpClient, type HttpClientError, type HttpEffects } from '@fxlake/http';
import { getLogger, type Logger } from '@fxlake/logger';
import { err, type Result } from 'neverthrow';

import { LatestRatesResponseSchema, type LatestRatesResponse } from './schemas.js';

export const EXCHANGE_RATE_API_PROVIDER = 'exchangerate-api';

export interface ExchangeRateApiConfig {
  apiKey: string;
  baseUrl: string;
  retries?: number | undefined;
  timeout?: number | undefined;
}

export type LatestRatesError = HttpClientError | InvalidInputError;

/**
 * Source of "latest rates" snapshots; implemented by the API client and by test fakes
 */
export interface IRatesSource {
  getLatestRates(baseCurrency: string): Promise<Result<LatestRatesResponse, LatestRatesError>>;
  close(): Promise<void>;
}

export class ExchangeRateApiClient implements IRatesSource {
  private readonly logger: Logger;

  constructor(
    private readonly config: ExchangeRateApiConfig,
    private readonly httpClient: HttpClient
  ) {
    this.logger = getLogger('ExchangeRateApiClient');
  }

  async getLatestRates(baseCurrency: string): Promise<Result<LatestRatesResponse, LatestRatesError>> {
    const codeResult = parseCurrencyCode(baseCurrency);
    if (codeResult.isErr()) {
      return err(new InvalidInputError(codeResult.error.message));
    }
    const base = codeResult.value;

    this.logger.info({ baseCurrency: base }, 'Fetching latest exchange rates');
    const result = await this.httpClient.get(`/${this.config.apiKey}/latest/${base}`, {
      schema: LatestRatesResponseSchema,
    });

    if (result.isOk()) {
      this.logger.info(
        { baseCurrency: base, rates: Object.keys(result.value.conversion_rates).length },
        'Fetched latest exchange rates'
      );
    }
    return result;
  }

  close(): Promise<void> {
    return this.httpClient.close();
  }
}

/**
 * Create a client with its own HTTP connection pool. `effects` replaces fetch, delay
 * and clock in tests.
 */
export function createExchangeRateApiClient(
  config: ExchangeRateApiConfig,
  effects?: Partial<HttpEffects>
): ExchangeRateApiClient {
  const httpClient = new HttpClient(
    {
      baseUrl: config.baseUrl,
      providerName: EXCHANGE_RATE_API_PROVIDER,
      redact: [config.apiKey],
      retries: config.retries,
      timeout: config.timeout,
    },
    effects
  );
  return new ExchangeRateApiClient(config, httpClient);
}
