import { getErrorMessage } from '@fxlake/core';
import { getLogger } from '@fxlake/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import type { HttpClientConfig, HttpClientError, HttpRequestOptions } from './types.js';
import { HttpError, NetworkError, ResponseValidationError } from './types.js';

type AttemptOutcome<T> =
  | { kind: 'done'; result: Result<T, HttpClientError> }
  | { error: HttpError | Error; kind: 'retry' };

export class HttpClient {
  private readonly config: HttpClientConfig & { retries: number; retryDelayMs: number; timeout: number };
  private readonly logger: ReturnType<typeof getLogger>;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  private closePromise?: Promise<void>;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      ...config,
      defaultHeaders: {
        Accept: 'application/json',
        'User-Agent': 'fxlake/1.0.0',
        ...config.defaultHeaders,
      },
      retries: config.retries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      timeout: config.timeout ?? 30_000,
    };

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${this.sanitize(config.baseUrl)}, Timeout: ${this.config.timeout}ms, Retries: ${this.config.retries}`
    );
  }

  /**
   * GET a JSON resource and validate it against `options.schema`.
   *
   * Timeouts, connection failures, 429 and 5xx responses are retried with exponential
   * backoff. Other 4xx responses and schema mismatches fail immediately.
   */
  async get<T>(endpoint: string, options: HttpRequestOptions<T>): Promise<Result<T, HttpClientError>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint);
    const safeUrl = this.sanitize(url);
    const startTime = this.effects.now();
    let lastError: HttpError | Error | undefined;

    for (let attempt = 1; attempt <= this.config.retries; attempt++) {
      this.effects.log('debug', `Making HTTP request - URL: ${safeUrl}, Attempt: ${attempt}/${this.config.retries}`);

      const outcome = await this.attempt(url, endpoint, options);
      if (outcome.kind === 'done') {
        if (outcome.result.isOk()) {
          this.effects.log('debug', `Request succeeded - URL: ${safeUrl}, Duration: ${this.effects.now() - startTime}ms`);
        }
        return outcome.result;
      }

      lastError = outcome.error;
      this.effects.log(
        'warn',
        `Request failed - URL: ${safeUrl}, Attempt: ${attempt}/${this.config.retries}, Error: ${this.sanitize(lastError.message)}`,
        { providerName: this.config.providerName }
      );

      if (attempt < this.config.retries) {
        const delay = HttpUtils.calculateExponentialBackoff(attempt, this.config.retryDelayMs, 10_000);
        this.effects.log('debug', `Retrying after delay - Delay: ${delay}ms, NextAttempt: ${attempt + 1}`);
        await this.effects.delay(delay);
      }
    }

    if (lastError instanceof HttpError) {
      return err(lastError);
    }
    const reason = lastError ? this.sanitize(lastError.message) : 'no attempts made';
    return err(new NetworkError(`Request failed after ${this.config.retries} attempts: ${reason}`, this.config.retries));
  }

  /**
   * Release pooled connections. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = getErrorMessage(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }

  private async attempt<T>(url: string, endpoint: string, options: HttpRequestOptions<T>): Promise<AttemptOutcome<T>> {
    const timeout = options.timeout ?? this.config.timeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await this.effects.fetch(url, {
        headers: { ...this.config.defaultHeaders, ...options.headers },
        method: 'GET',
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => 'Unknown error');
        const httpError = new HttpError(`HTTP ${response.status}: ${errorText}`, response.status, errorText);
        const classification = HttpUtils.classifyHttpError(response.status);
        return classification.shouldRetry ? { error: httpError, kind: 'retry' } : { kind: 'done', result: err(httpError) };
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (error) {
        return {
          kind: 'done',
          result: err(
            new ResponseValidationError(
              `Response is not valid JSON: ${getErrorMessage(error)}`,
              this.config.providerName,
              endpoint,
              [],
              ''
            )
          ),
        };
      }

      const parseResult = options.schema.safeParse(data);
      if (!parseResult.success) {
        const allIssues = parseResult.error.issues.map((issue) => ({
          message: issue.message,
          path: issue.path.join('.'),
        }));
        const firstFiveErrors = allIssues
          .slice(0, 5)
          .map((issue) => `${issue.path}: ${issue.message}`)
          .join('; ');
        const truncatedPayload = JSON.stringify(data).slice(0, 500);

        this.effects.log(
          'error',
          `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
          {
            providerName: this.config.providerName,
            status: response.status,
            truncatedPayload,
            url: this.sanitize(url),
          }
        );

        return {
          kind: 'done',
          result: err(
            new ResponseValidationError(
              `Response validation failed: ${firstFiveErrors}`,
              this.config.providerName,
              endpoint,
              allIssues,
              truncatedPayload
            )
          ),
        };
      }

      return { kind: 'done', result: ok(parseResult.data) };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return { error: new Error(`Request timeout after ${timeout}ms`), kind: 'retry' };
      }
      return { error: new Error(getErrorMessage(error)), kind: 'retry' };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private sanitize(text: string): string {
    return HttpUtils.sanitizeUrl(text, this.config.redact);
  }
}
