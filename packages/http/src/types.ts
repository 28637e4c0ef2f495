import { PipelineError } from '@fxlake/core';
import type { ZodType, ZodTypeDef } from 'zod';

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  providerName: string;
  /** Values scrubbed from every URL that reaches the logs (API keys embedded in paths) */
  redact?: string[] | undefined;
  retries?: number | undefined;
  /** First backoff delay; doubles per attempt */
  retryDelayMs?: number | undefined;
  timeout?: number | undefined;
}

export interface HttpRequestOptions<T> {
  headers?: Record<string, string> | undefined;
  schema: ZodType<T, ZodTypeDef, unknown>;
  timeout?: number | undefined;
}

/**
 * Non-2xx response. 4xx responses are returned straight away, 5xx only after retries run out.
 */
export class HttpError extends PipelineError {
  readonly category = 'network' as const;

  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string
  ) {
    super(message, { statusCode });
  }
}

/**
 * Connection failure or timeout that outlived every retry
 */
export class NetworkError extends PipelineError {
  readonly category = 'network' as const;

  constructor(
    message: string,
    public readonly attempts: number
  ) {
    super(message, { attempts });
  }
}

export class ResponseValidationError extends PipelineError {
  readonly category = 'network' as const;

  constructor(
    message: string,
    public readonly providerName: string,
    public readonly endpoint: string,
    public readonly validationIssues: { message: string; path: string }[],
    public readonly truncatedPayload: string
  ) {
    super(message, { endpoint, providerName });
  }
}

export type HttpClientError = HttpError | NetworkError | ResponseValidationError;
