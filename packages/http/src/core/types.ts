// Pure types for the functional core

/**
 * HTTP error classification
 */
export interface ErrorClassification {
  shouldRetry: boolean;
  type: 'rate_limit' | 'server' | 'client' | 'unknown';
}

/**
 * The slice of a fetch response the client reads. Satisfied by undici's Response and by test fakes.
 */
export interface HttpResponse {
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface HttpFetchInit {
  headers: Record<string, string>;
  method: 'GET';
  signal: AbortSignal;
}

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  delay: (ms: number) => Promise<void>;
  fetch: (url: string, init: HttpFetchInit) => Promise<HttpResponse>;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
