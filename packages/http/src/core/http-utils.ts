import type { ErrorClassification } from './types.js';

/**
 * Join base URL and endpoint with exactly one slash between them
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const path = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${base}${path}`;
};

/**
 * Redact credentials from a URL before logging it.
 *
 * Known secret query parameters are masked, and so is every occurrence of the
 * `secrets` values (for APIs that put the key in the path).
 */
export const sanitizeUrl = (url: string, secrets: readonly string[] = []): string => {
  let sanitized = url;
  try {
    const urlObj = new URL(url);
    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }
    sanitized = urlObj.toString();
  } catch {
    // Not an absolute URL; only the literal secrets below apply
  }

  for (const secret of secrets) {
    if (secret.length > 0) {
      sanitized = sanitized.split(secret).join('***');
    }
  }
  return sanitized;
};

/**
 * Classify an HTTP status for retry logic
 */
export const classifyHttpError = (status: number): ErrorClassification => {
  if (status === 429) {
    return { shouldRetry: true, type: 'rate_limit' };
  }

  if (status >= 500 && status < 600) {
    return { shouldRetry: true, type: 'server' };
  }

  if (status >= 400 && status < 500) {
    return { shouldRetry: false, type: 'client' };
  }

  return { shouldRetry: false, type: 'unknown' };
};

/**
 * Calculate exponential backoff delay
 */
export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  const delay = baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelayMs);
};
