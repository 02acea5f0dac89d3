const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'aborted due to timeout',
  'timed out',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];

/** Longest honoured Retry-After, in seconds */
const MAX_RETRY_AFTER_SECONDS = 60;

function field(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) return undefined;
  return Reflect.get(source, key);
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) return headers.get(name);
  if (typeof headers !== 'object' || headers === null) return null;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name);
  const value = key ? field(headers, key) : undefined;
  return typeof value === 'string' ? value : null;
}

/** HTTP status carried by a provider or SDK error, on the error or its `response`. */
export function getStatusCode(error: unknown): number | null {
  for (const candidate of [field(error, 'status'), field(error, 'statusCode'), field(field(error, 'response'), 'status')]) {
    if (typeof candidate === 'number') return candidate;
  }
  return null;
}

function isAbort(error: Error): boolean {
  return error.name === 'AbortError';
}

function isTransient(error: Error, rawError: unknown): boolean {
  if (isAbort(error)) return false;

  const status = getStatusCode(rawError);
  if (status !== null) return TRANSIENT_STATUSES.has(status);

  const code = field(rawError, 'code');
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code.toUpperCase())) return true;

  const msg = error.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Status embedded in the message ("Request failed with status 429")
  return /\b(408|425|429|500|502|503|504|529)\b/.test(msg);
}

/** Retry-After in milliseconds from the error or its response headers; 0 when absent. */
function getRetryAfterMs(error: unknown): number {
  const retryAfter = readHeader(field(error, 'headers'), 'retry-after')
    ?? readHeader(field(field(error, 'response'), 'headers'), 'retry-after');
  if (!retryAfter) return 0;

  const seconds = Number.parseFloat(retryAfter);
  if (Number.isFinite(seconds) && seconds > 0) {
    return Math.min(seconds, MAX_RETRY_AFTER_SECONDS) * 1000;
  }
  return 0;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  onRetry?: (attempt: number, error: Error) => void;
}

/**
 * Run `fn` until it succeeds, retrying transient failures (rate limits,
 * 5xx, dropped connections) with jittered exponential backoff. Aborts
 * and client errors are thrown immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? 3);
  const baseDelay = options?.baseDelay ?? 1000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= maxAttempts || !isTransient(error, err)) {
        throw error;
      }

      options?.onRetry?.(attempt, error);

      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }
}
