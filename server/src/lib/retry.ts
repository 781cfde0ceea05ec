// Transport-level retry for LLM calls. The revision loop never retries on its
// own, so round accounting stays exact; only a single chat() call is repeated.

const TRANSIENT_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'socket hang up',
  'fetch failed',
  'service unavailable',
  'bad gateway',
];

const MAX_RETRY_AFTER_MS = 30_000;

type HeaderBag = Headers | Record<string, string | undefined>;

interface ErrorShape {
  status?: unknown;
  statusCode?: unknown;
  code?: unknown;
  headers?: HeaderBag;
  response?: { status?: unknown; headers?: HeaderBag };
}

function asShape(error: unknown): ErrorShape {
  return typeof error === 'object' && error !== null ? (error as ErrorShape) : {};
}

function readHeader(headers: HeaderBag | undefined, name: string): string | null {
  if (!headers) return null;
  if (headers instanceof Headers) return headers.get(name);
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name);
  const value = key ? headers[key] : undefined;
  return typeof value === 'string' ? value : null;
}

function statusOf(error: unknown): number | null {
  const shape = asShape(error);
  for (const candidate of [shape.status, shape.statusCode, shape.response?.status]) {
    if (typeof candidate === 'number') return candidate;
  }
  return null;
}

export function isTransientError(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== null) return TRANSIENT_STATUSES.has(status);

  const code = asShape(error).code;
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code.toUpperCase())) return true;

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;
  // "API error 503: ..." from the HTTP provider
  return /\berror (408|425|429|5\d\d)\b/.test(msg);
}

function retryAfterMs(error: unknown): number {
  const shape = asShape(error);
  const raw = readHeader(shape.headers, 'retry-after') ?? readHeader(shape.response?.headers, 'retry-after');
  if (!raw) return 0;
  const seconds = parseFloat(raw);
  if (Number.isNaN(seconds) || seconds <= 0) return 0;
  return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason instanceof Error ? signal.reason : new Error('Aborted'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason instanceof Error ? signal.reason : new Error('Aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  /** Stops retrying (and aborts the backoff wait) once fired. */
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;
  const signal = options?.signal;

  let lastError: Error = new Error('withRetry called with maxAttempts < 1');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || signal?.aborted || !isTransientError(err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const serverDelay = retryAfterMs(err);
      const delay = serverDelay > 0
        ? serverDelay
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await sleep(delay, signal);
    }
  }

  throw lastError;
}
