import { ZodError } from 'zod';

export type FeedErrorKind =
  | 'transport'
  | 'timeout'
  | 'rate_limited'
  | 'server'
  | 'not_found'
  | 'client'
  | 'decoding'
  | 'cancelled'
  | 'unknown';

const RETRYABLE_KINDS: ReadonlySet<FeedErrorKind> = new Set([
  'transport',
  'timeout',
  'rate_limited',
  'server',
]);

const TRANSPORT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
]);

export interface FeedErrorOptions {
  status?: number;
  cause?: unknown;
}

/**
 * Classified pipeline failure. `kind` drives both retry decisions and the
 * message shown to the feed consumer.
 */
export class FeedError extends Error {
  readonly kind: FeedErrorKind;
  readonly status?: number;

  constructor(kind: FeedErrorKind, message: string, options: FeedErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FeedError';
    this.kind = kind;
    this.status = options.status;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export function isCancelled(error: unknown): boolean {
  return error instanceof FeedError && error.kind === 'cancelled';
}

/**
 * Map an HTTP status to the error taxonomy. Returns null for 2xx/3xx.
 */
export function errorFromStatus(status: number, url: string): FeedError | null {
  if (status < 400) return null;
  if (status === 429) {
    return new FeedError('rate_limited', `Rate limited by upstream (429) for ${url}`, { status });
  }
  if (status === 404 || status === 410) {
    return new FeedError('not_found', `Resource not found (${status}) for ${url}`, { status });
  }
  if (status === 408) {
    return new FeedError('timeout', `Upstream request timeout (408) for ${url}`, { status });
  }
  if (status >= 500) {
    return new FeedError('server', `Upstream server error (${status}) for ${url}`, { status });
  }
  return new FeedError('client', `Request rejected (${status}) for ${url}`, { status });
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify any thrown value into a FeedError. Already-classified errors pass
 * through unchanged.
 */
export function classifyError(error: unknown): FeedError {
  if (error instanceof FeedError) return error;

  const name = errorName(error);
  if (name === 'AbortError') {
    return new FeedError('cancelled', 'Operation cancelled', { cause: error });
  }
  if (name === 'TimeoutError') {
    return new FeedError('timeout', 'Request timed out', { cause: error });
  }

  if (error instanceof ZodError) {
    return new FeedError('decoding', `Malformed payload: ${error.issues[0]?.message ?? 'invalid shape'}`, { cause: error });
  }
  if (error instanceof SyntaxError) {
    return new FeedError('decoding', `Failed to parse response: ${error.message}`, { cause: error });
  }

  // undici reports connection failures as TypeError('fetch failed') with the
  // system error attached as `cause`
  const code = errorCode(error) ?? (error instanceof Error ? errorCode(error.cause) : undefined);
  if (code === 'ETIMEDOUT' || code === 'UND_ERR_HEADERS_TIMEOUT' || code === 'UND_ERR_BODY_TIMEOUT') {
    return new FeedError('timeout', 'Request timed out', { cause: error });
  }
  if ((code && TRANSPORT_CODES.has(code)) || (error instanceof TypeError && error.message === 'fetch failed')) {
    return new FeedError('transport', `Network error: ${errorMessage(error)}`, { cause: error });
  }

  return new FeedError('unknown', errorMessage(error), { cause: error });
}

/**
 * Message suitable for the feed consumer. Never exposes raw technical detail.
 */
export function userMessageFor(error: FeedError): string {
  switch (error.kind) {
    case 'transport':
      return 'No internet connection. Check your connection and try again.';
    case 'timeout':
      return 'The request timed out. Check your internet connection and try again.';
    case 'rate_limited':
      return 'Too many requests right now. Please wait a moment and try again.';
    case 'server':
      return 'The article service is having trouble. Please try again shortly.';
    case 'not_found':
      return "The content you're looking for is not available.";
    case 'decoding':
      return 'Received unexpected content. Please try again.';
    case 'client':
      return 'This feed configuration is not supported. Try another language or topic.';
    case 'cancelled':
      return '';
    case 'unknown':
      return 'Something went wrong. Please try again.';
  }
}
