import { z } from 'zod';
import { FeedError, classifyError, errorFromStatus } from '../errors';
import { AssetTransport, TransportRequestOptions, TransportResponse } from '../types';
import { debugLogger } from '../utils/debug-logger';

export interface HttpTransportOptions {
  userAgent?: string;
  /** Default per-request timeout. Default: 8000ms */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

function rejectOnAbort(signal: AbortSignal, response: Response): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener(
      'abort',
      () => {
        response.body?.cancel().catch((error: unknown) => {
          debugLogger.warn('HTTP', 'Failed to cancel response body', {
            error: error instanceof Error ? error.message : String(error)
          });
        });
        reject(signal.reason);
      },
      { once: true }
    );
  });
}

/**
 * Single-attempt HTTP client over fetch. No retries happen here; callers
 * layer their own policy on top.
 */
export class HttpTransport implements AssetTransport {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpTransportOptions = {}) {
    this.userAgent = options.userAgent ?? 'feed-pipeline/1.0';
    this.timeoutMs = options.timeoutMs ?? 8000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchBytes(url: string, options: TransportRequestOptions = {}): Promise<TransportResponse> {
    return this.send(url, 'image/*', options, async response => ({
      status: response.status,
      bytes: Buffer.from(await response.arrayBuffer()),
      contentType: response.headers.get('content-type'),
    }));
  }

  /**
   * GET a JSON document and validate it. HTTP error statuses reject with the
   * matching FeedError kind; schema mismatches reject as `decoding`.
   */
  async getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: TransportRequestOptions = {}): Promise<T> {
    const body = await this.send(url, 'application/json', options, async response => {
      const statusError = errorFromStatus(response.status, url);
      if (statusError) {
        throw statusError;
      }
      const json: unknown = await response.json();
      return json;
    });

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw classifyError(parsed.error);
    }
    return parsed.data;
  }

  /**
   * Issue the request and read its body under one timeout and one abort
   * listener; both stay armed until `read` settles.
   */
  private async send<T>(
    url: string,
    accept: string,
    options: TransportRequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      if (options.signal?.aborted) {
        throw new FeedError('cancelled', `Request cancelled: ${url}`);
      }

      debugLogger.info('HTTP', `GET ${url.slice(0, 120)}`);
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': this.userAgent,
          Accept: accept,
        },
      });
      const reading = read(response);
      // A body stream may ignore the signal, so the read races it
      reading.catch((error: unknown) => {
        if (controller.signal.aborted) {
          debugLogger.warn('HTTP', `Body read failed after abort: ${url.slice(0, 120)}`, {
            error: error instanceof Error ? error.message : String(error)
          });
        }
      });
      return await Promise.race([reading, rejectOnAbort(controller.signal, response)]);
    } catch (error) {
      if (timedOut) {
        throw new FeedError('timeout', `Request timed out after ${timeoutMs}ms: ${url}`, { cause: error });
      }
      throw classifyError(error);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
