import { classifyError } from '../errors';
import {
  AssetAbsenceReason,
  AssetCacheStats,
  AssetResult,
  AssetTransport,
  DecodedImage,
  ImageDecoder,
  TransportResponse,
} from '../types';
import { debugLogger } from '../utils/debug-logger';
import { Sleep, sleep as defaultSleep } from '../utils/time';

export interface AssetCacheEntry {
  asset: DecodedImage;
  cost: number;
}

export interface AssetCacheOptions {
  transport: AssetTransport;
  decoder: ImageDecoder;
  /** Maximum number of entries. Default: 50 */
  capacity?: number;
  /** Maximum cumulative cost in bytes. Default: 50 MiB */
  byteBudget?: number;
  /** Longest decoded edge in points. Default: 800 */
  maxDimension?: number;
  /** Pixel density multiplier applied to maxDimension. Default: 2 */
  density?: number;
  /** Per-request timeout. Default: 20000ms */
  timeoutMs?: number;
  /** Retries after a rate-limited or dropped request. Default: 3 */
  maxRetries?: number;
  /** Retry n waits retryBaseDelayMs * 2^n. Default: 1000ms (2s, 4s, 8s) */
  retryBaseDelayMs?: number;
  sleep?: Sleep;
}

export const DEFAULT_ASSET_BYTE_BUDGET = 50 * 1024 * 1024;

const absent = (reason: AssetAbsenceReason): AssetResult => ({ status: 'absent', reason });

function isFetchableUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'https:' || parsed.protocol === 'http:';
  } catch {
    return false;
  }
}

/**
 * Cost-bounded LRU of decoded images. Cost is the decoded RGBA byte size
 * (width * height * 4). Both the entry count and the cumulative cost are
 * capped; the least recently used entries go first.
 */
export class AssetCache {
  private readonly entries = new Map<string, AssetCacheEntry>();
  private readonly inFlight = new Map<string, Promise<AssetResult>>();
  private readonly transport: AssetTransport;
  private readonly decoder: ImageDecoder;
  private readonly capacity: number;
  private readonly byteBudget: number;
  private readonly maxPixelDimension: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly sleep: Sleep;
  private totalCost = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: AssetCacheOptions) {
    this.transport = options.transport;
    this.decoder = options.decoder;
    this.capacity = Math.max(1, options.capacity ?? 50);
    this.byteBudget = options.byteBudget ?? DEFAULT_ASSET_BYTE_BUDGET;
    this.maxPixelDimension = Math.round((options.maxDimension ?? 800) * (options.density ?? 2));
    this.timeoutMs = options.timeoutMs ?? 20000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get(key: string): DecodedImage | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.asset;
  }

  /**
   * Store an asset. Returns false when the cost alone exceeds the budget.
   */
  put(key: string, asset: DecodedImage, cost: number): boolean {
    if (cost > this.byteBudget) {
      debugLogger.warn('ASSET_CACHE', 'Asset exceeds byte budget, not cached', { key, cost, byteBudget: this.byteBudget });
      return false;
    }

    const previous = this.entries.get(key);
    if (previous) {
      this.totalCost -= previous.cost;
      this.entries.delete(key);
    }

    this.entries.set(key, { asset, cost });
    this.totalCost += cost;

    for (const [oldestKey, oldest] of this.entries) {
      if (this.entries.size <= this.capacity && this.totalCost <= this.byteBudget) break;
      this.entries.delete(oldestKey);
      this.totalCost -= oldest.cost;
      this.evictions++;
    }

    return true;
  }

  /**
   * Return the cached asset or fetch, downsample and cache it. Never rejects:
   * every failure resolves to an absent result. Concurrent calls for the same
   * key share one fetch (and the first caller's signal).
   */
  fetchAndCache(
    key: string,
    urlProvider: (key: string) => string | undefined = (k) => k,
    signal?: AbortSignal
  ): Promise<AssetResult> {
    const cached = this.get(key);
    if (cached) {
      return Promise.resolve({ status: 'present', asset: cached });
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const task = this.load(key, urlProvider(key), signal).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, task);
    return task;
  }

  clear(): void {
    const cleared = this.entries.size;
    this.entries.clear();
    this.totalCost = 0;
    debugLogger.info('ASSET_CACHE', 'Asset cache cleared', { cleared });
  }

  get size(): number {
    return this.entries.size;
  }

  get cost(): number {
    return this.totalCost;
  }

  stats(): AssetCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      totalCost: this.totalCost,
      byteBudget: this.byteBudget,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions
    };
  }

  private async load(key: string, url: string | undefined, signal?: AbortSignal): Promise<AssetResult> {
    if (!url || !isFetchableUrl(url)) {
      debugLogger.warn('ASSET_CACHE', 'Invalid asset URL', { key, url });
      return absent('invalid_url');
    }

    const stepId = debugLogger.stepStart('ASSET_CACHE', `Fetching asset ${url.slice(0, 80)}`, { key });
    let lastFailure: AssetAbsenceReason = 'transport';

    for (let retry = 0; retry <= this.maxRetries; retry++) {
      if (retry > 0) {
        await this.sleep(this.retryBaseDelayMs * Math.pow(2, retry));
      }
      if (signal?.aborted) {
        debugLogger.stepFinish(stepId, { outcome: 'cancelled' });
        return absent('cancelled');
      }

      let response: TransportResponse;
      try {
        response = await this.transport.fetchBytes(url, { timeoutMs: this.timeoutMs, signal });
      } catch (error) {
        const classified = classifyError(error);
        if (classified.kind === 'cancelled') {
          debugLogger.stepFinish(stepId, { outcome: 'cancelled' });
          return absent('cancelled');
        }
        if (!classified.retryable) {
          debugLogger.stepError(stepId, 'ASSET_CACHE', `Asset request failed (${classified.kind}), not retrying`, classified);
          return absent(classified.kind === 'not_found' || classified.kind === 'client' ? 'http_error' : 'transport');
        }
        debugLogger.warn('ASSET_CACHE', `Asset request failed (${classified.kind}), retry ${retry + 1}/${this.maxRetries}`, {
          url,
          error: classified.message
        });
        lastFailure = 'transport';
        continue;
      }

      if (response.status === 429) {
        debugLogger.info('ASSET_CACHE', `Rate limited (429), retry ${retry + 1}/${this.maxRetries}`, { url: url.slice(0, 60) });
        lastFailure = 'rate_limited';
        continue;
      }

      if (response.status < 200 || response.status > 299) {
        debugLogger.stepError(stepId, 'ASSET_CACHE', `HTTP error ${response.status}`, new Error(url));
        return absent('http_error');
      }

      if (response.bytes.length === 0) {
        debugLogger.stepError(stepId, 'ASSET_CACHE', 'Empty asset body', new Error(url));
        return absent('empty');
      }

      let decoded: DecodedImage;
      try {
        decoded = await this.decoder.decode(response.bytes, this.maxPixelDimension);
      } catch (error) {
        debugLogger.stepError(stepId, 'ASSET_CACHE', `Failed to downsample asset (${response.bytes.length} bytes)`, error);
        return absent('decode_failed');
      }

      const cost = decoded.width * decoded.height * 4;
      if (!this.put(key, decoded, cost)) {
        debugLogger.stepFinish(stepId, { outcome: 'too_large', cost });
        return absent('too_large');
      }

      debugLogger.stepFinish(stepId, { width: decoded.width, height: decoded.height, cost });
      return { status: 'present', asset: decoded };
    }

    debugLogger.stepError(stepId, 'ASSET_CACHE', 'Retries exhausted', new Error(`${lastFailure}: ${url}`));
    return absent(lastFailure);
  }
}
