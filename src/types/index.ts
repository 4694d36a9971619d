import type { FeedError } from '../errors';

export interface ContentItem {
  readonly id: number;
  readonly title: string;
  readonly excerpt: string;
  readonly assetUrl?: string;
  readonly sourceUrl: string;
}

/**
 * Upstream provider of content items. Each call makes a single network
 * attempt and rejects with a FeedError; retrying is layered on top.
 */
export interface ContentSource {
  fetchBatch(topics: string[], count: number, languageCode: string, signal?: AbortSignal): Promise<ContentItem[]>;
  fetchByCategory(categories: string[], count: number, languageCode: string, signal?: AbortSignal): Promise<ContentItem[]>;
}

export interface TransportRequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  bytes: Buffer;
  contentType: string | null;
}

/**
 * Single-attempt byte fetcher. Rejects with a FeedError when no HTTP
 * response was received; HTTP error statuses resolve normally.
 */
export interface AssetTransport {
  fetchBytes(url: string, options?: TransportRequestOptions): Promise<TransportResponse>;
}

export interface DecodedImage {
  data: Buffer;
  width: number;
  height: number;
  format: string;
}

export interface ImageDecoder {
  decode(bytes: Buffer, maxDimension: number): Promise<DecodedImage>;
}

export type AssetAbsenceReason =
  | 'invalid_url'
  | 'rate_limited'
  | 'http_error'
  | 'empty'
  | 'decode_failed'
  | 'transport'
  | 'too_large'
  | 'cancelled';

export type AssetResult =
  | { status: 'present'; asset: DecodedImage }
  | { status: 'absent'; reason: AssetAbsenceReason };

export type RetryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FeedError };

export interface FeedSettings {
  languageCode: string;
  topics: string[];
}

export interface FeedSnapshot {
  readonly items: readonly ContentItem[];
  readonly isLoading: boolean;
  readonly isRefilling: boolean;
  readonly hasError: boolean;
  readonly errorMessage: string | null;
  readonly bufferSize: number;
  readonly settings: Readonly<FeedSettings>;
}

export type RequestOutcome =
  | { status: 'dropped' }
  | { status: 'buffer'; added: number }
  | { status: 'network'; added: number }
  | { status: 'empty' }
  | { status: 'failed'; error: FeedError }
  | { status: 'cancelled' };

export type RefillOutcome =
  | { status: 'refilled'; added: number }
  | { status: 'failed'; error: FeedError }
  | { status: 'cancelled' };

export interface ItemCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

export interface AssetCacheStats {
  size: number;
  capacity: number;
  totalCost: number;
  byteBudget: number;
  hits: number;
  misses: number;
  evictions: number;
}
