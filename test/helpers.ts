import { FeedError } from '../src/errors';
import {
  ContentItem,
  ContentSource,
  DecodedImage,
  ImageDecoder,
  AssetTransport,
  TransportRequestOptions,
  TransportResponse,
} from '../src/types';

export function makeItem(id: number, overrides: Partial<ContentItem> = {}): ContentItem {
  return {
    id,
    title: `Article ${id}`,
    excerpt: `Excerpt for article ${id}`,
    sourceUrl: `https://example.org/wiki/Article_${id}`,
    ...overrides,
  };
}

export function makeItems(ids: readonly number[]): ContentItem[] {
  return ids.map(id => makeItem(id));
}

export const noSleep = async (_ms: number): Promise<void> => {};

export interface SourceCall {
  kind: 'batch' | 'category';
  keys: string[];
  count: number;
  languageCode: string;
}

type SourceResponse = ContentItem[] | FeedError | (() => Promise<ContentItem[]>);

/**
 * ContentSource answering from a queue of scripted responses. Once the queue
 * is empty, every call resolves with an empty batch.
 */
export class StubSource implements ContentSource {
  readonly calls: SourceCall[] = [];
  private readonly responses: SourceResponse[];

  constructor(responses: SourceResponse[] = []) {
    this.responses = [...responses];
  }

  enqueue(...responses: SourceResponse[]): void {
    this.responses.push(...responses);
  }

  fetchBatch(topics: string[], count: number, languageCode: string): Promise<ContentItem[]> {
    this.calls.push({ kind: 'batch', keys: topics, count, languageCode });
    return this.next();
  }

  fetchByCategory(categories: string[], count: number, languageCode: string): Promise<ContentItem[]> {
    this.calls.push({ kind: 'category', keys: categories, count, languageCode });
    return this.next();
  }

  private next(): Promise<ContentItem[]> {
    const response = this.responses.shift();
    if (response === undefined) return Promise.resolve([]);
    if (response instanceof FeedError) return Promise.reject(response);
    if (typeof response === 'function') return response();
    return Promise.resolve(response);
  }
}

/**
 * Promise whose settlement the test controls
 */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

type TransportReply = TransportResponse | FeedError;

export class FakeTransport implements AssetTransport {
  readonly requests: Array<{ url: string; options?: TransportRequestOptions }> = [];
  private readonly replies = new Map<string, TransportReply[]>();

  reply(url: string, ...replies: TransportReply[]): this {
    this.replies.set(url, [...(this.replies.get(url) ?? []), ...replies]);
    return this;
  }

  async fetchBytes(url: string, options?: TransportRequestOptions): Promise<TransportResponse> {
    this.requests.push({ url, options });
    const queue = this.replies.get(url) ?? [];
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (next === undefined) {
      return { status: 404, bytes: Buffer.alloc(0), contentType: null };
    }
    if (next instanceof FeedError) throw next;
    return next;
  }

  requestCount(url: string): number {
    return this.requests.filter(request => request.url === url).length;
  }
}

export function ok(bytes = Buffer.from('image-bytes')): TransportResponse {
  return { status: 200, bytes, contentType: 'image/jpeg' };
}

export function status(code: number): TransportResponse {
  return { status: code, bytes: Buffer.alloc(0), contentType: null };
}

/**
 * Decoder reporting a fixed size; rejects bytes equal to "corrupt".
 */
export class FakeDecoder implements ImageDecoder {
  readonly maxDimensions: number[] = [];

  constructor(private readonly width = 100, private readonly height = 50) {}

  async decode(bytes: Buffer, maxDimension: number): Promise<DecodedImage> {
    this.maxDimensions.push(maxDimension);
    if (bytes.toString() === 'corrupt') {
      throw new Error('Input buffer contains unsupported image format');
    }
    return { data: Buffer.from('decoded'), width: this.width, height: this.height, format: 'webp' };
  }
}

export function image(width: number, height: number): DecodedImage {
  return { data: Buffer.alloc(4), width, height, format: 'webp' };
}
