import { AssetCache } from '../cache/asset-cache';
import { ItemCache } from '../cache/item-cache';
import { FeedError, userMessageFor } from '../errors';
import { FeedEvents } from '../events/feed-events';
import { RetryExecutor } from '../retry/retry-executor';
import { TopicCatalog } from '../source/topics';
import { ContentItem, ContentSource, FeedSettings, FeedSnapshot, RefillOutcome, RequestOutcome } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { Clock, Sleep, sleep as defaultSleep, systemClock } from '../utils/time';
import { DEFAULT_SEEN_TTL_MS, SeenIdSet } from './seen-id-set';

/** `category` fetches random category members, `search` runs topic searches */
export type FetchStrategy = 'category' | 'search';

export interface FeedCacheOptions {
  source: ContentSource;
  retryExecutor: RetryExecutor;
  itemCache: ItemCache;
  assetCache: AssetCache;
  catalog: TopicCatalog;
  settings: FeedSettings;
  /** Configuration changes arriving here re-key the feed and refresh it */
  events?: FeedEvents;
  strategy?: FetchStrategy;
  /** Items fetched for the visible feed. Default: 10 */
  batchSize?: number;
  /** Items fetched per buffer refill. Default: 15 */
  refillBatchSize?: number;
  /** Refill is triggered while the buffer holds fewer items. Default: 20 */
  bufferThreshold?: number;
  /** Items promoted from the buffer per request. Default: 5 */
  promoteSlice?: number;
  /** Pause between asset prefetch requests. Default: 100ms */
  assetDelayMs?: number;
  seenTtlMs?: number;
  sleep?: Sleep;
  clock?: Clock;
}

export type FeedListener = (snapshot: FeedSnapshot) => void;

/**
 * Owns the visible feed and a hidden look-ahead buffer for one
 * language/topic configuration. Visible loads and buffer refills are two
 * independent busy axes; each runs at most one task at a time.
 *
 * Every task owns an AbortController. reset() aborts them all, and a task
 * checks its own signal right before mutating shared state, so a cancelled
 * task never writes after the reset.
 */
export class FeedCache {
  private readonly source: ContentSource;
  private readonly retryExecutor: RetryExecutor;
  private readonly itemCache: ItemCache;
  private readonly assetCache: AssetCache;
  private readonly catalog: TopicCatalog;
  private readonly strategy: FetchStrategy;
  private readonly batchSize: number;
  private readonly refillBatchSize: number;
  private readonly bufferThreshold: number;
  private readonly promoteSlice: number;
  private readonly assetDelayMs: number;
  private readonly sleep: Sleep;
  private readonly seen: SeenIdSet;

  private settings: FeedSettings;
  private visibleItems: ContentItem[] = [];
  private readonly visibleIds = new Set<number>();
  private buffer: ContentItem[] = [];
  private readonly bufferedIds = new Set<number>();
  private isLoading = false;
  private isRefilling = false;
  private error: FeedError | null = null;

  private foreground: AbortController | null = null;
  private refill: AbortController | null = null;
  private refillTask: Promise<RefillOutcome> | null = null;
  private assets = new AbortController();
  private assetQueue: Promise<void> = Promise.resolve();

  private readonly pending = new Set<Promise<unknown>>();
  private readonly listeners = new Set<FeedListener>();
  private readonly unsubscribers: Array<() => void> = [];

  constructor(options: FeedCacheOptions) {
    this.source = options.source;
    this.retryExecutor = options.retryExecutor;
    this.itemCache = options.itemCache;
    this.assetCache = options.assetCache;
    this.catalog = options.catalog;
    this.strategy = options.strategy ?? 'category';
    this.batchSize = options.batchSize ?? 10;
    this.refillBatchSize = options.refillBatchSize ?? 15;
    this.bufferThreshold = options.bufferThreshold ?? 20;
    this.promoteSlice = options.promoteSlice ?? 5;
    this.assetDelayMs = options.assetDelayMs ?? 100;
    this.sleep = options.sleep ?? defaultSleep;
    this.seen = new SeenIdSet(options.seenTtlMs ?? DEFAULT_SEEN_TTL_MS, options.clock ?? systemClock);
    this.settings = {
      languageCode: options.settings.languageCode,
      topics: this.catalog.normalizeTopics(options.settings.topics),
    };

    if (options.events) {
      this.unsubscribers.push(
        options.events.on('languageChanged', languageCode => this.applySettings({ ...this.settings, languageCode })),
        options.events.on('topicsChanged', topics => this.applySettings({ ...this.settings, topics: this.catalog.normalizeTopics(topics) }))
      );
    }
  }

  /**
   * Extend the visible feed, from the buffer when possible, otherwise from
   * the source. Calls made while a visible load is running are dropped.
   */
  async requestMore(isInitial = false): Promise<RequestOutcome> {
    if (this.isLoading) {
      debugLogger.info('FEED', 'Visible load already in progress, request dropped');
      return { status: 'dropped' };
    }

    const controller = new AbortController();
    this.foreground = controller;
    this.isLoading = true;
    this.error = null;
    this.notify();

    const task = this.loadVisible(isInitial, controller.signal);
    this.track(task);

    try {
      return await task;
    } finally {
      if (this.foreground === controller) {
        this.foreground = null;
        this.isLoading = false;
        this.notify();
      }
    }
  }

  /**
   * Top up the look-ahead buffer. While a refill is running, returns that
   * refill. Never rejects: failures are logged and reported in the outcome.
   */
  refillBuffer(): Promise<RefillOutcome> {
    if (this.isRefilling && this.refillTask) {
      debugLogger.info('BUFFER', 'Refill already in progress');
      return this.refillTask;
    }

    const controller = new AbortController();
    this.refill = controller;
    this.isRefilling = true;
    this.notify();

    const task = this.runRefill(controller.signal).finally(() => {
      if (this.refill === controller) {
        this.refill = null;
        this.refillTask = null;
        this.isRefilling = false;
        this.notify();
      }
    });
    this.refillTask = task;
    this.track(task);
    return task;
  }

  /**
   * Cancel every in-flight task and clear the feed, the buffer and the seen
   * ids. Safe to call at any time, any number of times.
   */
  reset(): void {
    this.foreground?.abort();
    this.refill?.abort();
    this.assets.abort();
    this.assets = new AbortController();
    // A fetch that ignores the abort must not hold up the next generation
    this.assetQueue = Promise.resolve();

    this.foreground = null;
    this.refill = null;
    this.refillTask = null;
    this.visibleItems = [];
    this.visibleIds.clear();
    this.buffer = [];
    this.bufferedIds.clear();
    this.seen.clear();
    this.isLoading = false;
    this.isRefilling = false;
    this.error = null;
    this.retryExecutor.resetAttempts(this.operationId('visible'));
    this.retryExecutor.resetAttempts(this.operationId('refill'));

    debugLogger.info('FEED', 'Feed reset', { languageCode: this.settings.languageCode, topics: this.settings.topics });
    this.notify();
  }

  refresh(): Promise<RequestOutcome> {
    this.reset();
    return this.requestMore(true);
  }

  snapshot(): FeedSnapshot {
    return Object.freeze({
      items: Object.freeze([...this.visibleItems]),
      isLoading: this.isLoading,
      isRefilling: this.isRefilling,
      hasError: this.error !== null,
      errorMessage: this.error ? userMessageFor(this.error) : null,
      bufferSize: this.buffer.length,
      settings: Object.freeze({ languageCode: this.settings.languageCode, topics: [...this.settings.topics] }),
    });
  }

  subscribe(listener: FeedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once no visible load, refill or asset prefetch is in flight */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
  }

  getSettings(): FeedSettings {
    return { languageCode: this.settings.languageCode, topics: [...this.settings.topics] };
  }

  /** Ids delivered to the visible feed within the current TTL window */
  hasSeen(id: number): boolean {
    return this.seen.has(id);
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.reset();
    this.listeners.clear();
  }

  private async loadVisible(isInitial: boolean, signal: AbortSignal): Promise<RequestOutcome> {
    if (!isInitial && this.buffer.length > 0) {
      const promoted = this.promoteFromBuffer();
      if (promoted > 0) {
        this.triggerRefillIfLow();
        return { status: 'buffer', added: promoted };
      }
    }

    const stepId = debugLogger.stepStart('FEED', `Fetching ${this.batchSize} items for the visible feed`, {
      isInitial,
      strategy: this.strategy
    });

    const result = await this.retryExecutor.executeWithRetry(
      this.operationId('visible'),
      undefined,
      () => this.fetchFromSource(this.batchSize, signal),
      signal
    );

    if (signal.aborted) {
      debugLogger.stepFinish(stepId, { outcome: 'cancelled' });
      return { status: 'cancelled' };
    }

    if (!result.ok) {
      if (result.error.kind === 'cancelled') {
        debugLogger.stepFinish(stepId, { outcome: 'cancelled' });
        return { status: 'cancelled' };
      }
      debugLogger.stepError(stepId, 'FEED', 'Visible load failed', result.error);
      this.error = result.error;
      this.notify();
      return { status: 'failed', error: result.error };
    }

    const fresh = dedupe(result.value, id => this.isDelivered(id));
    if (fresh.length === 0) {
      debugLogger.stepFinish(stepId, { outcome: 'no new content', fetched: result.value.length });
      return { status: 'empty' };
    }

    this.appendVisible(fresh);
    this.removeFromBuffer(fresh);
    this.storeItems(fresh);
    this.notify();

    debugLogger.stepFinish(stepId, { fetched: result.value.length, added: fresh.length, visible: this.visibleItems.length });

    this.prefetchAssets(fresh);
    this.triggerRefillIfLow();
    return { status: 'network', added: fresh.length };
  }

  private async runRefill(signal: AbortSignal): Promise<RefillOutcome> {
    const stepId = debugLogger.stepStart('BUFFER', `Refilling buffer with ${this.refillBatchSize} items`, {
      bufferSize: this.buffer.length,
      threshold: this.bufferThreshold
    });

    const result = await this.retryExecutor.executeWithRetry(
      this.operationId('refill'),
      undefined,
      () => this.fetchFromSource(this.refillBatchSize, signal),
      signal
    );

    if (signal.aborted || (!result.ok && result.error.kind === 'cancelled')) {
      debugLogger.stepFinish(stepId, { outcome: 'cancelled' });
      return { status: 'cancelled' };
    }

    if (!result.ok) {
      debugLogger.stepError(stepId, 'BUFFER', 'Buffer refill failed', result.error);
      return { status: 'failed', error: result.error };
    }

    const fresh = dedupe(result.value, id => this.isDelivered(id) || this.bufferedIds.has(id));
    this.buffer.push(...fresh);
    for (const item of fresh) {
      this.bufferedIds.add(item.id);
    }
    this.storeItems(fresh);
    this.notify();

    debugLogger.stepFinish(stepId, { fetched: result.value.length, added: fresh.length, bufferSize: this.buffer.length });

    this.prefetchAssets(fresh);
    return { status: 'refilled', added: fresh.length };
  }

  /**
   * Move up to promoteSlice unseen buffered items into the visible feed.
   * Buffered items that were delivered some other way are discarded.
   */
  private promoteFromBuffer(): number {
    const unseen = this.buffer.filter(item => !this.isDelivered(item.id));
    const discarded = this.buffer.length - unseen.length;
    const promoted = unseen.slice(0, this.promoteSlice);

    this.buffer = unseen.slice(this.promoteSlice);
    this.bufferedIds.clear();
    for (const item of this.buffer) {
      this.bufferedIds.add(item.id);
    }

    this.appendVisible(promoted);
    this.notify();

    debugLogger.info('BUFFER', `Promoted ${promoted.length} items from buffer`, {
      discarded,
      remaining: this.buffer.length,
      visible: this.visibleItems.length
    });
    return promoted.length;
  }

  /**
   * Seen within the TTL window, or still on screen. The visible feed never
   * repeats an id even after the seen set has expired.
   */
  private isDelivered(id: number): boolean {
    return this.seen.has(id) || this.visibleIds.has(id);
  }

  private appendVisible(items: readonly ContentItem[]): void {
    for (const item of items) {
      this.visibleItems.push(item);
      this.visibleIds.add(item.id);
      this.seen.add(item.id);
    }
  }

  private removeFromBuffer(items: readonly ContentItem[]): void {
    if (!items.some(item => this.bufferedIds.has(item.id))) return;
    const delivered = new Set(items.map(item => item.id));
    this.buffer = this.buffer.filter(item => !delivered.has(item.id));
    for (const id of delivered) {
      this.bufferedIds.delete(id);
    }
  }

  private triggerRefillIfLow(): void {
    if (this.buffer.length >= this.bufferThreshold) return;
    this.refillBuffer().catch((error: unknown) => {
      debugLogger.stepError(null, 'BUFFER', 'Background refill failed', error);
    });
  }

  private fetchFromSource(count: number, signal: AbortSignal): Promise<ContentItem[]> {
    const { languageCode, topics } = this.settings;
    if (this.strategy === 'search') {
      return this.source.fetchBatch(topics, count, languageCode, signal);
    }
    return this.source.fetchByCategory(this.catalog.feedCategories(topics), count, languageCode, signal);
  }

  private storeItems(items: readonly ContentItem[]): void {
    for (const item of items) {
      this.itemCache.put(item.id, item);
    }
  }

  /**
   * Queue asset fetches for the items' images. Prefetches from every task run
   * one at a time with a pause between requests.
   */
  private prefetchAssets(items: readonly ContentItem[]): void {
    const urls = items.flatMap(item => (item.assetUrl ? [item.assetUrl] : []));
    if (urls.length === 0) return;

    const signal = this.assets.signal;
    const run = this.assetQueue
      .then(() => untilAborted(this.runAssetPrefetch(urls, signal), signal))
      .catch((error: unknown) => {
        debugLogger.stepError(null, 'ASSET_CACHE', 'Asset prefetch failed', error);
      });
    this.assetQueue = run;
    this.track(run);
  }

  private async runAssetPrefetch(urls: readonly string[], signal: AbortSignal): Promise<void> {
    let present = 0;
    for (let i = 0; i < urls.length; i++) {
      if (signal.aborted) return;
      if (i > 0) {
        await this.sleep(this.assetDelayMs);
        if (signal.aborted) return;
      }
      const result = await this.assetCache.fetchAndCache(urls[i], url => url, signal);
      if (result.status === 'present') present++;
    }
    debugLogger.info('ASSET_CACHE', `Prefetched ${present}/${urls.length} assets`);
  }

  private applySettings(next: FeedSettings): void {
    const unchanged =
      next.languageCode === this.settings.languageCode &&
      next.topics.length === this.settings.topics.length &&
      next.topics.every((topic, i) => topic === this.settings.topics[i]);
    if (unchanged) return;

    this.settings = next;
    debugLogger.info('FEED', 'Configuration changed, refreshing feed', { ...next });
    this.refresh().catch((error: unknown) => {
      debugLogger.stepError(null, 'FEED', 'Refresh after configuration change failed', error);
    });
  }

  private operationId(kind: 'visible' | 'refill'): string {
    return `feed:${kind}:${this.strategy}`;
  }

  private track(task: Promise<unknown>): void {
    this.pending.add(task);
    const settle = (): void => {
      this.pending.delete(task);
    };
    task.then(settle, settle);
  }

  private notify(): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.snapshot();
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(snapshot);
      } catch (error) {
        debugLogger.stepError(null, 'FEED', 'Feed listener threw', error);
      }
    }
  }
}

/**
 * Drop repeated ids within the batch and ids the predicate excludes,
 * keeping first occurrences in order.
 */
function dedupe(items: readonly ContentItem[], isExcluded: (id: number) => boolean): ContentItem[] {
  const ids = new Set<number>();
  return items.filter(item => {
    if (ids.has(item.id) || isExcluded(item.id)) return false;
    ids.add(item.id);
    return true;
  });
}

/**
 * Settles with the task, or as soon as the signal aborts
 */
function untilAborted(task: Promise<void>, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
    task.then(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
