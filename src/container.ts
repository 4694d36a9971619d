import { AssetCache } from './cache/asset-cache';
import { ItemCache } from './cache/item-cache';
import { AssetTransport, ContentSource, FeedSettings, ImageDecoder } from './types';
import { AppConfig } from './config';
import { FeedEvents } from './events/feed-events';
import { FeedCache } from './feed/feed-cache';
import { HttpTransport } from './http/transport';
import { MemoryPressureMonitor } from './memory/memory-pressure-monitor';
import { RetryExecutor } from './retry/retry-executor';
import { FeedSettingsUpdate } from './schemas';
import { SharpImageDecoder } from './assets/sharp-decoder';
import { TopicCatalog } from './source/topics';
import { WikipediaContentSource } from './source/wikipedia-source';
import { debugLogger } from './utils/debug-logger';

/**
 * Everything the HTTP API and the job scheduler reach through
 */
export interface FeedRuntime {
  feed: FeedCache;
  itemCache: ItemCache;
  assetCache: AssetCache;
  monitor: MemoryPressureMonitor;
  updateSettings(update: FeedSettingsUpdate): FeedSettings;
}

export interface Container extends FeedRuntime {
  config: AppConfig;
  events: FeedEvents;
  catalog: TopicCatalog;
  retryExecutor: RetryExecutor;
  source: ContentSource;
  dispose(): void;
}

export interface ContainerOverrides {
  source?: ContentSource;
  assetTransport?: AssetTransport;
  decoder?: ImageDecoder;
  catalog?: TopicCatalog;
}

/**
 * Release memory when the monitor reports pressure: the asset cache empties
 * and the item cache drops its least recently used half.
 */
export function connectMemoryPressure(monitor: MemoryPressureMonitor, itemCache: ItemCache, assetCache: AssetCache): () => void {
  return monitor.onPressure(event => {
    const assets = assetCache.size;
    assetCache.clear();
    const trimmed = itemCache.trimToHalf();
    debugLogger.info('MEMORY', 'Released cached content', {
      reason: event.reason,
      assetsCleared: assets,
      itemsTrimmed: trimmed,
      itemsLeft: itemCache.size
    });
  });
}

/**
 * Turn a settings update into configuration events. Only values that differ
 * from the feed's current settings are emitted.
 */
export function applySettingsUpdate(
  feed: FeedCache,
  events: FeedEvents,
  catalog: TopicCatalog,
  update: FeedSettingsUpdate
): FeedSettings {
  const current = feed.getSettings();

  if (update.languageCode !== undefined && update.languageCode !== current.languageCode) {
    events.emit('languageChanged', update.languageCode);
  }

  if (update.topics !== undefined) {
    const topics = catalog.normalizeTopics(update.topics);
    const changed = topics.length !== current.topics.length || topics.some((topic, i) => topic !== current.topics[i]);
    if (changed) {
      events.emit('topicsChanged', topics);
    }
  }

  return feed.getSettings();
}

/**
 * Composition root: one instance of every component per process.
 */
export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
  const events = new FeedEvents();
  const catalog = overrides.catalog ?? new TopicCatalog();
  const transport = new HttpTransport({ userAgent: config.http.userAgent, timeoutMs: config.http.timeoutMs });

  let wikipedia: WikipediaContentSource | null = null;
  let source: ContentSource;
  if (overrides.source) {
    source = overrides.source;
  } else {
    wikipedia = new WikipediaContentSource({ transport, catalog, events, usedTermTtlMs: config.feed.seenTtlMs });
    source = wikipedia;
  }

  const retryExecutor = new RetryExecutor({
    baseDelayMs: config.retry.baseDelayMs,
    defaultMaxAttempts: config.retry.maxAttempts,
  });
  const itemCache = new ItemCache({ capacity: config.itemCache.capacity });
  const assetCache = new AssetCache({
    transport: overrides.assetTransport ?? transport,
    decoder: overrides.decoder ?? new SharpImageDecoder(),
    capacity: config.assetCache.capacity,
    byteBudget: config.assetCache.byteBudget,
    maxDimension: config.assetCache.maxDimension,
    density: config.assetCache.density,
    timeoutMs: config.assetCache.timeoutMs,
  });
  const monitor = new MemoryPressureMonitor({ heapLimitBytes: config.memory.heapLimitBytes });
  const disconnectMemory = connectMemoryPressure(monitor, itemCache, assetCache);

  const feed = new FeedCache({
    source,
    retryExecutor,
    itemCache,
    assetCache,
    catalog,
    events,
    settings: { languageCode: config.feed.languageCode, topics: config.feed.topics },
    strategy: config.feed.strategy,
    batchSize: config.feed.batchSize,
    refillBatchSize: config.feed.refillBatchSize,
    bufferThreshold: config.feed.bufferThreshold,
    promoteSlice: config.feed.promoteSlice,
    assetDelayMs: config.feed.assetDelayMs,
    seenTtlMs: config.feed.seenTtlMs,
  });

  return {
    config,
    events,
    catalog,
    retryExecutor,
    source,
    feed,
    itemCache,
    assetCache,
    monitor,
    updateSettings: update => applySettingsUpdate(feed, events, catalog, update),
    dispose: () => {
      feed.dispose();
      wikipedia?.dispose();
      disconnectMemory();
      monitor.stop();
    },
  };
}
