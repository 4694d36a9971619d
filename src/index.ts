export * from './types';
export * from './errors';
export { RetryExecutor } from './retry/retry-executor';
export type { RetryExecutorOptions } from './retry/retry-executor';
export { ItemCache } from './cache/item-cache';
export type { ItemCacheOptions, CacheEntry } from './cache/item-cache';
export { AssetCache, DEFAULT_ASSET_BYTE_BUDGET } from './cache/asset-cache';
export type { AssetCacheOptions, AssetCacheEntry } from './cache/asset-cache';
export { SharpImageDecoder } from './assets/sharp-decoder';
export { HttpTransport } from './http/transport';
export type { HttpTransportOptions } from './http/transport';
export { FeedCache } from './feed/feed-cache';
export type { FeedCacheOptions, FeedListener, FetchStrategy } from './feed/feed-cache';
export { SeenIdSet, DEFAULT_SEEN_TTL_MS } from './feed/seen-id-set';
export { FeedEvents } from './events/feed-events';
export type { FeedEventMap, FeedEventName } from './events/feed-events';
export { MemoryPressureMonitor } from './memory/memory-pressure-monitor';
export type { MemoryPressureMonitorOptions, PressureEvent, PressureReason } from './memory/memory-pressure-monitor';
export { TopicCatalog, ALL_TOPICS } from './source/topics';
export { WikipediaContentSource } from './source/wikipedia-source';
export type { WikipediaSourceOptions, JsonTransport } from './source/wikipedia-source';
export { runTaskGroup, chunkArray } from './utils/concurrency';
export type { TaskGroupResult, TaskGroupOptions } from './utils/concurrency';
export { loadConfig, ConfigError } from './config';
export type { AppConfig } from './config';
export { createContainer, connectMemoryPressure, applySettingsUpdate } from './container';
export type { Container, FeedRuntime } from './container';
export { createApp } from './api/app';
export type { AppOptions } from './api/app';
