import { debugLogger } from '../utils/debug-logger';

export interface FeedEventMap {
  languageChanged: [languageCode: string];
  topicsChanged: [topics: string[]];
}

export type FeedEventName = keyof FeedEventMap;
type Listener<K extends FeedEventName> = (...args: FeedEventMap[K]) => void;

/**
 * Typed channel for configuration-change signals. Subscribers register at
 * construction time and get back an unsubscribe function.
 */
export class FeedEvents {
  private readonly listeners: { [K in FeedEventName]: Set<Listener<K>> } = {
    languageChanged: new Set(),
    topicsChanged: new Set(),
  };

  on<K extends FeedEventName>(event: K, listener: Listener<K>): () => void {
    const listeners: Set<Listener<K>> = this.listeners[event];
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  emit<K extends FeedEventName>(event: K, ...args: FeedEventMap[K]): void {
    const listeners: Set<Listener<K>> = this.listeners[event];
    debugLogger.info('FEED', `Event: ${event}`, { listeners: listeners.size });
    for (const listener of Array.from(listeners)) {
      listener(...args);
    }
  }

  listenerCount(event: FeedEventName): number {
    return this.listeners[event].size;
  }
}
