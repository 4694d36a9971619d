import { describe, it, expect } from 'vitest';
import { AssetCache } from '../../src/cache/asset-cache';
import { ItemCache } from '../../src/cache/item-cache';
import { FeedError } from '../../src/errors';
import { FeedEvents } from '../../src/events/feed-events';
import { FeedCache, FeedCacheOptions } from '../../src/feed/feed-cache';
import { RetryExecutor } from '../../src/retry/retry-executor';
import { AssetTransport, ContentItem, FeedSnapshot, TransportResponse } from '../../src/types';
import { testCatalog } from '../fixtures';
import { FakeDecoder, FakeTransport, StubSource, deferred, makeItem, makeItems, noSleep, ok } from '../helpers';

type ScriptedResponse = ContentItem[] | FeedError | (() => Promise<ContentItem[]>);

function setup(responses: ScriptedResponse[] = [], overrides: Partial<FeedCacheOptions> = {}) {
  const source = new StubSource(responses);
  const retryExecutor = new RetryExecutor({ sleep: noSleep, random: () => 0 });
  const itemCache = new ItemCache();
  const transport = new FakeTransport();
  const assetCache = new AssetCache({ transport, decoder: new FakeDecoder(), sleep: noSleep });
  const events = new FeedEvents();
  const feed = new FeedCache({
    source,
    retryExecutor,
    itemCache,
    assetCache,
    catalog: testCatalog(),
    events,
    settings: { languageCode: 'en', topics: ['history_and_events'] },
    assetDelayMs: 0,
    sleep: noSleep,
    ...overrides,
  });
  return { feed, source, itemCache, assetCache, transport, events, retryExecutor };
}

const ids = (snapshot: FeedSnapshot): number[] => snapshot.items.map(item => item.id);

describe('FeedCache', () => {
  describe('requestMore', () => {
    it('loads the first batch from the source', async () => {
      const { feed, source, itemCache } = setup([makeItems([1, 2, 3])], { bufferThreshold: 0 });

      const outcome = await feed.requestMore(true);

      expect(outcome).toEqual({ status: 'network', added: 3 });
      expect(ids(feed.snapshot())).toEqual([1, 2, 3]);
      expect(feed.snapshot().isLoading).toBe(false);
      expect(itemCache.size).toBe(3);
      expect(source.calls).toEqual([
        {
          kind: 'category',
          keys: ['Battles', 'Empires', 'Painting', 'Opera', 'Ballet'],
          count: 10,
          languageCode: 'en',
        },
      ]);
    });

    it('uses topic search with the search strategy', async () => {
      const { feed, source } = setup([makeItems([1])], { bufferThreshold: 0, strategy: 'search', batchSize: 4 });

      await feed.requestMore(true);

      expect(source.calls[0]).toEqual({ kind: 'batch', keys: ['History and Events'], count: 4, languageCode: 'en' });
    });

    it('appends an item repeated within a batch once and skips already seen ids', async () => {
      const { feed } = setup([makeItems([2]), makeItems([1, 2, 1])], { bufferThreshold: 0 });

      await feed.requestMore(true);
      const outcome = await feed.requestMore(false);

      expect(outcome).toEqual({ status: 'network', added: 1 });
      expect(ids(feed.snapshot())).toEqual([2, 1]);
    });

    it('promotes five buffered items and triggers a refill when the buffer runs low', async () => {
      const { feed, source } = setup([makeItems([100]), makeItems([1, 2, 3, 4, 5, 6])]);

      await feed.requestMore(true);
      await feed.whenIdle();
      expect(feed.snapshot().bufferSize).toBe(6);
      expect(source.calls).toHaveLength(2);
      expect(source.calls[1].count).toBe(15);

      const outcome = await feed.requestMore(false);

      expect(outcome).toEqual({ status: 'buffer', added: 5 });
      expect(ids(feed.snapshot())).toEqual([100, 1, 2, 3, 4, 5]);
      expect(feed.snapshot().bufferSize).toBe(1);
      expect(source.calls).toHaveLength(3);
      expect(source.calls[2].count).toBe(15);

      await feed.whenIdle();
    });

    it('does not trigger a refill while the buffer is at or above the threshold', async () => {
      const { feed, source } = setup([makeItems([100]), makeItems([1, 2, 3, 4, 5, 6, 7, 8])], { bufferThreshold: 3 });

      await feed.requestMore(true);
      await feed.whenIdle();
      await feed.requestMore(false);

      expect(feed.snapshot().bufferSize).toBe(3);
      expect(source.calls).toHaveLength(2);
    });

    it('drops calls made while a visible load is running', async () => {
      const pending = deferred<ContentItem[]>();
      const { feed, source } = setup([() => pending.promise], { bufferThreshold: 0 });

      const first = feed.requestMore(true);
      const second = await feed.requestMore(false);

      expect(second).toEqual({ status: 'dropped' });
      expect(feed.snapshot().isLoading).toBe(true);
      expect(source.calls).toHaveLength(1);

      pending.resolve(makeItems([1]));
      expect(await first).toEqual({ status: 'network', added: 1 });
      expect(feed.snapshot().isLoading).toBe(false);
    });

    it('retries transient failures and then records a user-facing error', async () => {
      const failure = new FeedError('server', 'Upstream server error (502) for https://en.wikipedia.org/w/api.php');
      const { feed, source } = setup([failure, failure, failure], { bufferThreshold: 0 });

      const outcome = await feed.requestMore(true);

      expect(outcome.status).toBe('failed');
      expect(source.calls).toHaveLength(3);
      const snapshot = feed.snapshot();
      expect(snapshot.items).toEqual([]);
      expect(snapshot.hasError).toBe(true);
      expect(snapshot.errorMessage).toBe('The article service is having trouble. Please try again shortly.');
    });

    it('does not retry failures that are not transient', async () => {
      const { feed, source } = setup([new FeedError('decoding', 'bad payload')], { bufferThreshold: 0 });

      const outcome = await feed.requestMore(true);

      expect(outcome.status).toBe('failed');
      expect(source.calls).toHaveLength(1);
      expect(feed.snapshot().errorMessage).toBe('Received unexpected content. Please try again.');
    });

    it('keeps the visible items and clears the error on the next success', async () => {
      const { feed } = setup([makeItems([1]), new FeedError('not_found', 'gone'), makeItems([2])], {
        bufferThreshold: 0,
      });

      await feed.requestMore(true);
      await feed.requestMore(false);
      expect(ids(feed.snapshot())).toEqual([1]);
      expect(feed.snapshot().hasError).toBe(true);

      await feed.requestMore(false);
      expect(ids(feed.snapshot())).toEqual([1, 2]);
      expect(feed.snapshot().hasError).toBe(false);
      expect(feed.snapshot().errorMessage).toBeNull();
    });

    it('reports a batch of already seen items as empty without retrying', async () => {
      const { feed, source } = setup([makeItems([1, 2]), makeItems([2, 1])], { bufferThreshold: 0 });

      await feed.requestMore(true);
      const outcome = await feed.requestMore(false);

      expect(outcome).toEqual({ status: 'empty' });
      expect(source.calls).toHaveLength(2);
      expect(feed.snapshot().hasError).toBe(false);
    });

    it('never repeats a visible item after the seen set expires', async () => {
      let now = 0;
      const { feed } = setup([makeItems([1]), makeItems([1, 2])], { bufferThreshold: 0, clock: () => now });

      await feed.requestMore(true);
      now = 24 * 60 * 60 * 1000;
      expect(feed.hasSeen(1)).toBe(false);

      const outcome = await feed.requestMore(false);

      expect(outcome).toEqual({ status: 'network', added: 1 });
      expect(ids(feed.snapshot())).toEqual([1, 2]);
    });
  });

  describe('refillBuffer', () => {
    it('filters against seen and buffered ids', async () => {
      const { feed } = setup([makeItems([1, 2]), makeItems([2, 3, 3]), makeItems([3, 4])], { bufferThreshold: 0 });

      await feed.requestMore(true);
      expect(await feed.refillBuffer()).toEqual({ status: 'refilled', added: 1 });
      expect(await feed.refillBuffer()).toEqual({ status: 'refilled', added: 1 });

      expect(feed.snapshot().bufferSize).toBe(2);
      expect(feed.hasSeen(3)).toBe(false);
    });

    it('returns the running refill instead of starting another', async () => {
      const pending = deferred<ContentItem[]>();
      const { feed, source } = setup([() => pending.promise]);

      const first = feed.refillBuffer();
      const second = feed.refillBuffer();

      expect(second).toBe(first);
      expect(feed.snapshot().isRefilling).toBe(true);
      expect(source.calls).toHaveLength(1);

      pending.resolve(makeItems([1]));
      expect(await first).toEqual({ status: 'refilled', added: 1 });
      expect(feed.snapshot().isRefilling).toBe(false);
    });

    it('logs failures without surfacing them to the feed', async () => {
      const failure = new FeedError('transport', 'offline');
      const { feed, source } = setup([failure, failure, failure]);

      const outcome = await feed.refillBuffer();

      expect(outcome).toEqual({ status: 'failed', error: expect.objectContaining({ kind: 'transport' }) });
      expect(source.calls).toHaveLength(3);
      expect(feed.snapshot().hasError).toBe(false);
      expect(feed.snapshot().bufferSize).toBe(0);
    });

    it('leaves a background refill failure invisible after a successful load', async () => {
      const failure = new FeedError('timeout', 'slow');
      const { feed } = setup([makeItems([1]), failure, failure, failure]);

      await feed.requestMore(true);
      await feed.whenIdle();

      const snapshot = feed.snapshot();
      expect(ids(snapshot)).toEqual([1]);
      expect(snapshot.hasError).toBe(false);
      expect(snapshot.isRefilling).toBe(false);
    });

    it('discards buffered items that reached the feed another way', async () => {
      const { feed } = setup([makeItems([1]), makeItems([2, 3]), makeItems([2, 9])], { bufferThreshold: 5 });

      await feed.requestMore(true);
      await feed.whenIdle();
      expect(feed.snapshot().bufferSize).toBe(2);

      await feed.requestMore(true);
      await feed.whenIdle();
      expect(ids(feed.snapshot())).toEqual([1, 2, 9]);
      expect(feed.snapshot().bufferSize).toBe(1);

      await feed.requestMore(false);
      await feed.whenIdle();
      expect(ids(feed.snapshot())).toEqual([1, 2, 9, 3]);
    });
  });

  describe('reset and refresh', () => {
    it('clears everything and is idempotent', async () => {
      const { feed } = setup([makeItems([1, 2]), makeItems([3, 4])]);
      await feed.requestMore(true);
      await feed.whenIdle();

      feed.reset();
      const first = feed.snapshot();
      feed.reset();
      const second = feed.snapshot();

      for (const snapshot of [first, second]) {
        expect(snapshot.items).toEqual([]);
        expect(snapshot.bufferSize).toBe(0);
        expect(snapshot.isLoading).toBe(false);
        expect(snapshot.isRefilling).toBe(false);
      }
      expect(feed.hasSeen(1)).toBe(false);
    });

    it('refresh reloads the feed after a reset', async () => {
      const { feed } = setup([makeItems([1]), makeItems([5, 6])], { bufferThreshold: 0 });
      await feed.requestMore(true);

      feed.reset();
      const outcome = await feed.refresh();

      expect(outcome).toEqual({ status: 'network', added: 2 });
      expect(ids(feed.snapshot())).toEqual([5, 6]);
    });

    it('an in-flight load cancelled by reset writes nothing', async () => {
      const pending = deferred<ContentItem[]>();
      const { feed, itemCache } = setup([() => pending.promise], { bufferThreshold: 0 });

      const inFlight = feed.requestMore(true);
      feed.reset();
      pending.resolve(makeItems([1, 2]));

      expect(await inFlight).toEqual({ status: 'cancelled' });
      expect(feed.snapshot().items).toEqual([]);
      expect(feed.snapshot().hasError).toBe(false);
      expect(itemCache.size).toBe(0);
    });

    it('a cancelled load does not clear the flag of the load that replaced it', async () => {
      const stale = deferred<ContentItem[]>();
      const current = deferred<ContentItem[]>();
      const { feed } = setup([() => stale.promise, () => current.promise], { bufferThreshold: 0 });

      const old = feed.requestMore(true);
      const fresh = feed.refresh();
      stale.resolve(makeItems([1]));
      await old;

      expect(feed.snapshot().isLoading).toBe(true);

      current.resolve(makeItems([2]));
      expect(await fresh).toEqual({ status: 'network', added: 1 });
      expect(ids(feed.snapshot())).toEqual([2]);
      expect(feed.snapshot().isLoading).toBe(false);
    });

    it('an in-flight refill cancelled by reset does not fill the new buffer', async () => {
      const pending = deferred<ContentItem[]>();
      const { feed } = setup([() => pending.promise]);

      const refill = feed.refillBuffer();
      feed.reset();
      pending.resolve(makeItems([1, 2]));

      expect(await refill).toEqual({ status: 'cancelled' });
      expect(feed.snapshot().bufferSize).toBe(0);
    });

    it('stops asset prefetching on reset', async () => {
      const reachedDelay = deferred<void>();
      const gate = deferred<void>();
      const items = [1, 2, 3].map(id => makeItem(id, { assetUrl: `https://upload.example.org/${id}.jpg` }));
      const { feed, transport } = setup([items], {
        bufferThreshold: 0,
        assetDelayMs: 100,
        sleep: () => {
          reachedDelay.resolve();
          return gate.promise;
        },
      });
      transport.reply('https://upload.example.org/1.jpg', ok());

      await feed.requestMore(true);
      await reachedDelay.promise;
      feed.reset();
      gate.resolve();
      await feed.whenIdle();

      expect(transport.requests.map(request => request.url)).toEqual(['https://upload.example.org/1.jpg']);
    });
    it('prefetches for the new feed while an earlier asset fetch never returns', async () => {
      const hung = 'https://upload.example.org/hung.jpg';
      const fresh = 'https://upload.example.org/fresh.jpg';
      const requested: string[] = [];
      const reachedHung = deferred<void>();
      const transport: AssetTransport = {
        fetchBytes: (url: string) => {
          requested.push(url);
          if (url === hung) {
            reachedHung.resolve();
            return new Promise<TransportResponse>(() => {});
          }
          return Promise.resolve(ok());
        },
      };
      const assetCache = new AssetCache({ transport, decoder: new FakeDecoder(), sleep: noSleep });
      const { feed } = setup([[makeItem(1, { assetUrl: hung })], [makeItem(2, { assetUrl: fresh })]], {
        bufferThreshold: 0,
        assetCache,
      });

      await feed.requestMore(true);
      await reachedHung.promise;
      await feed.refresh();
      await feed.whenIdle();

      expect(requested).toEqual([hung, fresh]);
      expect(assetCache.size).toBe(1);
      expect(ids(feed.snapshot())).toEqual([2]);
    });
  });

  describe('asset prefetch', () => {
    it('fetches item images one at a time with a pause between requests', async () => {
      const delays: number[] = [];
      const items = [
        makeItem(1, { assetUrl: 'https://upload.example.org/1.jpg' }),
        makeItem(2),
        makeItem(3, { assetUrl: 'https://upload.example.org/3.jpg' }),
        makeItem(4, { assetUrl: 'https://upload.example.org/4.jpg' }),
      ];
      const { feed, transport, assetCache } = setup([items], {
        bufferThreshold: 0,
        assetDelayMs: 100,
        sleep: async (ms: number) => {
          delays.push(ms);
        },
      });
      for (const item of items) {
        if (item.assetUrl) transport.reply(item.assetUrl, ok());
      }

      await feed.requestMore(true);
      await feed.whenIdle();

      expect(transport.requests.map(request => request.url)).toEqual([
        'https://upload.example.org/1.jpg',
        'https://upload.example.org/3.jpg',
        'https://upload.example.org/4.jpg',
      ]);
      expect(delays).toEqual([100, 100]);
      expect(assetCache.size).toBe(3);
    });

    it('does not let a missing asset affect the feed', async () => {
      const { feed, transport } = setup([[makeItem(1, { assetUrl: 'https://upload.example.org/gone.jpg' })]], {
        bufferThreshold: 0,
      });

      const outcome = await feed.requestMore(true);
      await feed.whenIdle();

      expect(outcome).toEqual({ status: 'network', added: 1 });
      expect(transport.requestCount('https://upload.example.org/gone.jpg')).toBe(1);
      expect(feed.snapshot().hasError).toBe(false);
    });
  });

  describe('configuration changes', () => {
    it('re-keys the feed and refreshes when the language changes', async () => {
      const { feed, events, source } = setup([makeItems([1]), makeItems([7, 8])], { bufferThreshold: 0 });
      await feed.requestMore(true);

      events.emit('languageChanged', 'de');
      await feed.whenIdle();

      const snapshot = feed.snapshot();
      expect(snapshot.settings.languageCode).toBe('de');
      expect(ids(snapshot)).toEqual([7, 8]);
      expect(source.calls[1].languageCode).toBe('de');
    });

    it('normalizes topics and ignores changes to the same configuration', async () => {
      const { feed, events, source } = setup([makeItems([1]), makeItems([2])], { bufferThreshold: 0 });
      await feed.requestMore(true);

      events.emit('topicsChanged', ['History and Events']);
      await feed.whenIdle();
      expect(source.calls).toHaveLength(1);

      events.emit('topicsChanged', ['culture_and_arts']);
      await feed.whenIdle();
      expect(feed.getSettings().topics).toEqual(['Culture and the Arts']);
      expect(source.calls).toHaveLength(2);
      expect(ids(feed.snapshot())).toEqual([2]);
    });

    it('stops listening after dispose', async () => {
      const { feed, events } = setup([], { bufferThreshold: 0 });
      feed.dispose();
      expect(events.listenerCount('languageChanged')).toBe(0);
      expect(events.listenerCount('topicsChanged')).toBe(0);
    });
  });

  it('notifies subscribers of state changes until they unsubscribe', async () => {
    const { feed } = setup([makeItems([1]), makeItems([2])], { bufferThreshold: 0 });
    const seen: FeedSnapshot[] = [];
    const unsubscribe = feed.subscribe(snapshot => seen.push(snapshot));

    await feed.requestMore(true);

    expect(seen[0].isLoading).toBe(true);
    expect(ids(seen[seen.length - 1])).toEqual([1]);
    expect(seen[seen.length - 1].isLoading).toBe(false);

    unsubscribe();
    const count = seen.length;
    await feed.requestMore(false);
    expect(seen).toHaveLength(count);
  });

  it('never holds duplicate ids across loads and refills', async () => {
    const { feed } = setup(
      [makeItems([1, 2, 3]), makeItems([3, 4, 5, 4]), makeItems([5, 6, 1]), makeItems([6, 7]), makeItems([7, 8])],
      { bufferThreshold: 5, promoteSlice: 2 }
    );

    await feed.requestMore(true);
    await feed.whenIdle();
    for (let i = 0; i < 4; i++) {
      await feed.requestMore(false);
      await feed.whenIdle();
    }

    const visible = ids(feed.snapshot());
    expect(new Set(visible).size).toBe(visible.length);
    expect(visible.slice().sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });
});
