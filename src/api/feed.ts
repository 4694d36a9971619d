/**
 * Feed, item and asset endpoints
 */

import { Router } from 'express';
import { z } from 'zod';
import { FeedRuntime } from '../container';
import { userMessageFor } from '../errors';
import { FeedSettingsUpdateSchema } from '../schemas';
import { FeedSnapshot, RequestOutcome } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { asyncHandler } from './middleware';

const FeedQuerySchema = z.object({
  since: z.coerce.number().int().nonnegative().default(0).describe('Index of the first item to return'),
});

const ItemParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const AssetQuerySchema = z.object({
  url: z.string().url().describe('Image URL, also the asset cache key'),
});

type SerializedOutcome =
  | { status: 'dropped' | 'empty' | 'cancelled' }
  | { status: 'buffer' | 'network'; added: number }
  | { status: 'failed'; error: { kind: string; message: string } };

function serializeOutcome(outcome: RequestOutcome): SerializedOutcome {
  if (outcome.status === 'failed') {
    return { status: 'failed', error: { kind: outcome.error.kind, message: userMessageFor(outcome.error) } };
  }
  return outcome;
}

function feedPage(snapshot: FeedSnapshot, since: number) {
  return {
    ...snapshot,
    items: snapshot.items.slice(since),
    total: snapshot.items.length,
    since,
  };
}

export function createFeedRouter(runtime: FeedRuntime): Router {
  const router = Router();

  /**
   * GET /api/feed
   * Current feed snapshot, optionally from item index `since`
   */
  router.get('/feed', (req, res) => {
    const { since } = FeedQuerySchema.parse(req.query);
    res.json(feedPage(runtime.feed.snapshot(), since));
  });

  router.post('/feed/more', asyncHandler(async (_req, res) => {
    const outcome = await runtime.feed.requestMore(false);
    res.json({ outcome: serializeOutcome(outcome), feed: runtime.feed.snapshot() });
  }));

  router.post('/feed/refresh', asyncHandler(async (_req, res) => {
    const outcome = await runtime.feed.refresh();
    res.json({ outcome: serializeOutcome(outcome), feed: runtime.feed.snapshot() });
  }));

  /**
   * PUT /api/feed/settings
   * Changing the language or topics resets the feed and starts a fresh load
   */
  router.put('/feed/settings', (req, res) => {
    const update = FeedSettingsUpdateSchema.parse(req.body);
    const settings = runtime.updateSettings(update);
    debugLogger.info('API', 'Feed settings updated', { ...settings });
    res.json({ settings });
  });

  router.get('/items/:id', (req, res) => {
    const { id } = ItemParamsSchema.parse(req.params);
    const item = runtime.itemCache.get(id);
    if (!item) {
      res.status(404).json({ error: 'Item not found' });
      return;
    }
    res.json({ item });
  });

  /**
   * GET /api/assets?url=
   * Downsampled image bytes from the asset cache, fetched on a miss
   */
  router.get('/assets', asyncHandler(async (req, res) => {
    const { url } = AssetQuerySchema.parse(req.query);
    const result = await runtime.assetCache.fetchAndCache(url);

    if (result.status === 'absent') {
      res.status(404).json({ error: 'Asset not available', reason: result.reason });
      return;
    }

    res
      .status(200)
      .type(`image/${result.asset.format}`)
      .set('X-Asset-Width', String(result.asset.width))
      .set('X-Asset-Height', String(result.asset.height))
      .send(result.asset.data);
  }));

  router.post('/memory-pressure', (_req, res) => {
    runtime.monitor.signal('manual');
    res.json({
      items: runtime.itemCache.stats(),
      assets: runtime.assetCache.stats(),
    });
  });

  return router;
}
