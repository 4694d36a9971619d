import { Request, Response } from 'express';
import { FeedRuntime } from '../container';
import { getSchedulerStatus } from '../jobs/scheduler';
import { MetricsTracker, metricsTracker } from '../jobs/metrics-tracker';

export function createHealthCheck(runtime: FeedRuntime, tracker: MetricsTracker = metricsTracker) {
  return (_req: Request, res: Response): void => {
    const snapshot = runtime.feed.snapshot();
    const jobs = tracker.getStats();
    const healthy = !tracker.isCriticalFailureState();

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      feed: {
        visibleItems: snapshot.items.length,
        bufferSize: snapshot.bufferSize,
        isLoading: snapshot.isLoading,
        isRefilling: snapshot.isRefilling,
        hasError: snapshot.hasError,
        settings: snapshot.settings,
      },
      caches: {
        items: runtime.itemCache.stats(),
        assets: runtime.assetCache.stats(),
      },
      scheduler: getSchedulerStatus(),
      jobs,
      memory: {
        heapUsedBytes: process.memoryUsage().heapUsed,
        pressureEvents: runtime.monitor.getPressureCount(),
      },
      timestamp: new Date().toISOString(),
    });
  };
}
