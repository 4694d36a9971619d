/**
 * Background job keeping the look-ahead buffer warm
 */

import { RefillOutcome } from '../types';
import { userMessageFor } from '../errors';
import { debugLogger } from '../utils/debug-logger';
import { MetricsTracker, metricsTracker } from './metrics-tracker';

export interface WarmableFeed {
  refillBuffer(): Promise<RefillOutcome>;
}

let isJobRunning = false;

/**
 * Run one buffer refill. Overlapping runs are skipped.
 */
export async function runBufferWarmJob(feed: WarmableFeed, tracker: MetricsTracker = metricsTracker): Promise<void> {
  if (isJobRunning) {
    debugLogger.info('JOB', 'Buffer warm job already running, skipping this execution');
    tracker.recordJobSkipped();
    return;
  }

  isJobRunning = true;
  const startTime = Date.now();

  try {
    tracker.recordJobStart();
    const outcome = await feed.refillBuffer();
    const durationMs = Date.now() - startTime;

    switch (outcome.status) {
      case 'refilled':
        tracker.recordJobSuccess({ itemsAdded: outcome.added, durationMs });
        if (outcome.added > 0) {
          console.log(`🎉 Background job: Buffered ${outcome.added} new items (${durationMs}ms)`);
        } else if (debugLogger.isEnabled()) {
          console.log(`😴 Background job: No new items for the buffer (${durationMs}ms)`);
        }
        break;
      case 'cancelled':
        tracker.recordJobSuccess({ itemsAdded: 0, durationMs });
        debugLogger.info('JOB', 'Buffer refill was cancelled by a feed reset');
        break;
      case 'failed':
        recordFailure(tracker, `${outcome.error.kind}: ${outcome.error.message}`, durationMs, userMessageFor(outcome.error));
        break;
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    recordFailure(tracker, errorMessage, Date.now() - startTime);
  } finally {
    isJobRunning = false;
  }
}

function recordFailure(tracker: MetricsTracker, errorMessage: string, durationMs: number, userMessage?: string): void {
  tracker.recordJobFailure(errorMessage);
  console.error(`❌ Background job failed: ${errorMessage} (${durationMs}ms)`);
  if (userMessage) {
    debugLogger.warn('JOB', userMessage);
  }

  if (tracker.isCriticalFailureState()) {
    const failures = tracker.getConsecutiveFailures();
    console.error(`🚨 CRITICAL: Background job has failed ${failures} times consecutively!`);
  }
}

/**
 * Check if a buffer warm run is in progress
 */
export function isBufferWarmJobRunning(): boolean {
  return isJobRunning;
}
