/**
 * Background job scheduler using node-cron
 */

import * as cron from 'node-cron';
import { runBufferWarmJob, isBufferWarmJobRunning, WarmableFeed } from './buffer-warm-job';
import { runMemoryCheckJob, HeapChecker } from './memory-check-job';
import { MetricsTracker, metricsTracker } from './metrics-tracker';

// Cron expressions: buffer warm every 15 minutes, heap sample every minute
export const BUFFER_WARM_CRON = '*/15 * * * *';
export const MEMORY_CHECK_CRON = '*/1 * * * *';

export interface SchedulerContext {
  feed: WarmableFeed;
  monitor: HeapChecker;
  tracker?: MetricsTracker;
  /** Run the buffer warm job once right away. Default: true */
  runImmediately?: boolean;
}

let scheduledTasks: cron.ScheduledTask[] = [];

/**
 * Start the background job scheduler
 */
export function startJobScheduler(context: SchedulerContext): void {
  if (scheduledTasks.length > 0) {
    console.warn('Job scheduler is already running');
    return;
  }

  for (const expression of [BUFFER_WARM_CRON, MEMORY_CHECK_CRON]) {
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression: ${expression}`);
    }
  }

  const tracker = context.tracker ?? metricsTracker;

  scheduledTasks = [
    cron.schedule(BUFFER_WARM_CRON, async () => {
      await runBufferWarmJob(context.feed, tracker);
    }),
    cron.schedule(MEMORY_CHECK_CRON, () => {
      runMemoryCheckJob(context.monitor);
    }),
  ];

  console.log('🤖 Background job scheduler started (buffer warm every 15 minutes, memory check every minute)');

  if (context.runImmediately ?? true) {
    runBufferWarmJob(context.feed, tracker).catch((error: unknown) => {
      console.error('Error in initial job run:', error);
    });
  }
}

/**
 * Stop the background job scheduler
 */
export function stopJobScheduler(): void {
  if (scheduledTasks.length === 0) {
    console.warn('Job scheduler is not running');
    return;
  }

  for (const task of scheduledTasks) {
    task.stop();
  }
  scheduledTasks = [];

  console.log('Background job scheduler stopped');
}

/**
 * Gracefully shutdown: stop scheduler and wait for current job to finish
 */
export async function gracefulShutdown(maxWaitTime = 30000): Promise<void> {
  console.log('Stopping background job scheduler...');

  if (scheduledTasks.length > 0) {
    stopJobScheduler();
  }

  const startWait = Date.now();
  while (isBufferWarmJobRunning() && Date.now() - startWait < maxWaitTime) {
    await new Promise((resolve) => setTimeout(resolve, 100));
  }

  if (isBufferWarmJobRunning()) {
    console.warn('Background job did not finish within timeout period');
  } else {
    console.log('Background job scheduler shut down gracefully');
  }
}

export interface SchedulerStatus {
  isRunning: boolean;
  cronExpressions: { bufferWarm: string; memoryCheck: string };
  isJobCurrentlyExecuting: boolean;
}

/**
 * Get scheduler status
 */
export function getSchedulerStatus(): SchedulerStatus {
  return {
    isRunning: scheduledTasks.length > 0,
    cronExpressions: { bufferWarm: BUFFER_WARM_CRON, memoryCheck: MEMORY_CHECK_CRON },
    isJobCurrentlyExecuting: isBufferWarmJobRunning(),
  };
}
