/**
 * Run statistics for the buffer warm job
 */

export interface JobMetrics {
  itemsAdded: number;
  durationMs: number;
}

export interface JobStats {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  skippedRuns: number;
  /** Successful runs that added nothing to the buffer */
  idleRuns: number;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: string | null;
  consecutiveFailures: number;
  averageDurationMs: number;
  totalItemsAdded: number;
}

const CRITICAL_FAILURE_THRESHOLD = 3;

function emptyStats(): JobStats {
  return {
    totalRuns: 0,
    successfulRuns: 0,
    failedRuns: 0,
    skippedRuns: 0,
    idleRuns: 0,
    lastRunAt: null,
    lastSuccessAt: null,
    lastError: null,
    consecutiveFailures: 0,
    averageDurationMs: 0,
    totalItemsAdded: 0,
  };
}

export class MetricsTracker {
  private stats = emptyStats();

  constructor(private readonly criticalThreshold = CRITICAL_FAILURE_THRESHOLD) {}

  recordJobStart(): void {
    this.stats.lastRunAt = new Date();
    this.stats.totalRuns++;
  }

  recordJobSuccess({ itemsAdded, durationMs }: JobMetrics): void {
    const stats = this.stats;
    stats.successfulRuns++;
    stats.consecutiveFailures = 0;
    stats.lastSuccessAt = new Date();
    stats.lastError = null;
    stats.totalItemsAdded += itemsAdded;
    if (itemsAdded === 0) {
      stats.idleRuns++;
    }

    // Running mean over successful runs
    stats.averageDurationMs += (durationMs - stats.averageDurationMs) / stats.successfulRuns;
  }

  recordJobFailure(error: string): void {
    this.stats.failedRuns++;
    this.stats.consecutiveFailures++;
    this.stats.lastError = error;
  }

  /** A run that was skipped because the previous one was still going */
  recordJobSkipped(): void {
    this.stats.skippedRuns++;
  }

  getStats(): JobStats {
    return { ...this.stats };
  }

  /**
   * True once the job has failed criticalThreshold times in a row
   */
  isCriticalFailureState(): boolean {
    return this.stats.consecutiveFailures >= this.criticalThreshold;
  }

  getConsecutiveFailures(): number {
    return this.stats.consecutiveFailures;
  }

  reset(): void {
    this.stats = emptyStats();
  }
}

// Singleton instance
export const metricsTracker = new MetricsTracker();
