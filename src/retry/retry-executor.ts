import { FeedError, classifyError } from '../errors';
import { RetryResult } from '../types';
import { debugLogger } from '../utils/debug-logger';
import { Sleep, sleep as defaultSleep } from '../utils/time';

export interface RetryExecutorOptions {
  /** Delay before the first retry. Default: 2000ms */
  baseDelayMs?: number;
  /** Attempt ceiling used when a call does not pass one. Default: 3 */
  defaultMaxAttempts?: number;
  /** Source of randomness for jitter, returning [0, 1) */
  random?: () => number;
  sleep?: Sleep;
}

const JITTER_MIN = 0.8;
const JITTER_SPAN = 0.4;

/**
 * Runs async operations under a bounded, exponentially backed-off retry
 * policy. Attempts are counted per logical operation id and the counter is
 * shared: concurrent calls with the same id draw from one retry budget.
 */
export class RetryExecutor {
  private readonly attempts = new Map<string, number>();
  private readonly baseDelayMs: number;
  private readonly defaultMaxAttempts: number;
  private readonly random: () => number;
  private readonly sleep: Sleep;

  constructor(options: RetryExecutorOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? 2000;
    this.defaultMaxAttempts = options.defaultMaxAttempts ?? 3;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async executeWithRetry<T>(
    id: string,
    maxAttempts: number | undefined,
    operation: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<RetryResult<T>> {
    const ceiling = Math.max(1, maxAttempts ?? this.defaultMaxAttempts);

    for (;;) {
      // A cancelled call leaves the shared counter to whoever still runs under this id
      if (signal?.aborted) {
        return { ok: false, error: new FeedError('cancelled', `Operation ${id} cancelled`) };
      }

      const attempt = (this.attempts.get(id) ?? 0) + 1;
      this.attempts.set(id, attempt);

      try {
        const value = await operation();
        this.attempts.set(id, 0);
        return { ok: true, value };
      } catch (error) {
        const classified = classifyError(error);
        debugLogger.warn('RETRY', `Operation ${id} failed on attempt ${attempt}/${ceiling}`, {
          kind: classified.kind,
          error: classified.message
        });

        if (signal?.aborted) {
          return { ok: false, error: new FeedError('cancelled', `Operation ${id} cancelled`, { cause: classified }) };
        }

        if (attempt >= ceiling || !classified.retryable) {
          this.attempts.set(id, 0);
          return { ok: false, error: classified };
        }

        const delay = this.getRetryDelay(attempt);
        debugLogger.info('RETRY', `Retrying ${id} after ${Math.round(delay)}ms`, { delay, nextAttempt: attempt + 1 });
        await this.sleep(delay);
      }
    }
  }

  /**
   * baseDelay * 2^(attempt-1) * jitter, with jitter in [0.8, 1.2]
   */
  getRetryDelay(attempt: number): number {
    const multiplier = Math.pow(2, attempt - 1);
    const jitter = JITTER_MIN + this.random() * JITTER_SPAN;
    return this.baseDelayMs * multiplier * jitter;
  }

  getAttemptCount(id: string): number {
    return this.attempts.get(id) ?? 0;
  }

  resetAttempts(id: string): void {
    this.attempts.set(id, 0);
  }
}
