import { EventEmitter } from 'events';
import { debugLogger } from '../utils/debug-logger';

export type PressureReason = 'manual' | 'heap';

export interface PressureEvent {
  reason: PressureReason;
  heapUsedBytes: number;
  heapLimitBytes: number;
}

export interface MemoryPressureMonitorOptions {
  /** Heap usage above which `pressure` fires. Default: 512 MiB */
  heapLimitBytes?: number;
  sampleHeapUsed?: () => number;
}

const defaultSample = (): number => process.memoryUsage().heapUsed;

/**
 * Emits `pressure` when asked to (signal()) or when a heap sample exceeds
 * the configured limit. Listeners decide what to release.
 */
export class MemoryPressureMonitor {
  private readonly emitter = new EventEmitter();
  private readonly heapLimitBytes: number;
  private readonly sampleHeapUsed: () => number;
  private timer: NodeJS.Timeout | null = null;
  private pressureCount = 0;

  constructor(options: MemoryPressureMonitorOptions = {}) {
    this.heapLimitBytes = options.heapLimitBytes ?? 512 * 1024 * 1024;
    this.sampleHeapUsed = options.sampleHeapUsed ?? defaultSample;
  }

  onPressure(listener: (event: PressureEvent) => void): () => void {
    this.emitter.on('pressure', listener);
    return () => {
      this.emitter.off('pressure', listener);
    };
  }

  signal(reason: PressureReason = 'manual'): void {
    const event: PressureEvent = {
      reason,
      heapUsedBytes: this.sampleHeapUsed(),
      heapLimitBytes: this.heapLimitBytes,
    };
    this.pressureCount++;
    debugLogger.warn('MEMORY', `Memory pressure (${reason})`, {
      heapUsedMb: toMb(event.heapUsedBytes),
      heapLimitMb: toMb(event.heapLimitBytes),
      listeners: this.emitter.listenerCount('pressure')
    });
    this.emitter.emit('pressure', event);
  }

  /** Sample the heap once; returns true when pressure was signalled */
  check(): boolean {
    const heapUsed = this.sampleHeapUsed();
    if (heapUsed <= this.heapLimitBytes) {
      return false;
    }
    this.signal('heap');
    return true;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.check();
    }, intervalMs);
    this.timer.unref();
    debugLogger.info('MEMORY', `Heap watcher started (every ${intervalMs}ms)`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    debugLogger.info('MEMORY', 'Heap watcher stopped');
  }

  isWatching(): boolean {
    return this.timer !== null;
  }

  getPressureCount(): number {
    return this.pressureCount;
  }
}

function toMb(bytes: number): number {
  return Math.round(bytes / (1024 * 1024));
}
