import { debugLogger } from '../utils/debug-logger';

export interface HeapChecker {
  check(): boolean;
}

/**
 * Sample heap usage once; the monitor signals pressure when over its limit.
 */
export function runMemoryCheckJob(monitor: HeapChecker): boolean {
  const underPressure = monitor.check();
  if (underPressure) {
    debugLogger.warn('JOB', 'Memory check signalled pressure');
  }
  return underPressure;
}
