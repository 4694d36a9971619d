import { debugLogger } from './debug-logger';
import { FeedError, classifyError } from '../errors';

export interface TaskGroupOptions {
  /** Maximum number of concurrent tasks. Default: 3 */
  concurrency?: number;
  /** Label for logging purposes */
  label?: string;
  /** Aborting stops new tasks from launching; running tasks receive the same signal */
  signal?: AbortSignal;
}

export interface TaskGroupResult<T> {
  successful: T[];
  failed: Array<{ error: FeedError; index: number }>;
}

/**
 * Run one task per item with a concurrency limit, wait for all of them and
 * collect both outcomes. A failing task never aborts its siblings.
 *
 * @example
 * const { successful, failed } = await runTaskGroup(
 *   categories,
 *   (category, _i, signal) => listMembers(category, signal),
 *   { concurrency: 3, label: 'Category members', signal }
 * );
 */
export async function runTaskGroup<T, R>(
  items: readonly T[],
  fn: (item: T, index: number, signal?: AbortSignal) => Promise<R>,
  options: TaskGroupOptions = {}
): Promise<TaskGroupResult<R>> {
  const { concurrency = 3, label = 'Task group', signal } = options;

  if (items.length === 0) {
    return { successful: [], failed: [] };
  }

  const stepId = debugLogger.stepStart('TASK_GROUP', `${label} (${items.length} tasks, concurrency: ${concurrency})`, {
    taskCount: items.length,
    concurrency
  });

  const successful: R[] = [];
  const failed: Array<{ error: FeedError; index: number }> = [];
  const executing: Promise<void>[] = [];

  for (let i = 0; i < items.length; i++) {
    if (signal?.aborted) {
      failed.push({ error: new FeedError('cancelled', `${label} cancelled`), index: i });
      continue;
    }

    const promise: Promise<void> = fn(items[i], i, signal)
      .then((result) => {
        successful.push(result);
      })
      .catch((error: unknown) => {
        const classified = classifyError(error);
        debugLogger.warn('TASK_GROUP', `${label}: task ${i + 1}/${items.length} failed`, {
          kind: classified.kind,
          error: classified.message
        });
        failed.push({ error: classified, index: i });
      })
      .finally(() => {
        executing.splice(executing.indexOf(promise), 1);
      });

    executing.push(promise);

    if (executing.length >= concurrency) {
      await Promise.race(executing);
    }
  }

  await Promise.all(executing);

  debugLogger.stepFinish(stepId, {
    successful: successful.length,
    failed: failed.length
  });

  return { successful, failed };
}

/**
 * Split an array into chunks of a specified size.
 *
 * @example
 * chunkArray([1,2,3,4,5], 2) // [[1,2], [3,4], [5]]
 */
export function chunkArray<T>(array: readonly T[], chunkSize: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += chunkSize) {
    chunks.push(array.slice(i, i + chunkSize));
  }
  return chunks;
}
