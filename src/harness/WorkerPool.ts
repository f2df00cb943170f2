import { throwIfAborted } from '../common/utils';
import { Stage } from '../types';

export interface WorkerPoolOptions {
  concurrency: number;
  signal?: AbortSignal;
  stage?: Stage;
}

/**
 * Runs `count` indexed tasks on at most `concurrency` workers. Workers pull
 * the next index as they finish, so no more than `concurrency` tasks are ever
 * in flight. The first task rejection stops new tasks from starting and is
 * rethrown once running tasks have settled.
 */
export async function runBounded(
  count: number,
  task: (index: number) => Promise<void>,
  options: WorkerPoolOptions
): Promise<void> {
  const workers = Math.max(1, Math.min(options.concurrency, count));
  const stage = options.stage ?? 'read';
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < count) {
      throwIfAborted(options.signal, stage);
      const index = next++;
      try {
        await task(index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  if (count <= 0) return;

  const results = await Promise.allSettled(Array.from({ length: workers }, () => worker()));
  const rejection = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (rejection) {
    throw rejection.reason;
  }
}
