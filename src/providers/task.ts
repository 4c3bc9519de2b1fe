import { ProviderTimeoutError } from '../errors.js';

export type CancellableTask<T> = (signal: AbortSignal) => Promise<T>;

export class TaskCancelledError extends Error {
  constructor() {
    super('Task cancelled by caller');
    this.name = 'TaskCancelledError';
  }
}

/**
 * Run a task with its own AbortSignal and a deadline.
 *
 * When the timeout elapses (or the parent signal aborts) the task's signal is
 * aborted, which cancels the underlying request, and the returned promise
 * rejects immediately even if the task ignores the signal.
 *
 * @throws ProviderTimeoutError when the timeout elapses first
 * @throws TaskCancelledError when the parent signal aborts first
 */
export async function runCancellable<T>(
  task: CancellableTask<T>,
  options: { timeoutMs: number; label: string; signal?: AbortSignal }
): Promise<T> {
  const { timeoutMs, label, signal: parent } = options;
  if (parent?.aborted) {
    throw new TaskCancelledError();
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const stopped = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new ProviderTimeoutError(label, timeoutMs));
      controller.abort();
    }, timeoutMs);
    onParentAbort = () => {
      reject(new TaskCancelledError());
      controller.abort();
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([task(controller.signal), stopped]);
  } finally {
    clearTimeout(timeoutId);
    if (onParentAbort) {
      parent?.removeEventListener('abort', onParentAbort);
    }
  }
}
