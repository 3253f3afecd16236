export type TimedResult<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. Resolves with
 * `{ timedOut: true }` as soon as the deadline passes, whether or not the task
 * honours the signal. Rejections from the task propagate until the deadline;
 * a rejection arriving after it is handed to `onAbandonedError`.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onAbandonedError: (error: unknown) => void
): Promise<TimedResult<T>> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<TimedResult<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ timedOut: true });
    }, timeoutMs);
  });

  const work = Promise.resolve()
    .then(() => task(controller.signal))
    .then((value): TimedResult<T> => ({ timedOut: false, value }));
  work.catch((error: unknown) => {
    if (controller.signal.aborted) {
      onAbandonedError(error);
    }
  });

  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
