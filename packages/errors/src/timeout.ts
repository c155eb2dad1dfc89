import { TimeoutError } from "./errors.js";

/**
 * Run `fn` and reject with a {@link TimeoutError} if it has not settled within
 * `timeoutMs`. The signal passed to `fn` is aborted on timeout so HTTP calls
 * can be cancelled.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs);
      // Reject before aborting so the race settles with the timeout, not with
      // whatever `fn` rejects with once cancelled.
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
