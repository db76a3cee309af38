import { DeadlineExceededError } from './errors.js';

/**
 * Runs `work` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with {@link DeadlineExceededError} on expiry even if `work`
 * ignores the signal. The timer is cleared once either side settles.
 */
export const withDeadline = <T>(
  operation: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>
): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  const running = (async () => work(controller.signal))();

  return Promise.race([running, deadline]).finally(() => clearTimeout(timer));
};
