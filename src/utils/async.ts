import { EngineTimeoutError } from '../core/errors.js';

/**
 * Run an abortable task under a deadline. When the deadline passes the task's
 * signal is aborted and the returned promise rejects with EngineTimeoutError,
 * whether or not the task honours the signal.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  target: string,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new EngineTimeoutError(target, ms));
    }, ms);

    task(controller.signal)
      .then(value => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch(err => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
