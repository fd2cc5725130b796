import { DependencyTimeoutError, DependencyUnavailableError } from '../errors';

export interface DeadlineOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs` or when the
 * caller's signal aborts. The returned promise settles at that moment even if
 * the task ignores its signal.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, signal }: DeadlineOptions
): Promise<T> {
  const controller = new AbortController();

  if (signal?.aborted) {
    return Promise.reject(new DependencyUnavailableError('Request was aborted by the caller'));
  }

  return new Promise<T>((resolve, reject) => {
    const onCallerAbort = () => {
      controller.abort();
      settle(() => reject(new DependencyUnavailableError('Request was aborted by the caller')));
    };

    const timer = setTimeout(() => {
      controller.abort();
      settle(() => reject(new DependencyTimeoutError(timeoutMs)));
    }, timeoutMs);

    let settled = false;
    function settle(finish: () => void) {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
      finish();
    }

    signal?.addEventListener('abort', onCallerAbort, { once: true });

    Promise.resolve().then(() => task(controller.signal)).then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error))
    );
  });
}
