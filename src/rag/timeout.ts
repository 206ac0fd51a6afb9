import { ProviderTimeoutError } from './errors';

/**
 * Run a provider call under a deadline.
 *
 * The task receives an AbortSignal that fires when the deadline passes or
 * the caller's own signal aborts. On expiry the returned promise rejects
 * with ProviderTimeoutError; on caller abort it rejects with the caller's
 * abort reason.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  callerSignal?: AbortSignal
): Promise<T> {
  callerSignal?.throwIfAborted();

  const controller = new AbortController();
  const onCallerAbort = () => controller.abort(callerSignal?.reason);
  callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(controller.signal.reason),
      { once: true }
    );
  });

  const timer = setTimeout(() => {
    controller.abort(new ProviderTimeoutError(operation, timeoutMs));
  }, timeoutMs);

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  }
}
