import type { RelayError } from '../core/errors.js';
import { err, ok, type Result } from '../core/result.js';
import { classifyProviderError } from './errors.js';

export class ProviderTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}

export interface CallOptions<T> {
  /**
   * Receives the eventual result of a call that already timed out, so side
   * effects it leaves behind (a downloaded file) can be undone.
   */
  onLateResult?: (late: Result<T, RelayError>) => void | Promise<void>;
}

/**
 * Run one provider operation under its own timeout and classify any failure.
 * A timeout becomes a `timeout` error, which the engine treats as transient.
 */
export async function callProvider<T>(
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>,
  options: CallOptions<T> = {}
): Promise<Result<T, RelayError>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ProviderTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  let pending: Promise<T> | null = null;
  try {
    pending = fn();
    const value = await Promise.race([pending, timeout]);
    return ok(value);
  } catch (error) {
    if (error instanceof ProviderTimeoutError) {
      const onLateResult = options.onLateResult;
      if (pending && onLateResult) {
        void pending.then(
          (value) => onLateResult(ok(value)),
          (lateError: unknown) => onLateResult(err(classifyProviderError(lateError)))
        );
      }
      return err({ kind: 'timeout', detail: error.message, retryAfterMs: null });
    }
    return err(classifyProviderError(error));
  } finally {
    clearTimeout(timer);
  }
}
