import { CallAbortedError, CallTimeoutError } from './errors.js';

export interface CallOptions {
  /** Cancels the call; the pending promise rejects with CallAbortedError. */
  signal?: AbortSignal;
  /** Per-call deadline. No deadline when omitted or not positive. */
  timeoutMs?: number;
}

/**
 * Runs one external call under an optional deadline and cancellation signal.
 * The task receives a signal that aborts on either, so it can release its own resources.
 */
export async function runWithDeadline<T>(
  label: string,
  task: (signal: AbortSignal) => Promise<T>,
  options: CallOptions = {},
): Promise<T> {
  const { signal, timeoutMs } = options;
  if (signal?.aborted) {
    throw new CallAbortedError(label);
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    if (timeoutMs !== undefined && timeoutMs > 0) {
      timer = setTimeout(() => {
        reject(new CallTimeoutError(label, timeoutMs));
        controller.abort();
      }, timeoutMs);
    }
    if (signal) {
      onAbort = () => {
        reject(new CallAbortedError(label));
        controller.abort();
      };
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guard]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
