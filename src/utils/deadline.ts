/**
 * Cancellation helpers for calls into external collaborators.
 */

import { MAX_TIMEOUT_MS } from '../constants/index.js';

export interface DeadlineOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export class CallTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run `call` with a signal that aborts when the caller's signal aborts or the
 * timeout elapses. The returned promise settles on abort even if `call`
 * ignores its signal; a late result is then dropped.
 */
export async function callWithDeadline<T>(
  call: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions = {}
): Promise<T> {
  const { signal: parent, timeoutMs } = options;
  if (timeoutMs !== undefined && !(timeoutMs > 0 && timeoutMs <= MAX_TIMEOUT_MS)) {
    throw new RangeError(`timeoutMs must be between 1 and ${MAX_TIMEOUT_MS}, got ${timeoutMs}`);
  }

  const controller = new AbortController();

  const forwardAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', forwardAbort, { once: true });
  }

  const timeoutId = timeoutMs !== undefined
    ? setTimeout(() => controller.abort(new CallTimeoutError(timeoutMs)), timeoutMs)
    : undefined;

  try {
    return await new Promise<T>((resolve, reject) => {
      if (controller.signal.aborted) {
        reject(abortReason(controller.signal));
        return;
      }
      controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal)), { once: true });
      call(controller.signal).then(resolve, reject);
    });
  } finally {
    clearTimeout(timeoutId);
    parent?.removeEventListener('abort', forwardAbort);
  }
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }
  const error = new Error(reason === undefined ? 'Operation aborted' : String(reason));
  error.name = 'AbortError';
  return error;
}
