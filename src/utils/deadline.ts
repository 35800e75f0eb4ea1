/**
 * Request deadlines
 *
 * Combines a caller's AbortSignal with a timeout into one signal that can
 * be handed to an SDK `send()` call. The timer is cleared by `dispose()`,
 * so nothing keeps the process alive after the call settles.
 */

/** Per-call options threaded through every network-facing client */
export interface RequestOptions {
  /** Abort the call after this many milliseconds */
  timeoutMs?: number;
  /** Caller-controlled cancellation */
  signal?: AbortSignal;
}

export interface Deadline {
  /** Signal to pass to the SDK, undefined when neither option is set */
  signal?: AbortSignal;
  /** True once the timeout (not the caller) aborted the signal */
  readonly timedOut: boolean;
  /** Clear the timer and detach from the caller's signal */
  dispose(): void;
}

/**
 * Error used as the abort reason when a deadline expires.
 */
export class RequestTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Create a deadline for a single request.
 */
export function createDeadline(options: RequestOptions = {}): Deadline {
  const { timeoutMs, signal } = options;

  if (timeoutMs === undefined && signal === undefined) {
    return { signal: undefined, timedOut: false, dispose: () => {} };
  }

  const controller = new AbortController();
  let timedOut = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = () => controller.abort(signal?.reason);

  if (signal) {
    if (signal.aborted) {
      controller.abort(signal.reason);
    } else {
      signal.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new RequestTimeoutError(timeoutMs));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    get timedOut() {
      return timedOut;
    },
    dispose() {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Run `fn` with a deadline signal. When the deadline fired, the error is
 * replaced by a RequestTimeoutError so it classifies as transient.
 */
export async function withDeadline<T>(
  options: RequestOptions,
  fn: (signal: AbortSignal | undefined) => Promise<T>
): Promise<T> {
  const deadline = createDeadline(options);
  try {
    return await fn(deadline.signal);
  } catch (error) {
    if (deadline.timedOut && options.timeoutMs !== undefined) {
      throw new RequestTimeoutError(options.timeoutMs);
    }
    throw error;
  } finally {
    deadline.dispose();
  }
}
