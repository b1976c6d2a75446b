/**
 * Abort / sleep / timeout helpers shared by the HTTP transport and the
 * rate limiter.
 */

export type SleepFn = (ms: number, signal?: AbortSignal | null) => Promise<void>;

export class RequestAbortError extends Error {
  readonly httpStatus = 499;

  constructor(message = 'Request aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function sleepWithAbort(ms: number, signal?: AbortSignal | null): Promise<void> {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  return new Promise((resolve, reject) => {
    let settled = false;
    const done = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      fn();
    };
    const onAbort = () => done(() => reject(new RequestAbortError('Request aborted while waiting')));
    const timer = setTimeout(() => done(resolve), waitMs);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

export function linkAbortSignalToController(parentSignal: AbortSignal | null, controller: AbortController): () => void {
  if (!parentSignal) return () => {};
  const forwardAbort = () => controller.abort();
  if (parentSignal.aborted) {
    forwardAbort();
    return () => {};
  }
  parentSignal.addEventListener('abort', forwardAbort, { once: true });
  return () => {
    parentSignal.removeEventListener('abort', forwardAbort);
  };
}

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs` (or when the
 * parent signal aborts). `onTimeout` builds the error thrown on expiry.
 */
export async function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: { timeoutMs: number; signal?: AbortSignal | null; onTimeout: () => Error },
): Promise<T> {
  const parentSignal = options.signal || null;
  if (parentSignal && parentSignal.aborted) {
    throw new RequestAbortError();
  }
  const controller = new AbortController();
  const unlinkAbort = linkAbortSignalToController(parentSignal, controller);

  let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutTimer = setTimeout(() => {
      controller.abort();
      reject(options.onTimeout());
    }, Math.max(1, Math.floor(options.timeoutMs)));
  });

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    if (timeoutTimer) clearTimeout(timeoutTimer);
    unlinkAbort();
  }
}
