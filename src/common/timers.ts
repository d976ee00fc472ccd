// timers.ts - Cancellable waits for the remediation and validation path

export class CancelledError extends Error {
  constructor(message: string = 'cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Suspends for `ms` milliseconds. Rejects with {@link CancelledError} as soon
 * as `signal` aborts, clearing the pending timer.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = (ms, signal) => {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

export interface Deadline {
  signal: AbortSignal;
  /** Releases the timer and detaches from the parent signal. */
  dispose(): void;
}

/**
 * Signal that aborts after `ms` or when `parent` aborts, whichever is first.
 */
export function createDeadline(ms: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();

  const onParentAbort = (): void => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => controller.abort(), Math.max(0, ms));

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}
