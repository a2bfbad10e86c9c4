/**
 * Deadline helpers
 * Cancellation is carried by AbortSignal throughout the pipeline
 */

export class DeadlineExceededError extends Error {
  constructor(message = 'Deadline exceeded') {
    super(message);
    this.name = 'DeadlineExceededError';
  }
}

export interface Deadline {
  signal: AbortSignal;
  /** Release the timer; call once the guarded work has settled */
  dispose: () => void;
}

/**
 * Derive a signal that aborts after timeoutMs or when parent aborts,
 * whichever comes first
 */
export function createDeadline(
  timeoutMs: number,
  parent?: AbortSignal
): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new DeadlineExceededError()),
    timeoutMs
  );

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  if (parent !== undefined) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Wait ms milliseconds; rejects with DeadlineExceededError if signal aborts first
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DeadlineExceededError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new DeadlineExceededError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
