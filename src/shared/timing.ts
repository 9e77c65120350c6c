// Timing helpers shared by the supervisor and agents

/**
 * Sleep for `ms`, waking early when `signal` aborts.
 * Resolves true when the full delay elapsed, false when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race `promise` against a timer. The timer rejects with the error built by
 * `onTimeout`; the original promise keeps running and its outcome is ignored.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  if (!Number.isFinite(ms)) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export interface Backoff {
  next(): number;
  reset(): void;
  readonly current: number;
}

/** Exponential backoff: initial, doubled per attempt, capped at max. */
export class ExponentialBackoff implements Backoff {
  private attempt = 0;

  constructor(
    private readonly initialMs: number,
    private readonly maxMs: number,
    private readonly factor: number = 2
  ) {}

  get current(): number {
    return Math.min(this.initialMs * Math.pow(this.factor, Math.max(0, this.attempt - 1)), this.maxMs);
  }

  next(): number {
    this.attempt++;
    return this.current;
  }

  reset(): void {
    this.attempt = 0;
  }
}

export interface LinkedController {
  readonly controller: AbortController;
  /** Detach from the parent signal. */
  dispose(): void;
}

/** An AbortController that also aborts when `parent` does, until disposed. */
export function linkedController(parent: AbortSignal): LinkedController {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(parent.reason);

  if (parent.aborted) onAbort();
  else parent.addEventListener('abort', onAbort, { once: true });

  return {
    controller,
    dispose: () => parent.removeEventListener('abort', onAbort),
  };
}
