export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(message: string = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * Races `task` against a timer. When the timer wins, `onTimeout` runs (used to
 * abort the underlying request) and the returned promise rejects with a
 * TimeoutError. A late settlement of `task` is ignored.
 */
export function withTimeout<T>(task: Promise<T>, timeoutMs: number, onTimeout?: () => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timeoutId = setTimeout(() => {
      if (settled) return;
      settled = true;
      onTimeout?.();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);

    task.then(
      (value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        reject(error);
      }
    );
  });
}

/**
 * Rejects as soon as `signal` aborts, otherwise mirrors `task`.
 */
export function raceAbort<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new AbortedError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError());
    signal.addEventListener('abort', onAbort, { once: true });

    task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortedError());
  }

  const delay = new Promise<void>((resolve) => {
    const timeoutId = setTimeout(resolve, ms);
    signal?.addEventListener('abort', () => clearTimeout(timeoutId), { once: true });
  });
  return signal ? raceAbort(delay, signal) : delay;
}

/**
 * Aborts `controller` when any of `signals` aborts. Returns a function that
 * detaches the listeners.
 */
export function linkSignals(controller: AbortController, signals: Array<AbortSignal | undefined>): () => void {
  const onAbort = () => controller.abort();
  const linked = signals.filter((signal): signal is AbortSignal => signal !== undefined);

  for (const signal of linked) {
    if (signal.aborted) {
      controller.abort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  }

  return () => {
    for (const signal of linked) {
      signal.removeEventListener('abort', onAbort);
    }
  };
}
