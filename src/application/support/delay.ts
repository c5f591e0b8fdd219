import { CheckAbortedError } from '../errors/CheckErrors.js';

/** Resolves after `ms`, or rejects with {@link CheckAbortedError} as soon as `signal` aborts. */
export const delay = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CheckAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CheckAbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
