import type { SleepOutcome } from './types/Run.js';

/**
 * Wait `ms` milliseconds, resolving early with 'interrupted' when the signal aborts.
 * Never rejects.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<SleepOutcome> =>
  new Promise(resolve => {
    if (signal?.aborted) {
      resolve('interrupted');
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve('interrupted');
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve('elapsed');
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
