/**
 * @fileoverview Abortable delays for long-running commands.
 *
 * @module engine/timing
 */

import { InterruptedError } from './errors';

/**
 * Wait `ms` milliseconds. Rejects with InterruptedError as soon as `signal`
 * is aborted, and immediately if it already is.
 */
export function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.reject(new InterruptedError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new InterruptedError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
