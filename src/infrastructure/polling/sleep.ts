import { setTimeout as delay } from 'timers/promises';
import { CancelledError } from '../../domain/errors';

/**
 * Waits `ms`, rejecting with CancelledError as soon as `signal` aborts
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (ms, signal) => {
  throwIfCancelled(signal);
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    throw error;
  }
};

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
