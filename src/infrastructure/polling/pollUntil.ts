import { type Sleeper, throwIfCancelled } from './sleep';

export interface PollOptions<T> {
  attempts: number;
  intervalMs: number;
  /**
   * One status check; resolves null while the remote side is not ready yet.
   * A rejection ends polling immediately.
   */
  probe: (attempt: number) => Promise<T | null>;
  sleep: Sleeper;
  signal?: AbortSignal;
  onExhausted: () => Error;
}

/**
 * Bounded polling loop: probe, then wait `intervalMs`, at most `attempts` times.
 * No wait follows the final attempt.
 */
export async function pollUntil<T>(options: PollOptions<T>): Promise<T> {
  const { attempts, intervalMs, probe, sleep, signal } = options;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    throwIfCancelled(signal);

    const result = await probe(attempt);
    if (result !== null) {
      return result;
    }

    throwIfCancelled(signal);
    if (attempt < attempts) {
      await sleep(intervalMs, signal);
    }
  }

  throw options.onExhausted();
}
