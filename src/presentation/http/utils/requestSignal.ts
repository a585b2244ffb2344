import type { Response } from 'express';

/**
 * Aborts when the client goes away before the response is written,
 * or after `timeoutMs` when given
 */
export function requestSignal(res: Response, timeoutMs?: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = timeoutMs === undefined ? undefined : setTimeout(() => controller.abort(), timeoutMs);

  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });

  return {
    signal: controller.signal,
    dispose: () => clearTimeout(timer)
  };
}
